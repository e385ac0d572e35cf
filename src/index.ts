/**
 * cupsmith
 *
 * Lifecycle and consistency tooling for custom PvPoke cups.
 *
 * @packageDocumentation
 */

// Errors
export {
  CupError,
  NotFoundError,
  AlreadyExistsError,
  MissingFieldError,
  ParseError,
  PartialFailureError,
  isCupError,
} from './core/errors.js';
export type { CupErrorCode, PartialFailureReport } from './core/errors.js';

// Types and schemas
export {
  CP_TIERS,
  RANKING_CATEGORIES,
  isCpTier,
  isRankingCategory,
  defaultTitle,
  silentLogger,
} from './core/types.js';
export type {
  CpTier,
  RankingCategory,
  ArtifactRef,
  ArtifactGroup,
  DiagnosticLogger,
} from './core/types.js';
export {
  CodenameSchema,
  CpTierSchema,
  CupDefinitionSchema,
  FormatsEntrySchema,
  FormatsFileSchema,
  RankedEntrySchema,
  SpeciesRecordSchema,
} from './core/schemas.js';
export type { CupDefinition, FormatsEntry, RankedEntry, SpeciesRecord } from './core/schemas.js';

// Store and registry
export { CupStore, assertCodename } from './store/cup-store.js';
export {
  FormatsRegistry,
  upsertEntry,
  removeEntry,
  renameEntry,
  deriveEntry,
} from './registry/formats-registry.js';

// Lifecycle
export {
  CupLifecycleManager,
  BUILTIN_FORMATS_TEMPLATE,
  withIdentity,
} from './lifecycle/cup-lifecycle-manager.js';
export type { CreateCupInput, LifecycleManagerOptions } from './lifecycle/cup-lifecycle-manager.js';
export { runPlan } from './lifecycle/steps.js';
export type {
  LifecycleOperation,
  LifecycleStep,
  StepPlan,
  RunOptions,
  LifecycleResult,
} from './lifecycle/steps.js';

// Derivations
export { parseThreatGroup, filterThreatGroup, filterThreatGroupFiles } from './derive/threat-group.js';
export {
  leagueLabel,
  buildZygardeConfig,
  generateZygardeConfig,
  DEFAULT_NAME_SUFFIX,
} from './derive/zygarde-config.js';
export type { ZygardeConfig, ZygardeSource, ZygardeOptions } from './derive/zygarde-config.js';
export {
  eligibleSpecies,
  buildMovesetOverrides,
  importMovesetOverrides,
} from './derive/overrides-importer.js';
export type { MovesetOverride, ImportOptions, ImportResult } from './derive/overrides-importer.js';

// Distribution
export { ArchivePackager } from './distribution/archive-packager.js';
export type { PackagerOptions, PackageResult } from './distribution/archive-packager.js';
export { CupArchive } from './distribution/cup-archive.js';
export type { SnapshotKind, ArchiveIssue, ArchiveInspection } from './distribution/cup-archive.js';

// Merge
export { MergeConflictResolver, DEFAULT_RESOLVER_PATHS } from './merge/conflict-resolver.js';
export type {
  WorkingTree,
  MergeSide,
  Resolution,
  ResolutionRule,
  ResolverPaths,
  ResolverOptions,
} from './merge/conflict-resolver.js';
export { GitWorkingTree } from './merge/git-working-tree.js';

/**
 * Cup Core Types
 *
 * Fixed enumerations (CP tiers, ranking categories) and the shapes shared by
 * the store, registry, lifecycle and derivation modules.
 *
 * @module core/types
 */

// ============================================================================
// Enumerations
// ============================================================================

/**
 * CP caps a cup can be ranked at
 */
export const CP_TIERS = [500, 1500, 2500, 10000] as const;

export type CpTier = (typeof CP_TIERS)[number];

/**
 * Ranking categories produced by the ranker, one directory each
 */
export const RANKING_CATEGORIES = [
  'attackers',
  'chargers',
  'closers',
  'consistency',
  'leads',
  'overall',
  'switches',
] as const;

export type RankingCategory = (typeof RANKING_CATEGORIES)[number];

export function isCpTier(value: unknown): value is CpTier {
  return typeof value === 'number' && (CP_TIERS as readonly number[]).includes(value);
}

export function isRankingCategory(value: string): value is RankingCategory {
  return (RANKING_CATEGORIES as readonly string[]).includes(value);
}

// ============================================================================
// Artifacts
// ============================================================================

/**
 * One physical artifact of a cup
 */
export type ArtifactRef =
  | { readonly kind: 'definition' }
  | { readonly kind: 'overrides'; readonly cpTier: CpTier }
  | { readonly kind: 'group' }
  | { readonly kind: 'rankings'; readonly category: RankingCategory; readonly cpTier: CpTier };

/**
 * Artifact groups a lifecycle operation moves as a unit
 */
export type ArtifactGroup = 'definition' | 'overrides' | 'group' | 'rankings' | 'registry';

// ============================================================================
// Diagnostics
// ============================================================================

/**
 * Minimal logger accepted by library components.
 *
 * The CLI logger satisfies it; library callers may pass nothing and get
 * silence.
 */
export interface DiagnosticLogger {
  debug(message: string, metadata?: Readonly<Record<string, unknown>>): void;
  info(message: string, metadata?: Readonly<Record<string, unknown>>): void;
  warn(message: string, metadata?: Readonly<Record<string, unknown>>): void;
  error(message: string, metadata?: Readonly<Record<string, unknown>>): void;
}

export const silentLogger: DiagnosticLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Default display title for a codename: first letter upper-cased
 */
export function defaultTitle(codename: string): string {
  return codename.length === 0 ? codename : codename[0].toUpperCase() + codename.slice(1);
}

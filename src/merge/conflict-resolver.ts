/**
 * Merge Conflict Resolver
 *
 * Settles the conflicts left by merging upstream data into a locally
 * customized deployment. Local cup registrations win; everything the
 * upstream ranker regenerates is taken from upstream; the full gamemaster
 * is backed up and reset so it gets rebuilt.
 *
 * Rules apply in order and each sees only the paths earlier rules left
 * unresolved:
 *
 * 1. deleted upstream, modified locally: remove
 * 2. formats registry: keep local
 * 3. minified gamemaster: take upstream
 * 4. any `rankings-*.json`: take upstream
 * 5. full gamemaster: back up, reset to `[]`
 * 6. anything else: take upstream
 *
 * The whole tree is staged afterwards.
 *
 * @module merge/conflict-resolver
 */

import { silentLogger, type DiagnosticLogger } from '../core/types.js';
import { dashedStamp } from '../core/utils/timestamp.js';

// ============================================================================
// Working tree port
// ============================================================================

export type MergeSide = 'ours' | 'theirs';

/**
 * Operations the resolver needs from a conflicted working tree. Paths are
 * relative to the tree root, with forward slashes.
 */
export interface WorkingTree {
  /** Paths with unresolved conflicts */
  unmergedPaths(): string[];
  /** Unmerged paths deleted upstream and modified locally */
  deletedUpstream(): string[];
  /** Delete the path and record the deletion */
  remove(path: string): void;
  /** Replace the path with one side of the merge */
  checkout(path: string, side: MergeSide): void;
  /** Move a file without staging */
  move(from: string, to: string): void;
  writeFile(path: string, content: string): void;
  stage(paths: readonly string[]): void;
  stageAll(): void;
}

// ============================================================================
// Resolver
// ============================================================================

export type ResolutionRule =
  | 'deleted-upstream'
  | 'keep-local-formats'
  | 'take-upstream-minified'
  | 'take-upstream-rankings'
  | 'reset-gamemaster'
  | 'take-upstream';

export interface Resolution {
  readonly path: string;
  readonly rule: ResolutionRule;
  readonly backupPath?: string;
}

export interface ResolverPaths {
  readonly formats: string;
  readonly gamemasterMin: string;
  readonly gamemaster: string;
  readonly rankings: RegExp;
}

export const DEFAULT_RESOLVER_PATHS: ResolverPaths = {
  formats: 'src/data/gamemaster/formats.json',
  gamemasterMin: 'src/data/gamemaster.min.json',
  gamemaster: 'src/data/gamemaster.json',
  rankings: /rankings-.*\.json/,
};

export interface ResolverOptions {
  readonly paths?: Partial<ResolverPaths>;
  readonly now?: () => Date;
  readonly logger?: DiagnosticLogger;
}

export class MergeConflictResolver {
  private readonly paths: ResolverPaths;
  private readonly now: () => Date;
  private readonly logger: DiagnosticLogger;

  constructor(
    private readonly tree: WorkingTree,
    options: ResolverOptions = {}
  ) {
    this.paths = { ...DEFAULT_RESOLVER_PATHS, ...options.paths };
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  resolve(): Resolution[] {
    const resolutions: Resolution[] = [];
    const pending = new Set(this.tree.unmergedPaths());

    const settle = (path: string, rule: ResolutionRule, backupPath?: string): void => {
      pending.delete(path);
      resolutions.push(backupPath === undefined ? { path, rule } : { path, rule, backupPath });
      this.logger.info(`Resolved ${path}`, { rule, ...(backupPath ? { backupPath } : {}) });
    };

    const takeSide = (path: string, side: MergeSide, rule: ResolutionRule): void => {
      this.tree.checkout(path, side);
      this.tree.stage([path]);
      settle(path, rule);
    };

    for (const path of this.tree.deletedUpstream()) {
      if (pending.has(path)) {
        this.tree.remove(path);
        settle(path, 'deleted-upstream');
      }
    }

    if (pending.has(this.paths.formats)) {
      takeSide(this.paths.formats, 'ours', 'keep-local-formats');
    }

    if (pending.has(this.paths.gamemasterMin)) {
      takeSide(this.paths.gamemasterMin, 'theirs', 'take-upstream-minified');
    }

    for (const path of [...pending].filter((candidate) => this.paths.rankings.test(candidate))) {
      takeSide(path, 'theirs', 'take-upstream-rankings');
    }

    if (pending.has(this.paths.gamemaster)) {
      const gamemaster = this.paths.gamemaster;
      const backupPath = `${gamemaster}.${dashedStamp(this.now())}.bak`;
      this.tree.move(gamemaster, backupPath);
      this.tree.writeFile(gamemaster, '[]\n');
      this.tree.stage([gamemaster, backupPath]);
      settle(gamemaster, 'reset-gamemaster', backupPath);
    }

    for (const path of [...pending]) {
      takeSide(path, 'theirs', 'take-upstream');
    }

    this.tree.stageAll();
    this.logger.debug('Staged working tree', { resolved: resolutions.length });
    return resolutions;
  }
}

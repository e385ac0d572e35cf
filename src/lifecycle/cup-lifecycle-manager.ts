/**
 * Cup Lifecycle Manager
 *
 * Create, clone, rename and delete cups across all of their artifacts:
 * definition, overrides subtree, group record, rankings subtree and the
 * formats registry entry. Each operation checks its preconditions up front,
 * builds a step plan, and hands it to the step runner.
 *
 * CONCURRENCY: there is no locking. Callers must serialize operations per
 * (root, codename); two clones of the same source, or a rename racing a
 * delete, interleave without protection.
 *
 * @module lifecycle/cup-lifecycle-manager
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { AlreadyExistsError, NotFoundError } from '../core/errors.js';
import { CupDefinitionSchema, type CupDefinition, type FormatsEntry } from '../core/schemas.js';
import { RANKING_CATEGORIES, type CpTier, type DiagnosticLogger } from '../core/types.js';
import { atomicWriteJSONSync } from '../core/utils/atomic-write.js';
import { parseJsonText, readJsonFile } from '../core/utils/json-file.js';
import { compactStamp } from '../core/utils/timestamp.js';
import { deriveEntry, type FormatsRegistry } from '../registry/formats-registry.js';
import { assertCodename, type CupStore } from '../store/cup-store.js';
import {
  copyStep,
  moveStep,
  mutateStep,
  removeStep,
  writeJsonStep,
  writeJsonTreeStep,
} from './fs-steps.js';
import { runPlan, type LifecycleResult, type LifecycleStep, type StepPlan } from './steps.js';

// ============================================================================
// Types
// ============================================================================

export interface CreateCupInput {
  readonly codename: string;
  readonly title: string;
  readonly cpTier: CpTier;
  /** JSON object text or an already-parsed definition; defaults to `{}` */
  readonly definitionBody?: string | CupDefinition;
  /** Registry entry to derive the new entry from (overrides the manager default) */
  readonly template?: string;
}

export interface LifecycleManagerOptions {
  /** Restore touched paths when a step fails (default: true) */
  readonly rollback?: boolean;
  readonly dryRun?: boolean;
  /** Codename whose registry entry seeds new entries; unset uses the built-in template */
  readonly templateCup?: string;
  /** Copy formats.json to gamemaster/formats-bu before create */
  readonly backupFormats?: boolean;
  readonly logger?: DiagnosticLogger;
  readonly now?: () => Date;
}

/**
 * Registry entry used by create when no template cup is designated
 */
export const BUILTIN_FORMATS_TEMPLATE: FormatsEntry = {
  cup: 'custom',
  title: 'Custom',
  cp: 1500,
  meta: 'custom',
  showCup: true,
  showFormat: true,
  showMeta: true,
};

/**
 * Set codename and title on a definition. Existing keys keep their
 * position; absent ones are placed first.
 */
export function withIdentity(definition: CupDefinition, codename: string, title: string): CupDefinition {
  const ordered: CupDefinition = {
    ...('name' in definition ? {} : { name: codename }),
    ...('title' in definition ? {} : { title }),
    ...definition,
  };
  return { ...ordered, name: codename, title };
}

// ============================================================================
// Manager
// ============================================================================

export class CupLifecycleManager {
  constructor(
    private readonly store: CupStore,
    private readonly registry: FormatsRegistry,
    private readonly options: LifecycleManagerOptions = {}
  ) {}

  // --------------------------------------------------------------------------
  // Operations
  // --------------------------------------------------------------------------

  create(input: CreateCupInput): LifecycleResult {
    return this.execute(this.planCreate(input));
  }

  clone(oldCodename: string, newCodename: string, newTitle: string): LifecycleResult {
    return this.execute(this.planClone(oldCodename, newCodename, newTitle));
  }

  rename(oldCodename: string, newCodename: string, newTitle: string): LifecycleResult {
    return this.execute(this.planRename(oldCodename, newCodename, newTitle));
  }

  delete(codename: string): LifecycleResult {
    return this.execute(this.planDelete(codename));
  }

  // --------------------------------------------------------------------------
  // Plans
  // --------------------------------------------------------------------------

  planCreate(input: CreateCupInput): StepPlan {
    const codename = assertCodename(input.codename);
    const { title, cpTier } = input;

    const definitionPath = this.store.pathFor(codename, { kind: 'definition' });
    const groupPath = this.store.pathFor(codename, { kind: 'group' });
    const overridesPath = this.store.pathFor(codename, { kind: 'overrides', cpTier });
    const rankingFiles = RANKING_CATEGORIES.map(
      (category) => [this.store.pathFor(codename, { kind: 'rankings', category, cpTier }), []] as const
    );

    // A stray registry entry or leftover files are repaired by the steps below
    if (existsSync(definitionPath)) {
      throw new AlreadyExistsError(`Cup '${codename}' is already defined`, [definitionPath]);
    }

    const body =
      typeof input.definitionBody === 'string'
        ? parseJsonText(input.definitionBody, CupDefinitionSchema, 'definition body')
        : (input.definitionBody ?? {});
    const entry: FormatsEntry = {
      ...deriveEntry(this.resolveTemplate(input.template), codename, title),
      cp: cpTier,
      meta: codename,
    };

    const steps: LifecycleStep[] = [];
    if (this.options.backupFormats && this.registry.exists()) {
      const backupDir = this.store.formatsBackupDir();
      const stamp = compactStamp(this.now());
      steps.push(
        mutateStep('backup-formats', [join(backupDir, `formats-${stamp}.json`)], () => {
          this.registry.backup(backupDir, stamp);
        })
      );
    }
    steps.push(
      writeJsonStep('write-definition', definitionPath, withIdentity(body, codename, title)),
      mutateStep('upsert-formats-entry', [this.registry.path], () => this.registry.upsert(entry)),
      writeJsonStep('write-group', groupPath, []),
      writeJsonStep('write-overrides', overridesPath, []),
      writeJsonTreeStep('write-rankings', this.store.rankingsDir(codename), rankingFiles)
    );

    return { operation: 'create', codename, steps };
  }

  planClone(oldCodename: string, newCodename: string, newTitle: string): StepPlan {
    const source = this.requirePresent(oldCodename);
    const target = this.requireAbsent(newCodename);

    const steps: LifecycleStep[] = [];
    if (existsSync(source.overrides)) {
      steps.push(copyStep('copy-overrides', source.overrides, target.overrides));
    }
    if (existsSync(source.rankings)) {
      steps.push(copyStep('copy-rankings', source.rankings, target.rankings));
    }
    steps.push({
      name: 'write-definition',
      touches: [target.definition],
      writes: [target.definition],
      run: () => {
        const definition = readJsonFile(source.definition, CupDefinitionSchema);
        atomicWriteJSONSync(target.definition, withIdentity(definition, newCodename, newTitle));
      },
    });
    if (existsSync(source.group)) {
      steps.push(copyStep('copy-group', source.group, target.group));
    }
    steps.push(
      mutateStep('append-formats-entry', [this.registry.path], () => {
        this.registry.cloneEntry(oldCodename, newCodename, newTitle);
      })
    );

    return { operation: 'clone', codename: newCodename, steps };
  }

  planRename(oldCodename: string, newCodename: string, newTitle: string): StepPlan {
    const source = this.requirePresent(oldCodename);
    const target = this.requireAbsent(newCodename);

    const steps: LifecycleStep[] = [];
    if (existsSync(source.overrides)) {
      steps.push(moveStep('move-overrides', source.overrides, target.overrides));
    }
    if (existsSync(source.group)) {
      steps.push(moveStep('move-group', source.group, target.group));
    }
    if (existsSync(source.rankings)) {
      steps.push(moveStep('move-rankings', source.rankings, target.rankings));
    }
    steps.push(
      moveStep('move-definition', source.definition, target.definition),
      mutateStep('relabel-definition', [target.definition], () => {
        const definition = readJsonFile(target.definition, CupDefinitionSchema);
        atomicWriteJSONSync(target.definition, withIdentity(definition, newCodename, newTitle));
      }),
      mutateStep('relabel-formats-entry', [this.registry.path], () => {
        this.registry.renameCup(oldCodename, newCodename, newTitle);
      })
    );

    return { operation: 'rename', codename: newCodename, steps };
  }

  planDelete(codename: string): StepPlan {
    const paths = this.artifactPaths(codename);

    const steps: LifecycleStep[] = [];
    if (existsSync(paths.overrides)) {
      steps.push(removeStep('remove-overrides', paths.overrides));
    }
    if (existsSync(paths.rankings)) {
      steps.push(removeStep('remove-rankings', paths.rankings));
    }
    if (existsSync(paths.definition)) {
      steps.push(removeStep('remove-definition', paths.definition));
    }
    if (existsSync(paths.group)) {
      steps.push(removeStep('remove-group', paths.group));
    }
    if (this.registry.has(codename)) {
      steps.push(
        mutateStep('remove-formats-entry', [this.registry.path], () => {
          this.registry.remove(codename);
        })
      );
    }

    return { operation: 'delete', codename, steps };
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private execute(plan: StepPlan): LifecycleResult {
    const logger = this.options.logger;
    logger?.debug(`Planned ${plan.operation} ${plan.codename}`, {
      steps: plan.steps.map((step) => step.name),
    });
    return runPlan(plan, {
      rollback: this.options.rollback,
      dryRun: this.options.dryRun,
      logger,
    });
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }

  private resolveTemplate(override: string | undefined): FormatsEntry {
    const template = override ?? this.options.templateCup;
    return template === undefined ? BUILTIN_FORMATS_TEMPLATE : this.registry.findByCup(template);
  }

  private artifactPaths(codename: string): {
    definition: string;
    overrides: string;
    group: string;
    rankings: string;
  } {
    return {
      definition: this.store.pathFor(codename, { kind: 'definition' }),
      overrides: this.store.overridesDir(codename),
      group: this.store.pathFor(codename, { kind: 'group' }),
      rankings: this.store.rankingsDir(codename),
    };
  }

  /**
   * @throws NotFoundError if the definition or the registry entry is missing
   */
  private requirePresent(codename: string): ReturnType<CupLifecycleManager['artifactPaths']> {
    const paths = this.artifactPaths(codename);
    if (!existsSync(paths.definition)) {
      throw new NotFoundError(`Cup '${codename}' has no definition at ${paths.definition}`, paths.definition);
    }
    this.registry.findByCup(codename);
    return paths;
  }

  /**
   * @throws AlreadyExistsError if any artifact of the codename exists
   */
  private requireAbsent(codename: string): ReturnType<CupLifecycleManager['artifactPaths']> {
    const paths = this.artifactPaths(codename);
    const taken: string[] = Object.values(paths).filter((path) => existsSync(path));
    if (this.registry.has(codename)) {
      taken.push(`${this.registry.path}#${codename}`);
    }
    if (taken.length > 0) {
      throw new AlreadyExistsError(`Cup '${codename}' already has artifacts`, taken);
    }
    return paths;
  }
}

/**
 * Lifecycle Step Runner
 *
 * A lifecycle operation is an ordered list of named steps. Each step
 * declares the paths it touches; the runner snapshots them before the step
 * runs, so a failure can put every touched path back in reverse order.
 *
 * Failure outcomes:
 * - first step fails and its paths restore cleanly: the original error
 *   propagates, nothing changed
 * - any later failure: PartialFailureError naming completed steps and, when
 *   rollback ran, the steps that could not be restored
 *
 * @module lifecycle/steps
 */

import { PartialFailureError } from '../core/errors.js';
import { silentLogger, type DiagnosticLogger } from '../core/types.js';
import { captureArtifact, restoreArtifact, type ArtifactSnapshot } from './artifact-snapshot.js';

// ============================================================================
// Types
// ============================================================================

export type LifecycleOperation = 'create' | 'clone' | 'rename' | 'delete';

export interface LifecycleStep {
  readonly name: string;
  /** Every file or directory the step may create, modify or remove */
  readonly touches: readonly string[];
  /** Paths the step leaves behind, reported to the caller */
  readonly writes: readonly string[];
  run(): void;
}

export interface StepPlan {
  readonly operation: LifecycleOperation;
  readonly codename: string;
  readonly steps: readonly LifecycleStep[];
}

export interface RunOptions {
  /** Restore touched paths on failure (default: true) */
  readonly rollback?: boolean;
  /** Describe the plan without running it */
  readonly dryRun?: boolean;
  readonly logger?: DiagnosticLogger;
}

export interface LifecycleResult {
  readonly operation: LifecycleOperation;
  readonly codename: string;
  readonly dryRun: boolean;
  /** Step names in execution order */
  readonly steps: readonly string[];
  /** Paths written (for delete: paths removed) */
  readonly paths: readonly string[];
}

interface TouchedStep {
  readonly name: string;
  readonly snapshots: ReadonlyArray<readonly [string, ArtifactSnapshot]>;
}

// ============================================================================
// Runner
// ============================================================================

/**
 * Restore each step's snapshots, last step first.
 *
 * @returns names of steps with at least one path that failed to restore
 */
function rollback(touched: readonly TouchedStep[], logger: DiagnosticLogger): string[] {
  const unrestored: string[] = [];
  for (const step of [...touched].reverse()) {
    let clean = true;
    for (const [path, snapshot] of [...step.snapshots].reverse()) {
      try {
        restoreArtifact(path, snapshot);
      } catch (error) {
        clean = false;
        logger.error(`Could not restore ${path}`, {
          step: step.name,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    if (clean) {
      logger.debug(`Rolled back step ${step.name}`);
    } else {
      unrestored.push(step.name);
    }
  }
  return unrestored;
}

export function runPlan(plan: StepPlan, options: RunOptions = {}): LifecycleResult {
  const logger = options.logger ?? silentLogger;
  const rollbackEnabled = options.rollback ?? true;
  const stepNames = plan.steps.map((step) => step.name);
  const paths = plan.steps.flatMap((step) => step.writes);

  if (options.dryRun) {
    for (const step of plan.steps) {
      logger.info(`[dry-run] ${step.name}`, { touches: step.touches });
    }
    return { operation: plan.operation, codename: plan.codename, dryRun: true, steps: stepNames, paths };
  }

  const completed: TouchedStep[] = [];

  for (const step of plan.steps) {
    const snapshots = rollbackEnabled
      ? step.touches.map((path) => [path, captureArtifact(path)] as const)
      : [];

    try {
      step.run();
    } catch (error) {
      const failing: TouchedStep = { name: step.name, snapshots };
      const unrestored = rollbackEnabled ? rollback([...completed, failing], logger) : [];

      if (completed.length === 0 && rollbackEnabled && unrestored.length === 0) {
        throw error;
      }

      throw new PartialFailureError(
        {
          operation: plan.operation,
          codename: plan.codename,
          completedSteps: completed.map((done) => done.name),
          failedStep: step.name,
          rollbackAttempted: rollbackEnabled,
          unrestoredSteps: unrestored,
        },
        error
      );
    }

    logger.debug(`Completed step ${step.name}`, { writes: step.writes });
    completed.push({ name: step.name, snapshots });
  }

  return { operation: plan.operation, codename: plan.codename, dryRun: false, steps: stepNames, paths };
}

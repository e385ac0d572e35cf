/**
 * Lifecycle Step Runner Tests
 *
 * The runner is where "never leave a half-made cup behind" is enforced:
 * snapshots before each step, reverse-order restore on failure.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { runPlan, type LifecycleStep, type StepPlan } from '../../../lifecycle/steps.js';
import { mutateStep, removeStep, writeJsonStep } from '../../../lifecycle/fs-steps.js';
import { PartialFailureError } from '../../../core/errors.js';
import type { DiagnosticLogger } from '../../../core/types.js';
import { captureError, createTempRoot, removeTempRoot } from '../../fixtures/cup-root.js';

function failingStep(name: string, touches: readonly string[], message = 'disk full'): LifecycleStep {
  return mutateStep(name, touches, () => {
    for (const path of touches) {
      writeFileSync(path, 'half-written');
    }
    throw new Error(message);
  });
}

function recordingLogger(): DiagnosticLogger & { messages: string[] } {
  const messages: string[] = [];
  const record = (message: string): void => {
    messages.push(message);
  };
  return { messages, debug: record, info: record, warn: record, error: record };
}

describe('runPlan', () => {
  let root: string;

  beforeEach(() => {
    root = createTempRoot();
  });

  afterEach(() => {
    removeTempRoot(root);
  });

  const plan = (steps: LifecycleStep[]): StepPlan => ({ operation: 'create', codename: 'spring', steps });

  it('should run steps in order and report their writes', () => {
    const order: string[] = [];
    const a = join(root, 'a.json');
    const b = join(root, 'nested', 'b.json');

    const result = runPlan(
      plan([
        { ...writeJsonStep('write-a', a, { n: 1 }), run: () => order.push('write-a') },
        { ...writeJsonStep('write-b', b, { n: 2 }), run: () => order.push('write-b') },
      ])
    );

    expect(order).toEqual(['write-a', 'write-b']);
    expect(result).toEqual({
      operation: 'create',
      codename: 'spring',
      dryRun: false,
      steps: ['write-a', 'write-b'],
      paths: [a, b],
    });
  });

  it('should execute nothing on a dry run', () => {
    const run = vi.fn();
    const logger = recordingLogger();

    const result = runPlan(plan([mutateStep('touch', [join(root, 'x')], run)]), { dryRun: true, logger });

    expect(run).not.toHaveBeenCalled();
    expect(result.dryRun).toBe(true);
    expect(result.steps).toEqual(['touch']);
    expect(logger.messages).toEqual(['[dry-run] touch']);
  });

  it('should rethrow the original error when the first step fails and restores cleanly', () => {
    const target = join(root, 'a.json');
    writeFileSync(target, 'original');

    expect(() => runPlan(plan([failingStep('overwrite', [target])]))).toThrow('disk full');
    expect(readFileSync(target, 'utf-8')).toBe('original');
  });

  it('should restore completed steps and report a partial failure', () => {
    const created = join(root, 'created.json');
    const removed = join(root, 'removed.json');
    const broken = join(root, 'broken.json');
    writeFileSync(removed, 'keep me');

    const failure = captureError(
      () =>
        runPlan(
          plan([
            writeJsonStep('write-created', created, []),
            removeStep('remove-file', removed),
            failingStep('write-broken', [broken]),
          ])
        ),
      PartialFailureError
    );

    expect(failure.report).toEqual({
      operation: 'create',
      codename: 'spring',
      completedSteps: ['write-created', 'remove-file'],
      failedStep: 'write-broken',
      rollbackAttempted: true,
      unrestoredSteps: [],
    });
    expect(failure.rolledBack).toBe(true);
    expect(failure.message).toBe(
      "create spring failed at step 'write-broken': disk full " +
        '(completed: write-created, remove-file; rolled back)'
    );
    expect(existsSync(created)).toBe(false);
    expect(readFileSync(removed, 'utf-8')).toBe('keep me');
    expect(existsSync(broken)).toBe(false);
  });

  it('should leave completed steps in place when rollback is disabled', () => {
    const created = join(root, 'created.json');
    const broken = join(root, 'broken.json');

    const failure = captureError(
      () =>
        runPlan(plan([writeJsonStep('write-created', created, []), failingStep('write-broken', [broken])]), {
          rollback: false,
        }),
      PartialFailureError
    );

    expect(failure.report.rollbackAttempted).toBe(false);
    expect(failure.rolledBack).toBe(false);
    expect(existsSync(created)).toBe(true);
    expect(readFileSync(broken, 'utf-8')).toBe('half-written');
  });

  it('should wrap a first-step failure when rollback is disabled', () => {
    const broken = join(root, 'broken.json');

    expect(() => runPlan(plan([failingStep('write-broken', [broken])]), { rollback: false })).toThrow(
      PartialFailureError
    );
  });
});

/**
 * Filesystem step factories used to build lifecycle plans
 *
 * @module lifecycle/fs-steps
 */

import { cpSync, existsSync, mkdirSync, renameSync, rmSync } from 'node:fs';
import { dirname } from 'node:path';
import { atomicWriteJSONSync } from '../core/utils/atomic-write.js';
import type { LifecycleStep } from './steps.js';

export function writeJsonStep(name: string, path: string, data: unknown): LifecycleStep {
  return {
    name,
    touches: [path],
    writes: [path],
    run: () => atomicWriteJSONSync(path, data),
  };
}

/**
 * Several JSON files written as one step; `scope` is the directory the
 * files live under and is what gets restored on rollback
 */
export function writeJsonTreeStep(
  name: string,
  scope: string,
  files: ReadonlyArray<readonly [string, unknown]>
): LifecycleStep {
  return {
    name,
    touches: [scope],
    writes: files.map(([path]) => path),
    run: () => {
      for (const [path, data] of files) {
        atomicWriteJSONSync(path, data);
      }
    },
  };
}

/**
 * Recursive copy of a file or directory
 */
export function copyStep(name: string, from: string, to: string): LifecycleStep {
  return {
    name,
    touches: [to],
    writes: [to],
    run: () => {
      mkdirSync(dirname(to), { recursive: true });
      cpSync(from, to, { recursive: true, errorOnExist: true, force: false });
    },
  };
}

export function moveStep(name: string, from: string, to: string): LifecycleStep {
  return {
    name,
    touches: [from, to],
    writes: [to],
    run: () => {
      mkdirSync(dirname(to), { recursive: true });
      renameSync(from, to);
    },
  };
}

/**
 * Remove a file or directory; absent paths are skipped
 */
export function removeStep(name: string, path: string): LifecycleStep {
  return {
    name,
    touches: [path],
    writes: [path],
    run: () => {
      if (existsSync(path)) {
        rmSync(path, { recursive: true });
      }
    },
  };
}

/**
 * Step whose work is an arbitrary mutation of the given paths
 */
export function mutateStep(
  name: string,
  touches: readonly string[],
  run: () => void
): LifecycleStep {
  return { name, touches, writes: touches, run };
}

/**
 * In-memory snapshots of files and directory trees, used to restore the
 * paths a lifecycle step touched. Cup artifacts are small JSON files, so a
 * full copy in memory is fine.
 *
 * @module lifecycle/artifact-snapshot
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, rmSync, statSync } from 'node:fs';
import { join, relative } from 'node:path';
import { atomicWriteFileSync } from '../core/utils/atomic-write.js';

export type ArtifactSnapshot =
  | { readonly type: 'absent' }
  | { readonly type: 'file'; readonly data: Buffer }
  | { readonly type: 'dir'; readonly files: ReadonlyMap<string, Buffer>; readonly dirs: readonly string[] };

function walk(root: string, dir: string, files: Map<string, Buffer>, dirs: string[]): void {
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      dirs.push(relative(root, full));
      walk(root, full, files, dirs);
    } else if (entry.isFile()) {
      files.set(relative(root, full), readFileSync(full));
    }
  }
}

export function captureArtifact(path: string): ArtifactSnapshot {
  if (!existsSync(path)) {
    return { type: 'absent' };
  }
  if (statSync(path).isDirectory()) {
    const files = new Map<string, Buffer>();
    const dirs: string[] = [];
    walk(path, path, files, dirs);
    return { type: 'dir', files, dirs };
  }
  return { type: 'file', data: readFileSync(path) };
}

/**
 * Put a path back exactly as captured; anything written since is removed
 */
export function restoreArtifact(path: string, snapshot: ArtifactSnapshot): void {
  rmSync(path, { recursive: true, force: true });
  switch (snapshot.type) {
    case 'absent':
      return;
    case 'file':
      atomicWriteFileSync(path, snapshot.data);
      return;
    case 'dir':
      mkdirSync(path, { recursive: true });
      for (const dir of snapshot.dirs) {
        mkdirSync(join(path, dir), { recursive: true });
      }
      for (const [file, data] of snapshot.files) {
        atomicWriteFileSync(join(path, file), data);
      }
      return;
  }
}

/**
 * WorkingTree backed by the `git` binary
 *
 * @module merge/git-working-tree
 */

import { execFileSync } from 'node:child_process';
import { mkdirSync, renameSync, writeFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import type { MergeSide, WorkingTree } from './conflict-resolver.js';

/**
 * Split NUL-terminated `-z` output
 */
export function splitNul(output: string): string[] {
  return output.split('\0').filter((part) => part.length > 0);
}

/**
 * Paths with status `UD` (modified by us, deleted by them) from
 * `git status --porcelain -z`
 */
export function parseDeletedByThem(porcelain: string): string[] {
  const parts = splitNul(porcelain);
  const deleted: string[] = [];
  for (let i = 0; i < parts.length; i++) {
    const status = parts[i].slice(0, 2);
    const path = parts[i].slice(3);
    if (status === 'UD') {
      deleted.push(path);
    }
    // rename and copy records carry the source path as an extra field
    if (status[0] === 'R' || status[0] === 'C') {
      i++;
    }
  }
  return deleted;
}

export class GitWorkingTree implements WorkingTree {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  unmergedPaths(): string[] {
    return splitNul(this.git(['diff', '--name-only', '--diff-filter=U', '-z']));
  }

  deletedUpstream(): string[] {
    return parseDeletedByThem(this.git(['status', '--porcelain', '-z']));
  }

  remove(path: string): void {
    this.git(['rm', '--quiet', '--', path]);
  }

  checkout(path: string, side: MergeSide): void {
    this.git(['checkout', `--${side}`, '--', path]);
  }

  move(from: string, to: string): void {
    const target = join(this.root, to);
    mkdirSync(dirname(target), { recursive: true });
    renameSync(join(this.root, from), target);
  }

  writeFile(path: string, content: string): void {
    writeFileSync(join(this.root, path), content, 'utf-8');
  }

  stage(paths: readonly string[]): void {
    this.git(['add', '--', ...paths]);
  }

  stageAll(): void {
    this.git(['add', '-A']);
  }

  private git(args: readonly string[]): string {
    return execFileSync('git', args, { cwd: this.root, encoding: 'utf-8' });
  }
}

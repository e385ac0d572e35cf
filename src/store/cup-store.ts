/**
 * Cup Store
 *
 * Maps (root, codename, artifact) to filesystem paths. The layout is fixed:
 *
 *   gamemaster/cups/<codename>.json
 *   gamemaster/formats.json
 *   groups/<codename>.json
 *   overrides/<codename>/<cpTier>.json
 *   rankings/<codename>/<category>/rankings-<cpTier>.json
 *
 * The store never reads file contents.
 *
 * @module store/cup-store
 */

import { existsSync, mkdirSync, readdirSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { NotFoundError, ParseError } from '../core/errors.js';
import { CodenameSchema, formatIssues } from '../core/schemas.js';
import type { ArtifactRef } from '../core/types.js';

export const GAMEMASTER_DIR = 'gamemaster';
export const CUPS_DIR = join(GAMEMASTER_DIR, 'cups');
export const FORMATS_FILE = join(GAMEMASTER_DIR, 'formats.json');
export const FORMATS_BACKUP_DIR = join(GAMEMASTER_DIR, 'formats-bu');
export const GROUPS_DIR = 'groups';
export const OVERRIDES_DIR = 'overrides';
export const RANKINGS_DIR = 'rankings';

/**
 * Validate a codename, returning it unchanged
 *
 * @throws ParseError if the codename is not a lowercase slug
 */
export function assertCodename(codename: string): string {
  const result = CodenameSchema.safeParse(codename);
  if (!result.success) {
    throw new ParseError(`Invalid codename '${codename}': ${formatIssues(result.error)}`);
  }
  return result.data;
}

export class CupStore {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  /**
   * Path of one artifact, whether or not it exists
   */
  pathFor(codename: string, ref: ArtifactRef): string {
    const cup = assertCodename(codename);
    switch (ref.kind) {
      case 'definition':
        return join(this.root, CUPS_DIR, `${cup}.json`);
      case 'overrides':
        return join(this.root, OVERRIDES_DIR, cup, `${ref.cpTier}.json`);
      case 'group':
        return join(this.root, GROUPS_DIR, `${cup}.json`);
      case 'rankings':
        return join(this.root, RANKINGS_DIR, cup, ref.category, `rankings-${ref.cpTier}.json`);
    }
  }

  /**
   * Path of an existing artifact
   *
   * @throws NotFoundError if the artifact is absent
   */
  resolveForRead(codename: string, ref: ArtifactRef): string {
    const path = this.pathFor(codename, ref);
    if (!existsSync(path)) {
      throw new NotFoundError(`No ${ref.kind} artifact for cup '${codename}' at ${path}`, path);
    }
    return path;
  }

  /**
   * Path of an artifact about to be written; parent directories are created
   */
  resolveForWrite(codename: string, ref: ArtifactRef): string {
    const path = this.pathFor(codename, ref);
    mkdirSync(dirname(path), { recursive: true });
    return path;
  }

  exists(codename: string, ref: ArtifactRef): boolean {
    return existsSync(this.pathFor(codename, ref));
  }

  /** Directory holding every override tier of a cup */
  overridesDir(codename: string): string {
    return join(this.root, OVERRIDES_DIR, assertCodename(codename));
  }

  /** Directory holding every ranking category of a cup */
  rankingsDir(codename: string): string {
    return join(this.root, RANKINGS_DIR, assertCodename(codename));
  }

  formatsPath(): string {
    return join(this.root, FORMATS_FILE);
  }

  formatsBackupDir(): string {
    return join(this.root, FORMATS_BACKUP_DIR);
  }

  /**
   * Codenames that have a definition file, sorted
   */
  listCodenames(): string[] {
    const dir = join(this.root, CUPS_DIR);
    if (!existsSync(dir)) {
      return [];
    }
    return readdirSync(dir)
      .filter((file) => file.endsWith('.json'))
      .map((file) => file.slice(0, -'.json'.length))
      .filter((name) => CodenameSchema.safeParse(name).success)
      .sort();
  }
}

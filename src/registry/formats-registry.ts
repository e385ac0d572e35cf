/**
 * Formats Registry
 *
 * The ordered array in gamemaster/formats.json that the serving application
 * reads to list cups. Entries are keyed by `cup` (the codename); order is
 * meaningful to the UI and is never changed except by append or removal.
 *
 * The file is rewritten as a whole with tab indentation, matching how the
 * serving application's own tooling writes it.
 *
 * @module registry/formats-registry
 */

import { copyFileSync, existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { NotFoundError } from '../core/errors.js';
import { FormatsFileSchema, type FormatsEntry } from '../core/schemas.js';
import { atomicWriteJSONSync } from '../core/utils/atomic-write.js';
import { readJsonFile } from '../core/utils/json-file.js';
import type { CupStore } from '../store/cup-store.js';

// ============================================================================
// Pure entry transforms
// ============================================================================

/**
 * Replace the entry sharing `entry.cup`, or append it.
 *
 * Any further entries with the same codename are dropped, so the result
 * never holds duplicates even if the input did.
 */
export function upsertEntry(
  entries: readonly FormatsEntry[],
  entry: FormatsEntry
): FormatsEntry[] {
  const index = entries.findIndex((candidate) => candidate.cup === entry.cup);
  if (index === -1) {
    return [...entries, entry];
  }
  return entries
    .map((candidate, i) => (i === index ? entry : candidate))
    .filter((candidate, i) => i === index || candidate.cup !== entry.cup);
}

export function removeEntry(entries: readonly FormatsEntry[], codename: string): FormatsEntry[] {
  return entries.filter((entry) => entry.cup !== codename);
}

/**
 * Relabel the matching entry in place; every other field is kept
 *
 * @throws NotFoundError if no entry has `oldCodename`
 */
export function renameEntry(
  entries: readonly FormatsEntry[],
  oldCodename: string,
  newCodename: string,
  newTitle: string
): FormatsEntry[] {
  if (!entries.some((entry) => entry.cup === oldCodename)) {
    throw new NotFoundError(`No formats entry for cup '${oldCodename}'`);
  }
  return entries.map((entry) =>
    entry.cup === oldCodename ? { ...entry, cup: newCodename, title: newTitle } : entry
  );
}

/**
 * Copy of `template` relabeled to a new cup.
 *
 * `meta` is the serving pointer; it follows the codename only when it
 * pointed at the template cup.
 */
export function deriveEntry(
  template: FormatsEntry,
  newCodename: string,
  newTitle: string
): FormatsEntry {
  return {
    ...template,
    cup: newCodename,
    title: newTitle,
    ...(template.meta === template.cup ? { meta: newCodename } : {}),
  };
}

// ============================================================================
// File-backed registry
// ============================================================================

export class FormatsRegistry {
  constructor(readonly path: string) {}

  static forStore(store: CupStore): FormatsRegistry {
    return new FormatsRegistry(store.formatsPath());
  }

  exists(): boolean {
    return existsSync(this.path);
  }

  /**
   * All entries in file order; a missing file is an empty registry
   */
  list(): FormatsEntry[] {
    if (!this.exists()) {
      return [];
    }
    return readJsonFile(this.path, FormatsFileSchema);
  }

  /**
   * @throws NotFoundError if no entry has this codename
   */
  findByCup(codename: string): FormatsEntry {
    const entry = this.list().find((candidate) => candidate.cup === codename);
    if (!entry) {
      throw new NotFoundError(`No formats entry for cup '${codename}' in ${this.path}`, this.path);
    }
    return entry;
  }

  has(codename: string): boolean {
    return this.list().some((entry) => entry.cup === codename);
  }

  upsert(entry: FormatsEntry): void {
    this.write(upsertEntry(this.list(), entry));
  }

  /**
   * Remove the entry for a codename. Returns false, without writing, when
   * there was nothing to remove.
   */
  remove(codename: string): boolean {
    const entries = this.list();
    const remaining = removeEntry(entries, codename);
    if (remaining.length === entries.length) {
      return false;
    }
    this.write(remaining);
    return true;
  }

  renameCup(oldCodename: string, newCodename: string, newTitle: string): void {
    this.write(renameEntry(this.list(), oldCodename, newCodename, newTitle));
  }

  /**
   * Append an entry derived from the template cup's entry
   *
   * @throws NotFoundError if the template cup has no entry
   */
  cloneEntry(templateCodename: string, newCodename: string, newTitle: string): FormatsEntry {
    const derived = deriveEntry(this.findByCup(templateCodename), newCodename, newTitle);
    this.upsert(derived);
    return derived;
  }

  /**
   * Copy the current file to `<dir>/formats-<stamp>.json`
   *
   * @returns the backup path, or null when there is no file to back up
   */
  backup(dir: string, stamp: string): string | null {
    if (!this.exists()) {
      return null;
    }
    mkdirSync(dir, { recursive: true });
    const target = join(dir, `formats-${stamp}.json`);
    copyFileSync(this.path, target);
    return target;
  }

  private write(entries: readonly FormatsEntry[]): void {
    atomicWriteJSONSync(this.path, entries, '\t');
  }
}

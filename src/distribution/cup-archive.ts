/**
 * Cup Archive Reader
 *
 * Read access to a packaged cup bundle without extracting it. The first
 * top-level directory of the zip is the cup shortname; everything else is
 * located relative to it:
 *
 *   <s>/cupfile/<s>.json
 *   <s>/rankings/<s>/<category>/rankings-<league>.json
 *   <s>/overrides/<s>/<league>.json
 *   <s>/group/<s>.json
 *
 * @module distribution/cup-archive
 */

import { existsSync } from 'node:fs';
import AdmZip from 'adm-zip';
import { MissingFieldError, NotFoundError, ParseError } from '../core/errors.js';
import {
  CupDefinitionSchema,
  RankedListSchema,
  type CupDefinition,
  type RankedEntry,
} from '../core/schemas.js';
import { RANKING_CATEGORIES } from '../core/types.js';
import { parseJsonText } from '../core/utils/json-file.js';

// ============================================================================
// Types
// ============================================================================

export type SnapshotKind = 'rankings' | 'overrides';

export interface ArchiveIssue {
  readonly severity: 'error' | 'warning';
  readonly message: string;
}

export interface ArchiveInspection {
  readonly archivePath: string;
  readonly shortname: string;
  readonly league: number | string | null;
  /** Ranking category directories found in the archive, sorted */
  readonly categories: readonly string[];
  readonly issues: readonly ArchiveIssue[];
  /** True when no issue is an error */
  readonly valid: boolean;
}

// ============================================================================
// Archive
// ============================================================================

export class CupArchive {
  private readonly entryNames: ReadonlySet<string>;

  private constructor(
    readonly path: string,
    private readonly zip: AdmZip,
    readonly shortname: string
  ) {
    this.entryNames = new Set(zip.getEntries().map((entry) => entry.entryName));
  }

  /**
   * @throws NotFoundError if the file does not exist
   * @throws ParseError if it is not a zip or has no top-level directory
   */
  static open(path: string): CupArchive {
    if (!existsSync(path)) {
      throw new NotFoundError(`Archive not found: ${path}`, path);
    }

    let zip: AdmZip;
    try {
      zip = new AdmZip(path);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ParseError(`Unreadable archive ${path}: ${reason}`, path, { cause: error });
    }

    const topLevel = zip
      .getEntries()
      .map((entry) => entry.entryName)
      .find((name) => name.includes('/'));
    if (topLevel === undefined) {
      throw new ParseError(`Archive ${path} has no top-level directory`, path);
    }
    return new CupArchive(path, zip, topLevel.slice(0, topLevel.indexOf('/')));
  }

  definitionEntry(): string {
    return `${this.shortname}/cupfile/${this.shortname}.json`;
  }

  snapshotEntry(kind: SnapshotKind, league: number | string, category = 'overall'): string {
    const s = this.shortname;
    return kind === 'rankings'
      ? `${s}/rankings/${s}/${category}/rankings-${league}.json`
      : `${s}/overrides/${s}/${league}.json`;
  }

  hasEntry(name: string): boolean {
    return this.entryNames.has(name);
  }

  /**
   * @throws NotFoundError if the entry is absent
   */
  readText(name: string): string {
    const entry = this.zip.getEntry(name);
    if (!entry || entry.isDirectory) {
      throw new NotFoundError(`Entry ${name} not found in ${this.path}`, name);
    }
    return entry.getData().toString('utf-8');
  }

  readDefinition(): CupDefinition {
    const name = this.definitionEntry();
    return parseJsonText(this.readText(name), CupDefinitionSchema, `${this.path}:${name}`);
  }

  readSnapshot(kind: SnapshotKind, league: number | string): RankedEntry[] {
    const name = this.snapshotEntry(kind, league);
    return parseJsonText(this.readText(name), RankedListSchema, `${this.path}:${name}`);
  }

  /**
   * Ranking category directory names present under `<s>/rankings/<s>/`
   */
  rankingCategories(): string[] {
    const prefix = `${this.shortname}/rankings/${this.shortname}/`;
    const found = new Set<string>();
    for (const name of this.entryNames) {
      if (name.startsWith(prefix)) {
        const category = name.slice(prefix.length).split('/')[0];
        if (category.length > 0) {
          found.add(category);
        }
      }
    }
    return [...found].sort();
  }

  /**
   * Structural check of the bundle. Species and moves are not validated.
   *
   * @throws NotFoundError if the definition entry is missing
   * @throws ParseError if the definition is not a JSON object
   */
  inspect(): ArchiveInspection {
    const definition = this.readDefinition();
    const categories = this.rankingCategories();
    const issues: ArchiveIssue[] = [];
    const league = definition.league === undefined || definition.league === '' ? null : definition.league;

    if (league === null) {
      issues.push({
        severity: 'error',
        message: new MissingFieldError('league', this.definitionEntry()).message,
      });
    } else {
      const overrides = this.snapshotEntry('overrides', league);
      if (!this.hasEntry(overrides)) {
        issues.push({ severity: 'error', message: `Expected override file not found: ${overrides}` });
      }
    }

    const expected: readonly string[] = RANKING_CATEGORIES;
    for (const category of expected) {
      if (!categories.includes(category)) {
        issues.push({ severity: 'error', message: `Missing ranking category: ${category}` });
      }
    }
    for (const category of categories) {
      if (!expected.includes(category)) {
        issues.push({ severity: 'warning', message: `Extra ranking category: ${category}` });
      }
    }
    if (league !== null) {
      for (const category of categories.filter((found) => expected.includes(found))) {
        const ranking = this.snapshotEntry('rankings', league, category);
        if (!this.hasEntry(ranking)) {
          issues.push({ severity: 'error', message: `Expected ranking file not found: ${ranking}` });
        }
      }
    }

    return {
      archivePath: this.path,
      shortname: this.shortname,
      league,
      categories,
      issues,
      valid: issues.every((issue) => issue.severity !== 'error'),
    };
  }
}

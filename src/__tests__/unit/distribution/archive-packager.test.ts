/**
 * Archive Packager and Reader Tests
 *
 * Packaging is checked by reading the produced zip back through CupArchive.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import AdmZip from 'adm-zip';
import { ArchivePackager } from '../../../distribution/archive-packager.js';
import { CupArchive } from '../../../distribution/cup-archive.js';
import { generateZygardeConfig } from '../../../derive/zygarde-config.js';
import { NotFoundError, ParseError } from '../../../core/errors.js';
import { RANKING_CATEGORIES, type DiagnosticLogger } from '../../../core/types.js';
import { CupStore } from '../../../store/cup-store.js';
import { createTempRoot, removeTempRoot, seedCup, writeJson } from '../../fixtures/cup-root.js';

function buildZip(path: string, files: Readonly<Record<string, unknown>>): void {
  const zip = new AdmZip();
  for (const [name, data] of Object.entries(files)) {
    zip.addFile(name, Buffer.from(typeof data === 'string' ? data : JSON.stringify(data)));
  }
  zip.writeZip(path);
}

function rankingFiles(shortname: string, league: number, categories: readonly string[]): Record<string, unknown> {
  return Object.fromEntries(
    categories.map((category) => [`${shortname}/rankings/${shortname}/${category}/rankings-${league}.json`, []])
  );
}

describe('ArchivePackager', () => {
  let root: string;
  let filedrop: string;
  let store: CupStore;
  let warnings: string[];
  let packager: ArchivePackager;

  beforeEach(() => {
    root = createTempRoot();
    filedrop = createTempRoot('cupsmith-drop-');
    store = new CupStore(root);
    warnings = [];
    const logger: DiagnosticLogger = {
      debug: () => undefined,
      info: () => undefined,
      warn: (message) => {
        warnings.push(message);
      },
      error: () => undefined,
    };
    packager = new ArchivePackager(store, { filedrop, baseUri: 'http://localhost/filedrop/', logger });
  });

  afterEach(() => {
    removeTempRoot(root);
    removeTempRoot(filedrop);
  });

  it('should bundle every artifact under the codename', () => {
    seedCup(root, 'spring', {
      title: 'Spring Cup',
      link: 'https://example.test/spring',
      overall: [{ speciesId: 'azumarill' }],
    });

    const result = packager.package('spring');

    expect(result).toEqual({
      codename: 'spring',
      stagingDir: join(filedrop, 'spring'),
      archivePath: join(filedrop, 'spring.zip'),
      url: 'http://localhost/filedrop/spring.zip',
      included: ['rankings', 'definition', 'overrides', 'group'],
    });
    expect(warnings).toEqual([]);

    const archive = CupArchive.open(result.archivePath);
    expect(archive.shortname).toBe('spring');
    expect(archive.readDefinition()).toEqual({
      name: 'spring',
      title: 'Spring Cup',
      league: 1500,
      link: 'https://example.test/spring',
      include: [],
      exclude: [],
    });
    expect(archive.readSnapshot('rankings', 1500)).toEqual([{ speciesId: 'azumarill' }]);
    expect(archive.hasEntry('spring/group/spring.json')).toBe(true);
    expect(archive.rankingCategories()).toEqual([...RANKING_CATEGORIES]);
    expect(archive.inspect()).toEqual({
      archivePath: result.archivePath,
      shortname: 'spring',
      league: 1500,
      categories: [...RANKING_CATEGORIES],
      issues: [],
      valid: true,
    });
  });

  it('should produce the same team-builder config as the live root', () => {
    seedCup(root, 'spring', { title: 'Spring Cup', overall: [{ speciesId: 'registeel' }, { speciesId: 'azumarill' }] });
    const { archivePath } = packager.package('spring');

    expect(generateZygardeConfig({ kind: 'archive', archivePath })).toEqual(
      generateZygardeConfig({ kind: 'live', store, codename: 'spring' })
    );
  });

  it('should reject an archive holding a different cup', () => {
    seedCup(root, 'spring');
    const { archivePath } = packager.package('spring');

    expect(() => generateZygardeConfig({ kind: 'archive', archivePath, codename: 'winter' })).toThrow(ParseError);
    expect(generateZygardeConfig({ kind: 'archive', archivePath, codename: 'spring' }).name).toBe(
      'spring (Builder)'
    );
  });

  it('should skip missing overrides and group with warnings', () => {
    seedCup(root, 'winter', { overrides: null, withoutGroup: true });

    const result = packager.package('winter');

    expect(result.included).toEqual(['rankings', 'definition']);
    expect(warnings).toHaveLength(2);
    expect(CupArchive.open(result.archivePath).inspect().issues).toEqual([
      { severity: 'error', message: 'Expected override file not found: winter/overrides/winter/1500.json' },
    ]);
  });

  it('should clear a previous staging directory', () => {
    seedCup(root, 'spring');
    mkdirSync(join(filedrop, 'spring'), { recursive: true });
    writeFileSync(join(filedrop, 'spring', 'stale.json'), '{}');

    const { archivePath } = packager.package('spring');

    expect(existsSync(join(filedrop, 'spring', 'stale.json'))).toBe(false);
    expect(CupArchive.open(archivePath).hasEntry('spring/stale.json')).toBe(false);
  });

  it('should fail with NotFound without a definition or rankings', () => {
    expect(() => packager.package('spring')).toThrow(NotFoundError);

    writeJson(root, 'gamemaster/cups/spring.json', { name: 'spring', league: 1500 });
    expect(() => packager.package('spring')).toThrow(NotFoundError);
    expect(existsSync(join(filedrop, 'spring.zip'))).toBe(false);
  });
});

describe('CupArchive', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempRoot();
  });

  afterEach(() => {
    removeTempRoot(dir);
  });

  it('should report missing and extra ranking categories', () => {
    const path = join(dir, 'cup.zip');
    buildZip(path, {
      'cup/cupfile/cup.json': { name: 'cup', title: 'Cup', league: 1500 },
      'cup/overrides/cup/1500.json': [],
      ...rankingFiles(
        'cup',
        1500,
        RANKING_CATEGORIES.filter((category) => category !== 'switches')
      ),
      ...rankingFiles('cup', 1500, ['bonus']),
    });

    const inspection = CupArchive.open(path).inspect();

    expect(inspection.issues).toEqual([
      { severity: 'error', message: 'Missing ranking category: switches' },
      { severity: 'warning', message: 'Extra ranking category: bonus' },
    ]);
    expect(inspection.valid).toBe(false);
  });

  it('should stay valid with only warnings', () => {
    const path = join(dir, 'cup.zip');
    buildZip(path, {
      'cup/cupfile/cup.json': { name: 'cup', title: 'Cup', league: 1500 },
      'cup/overrides/cup/1500.json': [],
      ...rankingFiles('cup', 1500, [...RANKING_CATEGORIES, 'bonus']),
    });

    expect(CupArchive.open(path).inspect().valid).toBe(true);
  });

  it('should report a ranking file for the wrong league', () => {
    const path = join(dir, 'cup.zip');
    buildZip(path, {
      'cup/cupfile/cup.json': { name: 'cup', title: 'Cup', league: 1500 },
      'cup/overrides/cup/1500.json': [],
      ...rankingFiles(
        'cup',
        1500,
        RANKING_CATEGORIES.filter((category) => category !== 'leads')
      ),
      ...rankingFiles('cup', 2500, ['leads']),
    });

    expect(CupArchive.open(path).inspect().issues).toEqual([
      { severity: 'error', message: 'Expected ranking file not found: cup/rankings/cup/leads/rankings-1500.json' },
    ]);
  });

  it('should report a definition without a league', () => {
    const path = join(dir, 'cup.zip');
    buildZip(path, {
      'cup/cupfile/cup.json': { name: 'cup', title: 'Cup' },
      ...rankingFiles('cup', 1500, RANKING_CATEGORIES),
    });

    const inspection = CupArchive.open(path).inspect();

    expect(inspection.league).toBeNull();
    expect(inspection.issues).toEqual([
      { severity: 'error', message: "Missing or empty 'league' in cup/cupfile/cup.json" },
    ]);
  });

  it('should fail with NotFound for a missing entry', () => {
    const path = join(dir, 'cup.zip');
    buildZip(path, { 'cup/overrides/cup/1500.json': [] });

    const archive = CupArchive.open(path);

    expect(() => archive.readDefinition()).toThrow(NotFoundError);
    expect(() => archive.readSnapshot('rankings', 1500)).toThrow(NotFoundError);
  });

  it('should reject files that are not cup archives', () => {
    const text = join(dir, 'notes.zip');
    writeFileSync(text, 'not a zip');
    expect(() => CupArchive.open(text)).toThrow(ParseError);

    const flat = join(dir, 'flat.zip');
    buildZip(flat, { 'readme.txt': 'hello' });
    expect(() => CupArchive.open(flat)).toThrow(ParseError);

    expect(() => CupArchive.open(join(dir, 'missing.zip'))).toThrow(NotFoundError);
  });
});

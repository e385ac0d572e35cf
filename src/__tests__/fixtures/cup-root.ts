/**
 * Temporary data roots for tests
 *
 * Each helper works on a real directory under the OS temp dir so the code
 * under test exercises the filesystem exactly as in production.
 */

import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { RANKING_CATEGORIES, type CpTier } from '../../core/types.js';

export function createTempRoot(prefix = 'cupsmith-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempRoot(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

export function writeJson(root: string, relativePath: string, data: unknown, space: number | string = 2): void {
  const path = join(root, relativePath);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, `${JSON.stringify(data, null, space)}\n`, 'utf-8');
}

export function readJson(root: string, relativePath: string): unknown {
  return JSON.parse(readFileSync(join(root, relativePath), 'utf-8'));
}

export function exists(root: string, relativePath: string): boolean {
  return existsSync(join(root, relativePath));
}

export interface SeedCupOptions {
  readonly title?: string;
  readonly league?: CpTier;
  readonly link?: string;
  readonly include?: readonly unknown[];
  readonly exclude?: readonly unknown[];
  /** Entries of rankings/<cup>/overall/rankings-<league>.json */
  readonly overall?: readonly unknown[];
  /** Entries of overrides/<cup>/<league>.json; null skips the file */
  readonly overrides?: readonly unknown[] | null;
  /** Skip groups/<cup>.json */
  readonly withoutGroup?: boolean;
  /** Extra fields on the formats entry */
  readonly formatsExtra?: Readonly<Record<string, unknown>>;
}

/**
 * Write every artifact of a cup and append its formats entry
 */
export function seedCup(root: string, codename: string, options: SeedCupOptions = {}): void {
  const title = options.title ?? codename;
  const league = options.league ?? 1500;

  writeJson(root, `gamemaster/cups/${codename}.json`, {
    name: codename,
    title,
    league,
    ...(options.link !== undefined ? { link: options.link } : {}),
    include: options.include ?? [],
    exclude: options.exclude ?? [],
  });

  const formatsPath = 'gamemaster/formats.json';
  const entries = exists(root, formatsPath) ? readJson(root, formatsPath) : [];
  writeJson(
    root,
    formatsPath,
    [
      ...(Array.isArray(entries) ? entries : []),
      { cup: codename, title, cp: league, meta: codename, ...options.formatsExtra },
    ],
    '\t'
  );

  if (!options.withoutGroup) {
    writeJson(root, `groups/${codename}.json`, []);
  }
  if (options.overrides !== null) {
    writeJson(root, `overrides/${codename}/${league}.json`, options.overrides ?? []);
  }
  for (const category of RANKING_CATEGORIES) {
    writeJson(
      root,
      `rankings/${codename}/${category}/rankings-${league}.json`,
      category === 'overall' ? (options.overall ?? []) : []
    );
  }
}

/**
 * Run `fn` and return the error it throws, narrowed to `type`
 */
export function captureError<E extends Error>(fn: () => unknown, type: new (...args: never[]) => E): E {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}

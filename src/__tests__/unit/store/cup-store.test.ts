/**
 * Cup Store Tests
 *
 * Path resolution is the only thing standing between a codename and the
 * filesystem; these pin the layout and the codename guard.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { CupStore } from '../../../store/cup-store.js';
import { NotFoundError, ParseError } from '../../../core/errors.js';
import { createTempRoot, removeTempRoot, seedCup } from '../../fixtures/cup-root.js';

describe('CupStore', () => {
  let root: string;
  let store: CupStore;

  beforeEach(() => {
    root = createTempRoot();
    store = new CupStore(root);
  });

  afterEach(() => {
    removeTempRoot(root);
  });

  describe('pathFor', () => {
    it('should map each artifact kind to its fixed location', () => {
      expect(store.pathFor('spring', { kind: 'definition' })).toBe(
        join(root, 'gamemaster', 'cups', 'spring.json')
      );
      expect(store.pathFor('spring', { kind: 'group' })).toBe(join(root, 'groups', 'spring.json'));
      expect(store.pathFor('spring', { kind: 'overrides', cpTier: 2500 })).toBe(
        join(root, 'overrides', 'spring', '2500.json')
      );
      expect(store.pathFor('spring', { kind: 'rankings', category: 'leads', cpTier: 1500 })).toBe(
        join(root, 'rankings', 'spring', 'leads', 'rankings-1500.json')
      );
    });

    it('should expose subtree and registry locations', () => {
      expect(store.overridesDir('spring')).toBe(join(root, 'overrides', 'spring'));
      expect(store.rankingsDir('spring')).toBe(join(root, 'rankings', 'spring'));
      expect(store.formatsPath()).toBe(join(root, 'gamemaster', 'formats.json'));
      expect(store.formatsBackupDir()).toBe(join(root, 'gamemaster', 'formats-bu'));
    });

    it('should reject codenames that are not lowercase slugs', () => {
      expect(() => store.pathFor('../escape', { kind: 'definition' })).toThrow(ParseError);
      expect(() => store.pathFor('Spring', { kind: 'definition' })).toThrow(ParseError);
      expect(() => store.pathFor('', { kind: 'group' })).toThrow(ParseError);
      expect(() => store.rankingsDir('a/b')).toThrow(ParseError);
    });
  });

  describe('resolveForRead', () => {
    it('should fail with NotFound for a missing artifact', () => {
      expect(() => store.resolveForRead('spring', { kind: 'definition' })).toThrow(NotFoundError);
    });

    it('should return the path of an existing artifact', () => {
      seedCup(root, 'spring');
      expect(store.resolveForRead('spring', { kind: 'group' })).toBe(join(root, 'groups', 'spring.json'));
    });
  });

  describe('resolveForWrite', () => {
    it('should create intermediate directories', () => {
      const path = store.resolveForWrite('spring', { kind: 'rankings', category: 'overall', cpTier: 500 });
      expect(existsSync(dirname(path))).toBe(true);
      expect(existsSync(path)).toBe(false);
    });
  });

  describe('listCodenames', () => {
    it('should return an empty list without a cups directory', () => {
      expect(store.listCodenames()).toEqual([]);
    });

    it('should list defined cups in sorted order and skip other files', () => {
      seedCup(root, 'winter');
      seedCup(root, 'autumn');
      const cupsDir = join(root, 'gamemaster', 'cups');
      mkdirSync(cupsDir, { recursive: true });
      writeFileSync(join(cupsDir, 'README.txt'), 'notes');
      writeFileSync(join(cupsDir, 'Bad Name.json'), '{}');

      expect(store.listCodenames()).toEqual(['autumn', 'winter']);
    });
  });
});

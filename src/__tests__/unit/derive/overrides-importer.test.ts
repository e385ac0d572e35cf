/**
 * Moveset Override Importer Tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  buildMovesetOverrides,
  eligibleSpecies,
  importMovesetOverrides,
} from '../../../derive/overrides-importer.js';
import { MissingFieldError, NotFoundError, ParseError } from '../../../core/errors.js';
import { CupStore } from '../../../store/cup-store.js';
import { createTempRoot, exists, readJson, removeTempRoot, seedCup, writeJson } from '../../fixtures/cup-root.js';

describe('eligibleSpecies', () => {
  it('should take id includes minus every kind of exclude', () => {
    const eligible = eligibleSpecies({
      include: [
        { filterType: 'id', values: ['azumarill', 'medicham', 'registeel', 'altaria'] },
        { filterType: 'type', values: ['water'] },
        { filterType: 'id', values: ['skarmory'] },
      ],
      exclude: ['altaria', { filterType: 'id', values: ['registeel'] }, { speciesId: 'skarmory' }],
    });

    expect([...eligible]).toEqual(['azumarill', 'medicham']);
  });

  it('should be empty without id includes', () => {
    expect(eligibleSpecies({ include: [{ filterType: 'type', values: ['water'] }] }).size).toBe(0);
    expect(eligibleSpecies({}).size).toBe(0);
  });
});

describe('buildMovesetOverrides', () => {
  it('should split movesets and sort by species', () => {
    const overrides = buildMovesetOverrides(
      new Set(['medicham', 'azumarill']),
      [
        { speciesId: 'medicham', moveset: ['COUNTER', 'ICE_PUNCH', 'PSYCHIC'] },
        { speciesId: 'altaria', moveset: ['DRAGON_BREATH', 'SKY_ATTACK'] },
        { speciesId: 'azumarill', moveset: ['BUBBLE', 'ICE_BEAM'] },
      ],
      'rankings.json'
    );

    expect(overrides).toEqual([
      { speciesId: 'azumarill', fastMove: 'BUBBLE', chargedMoves: ['ICE_BEAM'] },
      { speciesId: 'medicham', fastMove: 'COUNTER', chargedMoves: ['ICE_PUNCH', 'PSYCHIC'] },
    ]);
  });

  it('should fail with ParseError for an eligible entry without a moveset', () => {
    expect(() =>
      buildMovesetOverrides(new Set(['azumarill']), [{ speciesId: 'azumarill', moveset: [] }], 'rankings.json')
    ).toThrow(ParseError);
  });
});

describe('importMovesetOverrides', () => {
  let root: string;
  let store: CupStore;

  beforeEach(() => {
    root = createTempRoot();
    store = new CupStore(root);
    seedCup(root, 'spring', {
      include: [{ filterType: 'id', values: ['azumarill', 'medicham'] }],
      overall: [
        { speciesId: 'medicham', moveset: ['COUNTER', 'ICE_PUNCH'] },
        { speciesId: 'azumarill', moveset: ['BUBBLE', 'ICE_BEAM', 'PLAY_ROUGH'] },
      ],
    });
  });

  afterEach(() => {
    removeTempRoot(root);
  });

  it('should import without writing by default', () => {
    const result = importMovesetOverrides(store, 'spring');

    expect(result.league).toBe(1500);
    expect(result.rankingsPath).toBe(join(root, 'rankings', 'spring', 'overall', 'rankings-1500.json'));
    expect(result.overrides.map((override) => override.speciesId)).toEqual(['azumarill', 'medicham']);
    expect(result.writtenTo).toBeUndefined();
    expect(readJson(root, 'overrides/spring/1500.json')).toEqual([]);
  });

  it('should write four-space indented overrides', () => {
    const result = importMovesetOverrides(store, 'spring', { write: true });

    expect(result.writtenTo).toBe(join(root, 'overrides', 'spring', '1500.json'));
    expect(readJson(root, 'overrides/spring/1500.json')).toEqual([
      { speciesId: 'azumarill', fastMove: 'BUBBLE', chargedMoves: ['ICE_BEAM', 'PLAY_ROUGH'] },
      { speciesId: 'medicham', fastMove: 'COUNTER', chargedMoves: ['ICE_PUNCH'] },
    ]);
    expect(readFileSync(join(root, 'overrides/spring/1500.json'), 'utf-8').startsWith('[\n    {\n        "speciesId"')).toBe(
      true
    );
  });

  it('should fail with NotFound for a league without rankings', () => {
    expect(() => importMovesetOverrides(store, 'spring', { league: 2500, write: true })).toThrow(NotFoundError);
    expect(exists(root, 'overrides/spring/2500.json')).toBe(false);
  });

  it('should fail with MissingField when no league is known', () => {
    writeJson(root, 'gamemaster/cups/winter.json', { name: 'winter', title: 'Winter' });
    expect(() => importMovesetOverrides(store, 'winter')).toThrow(MissingFieldError);
  });
});

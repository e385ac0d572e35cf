/**
 * Moveset Override Importer
 *
 * Turns the ranker's recommended movesets into an override file: for every
 * species the cup definition explicitly includes (and does not exclude),
 * take the moveset from the overall ranking at the chosen league.
 *
 * @module derive/overrides-importer
 */

import { join } from 'node:path';
import { MissingFieldError, ParseError } from '../core/errors.js';
import {
  CupDefinitionSchema,
  IdFilterRuleSchema,
  RankedListSchema,
  type CupDefinition,
  type RankedEntry,
} from '../core/schemas.js';
import { silentLogger, type DiagnosticLogger } from '../core/types.js';
import { atomicWriteJSONSync } from '../core/utils/atomic-write.js';
import { readJsonFile } from '../core/utils/json-file.js';
import type { CupStore } from '../store/cup-store.js';

export interface MovesetOverride {
  readonly speciesId: string;
  readonly fastMove: string;
  readonly chargedMoves: readonly string[];
}

export interface ImportOptions {
  /** CP tier to read rankings at; defaults to the definition's league */
  readonly league?: number | string;
  /** Write the result to overrides/<cup>/<league>.json */
  readonly write?: boolean;
  readonly logger?: DiagnosticLogger;
}

export interface ImportResult {
  readonly codename: string;
  readonly league: number | string;
  readonly rankingsPath: string;
  readonly overrides: readonly MovesetOverride[];
  /** Set when the overrides were written */
  readonly writtenTo?: string;
}

// ============================================================================
// Eligibility
// ============================================================================

function excludedIds(rule: unknown): string[] {
  if (typeof rule === 'string') {
    return [rule];
  }
  const idRule = IdFilterRuleSchema.safeParse(rule);
  if (idRule.success) {
    return idRule.data.values;
  }
  if (typeof rule === 'object' && rule !== null && 'speciesId' in rule && typeof rule.speciesId === 'string') {
    return [rule.speciesId];
  }
  return [];
}

/**
 * Species listed by `include` id rules, minus every species `exclude` names
 */
export function eligibleSpecies(definition: CupDefinition): Set<string> {
  const eligible = new Set<string>();
  for (const rule of definition.include ?? []) {
    const idRule = IdFilterRuleSchema.safeParse(rule);
    if (idRule.success) {
      idRule.data.values.forEach((id) => eligible.add(id));
    }
  }
  for (const rule of definition.exclude ?? []) {
    excludedIds(rule).forEach((id) => eligible.delete(id));
  }
  return eligible;
}

/**
 * @param source - Rankings location, for error messages
 * @throws ParseError if an eligible entry has no moveset
 */
export function buildMovesetOverrides(
  eligible: ReadonlySet<string>,
  rankings: readonly RankedEntry[],
  source: string
): MovesetOverride[] {
  const overrides: MovesetOverride[] = [];
  for (const entry of rankings) {
    if (!eligible.has(entry.speciesId)) {
      continue;
    }
    const [fastMove, ...chargedMoves] = entry.moveset ?? [];
    if (fastMove === undefined) {
      throw new ParseError(`Ranking entry '${entry.speciesId}' in ${source} has no moveset`, source);
    }
    overrides.push({ speciesId: entry.speciesId, fastMove, chargedMoves });
  }
  return overrides.sort((a, b) => (a.speciesId < b.speciesId ? -1 : a.speciesId > b.speciesId ? 1 : 0));
}

// ============================================================================
// Import
// ============================================================================

/**
 * @throws NotFoundError if the definition or the overall ranking is missing
 * @throws MissingFieldError if no league is given and the definition has none
 */
export function importMovesetOverrides(
  store: CupStore,
  codename: string,
  options: ImportOptions = {}
): ImportResult {
  const logger = options.logger ?? silentLogger;
  const definitionPath = store.resolveForRead(codename, { kind: 'definition' });
  const definition = readJsonFile(definitionPath, CupDefinitionSchema);

  const league = options.league ?? definition.league;
  if (league === undefined || league === '') {
    throw new MissingFieldError('league', definitionPath);
  }

  const rankingsPath = join(store.rankingsDir(codename), 'overall', `rankings-${league}.json`);
  const rankings = readJsonFile(rankingsPath, RankedListSchema);
  const eligible = eligibleSpecies(definition);
  const overrides = buildMovesetOverrides(eligible, rankings, rankingsPath);

  logger.info(`Imported ${overrides.length} movesets for '${codename}'`, {
    league,
    rankingsPath,
    eligible: eligible.size,
  });

  if (!options.write) {
    return { codename, league, rankingsPath, overrides };
  }

  const writtenTo = join(store.overridesDir(codename), `${league}.json`);
  atomicWriteJSONSync(writtenTo, overrides, 4);
  logger.info(`Wrote overrides to ${writtenTo}`);
  return { codename, league, rankingsPath, overrides, writtenTo };
}

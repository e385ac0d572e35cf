/**
 * Team-builder configuration for a cup
 *
 * Builds the JSON object the team builder imports: the cup's allowed
 * species, its display name and league label, and fixed roster rules.
 * The species come from a ranking or override snapshot, read either from
 * the live data root or from a packaged archive.
 *
 * @module derive/zygarde-config
 */

import { join } from 'node:path';
import { MissingFieldError, ParseError } from '../core/errors.js';
import { CupDefinitionSchema, RankedListSchema, type CupDefinition } from '../core/schemas.js';
import { silentLogger, type DiagnosticLogger } from '../core/types.js';
import { readJsonFile } from '../core/utils/json-file.js';
import { CupArchive, type SnapshotKind } from '../distribution/cup-archive.js';
import type { CupStore } from '../store/cup-store.js';

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_NAME_SUFFIX = ' (Builder)';

export interface ZygardeConfig {
  readonly allowedMons: string;
  readonly name: string;
  readonly league: string;
  readonly rulesUri: string;
  readonly uniquenessRule: 'DexNumberAndType';
  readonly slots: 6;
}

export type ZygardeSource =
  | { readonly kind: 'live'; readonly store: CupStore; readonly codename: string }
  | {
      readonly kind: 'archive';
      readonly archivePath: string;
      /** When set, the archive's shortname must match */
      readonly codename?: string;
    };

export interface ZygardeOptions {
  /** Snapshot the species list is taken from (default: rankings) */
  readonly snapshot?: SnapshotKind;
  readonly nameSuffix?: string;
  readonly logger?: DiagnosticLogger;
}

// ============================================================================
// Pure builder
// ============================================================================

const LEAGUE_LABELS: Readonly<Record<number, string>> = {
  1500: 'Great',
  2500: 'Ultra',
  10000: 'Master',
};

export function leagueLabel(league: number | string): string {
  const cp = typeof league === 'number' ? league : /^\d+$/.test(league) ? Number(league) : NaN;
  return LEAGUE_LABELS[cp] ?? `Custom(${league})`;
}

function requireLeague(definition: CupDefinition, source: string): number | string {
  const league = definition.league;
  if (league === undefined || (typeof league === 'string' && league.trim() === '')) {
    throw new MissingFieldError('league', source);
  }
  return league;
}

function requireTitle(definition: CupDefinition, source: string): string {
  const title = definition.title;
  if (title === undefined || title.trim() === '') {
    throw new MissingFieldError('title', source);
  }
  return title;
}

/**
 * @param source - Where the definition came from, for error messages
 * @throws MissingFieldError if the definition has no league or title
 */
export function buildZygardeConfig(
  definition: CupDefinition,
  records: ReadonlyArray<{ readonly speciesId?: string }>,
  source: string,
  nameSuffix: string = DEFAULT_NAME_SUFFIX
): ZygardeConfig {
  const league = requireLeague(definition, source);
  const title = requireTitle(definition, source);

  const ids = new Set<string>();
  for (const record of records) {
    if (record.speciesId !== undefined) {
      ids.add(record.speciesId);
    }
  }
  const allowedMons = [...ids].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0)).join(', ');

  return {
    allowedMons,
    name: `${title}${nameSuffix}`,
    league: leagueLabel(league),
    rulesUri: definition.link ?? '',
    uniquenessRule: 'DexNumberAndType',
    slots: 6,
  };
}

// ============================================================================
// Sources
// ============================================================================

/**
 * @throws NotFoundError if the definition or the snapshot is missing
 * @throws MissingFieldError if the definition has no league or title
 * @throws ParseError if the archive holds a different cup than asked for
 */
export function generateZygardeConfig(source: ZygardeSource, options: ZygardeOptions = {}): ZygardeConfig {
  const snapshot = options.snapshot ?? 'rankings';
  const logger = options.logger ?? silentLogger;

  let definition: CupDefinition;
  let definitionSource: string;
  let snapshotSource: string;
  let records: ReadonlyArray<{ readonly speciesId?: string }>;

  if (source.kind === 'live') {
    definitionSource = source.store.resolveForRead(source.codename, { kind: 'definition' });
    definition = readJsonFile(definitionSource, CupDefinitionSchema);
    const league = requireLeague(definition, definitionSource);
    snapshotSource =
      snapshot === 'rankings'
        ? join(source.store.rankingsDir(source.codename), 'overall', `rankings-${league}.json`)
        : join(source.store.overridesDir(source.codename), `${league}.json`);
    records = readJsonFile(snapshotSource, RankedListSchema);
  } else {
    const archive = CupArchive.open(source.archivePath);
    if (source.codename !== undefined && source.codename !== archive.shortname) {
      throw new ParseError(
        `Archive ${archive.path} holds cup '${archive.shortname}', not '${source.codename}'`,
        archive.path
      );
    }
    definitionSource = `${archive.path}:${archive.definitionEntry()}`;
    definition = archive.readDefinition();
    const league = requireLeague(definition, definitionSource);
    snapshotSource = `${archive.path}:${archive.snapshotEntry(snapshot, league)}`;
    records = archive.readSnapshot(snapshot, league);
  }

  logger.info('Building team-builder config', {
    definition: definitionSource,
    snapshot: snapshotSource,
    entries: records.length,
  });
  return buildZygardeConfig(definition, records, definitionSource, options.nameSuffix);
}

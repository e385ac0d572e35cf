/**
 * Threat Group Filter
 *
 * Narrows a species record set (typically a ranking snapshot) to a
 * hand-maintained list of species identifiers.
 *
 * @module derive/threat-group
 */

import { existsSync, readFileSync } from 'node:fs';
import { NotFoundError } from '../core/errors.js';
import { SpeciesRecordListSchema, type SpeciesRecord } from '../core/schemas.js';
import { silentLogger, type DiagnosticLogger } from '../core/types.js';
import { readJsonFile } from '../core/utils/json-file.js';

/**
 * Newline-delimited identifiers: trimmed, blank lines dropped, first
 * occurrence kept
 */
export function parseThreatGroup(text: string): string[] {
  const seen = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const id = line.trim();
    if (id.length > 0) {
      seen.add(id);
    }
  }
  return [...seen];
}

function compareCodePoints(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Records whose `speciesId` is wanted, ordered by identifier.
 *
 * Records without an identifier never match. Wanted identifiers with no
 * record are dropped.
 */
export function filterThreatGroup<T extends SpeciesRecord>(
  wantedIds: Iterable<string>,
  records: readonly T[]
): T[] {
  const wanted = new Set(wantedIds);
  return records
    .filter((record) => record.speciesId !== undefined && wanted.has(record.speciesId))
    .sort((a, b) => compareCodePoints(a.speciesId ?? '', b.speciesId ?? ''));
}

/**
 * Read both inputs from disk and filter
 *
 * @throws NotFoundError if either file is missing
 * @throws ParseError if the records file is not a JSON array of objects
 */
export function filterThreatGroupFiles(
  listPath: string,
  recordsPath: string,
  logger: DiagnosticLogger = silentLogger
): SpeciesRecord[] {
  if (!existsSync(listPath)) {
    throw new NotFoundError(`Threat group list not found: ${listPath}`, listPath);
  }
  const records = readJsonFile(recordsPath, SpeciesRecordListSchema);
  const wanted = parseThreatGroup(readFileSync(listPath, 'utf-8'));
  const matched = filterThreatGroup(wanted, records);

  logger.debug('Filtered threat group', {
    listPath,
    recordsPath,
    wanted: wanted.length,
    matched: matched.length,
  });
  return matched;
}

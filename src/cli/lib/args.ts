/**
 * Argument parsing shared by commands
 *
 * @module cli/lib/args
 */

import { existsSync, readFileSync } from 'node:fs';
import { NotFoundError, ParseError } from '../../core/errors.js';
import { CpTierSchema, formatIssues } from '../../core/schemas.js';
import type { CpTier } from '../../core/types.js';

/**
 * @throws ParseError if the value is not a known CP tier
 */
export function parseCpTier(value: string, option = '--cp'): CpTier {
  const result = CpTierSchema.safeParse(value);
  if (!result.success) {
    throw new ParseError(`Invalid ${option} '${value}': ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * @throws NotFoundError if the file does not exist
 */
export function readTextFile(path: string): string {
  if (!existsSync(path)) {
    throw new NotFoundError(`File not found: ${path}`, path);
  }
  return readFileSync(path, 'utf-8');
}

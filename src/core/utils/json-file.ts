/**
 * Schema-checked JSON file reading
 *
 * @module core/utils/json-file
 */

import { existsSync, readFileSync } from 'node:fs';
import type { z } from 'zod';
import { NotFoundError, ParseError } from '../errors.js';
import { formatIssues } from '../schemas.js';

/**
 * Parse JSON text and validate it against a schema
 *
 * @param source - File path or archive entry name, for error messages
 * @throws ParseError on invalid JSON or schema mismatch
 */
export function parseJsonText<S extends z.ZodTypeAny>(
  text: string,
  schema: S,
  source: string
): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Invalid JSON in ${source}: ${reason}`, source, { cause: error });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ParseError(`Unexpected structure in ${source}: ${formatIssues(result.error)}`, source);
  }
  return result.data;
}

/**
 * Read a JSON file and validate it against a schema
 *
 * @throws NotFoundError if the file does not exist
 * @throws ParseError on invalid JSON or schema mismatch
 */
export function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S): z.output<S> {
  if (!existsSync(filePath)) {
    throw new NotFoundError(`File not found: ${filePath}`, filePath);
  }
  return parseJsonText(readFileSync(filePath, 'utf-8'), schema, filePath);
}

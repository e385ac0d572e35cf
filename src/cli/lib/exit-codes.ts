/**
 * Exit codes and error-to-exit-code mapping
 *
 * @module cli/lib/exit-codes
 */

import { isCupError } from '../../core/errors.js';
import { ConfigError } from './config.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 1,
  PRECONDITION_FAILED: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (!isCupError(error)) {
    return EXIT_CODES.ERRORS;
  }
  switch (error.code) {
    case 'NOT_FOUND':
    case 'ALREADY_EXISTS':
    case 'MISSING_FIELD':
      return EXIT_CODES.PRECONDITION_FAILED;
    case 'PARSE_ERROR':
    case 'PARTIAL_FAILURE':
      return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
}

/**
 * Cup Error Types
 *
 * Error classes for every failure the cup core can report. Each carries a
 * `code` discriminant so callers (and the CLI exit-code mapping) can branch
 * without `instanceof` chains.
 *
 * @module core/errors
 */

export type CupErrorCode =
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'MISSING_FIELD'
  | 'PARSE_ERROR'
  | 'PARTIAL_FAILURE';

/**
 * Base class for all cup core errors
 */
export abstract class CupError extends Error {
  abstract readonly code: CupErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Structured details for log metadata
   */
  details(): Record<string, unknown> {
    return { code: this.code };
  }
}

/**
 * A file, directory, registry entry or archive entry is absent
 */
export class NotFoundError extends CupError {
  readonly code = 'NOT_FOUND' as const;
  readonly name = 'NotFoundError';

  constructor(
    message: string,
    public readonly path?: string
  ) {
    super(message);
  }

  override details(): Record<string, unknown> {
    return { code: this.code, ...(this.path ? { path: this.path } : {}) };
  }
}

/**
 * The target of a create/clone/rename already has artifacts
 */
export class AlreadyExistsError extends CupError {
  readonly code = 'ALREADY_EXISTS' as const;
  readonly name = 'AlreadyExistsError';

  constructor(
    message: string,
    public readonly paths: readonly string[] = []
  ) {
    super(message);
  }

  override details(): Record<string, unknown> {
    return { code: this.code, paths: this.paths };
  }
}

/**
 * A required field is absent or empty in a record
 */
export class MissingFieldError extends CupError {
  readonly code = 'MISSING_FIELD' as const;
  readonly name = 'MissingFieldError';

  constructor(
    public readonly field: string,
    public readonly source: string
  ) {
    super(`Missing or empty '${field}' in ${source}`);
  }

  override details(): Record<string, unknown> {
    return { code: this.code, field: this.field, source: this.source };
  }
}

/**
 * Content that does not parse, or does not match its schema
 */
export class ParseError extends CupError {
  readonly code = 'PARSE_ERROR' as const;
  readonly name = 'ParseError';

  constructor(
    message: string,
    public readonly source?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }

  override details(): Record<string, unknown> {
    return { code: this.code, ...(this.source ? { source: this.source } : {}) };
  }
}

/**
 * Outcome of a lifecycle step failing after earlier steps ran
 */
export interface PartialFailureReport {
  readonly operation: string;
  readonly codename: string;
  /** Steps that ran to completion before the failure */
  readonly completedSteps: readonly string[];
  /** Step that threw */
  readonly failedStep: string;
  /** Whether rollback was attempted at all */
  readonly rollbackAttempted: boolean;
  /** Steps whose touched paths could not be restored */
  readonly unrestoredSteps: readonly string[];
}

/**
 * A multi-step lifecycle operation failed part way through.
 *
 * When `rolledBack` is true every touched path was restored and the cup is
 * in its pre-operation state; otherwise the listed steps need manual
 * reconciliation.
 */
export class PartialFailureError extends CupError {
  readonly code = 'PARTIAL_FAILURE' as const;
  readonly name = 'PartialFailureError';

  constructor(
    public readonly report: PartialFailureReport,
    cause: unknown
  ) {
    super(PartialFailureError.describe(report, cause), { cause });
  }

  get rolledBack(): boolean {
    return this.report.rollbackAttempted && this.report.unrestoredSteps.length === 0;
  }

  override details(): Record<string, unknown> {
    return {
      code: this.code,
      completedSteps: this.report.completedSteps,
      failedStep: this.report.failedStep,
      rolledBack: this.rolledBack,
      unrestoredSteps: this.report.unrestoredSteps,
    };
  }

  private static describe(report: PartialFailureReport, cause: unknown): string {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const completed = report.completedSteps.length > 0 ? report.completedSteps.join(', ') : 'none';
    let outcome: string;
    if (!report.rollbackAttempted) {
      outcome = 'no rollback attempted';
    } else if (report.unrestoredSteps.length === 0) {
      outcome = 'rolled back';
    } else {
      outcome = `could not restore: ${report.unrestoredSteps.join(', ')}`;
    }
    return (
      `${report.operation} ${report.codename} failed at step '${report.failedStep}': ${reason} ` +
      `(completed: ${completed}; ${outcome})`
    );
  }
}

/**
 * Type guard for cup core errors
 */
export function isCupError(error: unknown): error is CupError {
  return error instanceof CupError;
}

// ============================================================================
// Job Errors: typed failures raised while building or consulting a JobContext
// ============================================================================

import type { PeriodSource } from './period.js';

export type JobContextErrorCode =
  | 'INVALID_INPUT'
  | 'INVALID_PERIOD'
  | 'SPECIAL_JURISDICTION_NOT_FIRST';

/**
 * Run input was rejected before any document was touched.
 * Surfaced to the caller as a 400 (HTTP) or a failed job (worker).
 */
export class JobContextError extends Error {
  readonly code: JobContextErrorCode;

  constructor(code: JobContextErrorCode, message: string) {
    super(message);
    this.name = 'JobContextError';
    this.code = code;
  }
}

/**
 * A protected document code asked for its period while the run has no
 * user-confirmed period. Never recovered locally: the pipeline records it
 * against the unit and halts the file.
 */
export class ProtectedPeriodError extends Error {
  readonly code = 'PROTECTED_PERIOD_SOURCE' as const;
  readonly documentCode: string;
  readonly periodSource: PeriodSource;

  constructor(documentCode: string, periodSource: PeriodSource) {
    super(
      `Document code ${documentCode} requires a user-confirmed period ` +
      `(period source is ${periodSource}). Confirm the period and re-run this file.`,
    );
    this.name = 'ProtectedPeriodError';
    this.documentCode = documentCode;
    this.periodSource = periodSource;
  }
}

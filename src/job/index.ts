/**
 * Job barrel export
 */

export {
  JobContext,
  createJobContext,
  PROTECTED_CODES,
  MAX_JURISDICTION_SLOTS,
  JobContextInputSchema,
  JurisdictionInputSchema,
} from './job-context.js';
export type { JobContextInput, JobContextOptions, PeriodResolution, ResolvedPeriodSource } from './job-context.js';
export { JobContextError, ProtectedPeriodError } from './errors.js';
export type { JobContextErrorCode } from './errors.js';
export { AuditTrail, formatAuditLine } from './audit-trail.js';
export type { AuditEntry, AuditEvent, AuditValue } from './audit-trail.js';
export { normalizePeriod, detectPeriod, isValidPeriod, PERIOD_SOURCES } from './period.js';
export type { PeriodSource, DetectedPeriod } from './period.js';
export { normalizeJurisdictionName, sameJurisdiction, describeSlot } from './jurisdiction.js';
export type { JurisdictionSlot } from './jurisdiction.js';

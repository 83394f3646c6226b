/**
 * JobContext: Per-Run State and Protected-Code Period Guard
 *
 * Built once at run start from user input and passed explicitly through the
 * pipeline; nothing run-scoped lives in module state, so concurrent runs never
 * see each other's slots or periods.
 *
 * Period chain for getPeriodFor(code, detected):
 * - Protected codes: user-confirmed period only (source UI / UI_FORCED),
 *   otherwise ProtectedPeriodError. Detected values are discarded.
 * - Other codes: valid detected value -> confirmed value -> run default.
 *
 * Every step is written to the run's AuditTrail.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { AuditTrail } from './audit-trail.js';
import { JobContextError, ProtectedPeriodError } from './errors.js';
import { describeSlot, sameJurisdiction } from './jurisdiction.js';
import type { JurisdictionSlot } from './jurisdiction.js';
import { PERIOD_SOURCES, isValidPeriod, monthsBetween, normalizePeriod, toPeriod } from './period.js';
import type { PeriodSource } from './period.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/**
 * Fixed-asset ledger, lump-sum depreciation schedule, small-asset schedule and
 * the payment summary: their period must come from the user.
 */
export const PROTECTED_CODES: ReadonlySet<string> = new Set(['6001', '6002', '6003', '0000']);

export const MAX_JURISDICTION_SLOTS = 10;

export const PLAUSIBLE_PERIOD_MONTHS = 24;

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

export const JurisdictionInputSchema = z.object({
  prefecture: z.string().trim().min(1),
  municipality: z.string().trim().default(''),
});

export const JobContextInputSchema = z.object({
  runId: z.string().trim().min(1).optional(),
  confirmedPeriod: z.string().nullable().default(null),
  periodSource: z.enum(PERIOD_SOURCES).optional(),
  /** Ordered: the first entry is slot 1 */
  jurisdictions: z.array(JurisdictionInputSchema).max(MAX_JURISDICTION_SLOTS).default([]),
});

export type JobContextInput = z.input<typeof JobContextInputSchema>;

export interface JobContextOptions {
  /** Prefecture with no municipal layer; must occupy slot 1 when configured */
  specialJurisdiction: string;
  /** YYMM used when neither detection nor the user supplied a period */
  defaultPeriod?: string;
  /** Run start time (default period fallback); injectable for tests */
  now?: Date;
  /** Receives audit lines; defaults to console.log */
  auditWriter?: (line: string) => void;
}

export type ResolvedPeriodSource = 'UI' | 'UI_FORCED' | 'DETECTED' | 'DEFAULT';

export interface PeriodResolution {
  value: string;
  source: ResolvedPeriodSource;
}

// ---------------------------------------------------------------------------
// JobContext
// ---------------------------------------------------------------------------

export class JobContext {
  constructor(
    readonly runId: string,
    readonly confirmedPeriod: string | null,
    readonly periodSource: PeriodSource,
    readonly jurisdictionSlots: readonly JurisdictionSlot[],
    readonly specialJurisdiction: string,
    readonly defaultPeriod: string,
    readonly audit: AuditTrail,
  ) {}

  isProtectedCode(code: string): boolean {
    return PROTECTED_CODES.has(code);
  }

  isSpecialSlot(slot: JurisdictionSlot): boolean {
    return sameJurisdiction(slot.prefecture, this.specialJurisdiction);
  }

  /**
   * Slot index used for municipality numbering: slot 1 is skipped when it
   * holds the special jurisdiction, so the first municipality gets the base code.
   */
  municipalOrdinal(slot: JurisdictionSlot): number {
    const first = this.jurisdictionSlots[0];
    const offset = first && this.isSpecialSlot(first) ? 1 : 0;
    return slot.slotIndex - offset;
  }

  /** Detected periods further than PLAUSIBLE_PERIOD_MONTHS from the confirmed (or default) period are rejected */
  isPlausiblePeriod(period: string): boolean {
    const reference = this.confirmedPeriod ?? this.defaultPeriod;
    const distance = monthsBetween(period, reference);
    return distance !== null && Math.abs(distance) <= PLAUSIBLE_PERIOD_MONTHS;
  }

  private hasUserPeriod(): boolean {
    return this.confirmedPeriod !== null && (this.periodSource === 'UI' || this.periodSource === 'UI_FORCED');
  }

  /**
   * Resolve the period for a document code.
   *
   * @param detected - Period read from the document, if detection ran
   * @throws ProtectedPeriodError for protected codes without a user-confirmed period
   */
  resolvePeriod(code: string, detected?: string | null): PeriodResolution {
    if (this.isProtectedCode(code)) {
      if (detected) {
        this.audit.record('period_detection_discarded', { code, detected });
      }
      if (!this.hasUserPeriod() || this.confirmedPeriod === null) {
        this.audit.record('protected_code_violation', { code, periodSource: this.periodSource });
        throw new ProtectedPeriodError(code, this.periodSource);
      }
      const resolution: PeriodResolution = {
        value: this.confirmedPeriod,
        source: this.periodSource === 'UI_FORCED' ? 'UI_FORCED' : 'UI',
      };
      this.audit.record('protected_code_enforced', { code, period: resolution.value, source: resolution.source });
      this.audit.record('period_resolution', { code, period: resolution.value, source: resolution.source });
      return resolution;
    }

    const accepted = detected && isValidPeriod(detected) && this.isPlausiblePeriod(detected) ? detected : null;

    let resolution: PeriodResolution;
    if (accepted) {
      resolution = { value: accepted, source: 'DETECTED' };
    } else if (this.confirmedPeriod !== null) {
      resolution = { value: this.confirmedPeriod, source: this.periodSource };
    } else {
      resolution = { value: this.defaultPeriod, source: 'DEFAULT' };
    }

    this.audit.record('period_resolution', {
      code,
      period: resolution.value,
      source: resolution.source,
      ...(detected && !accepted ? { rejectedDetected: detected } : {}),
    });
    return resolution;
  }

  getPeriodFor(code: string, detected?: string | null): string {
    return this.resolvePeriod(code, detected).value;
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

function periodOf(date: Date): string {
  const value = toPeriod(date.getFullYear(), date.getMonth() + 1);
  if (!value) {
    throw new JobContextError('INVALID_PERIOD', `Cannot derive a default period from ${date.toISOString()}`);
  }
  return value;
}

/**
 * Validate run input and build a JobContext.
 *
 * @throws JobContextError on invalid input, an unparseable period, or a special
 *         jurisdiction configured outside slot 1
 */
export function createJobContext(input: unknown, options: JobContextOptions): JobContext {
  const parsed = JobContextInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || 'input'}: ${issue.message}` : 'unknown issue';
    throw new JobContextError('INVALID_INPUT', `Invalid run input (${where})`);
  }
  const data = parsed.data;

  let confirmedPeriod: string | null = null;
  if (data.confirmedPeriod !== null && data.confirmedPeriod.trim() !== '') {
    confirmedPeriod = normalizePeriod(data.confirmedPeriod);
    if (!confirmedPeriod) {
      throw new JobContextError('INVALID_PERIOD', `Unrecognized period "${data.confirmedPeriod}" (expected YYMM)`);
    }
  }

  const periodSource: PeriodSource = data.periodSource ?? (confirmedPeriod ? 'UI' : 'DETECTED');
  if (periodSource !== 'DETECTED' && !confirmedPeriod) {
    throw new JobContextError('INVALID_INPUT', `Period source ${periodSource} requires a confirmed period`);
  }

  let defaultPeriod: string;
  if (options.defaultPeriod) {
    const normalized = normalizePeriod(options.defaultPeriod);
    if (!normalized) {
      throw new JobContextError('INVALID_PERIOD', `Unrecognized default period "${options.defaultPeriod}"`);
    }
    defaultPeriod = normalized;
  } else {
    defaultPeriod = periodOf(options.now ?? new Date());
  }

  const slots: JurisdictionSlot[] = data.jurisdictions.map((j, i) => {
    const isSpecial = sameJurisdiction(j.prefecture, options.specialJurisdiction);
    if (isSpecial && i > 0) {
      throw new JobContextError(
        'SPECIAL_JURISDICTION_NOT_FIRST',
        `${j.prefecture} must be configured as jurisdiction 1 (found at position ${i + 1})`,
      );
    }
    if (isSpecial && j.municipality) {
      console.warn('[job-context] Ignoring municipality on special jurisdiction slot', {
        prefecture: j.prefecture,
        municipality: j.municipality,
      });
    }
    return Object.freeze({
      slotIndex: i + 1,
      prefecture: j.prefecture,
      municipality: isSpecial ? '' : j.municipality,
    });
  });

  const runId = data.runId ?? randomUUID();
  const audit = new AuditTrail(runId, options.auditWriter);
  const context = new JobContext(
    runId,
    confirmedPeriod,
    periodSource,
    Object.freeze(slots),
    options.specialJurisdiction,
    defaultPeriod,
    audit,
  );

  audit.record('run_started', {
    period: confirmedPeriod,
    periodSource,
    defaultPeriod,
    slots: slots.map(describeSlot).join(',') || null,
  });
  return context;
}

/**
 * Tests for JobContext
 *
 * - Input validation and slot construction (special jurisdiction rules)
 * - Period chain: detected -> confirmed -> default
 * - Protected codes: user-confirmed period or ProtectedPeriodError
 * - Audit entries for every resolution
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { JobContextError, ProtectedPeriodError } from '../errors.js';
import { createJobContext, PROTECTED_CODES } from '../job-context.js';
import type { JobContextOptions } from '../job-context.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const options: JobContextOptions = {
  specialJurisdiction: '東京都',
  defaultPeriod: '2412',
  auditWriter: () => undefined,
};

const slots = [
  { prefecture: '東京都' },
  { prefecture: '愛知県', municipality: '蒲郡市' },
  { prefecture: '福岡県', municipality: '福岡市' },
];

function contextError(input: unknown, opts: JobContextOptions = options): unknown {
  try {
    createJobContext(input, opts);
  } catch (err) {
    return err;
  }
  return null;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('createJobContext', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds ordered slots from the jurisdiction list', () => {
    const context = createJobContext({ runId: 'run-1', jurisdictions: slots }, options);

    expect(context.runId).toBe('run-1');
    expect(context.jurisdictionSlots).toEqual([
      { slotIndex: 1, prefecture: '東京都', municipality: '' },
      { slotIndex: 2, prefecture: '愛知県', municipality: '蒲郡市' },
      { slotIndex: 3, prefecture: '福岡県', municipality: '福岡市' },
    ]);
  });

  it('normalizes the confirmed period and defaults its source to UI', () => {
    const context = createJobContext({ confirmedPeriod: '令和7年3月' }, options);
    expect(context.confirmedPeriod).toBe('2503');
    expect(context.periodSource).toBe('UI');
  });

  it('defaults the period source to DETECTED without a confirmed period', () => {
    const context = createJobContext({}, options);
    expect(context.confirmedPeriod).toBeNull();
    expect(context.periodSource).toBe('DETECTED');
  });

  it('derives the default period from the run start when none is configured', () => {
    const context = createJobContext({}, { specialJurisdiction: '東京都', now: new Date(2025, 4, 10), auditWriter: () => undefined });
    expect(context.defaultPeriod).toBe('2505');
  });

  it('generates a run id when none is given', () => {
    const context = createJobContext({}, options);
    expect(context.runId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('records run_started', () => {
    const context = createJobContext({ runId: 'run-1', confirmedPeriod: '2503', jurisdictions: slots }, options);
    expect(context.audit.ofEvent('run_started')[0]?.details).toEqual({
      period: '2503',
      periodSource: 'UI',
      defaultPeriod: '2412',
      slots: '東京都,愛知県/蒲郡市,福岡県/福岡市',
    });
  });

  it('rejects the special jurisdiction outside slot 1', () => {
    const err = contextError({ jurisdictions: [{ prefecture: '愛知県' }, { prefecture: '東京都' }] });
    expect(err).toBeInstanceOf(JobContextError);
    expect(err).toMatchObject({ code: 'SPECIAL_JURISDICTION_NOT_FIRST' });
  });

  it('drops a municipality configured on the special slot', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const context = createJobContext({ jurisdictions: [{ prefecture: '東京都', municipality: '千代田区' }] }, options);

    expect(context.jurisdictionSlots[0]?.municipality).toBe('');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('rejects more than ten jurisdictions', () => {
    const many = Array.from({ length: 11 }, (_, i) => ({ prefecture: `県${i}`, municipality: `市${i}` }));
    expect(contextError({ jurisdictions: many })).toMatchObject({ code: 'INVALID_INPUT' });
  });

  it('rejects a UI period source without a period', () => {
    expect(contextError({ periodSource: 'UI' })).toMatchObject({ code: 'INVALID_INPUT' });
  });

  it('rejects an unparseable period', () => {
    expect(contextError({ confirmedPeriod: 'March' })).toMatchObject({ code: 'INVALID_PERIOD' });
  });

  it('rejects an unparseable default period', () => {
    expect(contextError({}, { ...options, defaultPeriod: 'soon' })).toMatchObject({ code: 'INVALID_PERIOD' });
  });
});

describe('JobContext', () => {
  describe('slots', () => {
    it('skips the special slot when numbering municipalities', () => {
      const context = createJobContext({ jurisdictions: slots }, options);
      const [tokyo, aichi, fukuoka] = context.jurisdictionSlots;

      expect(context.isSpecialSlot(tokyo)).toBe(true);
      expect(context.municipalOrdinal(aichi)).toBe(1);
      expect(context.municipalOrdinal(fukuoka)).toBe(2);
    });

    it('numbers municipalities by slot when slot 1 is ordinary', () => {
      const context = createJobContext({ jurisdictions: slots.slice(1) }, options);
      const [aichi, fukuoka] = context.jurisdictionSlots;

      expect(context.municipalOrdinal(aichi)).toBe(1);
      expect(context.municipalOrdinal(fukuoka)).toBe(2);
    });
  });

  describe('resolvePeriod (ordinary codes)', () => {
    it('uses a valid detected period first', () => {
      const context = createJobContext({ confirmedPeriod: '2503' }, options);
      expect(context.resolvePeriod('1003', '2409')).toEqual({ value: '2409', source: 'DETECTED' });
    });

    it('falls back to the confirmed period and records the rejected value', () => {
      const context = createJobContext({ confirmedPeriod: '2503' }, options);
      expect(context.resolvePeriod('1003', '2513')).toEqual({ value: '2503', source: 'UI' });
      expect(context.audit.ofEvent('period_resolution')[0]?.details).toEqual({
        code: '1003',
        period: '2503',
        source: 'UI',
        rejectedDetected: '2513',
      });
    });

    it('falls back to the default period last', () => {
      const context = createJobContext({}, options);
      expect(context.resolvePeriod('1003', null)).toEqual({ value: '2412', source: 'DEFAULT' });
    });

    it('reports UI_FORCED as the source when the user forced the period', () => {
      const context = createJobContext({ confirmedPeriod: '2503', periodSource: 'UI_FORCED' }, options);
      expect(context.getPeriodFor('5001')).toBe('2503');
      expect(context.resolvePeriod('5001')).toEqual({ value: '2503', source: 'UI_FORCED' });
    });

    it('reports the run period source when a DETECTED run falls back to its confirmed period', () => {
      const context = createJobContext({ confirmedPeriod: '2503', periodSource: 'DETECTED' }, options);
      expect(context.resolvePeriod('5001', null)).toEqual({ value: '2503', source: 'DETECTED' });
      expect(context.audit.ofEvent('period_resolution')[0]?.details).toEqual({
        code: '5001',
        period: '2503',
        source: 'DETECTED',
      });
    });

    it('rejects a detected period far from the confirmed period', () => {
      const context = createJobContext({ confirmedPeriod: '2503' }, options);
      expect(context.resolvePeriod('1003', '7001')).toEqual({ value: '2503', source: 'UI' });
      expect(context.resolvePeriod('1003', '2303')).toEqual({ value: '2303', source: 'DETECTED' });
      expect(context.resolvePeriod('1003', '2302')).toEqual({ value: '2503', source: 'UI' });
    });

    it('records a rejected detected period on a DETECTED run', () => {
      const context = createJobContext({ confirmedPeriod: '2503', periodSource: 'DETECTED' }, options);
      expect(context.resolvePeriod('1003', '7001')).toEqual({ value: '2503', source: 'DETECTED' });
      expect(context.audit.ofEvent('period_resolution')[0]?.details).toEqual({
        code: '1003',
        period: '2503',
        source: 'DETECTED',
        rejectedDetected: '7001',
      });
    });

    it('measures plausibility against the default period when none is confirmed', () => {
      const context = createJobContext({}, options);
      expect(context.isPlausiblePeriod('2612')).toBe(true);
      expect(context.isPlausiblePeriod('2701')).toBe(false);
    });
  });

  describe('resolvePeriod (protected codes)', () => {
    it('covers the asset ledgers and the payment summary', () => {
      expect([...PROTECTED_CODES].sort()).toEqual(['0000', '6001', '6002', '6003']);
    });

    it('throws ProtectedPeriodError without a user-confirmed period', () => {
      const context = createJobContext({}, options);

      expect(() => context.resolvePeriod('6001', '2503')).toThrow(ProtectedPeriodError);
      expect(context.audit.ofEvent('period_detection_discarded')[0]?.details).toEqual({ code: '6001', detected: '2503' });
      expect(context.audit.ofEvent('protected_code_violation')[0]?.details).toEqual({
        code: '6001',
        periodSource: 'DETECTED',
      });
    });

    it('carries the document code and period source on the error', () => {
      const context = createJobContext({}, options);
      let caught: unknown = null;
      try {
        context.resolvePeriod('0000');
      } catch (err) {
        caught = err;
      }
      expect(caught).toMatchObject({
        name: 'ProtectedPeriodError',
        code: 'PROTECTED_PERIOD_SOURCE',
        documentCode: '0000',
        periodSource: 'DETECTED',
      });
    });

    it('uses the confirmed period and ignores the detected one', () => {
      const context = createJobContext({ confirmedPeriod: '2503' }, options);

      expect(context.resolvePeriod('6002', '2409')).toEqual({ value: '2503', source: 'UI' });
      expect(context.audit.ofEvent('protected_code_enforced')).toHaveLength(1);
    });

    it('accepts a forced period', () => {
      const context = createJobContext({ confirmedPeriod: '2503', periodSource: 'UI_FORCED' }, options);
      expect(context.resolvePeriod('6003')).toEqual({ value: '2503', source: 'UI_FORCED' });
    });

    it('knows which codes are protected', () => {
      const context = createJobContext({}, options);
      expect(context.isProtectedCode('6001')).toBe(true);
      expect(context.isProtectedCode('6004')).toBe(false);
    });
  });
});

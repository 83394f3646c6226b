/**
 * Period (YYMM) Handling
 *
 * - normalizePeriod: user input ("2508", "25/08", "2025-08", "2025年8月",
 *   "令和7年8月", full-width digits) -> "YYMM" or null
 * - detectPeriod: best-effort period found in document text, preferring the
 *   end date of a "...から...まで" range
 */

export const PERIOD_SOURCES = ['UI', 'DETECTED', 'UI_FORCED'] as const;
export type PeriodSource = (typeof PERIOD_SOURCES)[number];

const REIWA_OFFSET = 2018;
const HEISEI_OFFSET = 1988;

const ERA_DATE = /(令和|平成)\s?(\d{1,2}|元)\s?年\s?(\d{1,2})\s?月/;
const WESTERN_DATE = /(?<!\d)(\d{4})\s?年\s?(\d{1,2})\s?月/;
const SLASH_DATE = /(?<!\d)(\d{4})[/.-](\d{1,2})(?:[/.-]\d{1,2})?(?!\d)/;

/** Western years read from documents; phone and reference numbers fall outside */
const MIN_WESTERN_YEAR = 2000;
const MAX_WESTERN_YEAR = 2099;

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** Exactly four digits, year 01-99, month 01-12 */
export function isValidPeriod(value: string): boolean {
  if (!/^\d{4}$/.test(value)) return false;
  const year = Number(value.slice(0, 2));
  const month = Number(value.slice(2, 4));
  return year >= 1 && year <= 99 && month >= 1 && month <= 12;
}

export function toPeriod(westernYear: number, month: number): string | null {
  const value = `${String(westernYear % 100).padStart(2, '0')}${String(month).padStart(2, '0')}`;
  return isValidPeriod(value) ? value : null;
}

function eraYear(era: string, year: string): number {
  const n = year === '元' ? 1 : Number(year);
  return (era === '令和' ? REIWA_OFFSET : HEISEI_OFFSET) + n;
}

function westernPeriod(year: number, month: number): string | null {
  if (year < MIN_WESTERN_YEAR || year > MAX_WESTERN_YEAR) return null;
  return toPeriod(year, month);
}

/** Months from `to` to `from` (positive when `from` is later); null for invalid periods */
export function monthsBetween(from: string, to: string): number | null {
  if (!isValidPeriod(from) || !isValidPeriod(to)) return null;
  const index = (p: string) => Number(p.slice(0, 2)) * 12 + Number(p.slice(2, 4));
  return index(from) - index(to);
}

/** Parse one date-like token (era, western, or slash form) into YYMM */
function parseDateToken(token: string): string | null {
  const era = ERA_DATE.exec(token);
  if (era) return toPeriod(eraYear(era[1], era[2]), Number(era[3]));

  const western = WESTERN_DATE.exec(token);
  if (western) return westernPeriod(Number(western[1]), Number(western[2]));

  const slash = SLASH_DATE.exec(token);
  if (slash) return westernPeriod(Number(slash[1]), Number(slash[2]));

  return null;
}

// ---------------------------------------------------------------------------
// User Input
// ---------------------------------------------------------------------------

export function normalizePeriod(input: string): string | null {
  const s = input.normalize('NFKC').trim();
  if (s.length === 0) return null;

  if (/^\d{4}$/.test(s)) {
    return isValidPeriod(s) ? s : null;
  }

  const short = /^(\d{2})[/.-](\d{1,2})$/.exec(s);
  if (short) {
    return toPeriod(Number(short[1]), Number(short[2]));
  }

  const long = /^(\d{4})(?:[/.-]|年)(\d{1,2})月?$/.exec(s);
  if (long) {
    return toPeriod(Number(long[1]), Number(long[2]));
  }

  const era = /^(令和|平成)(\d{1,2}|元)年(\d{1,2})月?$/.exec(s);
  if (era) {
    return toPeriod(eraYear(era[1], era[2]), Number(era[3]));
  }

  return null;
}

// ---------------------------------------------------------------------------
// Detection
// ---------------------------------------------------------------------------

export interface DetectedPeriod {
  value: string;
  /** The text fragment the value was read from */
  matched: string;
}

const RANGE_END = new RegExp(
  `から\\s?(${ERA_DATE.source}|${WESTERN_DATE.source}|${SLASH_DATE.source})`,
);
const ANY_DATE = new RegExp(`${ERA_DATE.source}|${WESTERN_DATE.source}|${SLASH_DATE.source}`, 'g');

/**
 * Find the filing period in document text.
 *
 * Prefers the end of an accounting-period range ("令和6年4月1日から令和7年3月31日まで"
 * -> "2503"), otherwise the first parseable date.
 */
export function detectPeriod(text: string): DetectedPeriod | null {
  const normalized = text.normalize('NFKC');

  const range = RANGE_END.exec(normalized);
  if (range) {
    const value = parseDateToken(range[1]);
    if (value) return { value, matched: range[1] };
  }

  for (const match of normalized.matchAll(ANY_DATE)) {
    const value = parseDateToken(match[0]);
    if (value) return { value, matched: match[0] };
  }

  return null;
}

/**
 * File Naming Module
 *
 * Final names follow the filing convention:
 *   "{code}_{qualifier}_{YYMM}{ext}"
 *
 * Examples:
 *   - "1013_受信通知_愛知県_2503.pdf"
 *   - "0002_添付資料_法人税_2503.pdf"
 *   - "7002_税区分集計表_2503.csv"
 *
 * Pure functions with no I/O.
 *
 * Consumers: io/fs-rename-sink.ts, pipeline/pipeline.ts
 */

import type { SequencedClassification } from './types.js';

// ---------------------------------------------------------------------------
// Filename Sanitization
// ---------------------------------------------------------------------------

/**
 * Sanitize a filename by replacing forbidden characters.
 *
 * Replaces: / \ : * ? " < > |
 * Collapses whitespace runs to a single space, trims.
 */
export function sanitizeFilename(filename: string): string {
  return filename
    .replace(/[/\\:*?"<>|]/g, '-')
    .replace(/\s+/g, ' ')
    .trim();
}

// ---------------------------------------------------------------------------
// Qualifier + Final Name
// ---------------------------------------------------------------------------

/**
 * Qualifier text for a decided unit: the label, plus the matched jurisdiction
 * for slot-numbered notices so two receipts never share a qualifier.
 */
export function buildQualifier(result: SequencedClassification): string {
  if (result.sequence) {
    return `${result.label}_${result.sequence.jurisdiction}`;
  }
  return result.label;
}

/**
 * Assemble the final filename.
 *
 * @param ext - Extension including the dot (".pdf", ".csv")
 */
export function buildFinalName(code: string, qualifier: string, period: string, ext: string): string {
  const parts = [code, qualifier, period].filter((p) => p.length > 0);
  return sanitizeFilename(`${parts.join('_')}${ext}`);
}

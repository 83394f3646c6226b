/**
 * Decision CSV Export
 *
 * Serializes per-unit decision records for review in a spreadsheet.
 * RFC 4180 quoting; evidence log entries are joined with " | ".
 */

import type { DecisionRecord } from '../pipeline/types.js';

export const DECISION_CSV_COLUMNS = [
  'source',
  'ordinal',
  'page',
  'status',
  'final_code',
  'original_code',
  'label',
  'qualifier',
  'period',
  'period_source',
  'confidence',
  'tier',
  'output_name',
  'error',
  'evidence',
] as const;

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function toRow(record: DecisionRecord): string[] {
  return [
    record.source,
    String(record.ordinal),
    String(record.pageIndex + 1),
    record.status,
    record.finalCode ?? '',
    record.originalCode ?? '',
    record.label ?? '',
    record.qualifier ?? '',
    record.period ?? '',
    record.periodSource ?? '',
    record.confidence === null ? '' : record.confidence.toFixed(2),
    record.tier ?? '',
    record.outputName ?? '',
    record.error ?? '',
    record.evidenceLog.join(' | '),
  ];
}

/** Header line plus one line per record, CRLF-terminated */
export function toDecisionCsv(records: readonly DecisionRecord[]): string {
  const lines = [DECISION_CSV_COLUMNS.join(','), ...records.map((r) => toRow(r).map(escapeCsvField).join(','))];
  return lines.join('\r\n') + '\r\n';
}

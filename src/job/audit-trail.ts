/**
 * Run Audit Trail
 *
 * Append-only record of every significant decision in a run. Each entry is
 * also written as a single "[audit]" console line so a run can be followed
 * from the service logs alone.
 */

export type AuditEvent =
  | 'run_started'
  | 'bundle_verdict'
  | 'split'
  | 'classification_pick'
  | 'sequence_resolution'
  | 'sequence_skipped'
  | 'sequence_failed'
  | 'sequence_duplicate'
  | 'period_resolution'
  | 'period_detection_discarded'
  | 'protected_code_enforced'
  | 'protected_code_violation'
  | 'unit_failed'
  | 'file_halted'
  | 'file_aborted';

export type AuditValue = string | number | boolean | null;

export interface AuditEntry {
  at: string;
  runId: string;
  event: AuditEvent;
  details: Record<string, AuditValue>;
}

function formatValue(value: AuditValue): string {
  if (typeof value === 'string' && /[\s="]/.test(value)) {
    return JSON.stringify(value);
  }
  return String(value);
}

/** "[audit] run-1 sequence_resolution original=1003 final=1013" */
export function formatAuditLine(entry: AuditEntry): string {
  const pairs = Object.entries(entry.details).map(([k, v]) => `${k}=${formatValue(v)}`);
  return ['[audit]', entry.runId, entry.event, ...pairs].join(' ');
}

export class AuditTrail {
  private readonly items: AuditEntry[] = [];

  constructor(
    readonly runId: string,
    private readonly write: (line: string) => void = (line) => console.log(line),
  ) {}

  record(event: AuditEvent, details: Record<string, AuditValue> = {}): AuditEntry {
    const entry: AuditEntry = { at: new Date().toISOString(), runId: this.runId, event, details };
    this.items.push(entry);
    this.write(formatAuditLine(entry));
    return entry;
  }

  entries(): readonly AuditEntry[] {
    return this.items;
  }

  ofEvent(event: AuditEvent): AuditEntry[] {
    return this.items.filter((e) => e.event === event);
  }
}

/**
 * Pipeline Type Definitions
 *
 * - DecisionRecord: per-unit outcome, shown to the user and exported as CSV
 * - FileOutcome: everything produced for one input file
 * - RunSession: per-run state threaded through every file of the run
 * - RunJobData / RunResult: BullMQ payload and return value for a run
 */

import type { RuleCatalog } from '../catalog/types.js';
import type { BundleDecision, BundleThresholds } from '../bundle/types.js';
import type { ClassificationTier } from '../classification/types.js';
import type { BoundingBox, PdfIO, RenameSink, TextExtractor } from '../io/types.js';
import type { JobContext, ResolvedPeriodSource } from '../job/job-context.js';
import type { JobContextInput } from '../job/job-context.js';
import type { SequenceResolver } from '../sequencing/sequence-resolver.js';

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export type UnitStatus =
  | 'renamed'
  | 'manual_review'
  | 'skipped_blank'
  | 'failed'
  /** Decided, but the file halted before anything was emitted */
  | 'not_emitted';

export interface DecisionRecord {
  source: string;
  ordinal: number;
  pageIndex: number;
  status: UnitStatus;
  finalCode: string | null;
  /** Classifier's code; differs from finalCode after slot numbering */
  originalCode: string | null;
  label: string | null;
  qualifier: string | null;
  period: string | null;
  periodSource: ResolvedPeriodSource | null;
  confidence: number | null;
  tier: ClassificationTier | null;
  outputName: string | null;
  error: string | null;
  evidenceLog: readonly string[];
}

export type FileStatus = 'completed' | 'halted' | 'aborted';

export interface FileError {
  name: string;
  code: string;
  message: string;
}

export interface FileOutcome {
  source: string;
  status: FileStatus;
  bundle: BundleDecision | null;
  records: DecisionRecord[];
  /** Set when the file halted; reported to the user verbatim */
  error: FileError | null;
}

// ---------------------------------------------------------------------------
// Session + Dependencies
// ---------------------------------------------------------------------------

export interface RunSession {
  context: JobContext;
  resolver: SequenceResolver;
  catalog: RuleCatalog;
}

export interface PipelineDeps {
  extractor: TextExtractor;
  pdfIo: PdfIO;
  sink: RenameSink;
}

export interface PipelineOptions {
  /** Split every page without running bundle detection */
  forceSplit?: boolean;
  scanPages?: number;
  thresholds?: BundleThresholds;
  /** Pages read to classify an unsplit PDF (default 3) */
  classificationPages?: number;
  /** Units with fewer non-space characters are treated as blank (default 20) */
  minTextChars?: number;
  /** Below this confidence a unit goes to manual review (default 0.7) */
  confidenceThreshold?: number;
  /** Addressee region read for jurisdiction matching; null reads the whole page */
  jurisdictionRegion?: BoundingBox | null;
  /** Whole-file abort; nothing is emitted for an aborted file */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Run Job (BullMQ)
// ---------------------------------------------------------------------------

export interface RunJobData {
  /** JobContext input: runId, confirmedPeriod, periodSource, jurisdictions */
  context: JobContextInput;
  /** Absolute paths of the input files, processed in order */
  files: string[];
  forceSplit: boolean;
  /** Overrides the configured output directory */
  outputDir?: string;
  receivedAt: string;
}

export type UnitStatusCounts = Record<UnitStatus, number>;

export interface RunResult {
  runId: string;
  filesProcessed: number;
  filesHalted: number;
  units: UnitStatusCounts;
  /** CSV export of every decision record */
  reportPath: string | null;
  errors: Array<{ source: string } & FileError>;
}

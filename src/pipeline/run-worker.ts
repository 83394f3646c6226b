/**
 * Run Worker: BullMQ Sorting Run Processor
 *
 * Processes jobs from the tax-doc-runs queue. One job is one run:
 * 1. Build the JobContext (confirmed period, jurisdiction slots)
 * 2. Load the rule catalog (bundled, or SORTER_CATALOG_PATH)
 * 3. Wire the adapters: pdf-lib pages, Gemini text, filesystem sink
 * 4. Process input files in order, sharing one SequenceResolver
 * 5. Write {runId}_decisions.csv next to the renamed files
 *
 * Invalid run input and an invalid catalog are not retried
 * (UnrecoverableError). Document-level problems never fail the job: they are
 * reported in the RunResult and the decision CSV.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';
import { UnrecoverableError, Worker } from 'bullmq';
import type { Job } from 'bullmq';
import { appConfig } from '../config.js';
import { CatalogError } from '../catalog/types.js';
import { resolveCatalog } from '../catalog/catalog-loader.js';
import { toDecisionCsv } from '../io/csv-export.js';
import { FsRenameSink } from '../io/fs-rename-sink.js';
import { GeminiTextExtractor } from '../io/gemini-text-extractor.js';
import { PdfLibIO } from '../io/pdf-io.js';
import type { DocumentKind, SourceDocument } from '../io/types.js';
import { JobContextError } from '../job/errors.js';
import { createJobContext } from '../job/job-context.js';
import { createRedisConnection, RUN_QUEUE_NAME } from '../server/queue.js';
import { SequenceResolver } from '../sequencing/sequence-resolver.js';
import { processFile } from './pipeline.js';
import type {
  DecisionRecord,
  FileOutcome,
  PipelineDeps,
  PipelineOptions,
  RunJobData,
  RunResult,
  RunSession,
  UnitStatusCounts,
} from './types.js';

// ---------------------------------------------------------------------------
// Input Files
// ---------------------------------------------------------------------------

const KIND_BY_EXTENSION: Partial<Record<string, DocumentKind>> = {
  '.pdf': 'pdf',
  '.csv': 'csv',
};

export class InputFileError extends Error {
  readonly code: 'UNSUPPORTED_TYPE' | 'READ_FAILED';

  constructor(code: 'UNSUPPORTED_TYPE' | 'READ_FAILED', message: string) {
    super(message);
    this.name = 'InputFileError';
    this.code = code;
  }
}

export async function readSourceDocument(path: string): Promise<SourceDocument> {
  const kind = KIND_BY_EXTENSION[extname(path).toLowerCase()];
  if (!kind) {
    throw new InputFileError('UNSUPPORTED_TYPE', `Unsupported input type: ${basename(path)} (expected .pdf or .csv)`);
  }

  try {
    const bytes = await readFile(path);
    return { id: resolve(path), name: basename(path), kind, bytes: new Uint8Array(bytes) };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InputFileError('READ_FAILED', `Could not read ${basename(path)}: ${message}`);
  }
}

function unreadableInput(path: string, err: InputFileError): FileOutcome {
  const source = basename(path);
  const record: DecisionRecord = {
    source,
    ordinal: 1,
    pageIndex: 0,
    status: 'failed',
    finalCode: null,
    originalCode: null,
    label: null,
    qualifier: null,
    period: null,
    periodSource: null,
    confidence: null,
    tier: null,
    outputName: null,
    error: err.message,
    evidenceLog: [],
  };
  return {
    source,
    status: 'halted',
    bundle: null,
    records: [record],
    error: { name: err.name, code: err.code, message: err.message },
  };
}

/** Read and process one input path; unreadable inputs become a halted outcome */
async function processInput(
  path: string,
  session: RunSession,
  deps: PipelineDeps & { pdfIo: PdfLibIO },
  options: PipelineOptions,
): Promise<FileOutcome> {
  let document: SourceDocument;
  try {
    document = await readSourceDocument(path);
  } catch (err) {
    if (!(err instanceof InputFileError)) throw err;
    console.warn('[run-worker] Skipping input:', { runId: session.context.runId, code: err.code, error: err.message });
    return unreadableInput(path, err);
  }

  const outcome = await processFile(document, session, deps, options);
  deps.pdfIo.release(document);
  return outcome;
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

export function summarizeRun(runId: string, outcomes: readonly FileOutcome[], reportPath: string | null): RunResult {
  const units: UnitStatusCounts = {
    renamed: 0,
    manual_review: 0,
    skipped_blank: 0,
    failed: 0,
    not_emitted: 0,
  };
  for (const outcome of outcomes) {
    for (const record of outcome.records) {
      units[record.status]++;
    }
  }

  return {
    runId,
    filesProcessed: outcomes.length,
    filesHalted: outcomes.filter((o) => o.status === 'halted').length,
    units,
    reportPath,
    errors: outcomes.flatMap((o) => (o.error ? [{ source: o.source, ...o.error }] : [])),
  };
}

// ---------------------------------------------------------------------------
// Job Processor
// ---------------------------------------------------------------------------

/**
 * Process one sorting run.
 *
 * Exported for direct unit testing; the Worker below only wires it to Redis.
 */
export async function processRunJob(job: Job<RunJobData, RunResult>): Promise<RunResult> {
  const { sorter, gemini } = appConfig;

  let session: RunSession;
  try {
    const context = createJobContext(job.data.context, {
      specialJurisdiction: sorter.specialJurisdiction,
      defaultPeriod: sorter.defaultPeriod,
    });
    const catalog = await resolveCatalog(sorter.catalogPath);
    session = { context, catalog, resolver: new SequenceResolver(context, catalog) };
  } catch (err) {
    if (err instanceof JobContextError || err instanceof CatalogError) {
      console.error('[run-worker] Run rejected:', { jobId: job.id, code: err.code, error: err.message });
      throw new UnrecoverableError(`${err.code}: ${err.message}`);
    }
    throw err;
  }

  const runId = session.context.runId;
  const outputDir = job.data.outputDir ?? sorter.outputDir;
  const pdfIo = new PdfLibIO();
  const deps = {
    pdfIo,
    extractor: new GeminiTextExtractor({ apiKey: gemini.apiKey, model: gemini.model, pdfIo }),
    sink: new FsRenameSink(outputDir, { runId }),
  };

  console.log('[run-worker] Run started:', { runId, files: job.data.files.length, forceSplit: job.data.forceSplit });

  const options: PipelineOptions = {
    forceSplit: job.data.forceSplit,
    scanPages: sorter.bundleScanPages,
    thresholds: sorter.bundleThresholds,
    classificationPages: sorter.classificationPages,
    minTextChars: sorter.minTextChars,
  };

  const outcomes: FileOutcome[] = [];
  for (const [i, path] of job.data.files.entries()) {
    outcomes.push(await processInput(path, session, deps, options));
    await job.updateProgress({ filesDone: i + 1, filesTotal: job.data.files.length });
  }

  const records = outcomes.flatMap((o) => o.records);
  await mkdir(outputDir, { recursive: true });
  const reportPath = join(outputDir, `${runId}_decisions.csv`);
  await writeFile(reportPath, toDecisionCsv(records), 'utf-8');

  const result = summarizeRun(runId, outcomes, reportPath);
  console.log('[run-worker] Run complete:', {
    runId,
    filesProcessed: result.filesProcessed,
    filesHalted: result.filesHalted,
    ...result.units,
  });
  return result;
}

// ---------------------------------------------------------------------------
// Worker (Lazy Singleton)
// ---------------------------------------------------------------------------

let _worker: Worker<RunJobData, RunResult> | null = null;

/**
 * Create and start the run worker (lazy singleton).
 *
 * Concurrency 1: runs never share a resolver, but the output directory is shared.
 */
export function createRunWorker(): Worker<RunJobData, RunResult> {
  if (_worker) return _worker;

  _worker = new Worker<RunJobData, RunResult>(RUN_QUEUE_NAME, processRunJob, {
    connection: createRedisConnection(),
    concurrency: 1,
  });

  _worker.on('completed', (job) => {
    console.log(`[run-worker] Job ${job.id} completed`, {
      runId: job.returnvalue.runId,
      filesHalted: job.returnvalue.filesHalted,
    });
  });

  _worker.on('failed', (job, err) => {
    console.error(`[run-worker] Job ${job?.id} failed`, {
      error: err.message,
      attempt: job?.attemptsMade,
    });
  });

  console.log('[run-worker] Started, listening for jobs on queue:', RUN_QUEUE_NAME);
  return _worker;
}

export async function closeRunWorker(): Promise<void> {
  if (_worker) {
    await _worker.close();
    _worker = null;
  }
}

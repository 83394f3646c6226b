/**
 * Per-File Pipeline
 *
 * BundleDetector -> Splitter -> Classifier -> SequenceResolver -> period -> RenameSink
 *
 * Two phases per file:
 * 1. Decide every unit in page order (classification, slot numbering, period)
 * 2. Hand decided units to the RenameSink, in the same order
 *
 * Failure policy:
 * - Per-unit errors become a "failed" record; siblings continue
 * - ProtectedPeriodError or ExtractionUnavailableError halt the file:
 *   nothing is emitted and FileOutcome.error carries the named error
 * - Abort (signal) between units discards the file's units entirely
 *
 * Consumers: run-worker.ts
 */

import { detectBundle } from '../bundle/bundle-detector.js';
import { splitDocument } from '../bundle/splitter.js';
import type { BundleDecision } from '../bundle/types.js';
import { classify } from '../classification/classifier.js';
import { buildQualifier } from '../classification/naming.js';
import type { BundleFamily, ClassificationResult, SequencedClassification } from '../classification/types.js';
import { ExtractionUnavailableError } from '../io/types.js';
import type { SourceDocument, TextExtractor } from '../io/types.js';
import { ProtectedPeriodError } from '../job/errors.js';
import type { PeriodResolution } from '../job/job-context.js';
import { detectPeriod } from '../job/period.js';
import { memoizeExtractor } from './page-text-cache.js';
import type {
  DecisionRecord,
  FileError,
  FileOutcome,
  PipelineDeps,
  PipelineOptions,
  RunSession,
} from './types.js';

const DEFAULT_CLASSIFICATION_PAGES = 3;
const DEFAULT_MIN_TEXT_CHARS = 20;
const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;

// ---------------------------------------------------------------------------
// Work Units
// ---------------------------------------------------------------------------

interface WorkUnit {
  ordinal: number;
  pageIndex: number;
  /** Document handed to the sink; null when the page could not be cut */
  output: SourceDocument | null;
  unreadableError: string | null;
  /** Source pages whose text classifies this unit */
  textPages: number[];
  /** Decoded content for CSV inputs (no extraction) */
  inlineText: string | null;
  filenameHint: string | null;
}

interface DecidedUnit {
  unit: WorkUnit;
  output: SourceDocument;
  result: SequencedClassification;
  qualifier: string;
  period: PeriodResolution;
  recordIndex: number;
}

function emptyRecord(source: string, unit: WorkUnit): DecisionRecord {
  return {
    source,
    ordinal: unit.ordinal,
    pageIndex: unit.pageIndex,
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
    error: null,
    evidenceLog: [],
  };
}

function applyClassification(record: DecisionRecord, result: ClassificationResult): void {
  record.finalCode = result.code;
  record.originalCode = result.code;
  record.label = result.label;
  record.confidence = result.confidence;
  record.tier = result.tier;
  record.evidenceLog = result.evidenceLog;
}

function toFileError(err: unknown): FileError {
  if (err instanceof ProtectedPeriodError) {
    return { name: err.name, code: err.code, message: err.message };
  }
  if (err instanceof ExtractionUnavailableError) {
    return { name: err.name, code: 'EXTRACTION_UNAVAILABLE', message: err.message };
  }
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : 'FILE_FAILED';
    return { name: err.name, code, message: err.message };
  }
  return { name: 'Error', code: 'FILE_FAILED', message: String(err) };
}

function isHaltingError(err: unknown): boolean {
  return err instanceof ProtectedPeriodError || err instanceof ExtractionUnavailableError;
}

function nonSpaceLength(text: string): number {
  return text.replace(/\s/g, '').length;
}

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

async function readPages(
  extractor: TextExtractor,
  document: SourceDocument,
  pages: readonly number[],
): Promise<string> {
  const texts: string[] = [];
  for (const pageIndex of pages) {
    try {
      texts.push(await extractor.extractPage(document, pageIndex));
    } catch (err) {
      if (err instanceof ExtractionUnavailableError) throw err;
      console.warn('[pipeline] Page text unreadable, continuing with empty text:', {
        document: document.name,
        page: pageIndex + 1,
        error: err instanceof Error ? err.message : String(err),
      });
      texts.push('');
    }
  }
  return texts.join('\n');
}

async function readJurisdictionText(
  extractor: TextExtractor,
  document: SourceDocument,
  unit: WorkUnit,
  fallback: string,
  options: PipelineOptions,
): Promise<string> {
  if (!options.jurisdictionRegion || document.kind !== 'pdf') return fallback;
  try {
    const region = await extractor.extractRegion(document, unit.pageIndex, options.jurisdictionRegion);
    return region.trim().length > 0 ? region : fallback;
  } catch (err) {
    if (err instanceof ExtractionUnavailableError) throw err;
    return fallback;
  }
}

// ---------------------------------------------------------------------------
// Unit Planning
// ---------------------------------------------------------------------------

async function planUnits(
  document: SourceDocument,
  session: RunSession,
  deps: PipelineDeps,
  extractor: TextExtractor,
  options: PipelineOptions,
): Promise<{ units: WorkUnit[]; bundle: BundleDecision | null }> {
  if (document.kind === 'csv') {
    const text = new TextDecoder('utf-8').decode(document.bytes);
    return {
      bundle: null,
      units: [
        {
          ordinal: 1,
          pageIndex: 0,
          output: document,
          unreadableError: null,
          textPages: [],
          inlineText: text,
          filenameHint: document.name,
        },
      ],
    };
  }

  const audit = session.context.audit;
  let bundle: BundleDecision | null = null;

  if (!options.forceSplit) {
    bundle = await detectBundle(
      document,
      { extractor, pdfIo: deps.pdfIo },
      { catalog: session.catalog, scanPages: options.scanPages, thresholds: options.thresholds },
    );
    audit.record('bundle_verdict', {
      source: document.name,
      isBundle: bundle.isBundle,
      family: bundle.family,
      confidence: bundle.confidence,
      sampledPages: bundle.sampledPages,
      reason: bundle.reason,
    });
  }

  if (options.forceSplit || bundle?.isBundle) {
    const request = bundle && !options.forceSplit ? { kind: 'decision' as const, decision: bundle } : { kind: 'forced' as const };
    const split = await splitDocument(document, request, deps.pdfIo);
    audit.record('split', { source: document.name, units: split.length, forced: request.kind === 'forced' });

    return {
      bundle,
      units: split.map((u) => ({
        ordinal: u.ordinal,
        pageIndex: u.pageIndex,
        output: u.status === 'ok' ? u.document : null,
        unreadableError: u.status === 'unreadable' ? u.error : null,
        textPages: [u.pageIndex],
        inlineText: null,
        filenameHint: null,
      })),
    };
  }

  const pageCount = await deps.pdfIo.pageCount(document);
  const pages = Math.min(pageCount, options.classificationPages ?? DEFAULT_CLASSIFICATION_PAGES);
  return {
    bundle,
    units: [
      {
        ordinal: 1,
        pageIndex: 0,
        output: document,
        unreadableError: null,
        textPages: Array.from({ length: pages }, (_, i) => i),
        inlineText: null,
        filenameHint: document.name,
      },
    ],
  };
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/**
 * Process one input file end to end.
 *
 * Never throws for document-level problems: every failure is expressed in the
 * returned FileOutcome.
 */
export async function processFile(
  document: SourceDocument,
  session: RunSession,
  deps: PipelineDeps,
  options: PipelineOptions = {},
): Promise<FileOutcome> {
  const { context, resolver, catalog } = session;
  const audit = context.audit;
  const extractor = memoizeExtractor(deps.extractor);
  const minTextChars = options.minTextChars ?? DEFAULT_MIN_TEXT_CHARS;
  const threshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;

  const aborted = (bundle: BundleDecision | null): FileOutcome => {
    audit.record('file_aborted', { source: document.name });
    return { source: document.name, status: 'aborted', bundle, records: [], error: null };
  };

  const halted = (
    bundle: BundleDecision | null,
    records: DecisionRecord[],
    err: unknown,
  ): FileOutcome => {
    const error = toFileError(err);
    audit.record('file_halted', { source: document.name, error: error.code });
    console.error('[pipeline] File halted:', { source: document.name, ...error });
    for (const record of records) {
      if (record.status === 'renamed') record.status = 'not_emitted';
    }
    return { source: document.name, status: 'halted', bundle, records, error };
  };

  // -------------------------------------------------------------------------
  // Plan
  // -------------------------------------------------------------------------

  let plan: { units: WorkUnit[]; bundle: BundleDecision | null };
  try {
    plan = await planUnits(document, session, deps, extractor, options);
  } catch (err) {
    const record = emptyRecord(document.name, {
      ordinal: 1, pageIndex: 0, output: null, unreadableError: null, textPages: [], inlineText: null, filenameHint: null,
    });
    record.error = err instanceof Error ? err.message : String(err);
    return halted(null, [record], err);
  }

  const { units, bundle } = plan;
  const family: BundleFamily = bundle?.isBundle ? bundle.family : 'NONE';
  const records: DecisionRecord[] = [];
  const decided: DecidedUnit[] = [];

  // -------------------------------------------------------------------------
  // Phase 1: decide
  // -------------------------------------------------------------------------

  for (const unit of units) {
    if (options.signal?.aborted) return aborted(bundle);

    const unitRef = `${document.name}#${unit.ordinal}`;
    const record = emptyRecord(document.name, unit);
    records.push(record);

    try {
      if (unit.unreadableError !== null || unit.output === null) {
        const result = classify('', null, catalog);
        applyClassification(record, result);
        record.originalCode = null;
        record.status = 'manual_review';
        record.error = unit.unreadableError ?? 'page unavailable';
        continue;
      }

      const text = unit.inlineText ?? (await readPages(extractor, document, unit.textPages));
      if (nonSpaceLength(text) < minTextChars) {
        record.status = 'skipped_blank';
        record.evidenceLog = [`blank: ${nonSpaceLength(text)} characters`];
        continue;
      }

      const classified = classify(text, unit.filenameHint, catalog, { bundleFamily: family });
      audit.record('classification_pick', {
        unit: unitRef,
        code: classified.code,
        tier: classified.tier,
        confidence: classified.confidence,
      });

      applyClassification(record, classified);

      if (classified.tier === 'unclassified' || classified.confidence < threshold) {
        record.status = 'manual_review';
        continue;
      }

      const jurisdictionText = await readJurisdictionText(extractor, document, unit, text, options);
      const result = resolver.resolve(classified, jurisdictionText, unitRef);

      const detected = context.isProtectedCode(result.code) ? null : (detectPeriod(text)?.value ?? null);
      const period = context.resolvePeriod(result.code, detected);
      const qualifier = buildQualifier(result);

      applyClassification(record, result);
      record.status = 'renamed';
      record.originalCode = result.originalCode;
      record.qualifier = qualifier;
      record.period = period.value;
      record.periodSource = period.source;
      decided.push({ unit, output: unit.output, result, qualifier, period, recordIndex: records.length - 1 });
    } catch (err) {
      record.status = 'failed';
      record.error = err instanceof Error ? err.message : String(err);
      audit.record('unit_failed', { unit: unitRef, error: record.error });

      if (isHaltingError(err)) {
        return halted(bundle, records, err);
      }
      console.error('[pipeline] Unit failed (continuing):', { unit: unitRef, error: record.error });
    }
  }

  // -------------------------------------------------------------------------
  // Phase 2: emit
  // -------------------------------------------------------------------------

  if (options.signal?.aborted) return aborted(bundle);

  for (const d of decided) {
    const record = records[d.recordIndex];
    const outcome = await deps.sink.finalize(
      { sourceFile: document.name, ordinal: d.unit.ordinal, document: d.output },
      d.result.code,
      d.qualifier,
      d.period.value,
    );

    if (outcome.ok) {
      record.outputName = outcome.outputName;
    } else {
      record.status = 'failed';
      record.error = outcome.error;
      audit.record('unit_failed', { unit: `${document.name}#${d.unit.ordinal}`, error: outcome.error });
    }
  }

  console.log('[pipeline] File complete:', {
    source: document.name,
    units: records.length,
    renamed: records.filter((r) => r.status === 'renamed').length,
    review: records.filter((r) => r.status === 'manual_review').length,
  });

  return { source: document.name, status: 'completed', bundle, records, error: null };
}

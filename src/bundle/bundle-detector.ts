/**
 * Bundle Detector
 *
 * Decides whether a PDF is a bundle of notices from one family (LOCAL:
 * prefecture/municipality, NATIONAL: national/consumption tax) by sampling
 * only the first few pages.
 *
 * Decision rules:
 * - Never-split pattern in the filename or first page -> not a bundle (checked first)
 * - A family qualifies when receipt, payment and code counters all reach their minimum
 * - Both qualify -> larger counter sum wins; equal sums -> not a bundle
 *
 * Consumers: pipeline/pipeline.ts
 */

import { normalizeText } from '../catalog/normalize.js';
import type { RuleCatalog } from '../catalog/types.js';
import { classify } from '../classification/classifier.js';
import { ExtractionUnavailableError } from '../io/types.js';
import type { PdfIO, SourceDocument, TextExtractor } from '../io/types.js';
import { FAMILY_KEYWORDS, NEVER_SPLIT_PATTERNS } from './keywords.js';
import type { BundleDecision, BundleThresholds, DetectedFamily, FamilyCounters } from './types.js';

export const DEFAULT_SCAN_PAGES = 10;
export const DEFAULT_THRESHOLDS: BundleThresholds = { receipt: 1, payment: 1, codes: 1 };

const FAMILIES: readonly DetectedFamily[] = ['LOCAL', 'NATIONAL'];

export interface BundleDetectorOptions {
  catalog: RuleCatalog;
  scanPages?: number;
  thresholds?: BundleThresholds;
}

export interface BundleDetectorDeps {
  extractor: TextExtractor;
  pdfIo: PdfIO;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function emptyCounters(): Record<DetectedFamily, FamilyCounters> {
  return {
    LOCAL: { receipt: 0, payment: 0, codes: 0 },
    NATIONAL: { receipt: 0, payment: 0, codes: 0 },
  };
}

function notBundle(
  reason: string,
  sampledPages: number,
  counters = emptyCounters(),
): BundleDecision {
  return { isBundle: false, family: 'NONE', confidence: 0, sampledPages, counters, reason };
}

async function samplePage(
  document: SourceDocument,
  pageIndex: number,
  extractor: TextExtractor,
): Promise<string> {
  try {
    return normalizeText(await extractor.extractPage(document, pageIndex));
  } catch (err) {
    if (err instanceof ExtractionUnavailableError) throw err;
    console.warn('[bundle] Page sample unreadable, counting as empty:', {
      document: document.name,
      page: pageIndex + 1,
      error: err instanceof Error ? err.message : String(err),
    });
    return '';
  }
}

function findNeverSplit(text: string): string | undefined {
  return NEVER_SPLIT_PATTERNS.find((p) => text.includes(p));
}

function countFamily(
  family: DetectedFamily,
  pages: readonly string[],
  catalog: RuleCatalog,
): FamilyCounters {
  const keywords = FAMILY_KEYWORDS[family];
  const counters: FamilyCounters = { receipt: 0, payment: 0, codes: 0 };

  for (const text of pages) {
    if (text.length === 0) continue;
    if (keywords.receipt.some((k) => text.includes(k))) counters.receipt++;
    if (keywords.payment.some((k) => text.includes(k))) counters.payment++;

    const page = classify(text, null, catalog, { bundleFamily: family });
    if (page.tier === 'required' && keywords.codes.has(page.code)) counters.codes++;
  }
  return counters;
}

function qualifies(counters: FamilyCounters, thresholds: BundleThresholds): boolean {
  return (
    counters.receipt >= thresholds.receipt &&
    counters.payment >= thresholds.payment &&
    counters.codes >= thresholds.codes
  );
}

function sum(counters: FamilyCounters): number {
  return counters.receipt + counters.payment + counters.codes;
}

/** 0.5 at bare threshold, +0.1 per count above it, capped at 1.0 */
function confidenceFor(counters: FamilyCounters, thresholds: BundleThresholds): number {
  const surplus =
    counters.receipt - thresholds.receipt +
    (counters.payment - thresholds.payment) +
    (counters.codes - thresholds.codes);
  return Math.min(1, Math.round((0.5 + 0.1 * surplus) * 100) / 100);
}

// ---------------------------------------------------------------------------
// Detection
// ---------------------------------------------------------------------------

/**
 * Decide whether a PDF is a notice bundle.
 *
 * @throws ExtractionUnavailableError when the extraction backend is down
 */
export async function detectBundle(
  document: SourceDocument,
  deps: BundleDetectorDeps,
  options: BundleDetectorOptions,
): Promise<BundleDecision> {
  const scanPages = options.scanPages ?? DEFAULT_SCAN_PAGES;
  const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;

  const nameHit = findNeverSplit(normalizeText(document.name));
  if (nameHit) {
    return notBundle(`excluded:${nameHit}`, 0);
  }

  const total = await deps.pdfIo.pageCount(document);
  const limit = Math.min(total, scanPages);
  if (limit === 0) {
    return notBundle('empty_document', 0);
  }

  const pages = [await samplePage(document, 0, deps.extractor)];
  const firstPageHit = findNeverSplit(pages[0]);
  if (firstPageHit) {
    return notBundle(`excluded:${firstPageHit}`, 1);
  }

  for (let i = 1; i < limit; i++) {
    pages.push(await samplePage(document, i, deps.extractor));
  }

  const counters = emptyCounters();
  for (const family of FAMILIES) {
    counters[family] = countFamily(family, pages, options.catalog);
  }

  const qualified = FAMILIES.filter((f) => qualifies(counters[f], thresholds));
  if (qualified.length === 0) {
    return notBundle('below_threshold', limit, counters);
  }

  let winner: DetectedFamily;
  if (qualified.length === 2) {
    const local = sum(counters.LOCAL);
    const national = sum(counters.NATIONAL);
    if (local === national) {
      return notBundle('tie', limit, counters);
    }
    winner = local > national ? 'LOCAL' : 'NATIONAL';
  } else {
    winner = qualified[0];
  }

  return {
    isBundle: true,
    family: winner,
    confidence: confidenceFor(counters[winner], thresholds),
    sampledPages: limit,
    counters,
    reason: `qualified:${winner}`,
  };
}

/**
 * Tests for bundle detection
 *
 * - LOCAL and NATIONAL families qualify on receipt, payment and code counters
 * - Never-split documents are rejected from the filename or first page
 * - Ties and sub-threshold counts are not bundles
 * - Only the first scanPages pages are read
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { loadDefaultCatalog } from '../../catalog/catalog-loader.js';
import { ExtractionUnavailableError } from '../../io/types.js';
import { FakeDocuments } from '../../io/__tests__/fixtures/fakes.js';
import {
  LOCAL_BUNDLE_PAGES,
  NATIONAL_PAYMENT_PAGE,
  NATIONAL_RECEIPT_PAGE,
} from '../../io/__tests__/fixtures/notices.js';
import { detectBundle } from '../bundle-detector.js';
import type { BundleDetectorOptions } from '../bundle-detector.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const options: BundleDetectorOptions = { catalog: loadDefaultCatalog() };

function setup() {
  const docs = new FakeDocuments();
  return { docs, deps: { extractor: docs, pdfIo: docs } };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('detectBundle', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('detects a local-tax bundle', async () => {
    const { docs, deps } = setup();
    const doc = docs.add('local.pdf', LOCAL_BUNDLE_PAGES);

    const decision = await detectBundle(doc, deps, options);

    expect(decision).toEqual({
      isBundle: true,
      family: 'LOCAL',
      confidence: 1,
      sampledPages: 7,
      counters: {
        LOCAL: { receipt: 5, payment: 2, codes: 7 },
        NATIONAL: { receipt: 0, payment: 0, codes: 0 },
      },
      reason: 'qualified:LOCAL',
    });
  });

  it('detects a national-tax bundle with confidence from the threshold surplus', async () => {
    const { docs, deps } = setup();
    const doc = docs.add('national.pdf', [NATIONAL_RECEIPT_PAGE, NATIONAL_PAYMENT_PAGE]);

    const decision = await detectBundle(doc, deps, options);

    expect(decision.family).toBe('NATIONAL');
    expect(decision.counters.NATIONAL).toEqual({ receipt: 1, payment: 1, codes: 2 });
    expect(decision.confidence).toBe(0.6);
  });

  it('treats equal family sums as not a bundle', async () => {
    const { docs, deps } = setup();
    const doc = docs.add('mixed.pdf', [
      LOCAL_BUNDLE_PAGES[0],
      NATIONAL_RECEIPT_PAGE,
      LOCAL_BUNDLE_PAGES[5],
      NATIONAL_PAYMENT_PAGE,
    ]);

    const decision = await detectBundle(doc, deps, options);

    expect(decision).toMatchObject({ isBundle: false, family: 'NONE', confidence: 0, reason: 'tie' });
    expect(decision.counters.LOCAL).toEqual({ receipt: 1, payment: 1, codes: 2 });
    expect(decision.counters.NATIONAL).toEqual({ receipt: 1, payment: 1, codes: 2 });
  });

  it('rejects a family missing one category', async () => {
    const { docs, deps } = setup();
    const doc = docs.add('receipts.pdf', [LOCAL_BUNDLE_PAGES[0], LOCAL_BUNDLE_PAGES[3]]);

    const decision = await detectBundle(doc, deps, options);

    expect(decision.reason).toBe('below_threshold');
    expect(decision.counters.LOCAL).toEqual({ receipt: 2, payment: 0, codes: 2 });
  });

  it('applies custom thresholds', async () => {
    const { docs, deps } = setup();
    const doc = docs.add('local.pdf', LOCAL_BUNDLE_PAGES);

    const decision = await detectBundle(doc, deps, { ...options, thresholds: { receipt: 6, payment: 1, codes: 1 } });
    expect(decision.reason).toBe('below_threshold');
  });

  it('never splits a document named like a ledger, without reading it', async () => {
    const { docs, deps } = setup();
    const doc = docs.add('総勘定元帳_2024.pdf', LOCAL_BUNDLE_PAGES);

    const decision = await detectBundle(doc, deps, options);

    expect(decision).toMatchObject({ isBundle: false, reason: 'excluded:総勘定元帳', sampledPages: 0 });
    expect(docs.extractCalls).toEqual([]);
  });

  it('never splits a document whose first page is a ledger', async () => {
    const { docs, deps } = setup();
    const doc = docs.add('scan.pdf', ['固定資産台帳 取得価額', ...LOCAL_BUNDLE_PAGES]);

    const decision = await detectBundle(doc, deps, options);

    expect(decision).toMatchObject({ isBundle: false, reason: 'excluded:固定資産台帳', sampledPages: 1 });
    expect(docs.extractCalls).toEqual(['scan.pdf:0']);
  });

  it('reads at most scanPages pages', async () => {
    const { docs, deps } = setup();
    const doc = docs.add('local.pdf', LOCAL_BUNDLE_PAGES);

    const decision = await detectBundle(doc, deps, { ...options, scanPages: 2 });

    expect(docs.extractCalls).toEqual(['local.pdf:0', 'local.pdf:1']);
    expect(decision.sampledPages).toBe(2);
    expect(decision.reason).toBe('below_threshold');
  });

  it('reports an empty document', async () => {
    const { docs, deps } = setup();
    const decision = await detectBundle(docs.add('empty.pdf', []), deps, options);
    expect(decision.reason).toBe('empty_document');
  });

  it('counts an unreadable sample page as empty', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { docs, deps } = setup();
    const doc = docs.add('local.pdf', LOCAL_BUNDLE_PAGES);
    docs.failingPages.add('local.pdf:6');

    const decision = await detectBundle(doc, deps, options);

    expect(decision.counters.LOCAL).toEqual({ receipt: 5, payment: 1, codes: 6 });
    expect(decision.isBundle).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('rethrows when the extraction backend is unavailable', async () => {
    const { docs, deps } = setup();
    const doc = docs.add('local.pdf', LOCAL_BUNDLE_PAGES);
    docs.unavailable = true;

    await expect(detectBundle(doc, deps, options)).rejects.toBeInstanceOf(ExtractionUnavailableError);
  });
});

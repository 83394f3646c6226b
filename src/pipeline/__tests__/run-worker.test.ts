/**
 * Run Worker Tests
 *
 * Tests processRunJob end to end against real PDFs in a temp directory:
 * pdf-lib splitting, filesystem sink and the decision CSV are real; text
 * extraction is replaced by page texts keyed by file name.
 *
 * Mocked:
 * - Application config (config.ts)
 * - Redis/queue (server/queue.ts) and BullMQ
 * - Gemini text extraction
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { PDFDocument } from 'pdf-lib';

// ============================================================================
// Module-level mocks
// ============================================================================

const mockConfig = vi.hoisted(() => ({
  appConfig: {
    isDev: true,
    killSwitch: false,
    gemini: { apiKey: 'test-api-key', model: 'gemini-test' },
    sorter: {
      outputDir: './output',
      catalogPath: '',
      specialJurisdiction: '東京都',
      bundleScanPages: 10,
      bundleThresholds: { receipt: 1, payment: 1, codes: 1 },
      classificationPages: 3,
      minTextChars: 20,
      defaultPeriod: '2412',
    },
  },
}));

const mockPages = vi.hoisted(() => new Map<string, readonly string[]>());

vi.mock('../../config.js', () => mockConfig);

vi.mock('../../server/queue.js', () => ({
  createRedisConnection: vi.fn(() => ({})),
  RUN_QUEUE_NAME: 'tax-doc-runs',
}));

vi.mock('bullmq', () => ({
  Worker: vi.fn(),
  UnrecoverableError: class UnrecoverableError extends Error {
    constructor(message: string) {
      super(message);
      this.name = 'UnrecoverableError';
    }
  },
}));

vi.mock('../../io/gemini-text-extractor.js', () => ({
  GeminiTextExtractor: class MockExtractor {
    async extractPage(document: { name: string }, pageIndex: number): Promise<string> {
      return mockPages.get(document.name)?.[pageIndex] ?? '';
    }
    async extractRegion(): Promise<string> {
      return '';
    }
  },
}));

import { UnrecoverableError } from 'bullmq';
import type { Job } from 'bullmq';
import { LOCAL_BUNDLE_PAGES } from '../../io/__tests__/fixtures/notices.js';
import { InputFileError, processRunJob, readSourceDocument, summarizeRun } from '../run-worker.js';
import type { FileOutcome, RunJobData, RunResult } from '../types.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const JURISDICTIONS = [
  { prefecture: '東京都' },
  { prefecture: '愛知県', municipality: '蒲郡市' },
  { prefecture: '福岡県', municipality: '福岡市' },
];

async function writePdf(path: string, pages: number): Promise<void> {
  const doc = await PDFDocument.create();
  for (let i = 0; i < pages; i++) {
    doc.addPage([200, 200]);
  }
  await writeFile(path, await doc.save());
}

function createMockJob(data: RunJobData) {
  const updateProgress = vi.fn(() => Promise.resolve());
  const job = { id: 'job-1', data, attemptsMade: 0, updateProgress } as unknown as Job<RunJobData, RunResult>;
  return { job, updateProgress };
}

// ============================================================================
// Tests
// ============================================================================

describe('processRunJob', () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    mockConfig.appConfig.sorter.catalogPath = '';
    mockPages.clear();
    dir = await mkdtemp(join(tmpdir(), 'run-worker-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('sorts every input, writes the decision CSV and summarizes the run', async () => {
    const outputDir = join(dir, 'out');
    await writePdf(join(dir, 'local.pdf'), LOCAL_BUNDLE_PAGES.length);
    mockPages.set('local.pdf', LOCAL_BUNDLE_PAGES);
    await writeFile(join(dir, '税区分集計表.csv'), '勘定科目,税区分,金額\n売上高,課税売上10%,1000000\n');
    await writeFile(join(dir, 'notes.txt'), 'not a tax document');

    const { job, updateProgress } = createMockJob({
      context: { runId: 'run-42', confirmedPeriod: '2503', jurisdictions: JURISDICTIONS },
      files: [join(dir, 'local.pdf'), join(dir, '税区分集計表.csv'), join(dir, 'notes.txt')],
      forceSplit: false,
      outputDir,
      receivedAt: '2025-04-01T00:00:00.000Z',
    });

    const result = await processRunJob(job);

    expect(result).toEqual<RunResult>({
      runId: 'run-42',
      filesProcessed: 3,
      filesHalted: 1,
      units: { renamed: 8, manual_review: 0, skipped_blank: 0, failed: 1, not_emitted: 0 },
      reportPath: join(outputDir, 'run-42_decisions.csv'),
      errors: [
        {
          source: 'notes.txt',
          name: 'InputFileError',
          code: 'UNSUPPORTED_TYPE',
          message: 'Unsupported input type: notes.txt (expected .pdf or .csv)',
        },
      ],
    });

    expect((await readdir(outputDir)).sort()).toEqual(
      [
        '1003_受信通知_東京都_2503.pdf',
        '1013_受信通知_愛知県_2503.pdf',
        '1023_受信通知_福岡県_2503.pdf',
        '2003_受信通知_蒲郡市_2503.pdf',
        '2013_受信通知_福岡市_2503.pdf',
        '1004_納付情報_愛知県_2503.pdf',
        '2004_納付情報_福岡市_2503.pdf',
        '7002_税区分集計表_2503.csv',
        'run-42_decisions.csv',
        'run-42_emitted.json',
      ].sort(),
    );

    const page = await PDFDocument.load(await readFile(join(outputDir, '1013_受信通知_愛知県_2503.pdf')));
    expect(page.getPageCount()).toBe(1);

    const report = (await readFile(join(outputDir, 'run-42_decisions.csv'), 'utf-8')).split('\r\n');
    expect(report).toHaveLength(11);
    expect(report[0]).toMatch(/^source,ordinal,page,status,/);

    expect(updateProgress).toHaveBeenCalledTimes(3);
    expect(updateProgress).toHaveBeenLastCalledWith({ filesDone: 3, filesTotal: 3 });
  });

  it('does not write copies when a run is retried', async () => {
    const outputDir = join(dir, 'out');
    await writePdf(join(dir, 'local.pdf'), LOCAL_BUNDLE_PAGES.length);
    mockPages.set('local.pdf', LOCAL_BUNDLE_PAGES);
    const data: RunJobData = {
      context: { runId: 'run-44', confirmedPeriod: '2503', jurisdictions: JURISDICTIONS },
      files: [join(dir, 'local.pdf')],
      forceSplit: false,
      outputDir,
      receivedAt: '2025-04-01T00:00:00.000Z',
    };

    await processRunJob(createMockJob(data).job);
    const firstAttempt = (await readdir(outputDir)).sort();
    const result = await processRunJob(createMockJob(data).job);

    expect(firstAttempt).toHaveLength(9);
    expect((await readdir(outputDir)).sort()).toEqual(firstAttempt);
    expect(result.units.renamed).toBe(7);
  });

  it('reports a missing input file and keeps going', async () => {
    const outputDir = join(dir, 'out');
    const { job } = createMockJob({
      context: { runId: 'run-43', confirmedPeriod: '2503' },
      files: [join(dir, 'missing.pdf')],
      forceSplit: false,
      outputDir,
      receivedAt: '2025-04-01T00:00:00.000Z',
    });

    const result = await processRunJob(job);

    expect(result.filesHalted).toBe(1);
    expect(result.errors[0]).toMatchObject({ source: 'missing.pdf', code: 'READ_FAILED' });
  });

  it('does not retry invalid run input', async () => {
    const { job } = createMockJob({
      context: { jurisdictions: [{ prefecture: '愛知県' }, { prefecture: '東京都' }] },
      files: [],
      forceSplit: false,
      outputDir: join(dir, 'out'),
      receivedAt: '2025-04-01T00:00:00.000Z',
    });

    const err = await processRunJob(job).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UnrecoverableError);
    expect(err).toMatchObject({ message: expect.stringMatching(/^SPECIAL_JURISDICTION_NOT_FIRST: /) });
  });

  it('does not retry an unreadable catalog', async () => {
    mockConfig.appConfig.sorter.catalogPath = join(dir, 'missing-catalog.json');
    const { job } = createMockJob({
      context: {},
      files: [],
      forceSplit: false,
      outputDir: join(dir, 'out'),
      receivedAt: '2025-04-01T00:00:00.000Z',
    });

    const err = await processRunJob(job).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UnrecoverableError);
    expect(err).toMatchObject({ message: expect.stringMatching(/^READ_FAILED: /) });
  });
});

describe('readSourceDocument', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'read-source-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a PDF by extension, case-insensitively', async () => {
    const path = join(dir, 'BUNDLE.PDF');
    await writeFile(path, 'x');

    const doc = await readSourceDocument(path);

    expect(doc).toMatchObject({ id: resolve(path), name: 'BUNDLE.PDF', kind: 'pdf' });
    expect(Array.from(doc.bytes)).toEqual([120]);
  });

  it('reads a CSV', async () => {
    const path = join(dir, 'summary.csv');
    await writeFile(path, 'a,b');
    expect((await readSourceDocument(path)).kind).toBe('csv');
  });

  it('rejects other extensions without reading', async () => {
    const err = await readSourceDocument(join(dir, 'scan.tiff')).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InputFileError);
    expect(err).toMatchObject({ code: 'UNSUPPORTED_TYPE' });
  });
});

describe('summarizeRun', () => {
  it('counts records by status and collects file errors', () => {
    const outcomes: FileOutcome[] = [
      {
        source: 'a.pdf',
        status: 'completed',
        bundle: null,
        records: [
          { ...baseRecord('a.pdf'), status: 'renamed' },
          { ...baseRecord('a.pdf'), status: 'skipped_blank' },
        ],
        error: null,
      },
      {
        source: 'b.pdf',
        status: 'halted',
        bundle: null,
        records: [
          { ...baseRecord('b.pdf'), status: 'not_emitted' },
          { ...baseRecord('b.pdf'), status: 'failed' },
        ],
        error: { name: 'ProtectedPeriodError', code: 'PROTECTED_PERIOD_SOURCE', message: 'confirm the period' },
      },
      { source: 'c.pdf', status: 'aborted', bundle: null, records: [], error: null },
    ];

    expect(summarizeRun('run-1', outcomes, null)).toEqual({
      runId: 'run-1',
      filesProcessed: 3,
      filesHalted: 1,
      units: { renamed: 1, manual_review: 0, skipped_blank: 1, failed: 1, not_emitted: 1 },
      reportPath: null,
      errors: [
        { source: 'b.pdf', name: 'ProtectedPeriodError', code: 'PROTECTED_PERIOD_SOURCE', message: 'confirm the period' },
      ],
    });
  });
});

function baseRecord(source: string): FileOutcome['records'][number] {
  return {
    source,
    ordinal: 1,
    pageIndex: 0,
    status: 'renamed',
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

/**
 * Collaborator Interfaces
 *
 * The core never touches PDF bytes, OCR engines or the filesystem directly.
 * It talks to these three narrow seams; production adapters live beside this
 * file (pdf-lib, Gemini, local filesystem) and tests substitute fakes.
 */

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

export type DocumentKind = 'pdf' | 'csv';

/** An input file (or a single page cut from one) held in memory */
export interface SourceDocument {
  /** Stable identity within a run (absolute path for inputs, derived for pages) */
  id: string;
  /** Original filename, used as a classification hint and in decision records */
  name: string;
  kind: DocumentKind;
  bytes: Uint8Array;
}

/** Region of a page expressed as fractions of its width/height (0.0-1.0) */
export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export interface TextExtractor {
  /** Best-effort plain text of one page (0-based index) */
  extractPage(document: SourceDocument, pageIndex: number): Promise<string>;
  /** Text restricted to a region of one page */
  extractRegion(document: SourceDocument, pageIndex: number, bbox: BoundingBox): Promise<string>;
}

export interface PdfIO {
  pageCount(document: SourceDocument): Promise<number>;
  copySinglePage(document: SourceDocument, pageIndex: number): Promise<SourceDocument>;
}

export type FinalizeOutcome =
  | { ok: true; outputName: string }
  | { ok: false; error: string };

/** What the sink receives for one decided unit */
export interface FinalizableUnit {
  sourceFile: string;
  ordinal: number;
  document: SourceDocument;
}

export interface RenameSink {
  finalize(
    unit: FinalizableUnit,
    finalCode: string,
    qualifierText: string,
    period: string,
  ): Promise<FinalizeOutcome>;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** A single page or region could not be read; isolated to that unit */
export class ExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExtractionError';
  }
}

/**
 * The extraction backend itself is unusable (missing credentials, library
 * failure). Processing of the current file stops.
 */
export class ExtractionUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExtractionUnavailableError';
  }
}

export type PdfIoErrorCode = 'LOAD_FAILED' | 'PAGE_OUT_OF_RANGE' | 'COPY_FAILED';

export class PdfIoError extends Error {
  readonly code: PdfIoErrorCode;

  constructor(code: PdfIoErrorCode, message: string) {
    super(message);
    this.name = 'PdfIoError';
    this.code = code;
  }
}

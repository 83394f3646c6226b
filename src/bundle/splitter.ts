/**
 * Splitter
 *
 * Cuts a confirmed (or forced) bundle into one single-page document per page.
 * Order is preserved and nothing is dropped: blank pages stay, and a page
 * that cannot be copied becomes an "unreadable" unit instead of failing the
 * whole split.
 */

import type { PdfIO, SourceDocument } from '../io/types.js';
import { SplitError } from './types.js';
import type { SplitRequest, SplitUnit } from './types.js';

export async function splitDocument(
  document: SourceDocument,
  request: SplitRequest,
  pdfIo: PdfIO,
): Promise<SplitUnit[]> {
  if (request.kind === 'decision' && !request.decision.isBundle) {
    throw new SplitError('NOT_A_BUNDLE', `${document.name} is not a bundle (${request.decision.reason})`);
  }

  let pageCount: number;
  try {
    pageCount = await pdfIo.pageCount(document);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SplitError('PAGE_COUNT_FAILED', `Could not count pages of ${document.name}: ${message}`);
  }

  const units: SplitUnit[] = [];
  for (let pageIndex = 0; pageIndex < pageCount; pageIndex++) {
    const base = { sourceFile: document.name, pageIndex, ordinal: pageIndex + 1 };
    try {
      const page = await pdfIo.copySinglePage(document, pageIndex);
      units.push({ ...base, status: 'ok', document: page });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn('[splitter] Page copy failed:', { document: document.name, page: pageIndex + 1, error: message });
      units.push({ ...base, status: 'unreadable', error: message });
    }
  }

  console.log('[splitter] Split complete:', {
    document: document.name,
    pages: pageCount,
    unreadable: units.filter((u) => u.status === 'unreadable').length,
    forced: request.kind === 'forced',
  });
  return units;
}

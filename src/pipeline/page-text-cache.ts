/**
 * Page text memoization for one file.
 *
 * Bundle detection samples the same pages the classifier reads afterwards;
 * wrapping the extractor means each page is sent to the backend once.
 * Failures are not cached so a retry can still succeed.
 */

import type { BoundingBox, SourceDocument, TextExtractor } from '../io/types.js';

export function memoizeExtractor(inner: TextExtractor): TextExtractor {
  const pages = new Map<string, Promise<string>>();

  return {
    extractPage(document: SourceDocument, pageIndex: number): Promise<string> {
      const key = `${document.id}:${pageIndex}`;
      const cached = pages.get(key);
      if (cached) return cached;

      const pending = inner.extractPage(document, pageIndex).catch((err: unknown) => {
        pages.delete(key);
        throw err;
      });
      pages.set(key, pending);
      return pending;
    },

    extractRegion(document: SourceDocument, pageIndex: number, bbox: BoundingBox): Promise<string> {
      return inner.extractRegion(document, pageIndex, bbox);
    },
  };
}

/**
 * pdf-lib Page I/O
 *
 * PdfIO adapter: page counting and single-page extraction for the splitter.
 * Parsed documents are cached per instance (one instance per run) so a
 * bundle is parsed once no matter how many pages are cut from it.
 */

import { PDFDocument } from 'pdf-lib';
import { PdfIoError } from './types.js';
import type { PdfIO, SourceDocument } from './types.js';

/** "bundle.pdf" + page index 2 -> "bundle_p003.pdf" */
export function pageDocumentName(name: string, pageIndex: number): string {
  const base = name.replace(/\.pdf$/i, '');
  return `${base}_p${String(pageIndex + 1).padStart(3, '0')}.pdf`;
}

export class PdfLibIO implements PdfIO {
  private readonly loaded = new Map<string, PDFDocument>();

  private async load(document: SourceDocument): Promise<PDFDocument> {
    const cached = this.loaded.get(document.id);
    if (cached) return cached;

    try {
      const pdf = await PDFDocument.load(document.bytes, { ignoreEncryption: true });
      this.loaded.set(document.id, pdf);
      return pdf;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new PdfIoError('LOAD_FAILED', `Could not parse PDF ${document.name}: ${message}`);
    }
  }

  async pageCount(document: SourceDocument): Promise<number> {
    const pdf = await this.load(document);
    return pdf.getPageCount();
  }

  async copySinglePage(document: SourceDocument, pageIndex: number): Promise<SourceDocument> {
    const src = await this.load(document);
    if (pageIndex < 0 || pageIndex >= src.getPageCount()) {
      throw new PdfIoError(
        'PAGE_OUT_OF_RANGE',
        `Page ${pageIndex + 1} out of range for ${document.name} (${src.getPageCount()} pages)`,
      );
    }

    try {
      const single = await PDFDocument.create();
      const [page] = await single.copyPages(src, [pageIndex]);
      single.addPage(page);
      const bytes = await single.save();

      return {
        id: `${document.id}#p${pageIndex + 1}`,
        name: pageDocumentName(document.name, pageIndex),
        kind: 'pdf',
        bytes,
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new PdfIoError('COPY_FAILED', `Could not copy page ${pageIndex + 1} of ${document.name}: ${message}`);
    }
  }

  /** Drop the parsed copy of a document once its file is finished */
  release(document: SourceDocument): void {
    this.loaded.delete(document.id);
  }
}

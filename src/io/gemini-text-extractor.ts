/**
 * Gemini Text Extractor
 *
 * TextExtractor adapter backed by Google Gemini. Each call sends a single
 * page (cut with PdfIO) and asks for a verbatim transcription, optionally
 * restricted to a region of the page.
 *
 * Error mapping:
 * - Missing API key -> ExtractionUnavailableError (file halts)
 * - API or parse failure on one page -> ExtractionError (unit gets empty text)
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import { ExtractionError, ExtractionUnavailableError } from './types.js';
import type { BoundingBox, PdfIO, SourceDocument, TextExtractor } from './types.js';

export interface GeminiExtractorOptions {
  apiKey: string;
  model: string;
  pdfIo: PdfIO;
}

// ---------------------------------------------------------------------------
// Prompts
// ---------------------------------------------------------------------------

const PAGE_PROMPT = `Transcribe all text on this Japanese tax document page exactly as printed.
- Keep the original characters (kanji, kana, digits); do not translate or summarize.
- Output plain text only, one printed line per line.
- If the page is blank, output nothing.`;

function regionPrompt(bbox: BoundingBox): string {
  const pct = (v: number) => `${Math.round(v * 100)}%`;
  return `Transcribe only the text inside this region of the page, measured from the top-left corner:
left ${pct(bbox.x)}, top ${pct(bbox.y)}, width ${pct(bbox.width)}, height ${pct(bbox.height)}.
Keep the original characters exactly as printed. Output plain text only. If the region is empty, output nothing.`;
}

// ---------------------------------------------------------------------------
// Extractor
// ---------------------------------------------------------------------------

export class GeminiTextExtractor implements TextExtractor {
  private genAI: GoogleGenerativeAI | null = null;

  constructor(private readonly options: GeminiExtractorOptions) {}

  private client(): GoogleGenerativeAI {
    if (this.genAI) return this.genAI;
    if (!this.options.apiKey) {
      throw new ExtractionUnavailableError('GEMINI_API_KEY is not set; text extraction is unavailable');
    }
    this.genAI = new GoogleGenerativeAI(this.options.apiKey);
    return this.genAI;
  }

  async extractPage(document: SourceDocument, pageIndex: number): Promise<string> {
    return this.transcribe(document, pageIndex, PAGE_PROMPT);
  }

  async extractRegion(document: SourceDocument, pageIndex: number, bbox: BoundingBox): Promise<string> {
    return this.transcribe(document, pageIndex, regionPrompt(bbox));
  }

  private async transcribe(document: SourceDocument, pageIndex: number, prompt: string): Promise<string> {
    const model = this.client().getGenerativeModel({ model: this.options.model });
    const page = await this.options.pdfIo.copySinglePage(document, pageIndex);

    try {
      const result = await model.generateContent([
        {
          inlineData: {
            mimeType: 'application/pdf',
            data: Buffer.from(page.bytes).toString('base64'),
          },
        },
        { text: prompt },
      ]);
      return result.response.text().trim();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ExtractionError(`Gemini extraction failed for ${document.name} page ${pageIndex + 1}: ${message}`);
    }
  }
}

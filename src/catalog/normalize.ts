/**
 * Text normalization shared by the catalog loader and every matcher.
 *
 * NFKC folds full-width ASCII, digits and punctuation to their half-width
 * forms (and half-width katakana to full-width), so OCR output and catalog
 * keywords compare on the same alphabet.
 */
export function normalizeText(text: string): string {
  return text.normalize('NFKC').replace(/\s+/g, ' ').trim();
}

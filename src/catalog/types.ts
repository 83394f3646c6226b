/**
 * Rule Catalog Types
 *
 * Zod schemas for the document-type catalog plus the TypeScript types inferred
 * from them. The catalog is plain data (JSON) so a new filing season can ship a
 * new catalog version without a code change.
 *
 * Consumers: classification/classifier.ts, sequencing/sequence-resolver.ts,
 * bundle/bundle-detector.ts
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Domains
// ---------------------------------------------------------------------------

export const DOCUMENT_DOMAINS = [
  'NATIONAL_TAX',
  'LOCAL_TAX_PREFECTURE',
  'LOCAL_TAX_MUNICIPALITY',
  'CONSUMPTION_TAX',
  'ACCOUNTING',
  'ASSETS',
  'SUMMARY',
] as const;

export const DocumentDomainSchema = z.enum(DOCUMENT_DOMAINS);
export type DocumentDomain = z.infer<typeof DocumentDomainSchema>;

/** Local-tax domains are the only ones eligible for slot numbering */
export const LOCAL_TAX_DOMAINS: ReadonlySet<DocumentDomain> = new Set([
  'LOCAL_TAX_PREFECTURE',
  'LOCAL_TAX_MUNICIPALITY',
]);

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

/** return and receipt codes step by slot; payment codes are fixed per domain */
export const SequenceKindSchema = z.enum(['return', 'receipt', 'payment']);
export type SequenceKind = z.infer<typeof SequenceKindSchema>;

const keywordList = z.array(z.string().min(1));

export const DocumentTypeRuleSchema = z.object({
  code: z.string().regex(/^\d{4}$/, 'code must be 4 digits'),
  label: z.string().min(1),
  domain: DocumentDomainSchema,
  priority: z.number().int().min(0),
  requiredKeywords: keywordList.min(1),
  alternateRequired: z.array(keywordList.min(1)).default([]),
  partialKeywords: keywordList.default([]),
  exclusionKeywords: keywordList.default([]),
  /** Receipt/payment notices that get jurisdiction slot numbering */
  sequence: SequenceKindSchema.optional(),
});

export type DocumentTypeRule = z.infer<typeof DocumentTypeRuleSchema>;

export const RuleCatalogSchema = z.object({
  version: z.string().min(1),
  unclassified: z.object({
    code: z.string().regex(/^\d{4}$/),
    label: z.string().min(1),
  }),
  rules: z.array(DocumentTypeRuleSchema).min(1),
});

/** Raw shape accepted from JSON (defaults not yet applied) */
export type RuleCatalogInput = z.input<typeof RuleCatalogSchema>;

export interface RuleCatalog {
  version: string;
  unclassified: { code: string; label: string };
  /** Declaration order is the final tie-breaker during classification */
  rules: readonly DocumentTypeRule[];
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export type CatalogErrorCode = 'INVALID_CATALOG' | 'DUPLICATE_CODE' | 'READ_FAILED';

export class CatalogError extends Error {
  readonly code: CatalogErrorCode;

  constructor(code: CatalogErrorCode, message: string) {
    super(message);
    this.name = 'CatalogError';
    this.code = code;
  }
}

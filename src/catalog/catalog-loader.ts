/**
 * Rule Catalog Loader
 *
 * Validates catalog JSON with zod, normalizes every keyword once at load time
 * and rejects duplicate codes. The default catalog ships beside this module;
 * a custom catalog can be loaded from disk (SORTER_CATALOG_PATH).
 */

import { readFile } from 'node:fs/promises';
import defaultCatalogJson from './default-catalog.json' with { type: 'json' };
import { normalizeText } from './normalize.js';
import { CatalogError, RuleCatalogSchema } from './types.js';
import type { DocumentTypeRule, RuleCatalog } from './types.js';

function normalizeKeywords(keywords: readonly string[]): string[] {
  return keywords.map(normalizeText).filter((k) => k.length > 0);
}

/**
 * Parse and validate an unknown value as a RuleCatalog.
 *
 * @throws CatalogError INVALID_CATALOG on schema failure, DUPLICATE_CODE on repeated codes
 */
export function parseRuleCatalog(raw: unknown): RuleCatalog {
  const parsed = RuleCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue';
    throw new CatalogError('INVALID_CATALOG', `Invalid rule catalog (${where})`);
  }

  const seen = new Set<string>();
  const rules: DocumentTypeRule[] = [];

  for (const rule of parsed.data.rules) {
    if (seen.has(rule.code) || rule.code === parsed.data.unclassified.code) {
      throw new CatalogError('DUPLICATE_CODE', `Duplicate document code in catalog: ${rule.code}`);
    }
    seen.add(rule.code);

    rules.push(
      Object.freeze({
        ...rule,
        requiredKeywords: normalizeKeywords(rule.requiredKeywords),
        alternateRequired: rule.alternateRequired.map(normalizeKeywords),
        partialKeywords: normalizeKeywords(rule.partialKeywords),
        exclusionKeywords: normalizeKeywords(rule.exclusionKeywords),
      }),
    );
  }

  return Object.freeze({
    version: parsed.data.version,
    unclassified: parsed.data.unclassified,
    rules: Object.freeze(rules),
  });
}

let _defaultCatalog: RuleCatalog | null = null;

/** The catalog bundled with the service (parsed once, then shared read-only) */
export function loadDefaultCatalog(): RuleCatalog {
  if (!_defaultCatalog) {
    _defaultCatalog = parseRuleCatalog(defaultCatalogJson);
  }
  return _defaultCatalog;
}

/**
 * Load a catalog from a JSON file on disk.
 *
 * @throws CatalogError READ_FAILED when the file cannot be read or is not JSON
 */
export async function loadCatalogFile(path: string): Promise<RuleCatalog> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CatalogError('READ_FAILED', `Could not read catalog at ${path}: ${message}`);
  }
  return parseRuleCatalog(raw);
}

/** Catalog from a configured path, or the bundled default when none is set */
export async function resolveCatalog(path: string | undefined): Promise<RuleCatalog> {
  return path ? loadCatalogFile(path) : loadDefaultCatalog();
}

export function findRule(catalog: RuleCatalog, code: string): DocumentTypeRule | undefined {
  return catalog.rules.find((r) => r.code === code);
}

/**
 * Rule Classifier: Priority-Ranked Keyword Matching
 *
 * Applies a RuleCatalog to extracted text and returns a frozen
 * ClassificationResult. Pure: no I/O and no logging; everything the decision
 * depends on is passed in and everything it considered is written to the
 * result's evidenceLog.
 *
 * Selection:
 * 1. Exclusion keywords veto a rule outright
 * 2. Among rules whose required set (or an alternate set) is fully present:
 *    highest priority, then most partial hits, then catalog order
 * 3. Otherwise best partial-only rule (confidence capped below 0.7)
 * 4. Otherwise the catalog's explicit "unclassified" code
 *
 * Consumers: pipeline/pipeline.ts, bundle/bundle-detector.ts
 */

import { normalizeText } from '../catalog/normalize.js';
import type { DocumentDomain, DocumentTypeRule, RuleCatalog } from '../catalog/types.js';
import type {
  BundleFamily,
  ClassificationHints,
  ClassificationResult,
  ClassificationTier,
} from './types.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const FAMILY_DOMAINS: Record<Exclude<BundleFamily, 'NONE'>, readonly DocumentDomain[]> = {
  LOCAL: ['LOCAL_TAX_PREFECTURE', 'LOCAL_TAX_MUNICIPALITY'],
  NATIONAL: ['NATIONAL_TAX', 'CONSUMPTION_TAX'],
};

/** Priority at (or above) which a required match is certain */
const CERTAIN_PRIORITY = 200;

/** Partial-only matches never reach the auto-rename threshold */
const PARTIAL_CONFIDENCE_CAP = 0.69;

// ---------------------------------------------------------------------------
// Rule Evaluation
// ---------------------------------------------------------------------------

interface RuleEvaluation {
  rule: DocumentTypeRule;
  vetoedBy: string | null;
  /** The required keyword set that was fully present, if any */
  requiredSet: readonly string[] | null;
  partialHits: string[];
}

function evaluateRule(rule: DocumentTypeRule, text: string): RuleEvaluation {
  const vetoedBy = rule.exclusionKeywords.find((k) => text.includes(k)) ?? null;
  const requiredSets = [rule.requiredKeywords, ...rule.alternateRequired];
  const requiredSet = requiredSets.find((set) => set.every((k) => text.includes(k))) ?? null;
  const partialHits = rule.partialKeywords.filter((k) => text.includes(k));

  return { rule, vetoedBy, requiredSet, partialHits };
}

function plausibleDomains(hints: ClassificationHints): ReadonlySet<DocumentDomain> | null {
  if (hints.domains && hints.domains.length > 0) {
    return new Set(hints.domains);
  }
  if (hints.bundleFamily && hints.bundleFamily !== 'NONE') {
    return new Set(FAMILY_DOMAINS[hints.bundleFamily]);
  }
  return null;
}

function pickRequired(pool: readonly RuleEvaluation[]): RuleEvaluation | null {
  let best: RuleEvaluation | null = null;
  for (const e of pool) {
    if (e.vetoedBy || !e.requiredSet) continue;
    if (
      !best ||
      e.rule.priority > best.rule.priority ||
      (e.rule.priority === best.rule.priority && e.partialHits.length > best.partialHits.length)
    ) {
      best = e;
    }
    // Equal priority and hits: the earlier declaration wins
  }
  return best;
}

function pickPartial(pool: readonly RuleEvaluation[]): RuleEvaluation | null {
  let best: RuleEvaluation | null = null;
  for (const e of pool) {
    if (e.vetoedBy || e.partialHits.length === 0) continue;
    if (
      !best ||
      e.partialHits.length > best.partialHits.length ||
      (e.partialHits.length === best.partialHits.length && e.rule.priority > best.rule.priority)
    ) {
      best = e;
    }
  }
  return best;
}

// ---------------------------------------------------------------------------
// Confidence
// ---------------------------------------------------------------------------

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function partialRatio(e: RuleEvaluation): number {
  const total = e.rule.partialKeywords.length;
  return total === 0 ? 0 : e.partialHits.length / total;
}

/**
 * Monotonic in (required match, partial ratio, priority).
 * Required + priority >= 200 is exactly 1.0; partial-only never exceeds 0.69.
 */
export function scoreConfidence(tier: ClassificationTier, priority: number, ratio: number): number {
  const priorityWeight = Math.min(priority, CERTAIN_PRIORITY) / CERTAIN_PRIORITY;

  switch (tier) {
    case 'required':
      if (priority >= CERTAIN_PRIORITY) return 1;
      return round2(Math.min(0.99, 0.7 + 0.2 * priorityWeight + 0.09 * ratio));
    case 'partial':
      return round2(Math.min(PARTIAL_CONFIDENCE_CAP, 0.2 + 0.4 * ratio + 0.09 * priorityWeight));
    case 'unclassified':
      return 0;
  }
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

function toResult(e: RuleEvaluation, tier: 'required' | 'partial', evidence: string[]): ClassificationResult {
  const matched = [...(e.requiredSet ?? []), ...e.partialHits];
  const confidence = scoreConfidence(tier, e.rule.priority, partialRatio(e));

  evidence.push(
    `pick ${e.rule.code} (${tier}, priority ${e.rule.priority}, partial ${e.partialHits.length}/${e.rule.partialKeywords.length}, confidence ${confidence})`,
  );

  const result: ClassificationResult = {
    code: e.rule.code,
    label: e.rule.label,
    confidence,
    matchedKeywords: [...new Set(matched)],
    domain: e.rule.domain,
    tier,
    evidenceLog: evidence,
  };
  return Object.freeze(result);
}

function logVetoes(pool: readonly RuleEvaluation[], evidence: string[]): void {
  for (const e of pool) {
    if (e.vetoedBy) {
      evidence.push(`veto ${e.rule.code}: exclusion "${e.vetoedBy}"`);
    }
  }
}

/**
 * Classify one unit of text against the rule catalog.
 *
 * @param text - Extracted text of the unit (raw; normalized here)
 * @param filenameHint - Source filename, searched alongside the text; null for split pages
 * @param catalog - Validated rule catalog
 * @param hints - Document-level hints bounding the rule search
 */
export function classify(
  text: string,
  filenameHint: string | null,
  catalog: RuleCatalog,
  hints: ClassificationHints = {},
): ClassificationResult {
  const searchable = normalizeText(filenameHint ? `${text} ${filenameHint}` : text);
  const evidence: string[] = [];

  const evaluations = catalog.rules.map((rule) => evaluateRule(rule, searchable));
  const domains = plausibleDomains(hints);

  let picked: RuleEvaluation | null;
  if (domains) {
    evidence.push(`domains: ${[...domains].join(',')}`);
    const hinted = evaluations.filter((e) => domains.has(e.rule.domain));
    logVetoes(hinted, evidence);
    picked = pickRequired(hinted);

    if (!picked) {
      evidence.push('no required match in hinted domains; widening to all domains');
      logVetoes(evaluations.filter((e) => !domains.has(e.rule.domain)), evidence);
      picked = pickRequired(evaluations);
    }
  } else {
    evidence.push('domains: all');
    logVetoes(evaluations, evidence);
    picked = pickRequired(evaluations);
  }

  if (picked) {
    return toResult(picked, 'required', evidence);
  }

  evidence.push('no required match; falling back to partial keywords');
  const partial = pickPartial(evaluations);
  if (partial) {
    return toResult(partial, 'partial', evidence);
  }

  evidence.push(`unclassified (${catalog.unclassified.code})`);
  const unclassified: ClassificationResult = {
    code: catalog.unclassified.code,
    label: catalog.unclassified.label,
    confidence: 0,
    matchedKeywords: [],
    domain: null,
    tier: 'unclassified',
    evidenceLog: evidence,
  };
  return Object.freeze(unclassified);
}

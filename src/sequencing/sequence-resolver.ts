/**
 * Sequence Resolver: Jurisdiction Slot Numbering
 *
 * Turns a local-tax return/receipt/payment classification into its final code:
 * - Prefecture return or receipt: base + (slot - 1) * 10  (1001, 1011, ... / 1003, 1013, ...)
 * - Municipality return or receipt: base + (ordinal - 1) * 10
 *   (2001, 2011, ... / 2003, 2013, ...) where ordinal skips slot 1 when it
 *   holds the special jurisdiction
 * - Payments: one fixed code per domain                   (1004 / 2004)
 *
 * A municipality-family unit that lands on the special jurisdiction's slot is
 * re-routed to that slot's prefecture code. The same function serves every
 * kind, so the paths cannot disagree.
 *
 * One instance per run. resolve() is synchronous and the assignment tracker is
 * only touched from it, so units are numbered in the order the pipeline feeds them.
 */

import { LOCAL_TAX_DOMAINS } from '../catalog/types.js';
import type { DocumentDomain, DocumentTypeRule, RuleCatalog, SequenceKind } from '../catalog/types.js';
import { findRule } from '../catalog/catalog-loader.js';
import type { ClassificationResult, SequencedClassification } from '../classification/types.js';
import type { JobContext } from '../job/job-context.js';
import type { JurisdictionSlot } from '../job/jurisdiction.js';
import { extractJurisdiction } from './jurisdiction-extractor.js';
import type { ExtractedJurisdiction } from './jurisdiction-extractor.js';
import { matchSlot } from './slot-matcher.js';
import type { SlotFamily, SlotMatch } from './slot-matcher.js';

const SLOT_STEP = 10;

const FAMILY_DOMAIN: Record<SlotFamily, DocumentDomain> = {
  prefecture: 'LOCAL_TAX_PREFECTURE',
  municipality: 'LOCAL_TAX_MUNICIPALITY',
};

interface NumberedCode {
  rule: DocumentTypeRule;
  code: string;
  family: SlotFamily;
  /** Municipality numbering was suppressed for the special jurisdiction */
  rerouted: boolean;
}

function passThrough(result: ClassificationResult, note: string): SequencedClassification {
  const wrapped: SequencedClassification = {
    ...result,
    evidenceLog: [...result.evidenceLog, note],
    originalCode: result.code,
    sequence: null,
  };
  return Object.freeze(wrapped);
}

export class SequenceResolver {
  /** Extracted-name key -> slot match (or miss), per run */
  private readonly matchCache = new Map<string, SlotMatch | null>();
  /** Final code -> first unit that received it */
  private readonly assigned = new Map<string, string>();

  constructor(
    private readonly context: JobContext,
    private readonly catalog: RuleCatalog,
  ) {}

  /**
   * Resolve the final code for one classified unit.
   *
   * @param jurisdictionText - Text the jurisdiction is read from (addressee region or whole page)
   * @param unitRef - Identifies the unit in audit lines ("bundle.pdf#3")
   */
  resolve(result: ClassificationResult, jurisdictionText: string, unitRef: string): SequencedClassification {
    const audit = this.context.audit;
    const rule = findRule(this.catalog, result.code);

    if (!result.domain || !LOCAL_TAX_DOMAINS.has(result.domain) || !rule?.sequence) {
      audit.record('sequence_skipped', { unit: unitRef, code: result.code, domain: result.domain ?? 'NONE' });
      return passThrough(result, `sequence: skipped, domain=${result.domain ?? 'NONE'}`);
    }

    const family: SlotFamily = result.domain === 'LOCAL_TAX_PREFECTURE' ? 'prefecture' : 'municipality';
    const extracted = extractJurisdiction(jurisdictionText);
    const match = this.lookup(extracted, family);

    if (!match) {
      audit.record('sequence_failed', {
        unit: unitRef,
        code: result.code,
        reason: 'no_slot',
        prefecture: extracted.prefecture,
        municipality: extracted.municipality,
      });
      return passThrough(result, `sequence: no configured slot for ${extracted.municipality ?? extracted.prefecture ?? 'unknown jurisdiction'}`);
    }

    const numbered = this.numberFor(rule.sequence, family, match.slot);
    if (!numbered) {
      audit.record('sequence_failed', { unit: unitRef, code: result.code, reason: 'no_base_rule' });
      return passThrough(result, `sequence: catalog has no ${rule.sequence} rule for the target domain`);
    }

    const previous = this.assigned.get(numbered.code);
    if (previous !== undefined && previous !== unitRef) {
      audit.record('sequence_duplicate', { unit: unitRef, code: numbered.code, firstUnit: previous });
    } else if (previous === undefined) {
      this.assigned.set(numbered.code, unitRef);
    }

    const jurisdiction = numbered.family === 'prefecture' ? match.slot.prefecture : match.slot.municipality;
    audit.record('sequence_resolution', {
      unit: unitRef,
      original: result.code,
      final: numbered.code,
      slot: match.slot.slotIndex,
      jurisdiction,
      matchedBy: match.matchedBy,
      rerouted: numbered.rerouted,
    });

    const note = numbered.rerouted
      ? `sequence: ${result.code} -> ${numbered.code} (slot ${match.slot.slotIndex} ${jurisdiction}, municipal numbering suppressed)`
      : `sequence: ${result.code} -> ${numbered.code} (slot ${match.slot.slotIndex} ${jurisdiction}, ${match.matchedBy})`;

    const wrapped: SequencedClassification = {
      ...result,
      code: numbered.code,
      label: numbered.rule.label,
      domain: numbered.rule.domain,
      evidenceLog: [...result.evidenceLog, note],
      originalCode: result.code,
      sequence: {
        kind: rule.sequence,
        slotIndex: match.slot.slotIndex,
        jurisdiction,
        matchedBy: match.matchedBy,
      },
    };
    return Object.freeze(wrapped);
  }

  private lookup(extracted: ExtractedJurisdiction, family: SlotFamily): SlotMatch | null {
    const key = `${family}|${extracted.prefecture ?? ''}|${extracted.municipality ?? ''}`;
    const cached = this.matchCache.get(key);
    if (cached !== undefined) return cached;

    const match = matchSlot(extracted, this.context.jurisdictionSlots, family, (slot) =>
      this.context.isSpecialSlot(slot),
    );
    this.matchCache.set(key, match);
    return match;
  }

  private baseRule(family: SlotFamily, kind: SequenceKind): DocumentTypeRule | undefined {
    return this.catalog.rules.find((r) => r.domain === FAMILY_DOMAIN[family] && r.sequence === kind);
  }

  /** Shared by return, receipt and payment paths */
  private numberFor(kind: SequenceKind, family: SlotFamily, slot: JurisdictionSlot): NumberedCode | null {
    const rerouted = family === 'municipality' && this.context.isSpecialSlot(slot);
    const effective: SlotFamily = rerouted ? 'prefecture' : family;

    const base = this.baseRule(effective, kind);
    if (!base) return null;

    if (kind === 'payment') {
      return { rule: base, code: base.code, family: effective, rerouted };
    }

    const ordinal = effective === 'prefecture' ? slot.slotIndex : this.context.municipalOrdinal(slot);
    const code = String(Number(base.code) + (ordinal - 1) * SLOT_STEP).padStart(4, '0');
    return { rule: base, code, family: effective, rerouted };
  }
}

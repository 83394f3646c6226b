/**
 * Slot Matcher
 *
 * Finds which configured jurisdiction slot an extracted name refers to.
 * Tiers, strongest first: exact string, normalized (NFKC, suffix-stripped),
 * partial (one normalized name contains the other). No match is an explicit
 * null the caller must handle.
 */

import { normalizeJurisdictionName } from '../job/jurisdiction.js';
import type { JurisdictionSlot } from '../job/jurisdiction.js';
import type { SlotMatchTier } from '../classification/types.js';
import type { ExtractedJurisdiction } from './jurisdiction-extractor.js';

export type SlotFamily = 'prefecture' | 'municipality';

export interface SlotMatch {
  slot: JurisdictionSlot;
  matchedBy: SlotMatchTier;
  /** Which extracted name produced the match */
  via: SlotFamily;
}

const TIER_RANK: Record<SlotMatchTier, number> = { exact: 0, normalized: 1, partial: 2 };

export function matchTier(extracted: string, configured: string): SlotMatchTier | null {
  if (!extracted || !configured) return null;
  if (extracted === configured) return 'exact';

  const a = normalizeJurisdictionName(extracted);
  const b = normalizeJurisdictionName(configured);
  if (a === b) return 'normalized';
  if (Math.min(a.length, b.length) >= 2 && (a.includes(b) || b.includes(a))) return 'partial';
  return null;
}

interface Candidate {
  slot: JurisdictionSlot;
  tier: SlotMatchTier;
}

/** Candidates sharing the strongest tier, in slot order */
function strongest(
  name: string,
  slots: readonly JurisdictionSlot[],
  field: (slot: JurisdictionSlot) => string,
): Candidate[] {
  const candidates: Candidate[] = [];
  for (const slot of slots) {
    const tier = matchTier(name, field(slot));
    if (tier) candidates.push({ slot, tier });
  }
  if (candidates.length === 0) return [];

  const best = Math.min(...candidates.map((c) => TIER_RANK[c.tier]));
  return candidates.filter((c) => TIER_RANK[c.tier] === best);
}

/**
 * Match an extracted jurisdiction to a slot.
 *
 * - prefecture family: by prefecture name (first slot wins when several share it)
 * - municipality family: by municipality name, prefecture breaking ties between
 *   same-named municipalities; failing that, by prefecture against the special
 *   jurisdiction's slot only (it has no municipal layer to match on)
 */
export function matchSlot(
  extracted: ExtractedJurisdiction,
  slots: readonly JurisdictionSlot[],
  family: SlotFamily,
  isSpecialSlot: (slot: JurisdictionSlot) => boolean,
): SlotMatch | null {
  if (family === 'prefecture') {
    if (!extracted.prefecture) return null;
    const [first] = strongest(extracted.prefecture, slots, (s) => s.prefecture);
    return first ? { slot: first.slot, matchedBy: first.tier, via: 'prefecture' } : null;
  }

  if (extracted.municipality) {
    const candidates = strongest(extracted.municipality, slots, (s) => s.municipality);
    const prefecture = extracted.prefecture;
    const preferred = prefecture
      ? candidates.find((c) => matchTier(prefecture, c.slot.prefecture) !== null)
      : undefined;
    const chosen = preferred ?? candidates[0];
    if (chosen) {
      return { slot: chosen.slot, matchedBy: chosen.tier, via: 'municipality' };
    }
  }

  if (extracted.prefecture) {
    const special = slots.filter(isSpecialSlot);
    const [first] = strongest(extracted.prefecture, special, (s) => s.prefecture);
    if (first) {
      return { slot: first.slot, matchedBy: first.tier, via: 'prefecture' };
    }
  }

  return null;
}

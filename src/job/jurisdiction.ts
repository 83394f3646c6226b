/**
 * Jurisdiction slots configured for a run, and the name normalization every
 * jurisdiction comparison goes through.
 */

export interface JurisdictionSlot {
  /** 1-based; defines numbering precedence */
  readonly slotIndex: number;
  readonly prefecture: string;
  /** '' when the slot has no municipal layer */
  readonly municipality: string;
}

const ADMINISTRATIVE_SUFFIX = /[都道府県市区町村]$/;

/**
 * Compare form of a jurisdiction name: NFKC, no whitespace, trailing
 * administrative suffix removed ("愛知県" -> "愛知", "蒲郡 市" -> "蒲郡").
 * Two-character names keep their suffix so "津市" does not collapse to "津".
 */
export function normalizeJurisdictionName(name: string): string {
  const compact = name.normalize('NFKC').replace(/\s+/g, '');
  if (compact.length > 2 && ADMINISTRATIVE_SUFFIX.test(compact)) {
    return compact.slice(0, -1);
  }
  return compact;
}

export function sameJurisdiction(a: string, b: string): boolean {
  return a.length > 0 && b.length > 0 && normalizeJurisdictionName(a) === normalizeJurisdictionName(b);
}

/** Display name of a slot: "愛知県/蒲郡市" or "東京都" */
export function describeSlot(slot: JurisdictionSlot): string {
  return slot.municipality ? `${slot.prefecture}/${slot.municipality}` : slot.prefecture;
}

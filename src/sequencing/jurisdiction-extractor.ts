/**
 * Jurisdiction Extractor
 *
 * Lightweight heuristic that reads the addressed prefecture / municipality
 * from a notice's text. Independent of the rule classifier: it only looks for
 * place names, preferring those next to an authority marker (知事, 税事務所,
 * 市長, 役所, 役場) over incidental mentions such as the filer's address.
 */

import prefectureNames from './prefectures.json' with { type: 'json' };

export interface JurisdictionMention {
  kind: 'prefecture' | 'municipality';
  name: string;
  /** Offset in the normalized text */
  index: number;
  /** Followed by an authority marker (addressee rather than an address) */
  authority: boolean;
}

export interface ExtractedJurisdiction {
  prefecture: string | null;
  municipality: string | null;
  mentions: readonly JurisdictionMention[];
}

const PREFECTURES: readonly string[] = prefectureNames;

const PREFECTURE_AUTHORITY = /^\s?\S{0,6}?(知事|税事務所|県税|都税|府税|道税)/;

const NAME_CHARS = '\\p{Script=Han}\\p{Script=Katakana}ヶケ々';
const MUNICIPAL_AUTHORITY = new RegExp(`([${NAME_CHARS}]{1,5}?[市区町村])(?:長|役所|役場)`, 'gu');
const MUNICIPAL_TOKEN = new RegExp(`(?:^|[\\s:、。])([${NAME_CHARS}]{1,5}?[市区町村])(?=[\\s、。]|$)`, 'gu');

/** Words that look like a municipality but name the tier itself */
const GENERIC_MUNICIPAL = new Set(['市町村', '市区町村', '区市町村', '町村']);

// ---------------------------------------------------------------------------
// Mentions
// ---------------------------------------------------------------------------

function prefectureMentions(text: string): JurisdictionMention[] {
  const mentions: JurisdictionMention[] = [];
  for (const name of PREFECTURES) {
    let from = 0;
    for (;;) {
      const index = text.indexOf(name, from);
      if (index < 0) break;
      const after = text.slice(index + name.length, index + name.length + 10);
      mentions.push({ kind: 'prefecture', name, index, authority: PREFECTURE_AUTHORITY.test(after) });
      from = index + name.length;
    }
  }
  return mentions;
}

/** "愛知県蒲郡市" -> { prefecture: "愛知県", municipality: "蒲郡市" } */
function splitPrefecturePrefix(name: string): { prefecture: string | null; municipality: string } {
  const prefecture = PREFECTURES.find((p) => name.startsWith(p) && name.length > p.length);
  return prefecture
    ? { prefecture, municipality: name.slice(prefecture.length) }
    : { prefecture: null, municipality: name };
}

function municipalityMentions(text: string): JurisdictionMention[] {
  const mentions: JurisdictionMention[] = [];
  const seen = new Set<number>();

  const collect = (pattern: RegExp, authority: boolean) => {
    for (const match of text.matchAll(pattern)) {
      const captured = match[1];
      const start = (match.index ?? 0) + match[0].indexOf(captured);
      if (seen.has(start)) continue;

      const { prefecture, municipality } = splitPrefecturePrefix(captured);
      if (GENERIC_MUNICIPAL.has(municipality) || municipality.length < 2) continue;

      seen.add(start);
      mentions.push({
        kind: 'municipality',
        name: municipality,
        index: prefecture ? start + prefecture.length : start,
        authority,
      });
    }
  };

  collect(MUNICIPAL_AUTHORITY, true);
  collect(MUNICIPAL_TOKEN, false);
  return mentions;
}

function pickMention(mentions: readonly JurisdictionMention[]): JurisdictionMention | null {
  const sorted = [...mentions].sort((a, b) => Number(b.authority) - Number(a.authority) || a.index - b.index);
  return sorted[0] ?? null;
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/**
 * Extract the addressed jurisdiction from unit text.
 * Each field is null when no plausible name was found.
 */
export function extractJurisdiction(text: string): ExtractedJurisdiction {
  const normalized = text.normalize('NFKC');
  const mentions = [...prefectureMentions(normalized), ...municipalityMentions(normalized)].sort(
    (a, b) => a.index - b.index,
  );

  const prefecture = pickMention(mentions.filter((m) => m.kind === 'prefecture'));
  const municipality = pickMention(mentions.filter((m) => m.kind === 'municipality'));

  return {
    prefecture: prefecture?.name ?? null,
    municipality: municipality?.name ?? null,
    mentions,
  };
}

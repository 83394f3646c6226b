/**
 * Sequencing barrel export
 */

export { SequenceResolver } from './sequence-resolver.js';
export { extractJurisdiction } from './jurisdiction-extractor.js';
export type { ExtractedJurisdiction, JurisdictionMention } from './jurisdiction-extractor.js';
export { matchSlot, matchTier } from './slot-matcher.js';
export type { SlotFamily, SlotMatch } from './slot-matcher.js';

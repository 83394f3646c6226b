/**
 * Bundle barrel export
 */

export { detectBundle, DEFAULT_SCAN_PAGES, DEFAULT_THRESHOLDS } from './bundle-detector.js';
export type { BundleDetectorDeps, BundleDetectorOptions } from './bundle-detector.js';
export { splitDocument } from './splitter.js';
export { FAMILY_KEYWORDS, NEVER_SPLIT_PATTERNS } from './keywords.js';
export { SplitError } from './types.js';
export type {
  BundleDecision,
  BundleThresholds,
  DetectedFamily,
  FamilyCounters,
  SplitErrorCode,
  SplitRequest,
  SplitUnit,
} from './types.js';

/**
 * Classification barrel export
 */

export { classify, scoreConfidence } from './classifier.js';
export { sanitizeFilename, buildQualifier, buildFinalName } from './naming.js';
export type {
  BundleFamily,
  ClassificationHints,
  ClassificationResult,
  ClassificationTier,
  SequenceAssignment,
  SequencedClassification,
  SlotMatchTier,
} from './types.js';

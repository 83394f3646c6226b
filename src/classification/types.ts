/**
 * Classification Type Definitions
 *
 * - ClassificationResult: frozen output of the rule classifier for one unit
 * - ClassificationHints: document-level hints that bound the rule search
 * - SequencedClassification: a result after slot numbering, keeping the
 *   classifier's code as originalCode
 *
 * Consumers: classifier.ts, sequencing/sequence-resolver.ts, pipeline/pipeline.ts
 */

import type { DocumentDomain, SequenceKind } from '../catalog/types.js';

export type BundleFamily = 'NONE' | 'NATIONAL' | 'LOCAL';

export type ClassificationTier = 'required' | 'partial' | 'unclassified';

export interface ClassificationResult {
  readonly code: string;
  readonly label: string;
  /** 0.0-1.0; 1.0 only for required matches of priority 200 or above */
  readonly confidence: number;
  readonly matchedKeywords: readonly string[];
  readonly domain: DocumentDomain | null;
  readonly tier: ClassificationTier;
  readonly evidenceLog: readonly string[];
}

export interface ClassificationHints {
  /** Bundle family of the source file; narrows evaluation to that family's domains */
  bundleFamily?: BundleFamily;
  /** Explicit domain restriction (takes precedence over bundleFamily) */
  domains?: readonly DocumentDomain[];
}

export type SlotMatchTier = 'exact' | 'normalized' | 'partial';

export interface SequenceAssignment {
  readonly kind: SequenceKind;
  readonly slotIndex: number;
  /** Jurisdiction name as configured for the matched slot */
  readonly jurisdiction: string;
  readonly matchedBy: SlotMatchTier;
}

export interface SequencedClassification extends ClassificationResult {
  /** Code chosen by the classifier before slot numbering */
  readonly originalCode: string;
  /** null when the unit passed through without slot numbering */
  readonly sequence: SequenceAssignment | null;
}

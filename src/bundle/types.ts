/**
 * Bundle Detection & Splitting Types
 */

import type { BundleFamily } from '../classification/types.js';
import type { SourceDocument } from '../io/types.js';

export type DetectedFamily = Exclude<BundleFamily, 'NONE'>;

/** Pages (among those sampled) that hit each keyword category */
export interface FamilyCounters {
  receipt: number;
  payment: number;
  codes: number;
}

export type BundleThresholds = FamilyCounters;

export interface BundleDecision {
  isBundle: boolean;
  family: BundleFamily;
  /** Advisory only; the split gate is threshold satisfaction */
  confidence: number;
  sampledPages: number;
  counters: Record<DetectedFamily, FamilyCounters>;
  /** "qualified:LOCAL", "tie", "below_threshold", "excluded:<pattern>", "empty_document" */
  reason: string;
}

export type SplitRequest =
  | { kind: 'decision'; decision: BundleDecision }
  | { kind: 'forced' };

interface SplitUnitBase {
  sourceFile: string;
  /** 0-based page in the source document */
  pageIndex: number;
  /** 1-based, contiguous, in page order */
  ordinal: number;
}

export type SplitUnit =
  | (SplitUnitBase & { status: 'ok'; document: SourceDocument })
  | (SplitUnitBase & { status: 'unreadable'; error: string });

export type SplitErrorCode = 'NOT_A_BUNDLE' | 'PAGE_COUNT_FAILED';

export class SplitError extends Error {
  readonly code: SplitErrorCode;

  constructor(code: SplitErrorCode, message: string) {
    super(message);
    this.name = 'SplitError';
    this.code = code;
  }
}

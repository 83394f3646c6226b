/**
 * Bundle keyword sets.
 *
 * Each family has its own receipt/payment indicators and the closed set of
 * base codes a page must classify to before it counts as a family page.
 * Keywords are compared against NFKC-normalized text.
 */

import type { DetectedFamily } from './types.js';

export interface FamilyKeywords {
  receipt: readonly string[];
  payment: readonly string[];
  codes: ReadonlySet<string>;
}

export const FAMILY_KEYWORDS: Record<DetectedFamily, FamilyKeywords> = {
  LOCAL: {
    receipt: ['申告受付完了通知', '受付完了通知', '地方税電子申告'],
    payment: ['納付情報発行結果', '地方税共同機構', 'ペイジー'],
    codes: new Set(['1003', '1004', '2003', '2004']),
  },
  NATIONAL: {
    receipt: ['メール詳細', '送信されたデータを受け付けました', '国税電子申告'],
    payment: ['納付区分番号通知', '納付内容を確認し'],
    codes: new Set(['0003', '0004', '3003', '3004']),
  },
};

/** Standalone documents that are never split, whatever their keyword counts */
export const NEVER_SPLIT_PATTERNS: readonly string[] = [
  '一括償却資産明細表',
  '少額減価償却資産明細表',
  '固定資産台帳',
  '総勘定元帳',
  '補助元帳',
  '決算報告書',
];

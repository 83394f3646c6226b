/**
 * Tests for the decision CSV export
 */

import { describe, it, expect } from 'vitest';
import { escapeCsvField, toDecisionCsv } from '../csv-export.js';
import type { DecisionRecord } from '../../pipeline/types.js';

const HEADER =
  'source,ordinal,page,status,final_code,original_code,label,qualifier,period,period_source,confidence,tier,output_name,error,evidence';

function record(overrides: Partial<DecisionRecord>): DecisionRecord {
  return {
    source: 'bundle.pdf',
    ordinal: 1,
    pageIndex: 0,
    status: 'renamed',
    finalCode: null,
    originalCode: null,
    label: null,
    qualifier: null,
    period: null,
    periodSource: null,
    confidence: null,
    tier: null,
    outputName: null,
    error: null,
    evidenceLog: [],
    ...overrides,
  };
}

describe('escapeCsvField', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsvField('1013')).toBe('1013');
  });

  it('quotes commas, quotes and line breaks', () => {
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('line\nbreak')).toBe('"line\nbreak"');
  });
});

describe('toDecisionCsv', () => {
  it('writes only the header for no records', () => {
    expect(toDecisionCsv([])).toBe(`${HEADER}\r\n`);
  });

  it('writes one CRLF-terminated row per record', () => {
    const csv = toDecisionCsv([
      record({
        ordinal: 2,
        pageIndex: 1,
        finalCode: '1013',
        originalCode: '1003',
        label: '受信通知',
        qualifier: '受信通知_愛知県',
        period: '2503',
        periodSource: 'DETECTED',
        confidence: 0.9,
        tier: 'required',
        outputName: '1013_受信通知_愛知県_2503.pdf',
        evidenceLog: ['pick 1003', 'sequence: 1003 -> 1013'],
      }),
      record({ ordinal: 3, pageIndex: 2, status: 'failed', error: 'disk full, retry' }),
    ]);

    expect(csv.split('\r\n')).toEqual([
      HEADER,
      'bundle.pdf,2,2,renamed,1013,1003,受信通知,受信通知_愛知県,2503,DETECTED,0.90,required,1013_受信通知_愛知県_2503.pdf,,pick 1003 | sequence: 1003 -> 1013',
      'bundle.pdf,3,3,failed,,,,,,,,,,"disk full, retry",',
      '',
    ]);
  });
});

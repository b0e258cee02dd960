/**
 * Result aggregator tests
 */

import {
  RISK_RANK,
  aggregate,
  buildRankKey,
  compareFindings,
  summarizeCounts,
} from '../../../../src/services/report/result.aggregator';
import { unknownClassification } from '../../../../src/services/ai/risk.classifier';
import { Classification, LeakRecord, Preview, RiskLevel } from '../../../../src/types';
import { makeRecord } from '../../../integration/mocks/search.mocks';

function verdict(risk: RiskLevel): Classification {
  return { risk, summary: `${risk} summary`, tags: [], credentialCount: 0, credentialKinds: [] };
}

const records: LeakRecord[] = [
  makeRecord('m-old', { discoveredAt: new Date('2020-01-01T00:00:00Z') }),
  makeRecord('h-undated'),
  makeRecord('m-new', { discoveredAt: new Date('2023-01-01T00:00:00Z') }),
  makeRecord('h-new', { discoveredAt: new Date('2024-01-01T00:00:00Z') }),
  makeRecord('l-b'),
  makeRecord('l-a'),
  makeRecord('unclassified'),
];

const classifications = new Map<string, Classification>([
  ['m-old', verdict('Medium')],
  ['h-undated', verdict('High')],
  ['m-new', verdict('Medium')],
  ['h-new', verdict('High')],
  ['l-b', verdict('Low')],
  ['l-a', verdict('Low')],
]);

const EXPECTED_ORDER = ['h-new', 'h-undated', 'm-new', 'm-old', 'l-a', 'l-b', 'unclassified'];

describe('aggregate', () => {
  it('should rank by risk, then recency with undated last, then id', () => {
    const findings = aggregate(records, classifications);

    expect(findings.map(finding => finding.record.id)).toEqual(EXPECTED_ORDER);
  });

  it('should produce the same order for any input permutation', () => {
    const shuffled = [3, 6, 0, 5, 1, 4, 2].map(index => records[index]);
    const permutations = [[...records].reverse(), shuffled];

    for (const permutation of permutations) {
      expect(aggregate(permutation, classifications).map(finding => finding.record.id)).toEqual(EXPECTED_ORDER);
    }
  });

  it('should make unclassified records Unknown', () => {
    const finding = aggregate([makeRecord('only')], new Map()).at(0);

    expect(finding?.classification).toEqual(unknownClassification('classification unavailable'));
    expect(finding?.preview).toEqual({ availability: 'Unavailable', truncated: false });
  });

  it('should carry preview availability and freeze findings', () => {
    const previews = new Map<string, Preview>([
      ['h-new', { recordId: 'h-new', content: 'x', truncated: true, availability: 'Available' }],
    ]);

    const findings = aggregate(records, classifications, previews);

    expect(findings[0].preview).toEqual({ availability: 'Available', truncated: true });
    expect(Object.isFrozen(findings[0])).toBe(true);
  });

  it('should return nothing for no records', () => {
    expect(aggregate([], classifications)).toEqual([]);
  });
});

describe('buildRankKey', () => {
  it('should use the risk rank, discovery time and id', () => {
    const record = makeRecord('k', { discoveredAt: new Date('2021-05-05T00:00:00Z') });

    expect(buildRankKey(record, verdict('Low'))).toEqual({
      riskRank: RISK_RANK.Low,
      discoveredAtMs: Date.parse('2021-05-05T00:00:00Z'),
      recordId: 'k',
    });
  });
});

describe('compareFindings', () => {
  it('should order ids by code unit', () => {
    const [upper, lower] = aggregate([makeRecord('b'), makeRecord('B')], new Map()).map(finding => finding.record.id);

    expect([upper, lower]).toEqual(['B', 'b']);
  });

  it('should return zero for the same record', () => {
    const [finding] = aggregate([makeRecord('same')], new Map());

    expect(compareFindings(finding, finding)).toBe(0);
  });
});

describe('summarizeCounts', () => {
  it('should count every level, including zeros', () => {
    expect(summarizeCounts(aggregate(records, classifications))).toEqual({ High: 2, Medium: 2, Low: 2, Unknown: 1 });
    expect(summarizeCounts([])).toEqual({ High: 0, Medium: 0, Low: 0, Unknown: 0 });
  });
});

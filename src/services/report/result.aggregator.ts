/**
 * Result Aggregator
 * Joins records with their classifications into ranked Findings
 */

import {
  Classification,
  Finding,
  LeakRecord,
  Preview,
  RankKey,
  RiskCounts,
  RiskLevel,
} from '../../types';
import { unknownClassification, UNAVAILABLE_SUMMARY } from '../ai/risk.classifier';

export const RISK_RANK: Record<RiskLevel, number> = {
  High: 0,
  Medium: 1,
  Low: 2,
  Unknown: 3,
};

export function buildRankKey(record: LeakRecord, classification: Classification): RankKey {
  return {
    riskRank: RISK_RANK[classification.risk],
    discoveredAtMs: record.discoveredAt ? record.discoveredAt.getTime() : null,
    recordId: record.id,
  };
}

/**
 * Total order: risk, then most recent discovery (undated last), then id
 */
export function compareFindings(a: Finding, b: Finding): number {
  const left = a.rankKey;
  const right = b.rankKey;

  if (left.riskRank !== right.riskRank) {
    return left.riskRank - right.riskRank;
  }

  if (left.discoveredAtMs !== right.discoveredAtMs) {
    if (left.discoveredAtMs === null) return 1;
    if (right.discoveredAtMs === null) return -1;
    return right.discoveredAtMs - left.discoveredAtMs;
  }

  if (left.recordId === right.recordId) return 0;
  return left.recordId < right.recordId ? -1 : 1;
}

/**
 * One Finding per record, sorted. A record with no classification is Unknown.
 */
export function aggregate(
  records: LeakRecord[],
  classifications: ReadonlyMap<string, Classification>,
  previews: ReadonlyMap<string, Preview> = new Map()
): Finding[] {
  const findings = records.map(record => {
    const classification = classifications.get(record.id) ?? unknownClassification(UNAVAILABLE_SUMMARY);
    const preview = previews.get(record.id);

    return Object.freeze({
      record,
      classification,
      preview: {
        availability: preview?.availability ?? 'Unavailable',
        truncated: preview?.truncated ?? false,
      },
      rankKey: buildRankKey(record, classification),
    });
  });

  return findings.sort(compareFindings);
}

export function summarizeCounts(findings: readonly Finding[]): RiskCounts {
  const counts: RiskCounts = { High: 0, Medium: 0, Low: 0, Unknown: 0 };
  for (const finding of findings) {
    counts[finding.classification.risk]++;
  }
  return counts;
}

/**
 * Core type definitions for Leak Triage
 */

/**
 * Shape of the identifier under investigation
 */
export type TargetKind = 'Email' | 'Domain' | 'IPAddress';

/**
 * Identifier under investigation. Built by `parseTarget`, never mutated.
 */
export interface Target {
  readonly raw: string;
  /** Trimmed, lower-cased form sent to the search provider */
  readonly value: string;
  readonly kind: TargetKind;
}

export type SearchSessionStatus = 'Pending' | 'Complete' | 'Failed' | 'TimedOut';

/**
 * One query against the search provider
 */
export interface SearchSession {
  id: string;
  status: SearchSessionStatus;
  createdAt: Date;
}

export type BucketVisibility = 'Public' | 'Private' | 'Unknown';

/**
 * One item returned by the search provider as a potential exposure match
 */
export interface LeakRecord {
  /** Unique within a session; identity key */
  id: string;
  /** Human-readable label, usually the leaked file name */
  source: string;
  bucket: string;
  visibility: BucketVisibility;
  sizeBytes: number;
  discoveredAt: Date | null;
  /** Provider storage handle used for partial reads */
  storageId?: string;
  mediaType?: number;
}

export type PreviewAvailability = 'Available' | 'Unavailable' | 'Unsupported';

/**
 * Size-bounded content sample of a leak record
 */
export interface Preview {
  recordId: string;
  content: string;
  truncated: boolean;
  availability: PreviewAvailability;
  contentType?: string;
  /** Why the preview is not Available */
  reason?: string;
}

/**
 * Closed severity vocabulary; nothing else may reach a Finding
 */
export type RiskLevel = 'High' | 'Medium' | 'Low' | 'Unknown';

export const RISK_LEVELS: readonly RiskLevel[] = ['High', 'Medium', 'Low', 'Unknown'];

/**
 * Advisory labels derived from the classifier summary. Never used for ranking.
 */
export type RationaleTag = 'credentials' | 'pii' | 'hashes' | 'financial' | 'config-only';

/**
 * Kind of a reported credential. Anything a model names outside the list is `other`.
 */
export type CredentialKind = 'password' | 'hash' | 'token' | 'other';

export const CREDENTIAL_KINDS: readonly CredentialKind[] = ['password', 'hash', 'token', 'other'];

/**
 * Verdict for one preview
 */
export interface Classification {
  risk: RiskLevel;
  /** One line, human readable */
  summary: string;
  tags: RationaleTag[];
  /** Number of credential pairs the model reported; values are never kept */
  credentialCount: number;
  /** Distinct kinds among those credentials, in `CREDENTIAL_KINDS` order */
  credentialKinds: CredentialKind[];
  provider?: string;
  model?: string;
}

/**
 * Sort key of a finding: risk rank, negated discovery time, record id
 */
export interface RankKey {
  riskRank: number;
  discoveredAtMs: number | null;
  recordId: string;
}

/**
 * One leak record joined with its classification
 */
export interface Finding {
  readonly record: LeakRecord;
  readonly classification: Classification;
  readonly preview: {
    availability: PreviewAvailability;
    truncated: boolean;
  };
  readonly rankKey: RankKey;
}

export type RiskCounts = Record<RiskLevel, number>;

/**
 * Final output of a pipeline run
 */
export interface Report {
  target: Target;
  session: SearchSession;
  totalRecords: number;
  counts: RiskCounts;
  findings: Finding[];
  /** True when the run deadline expired before every record finished */
  timedOut: boolean;
  /** Records forced to Unknown because their stage was abandoned */
  forcedUnknown: number;
  generatedAt: Date;
}

/**
 * Result of the search stage
 */
export interface ResolvedSearch {
  session: SearchSession;
  records: LeakRecord[];
}

/**
 * Injectable clock so runs can be reproduced exactly
 */
export type Clock = () => Date;

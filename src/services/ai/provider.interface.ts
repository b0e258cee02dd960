/**
 * AI Provider Interface
 * Defines the contract for classification providers and the boundary that
 * turns their free text into the closed risk vocabulary
 */

import { z } from 'zod';
import { CREDENTIAL_KINDS, CredentialKind, RationaleTag, RiskLevel } from '../../types';
import { normalizeWhitespace, truncateText } from '../../utils/validation';

/**
 * Options for a single prompt
 */
export interface PromptOptions {
  maxTokens?: number;
  temperature?: number;
  timeout?: number;
  /** Instruction sent as the system message where the API has one */
  systemPrompt?: string;
  signal?: AbortSignal;
}

/**
 * AI Provider interface
 * All AI providers must implement this interface
 */
export interface AIProvider {
  /**
   * Provider name identifier
   */
  readonly name: string;

  /**
   * Model identifier being used
   */
  readonly model: string;

  /**
   * Send a raw prompt and get the response text
   */
  sendPrompt(prompt: string, options?: PromptOptions): Promise<string>;

  /**
   * Get provider health status
   */
  healthCheck(): Promise<ProviderHealth>;
}

/**
 * Provider health status
 */
export interface ProviderHealth {
  available: boolean;
  latencyMs?: number;
  lastError?: string;
  lastChecked: Date;
}

/** Risk levels a model may assign; Unknown is reserved for the core */
export type ModelRiskLevel = Exclude<RiskLevel, 'Unknown'>;

/**
 * Classification fields accepted from a model
 */
export interface ParsedClassification {
  risk: ModelRiskLevel;
  summary: string;
  credentialCount: number;
  credentialKinds: CredentialKind[];
}

export const MAX_SUMMARY_LENGTH = 200;
export const EMPTY_SUMMARY = 'no summary provided';

/**
 * Expected response shape. Extra fields are ignored.
 */
const ClassificationResponseSchema = z.object({
  risk_level: z.string(),
  summary: z.unknown().optional(),
  credentials: z.array(z.unknown()).optional(),
});

/**
 * Map a model-supplied risk level onto the closed vocabulary.
 * Only the exact words High, Medium and Low (any case, surrounding
 * whitespace ignored) are accepted.
 */
export function normalizeRiskLevel(value: unknown): ModelRiskLevel | null {
  if (typeof value !== 'string') return null;

  switch (value.trim().toLowerCase()) {
    case 'high':
      return 'High';
    case 'medium':
      return 'Medium';
    case 'low':
      return 'Low';
    default:
      return null;
  }
}

/**
 * Pull the JSON object out of a response that may wrap it in prose or a code fence
 */
export function extractJsonObject(responseText: string): string | null {
  let jsonText = responseText.trim();

  // Handle markdown code blocks
  const fenced = jsonText.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  if (fenced) {
    jsonText = fenced[1].trim();
  }

  if (jsonText.startsWith('{') && jsonText.endsWith('}')) {
    return jsonText;
  }

  const jsonMatch = jsonText.match(/\{[\s\S]*\}/);
  return jsonMatch ? jsonMatch[0] : null;
}

/**
 * Parse a model response. Returns null for anything outside the contract:
 * no JSON object, invalid JSON, or a risk level outside High/Medium/Low.
 */
export function parseClassificationResponse(responseText: string): ParsedClassification | null {
  const jsonText = extractJsonObject(responseText);
  if (!jsonText) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(jsonText);
  } catch {
    return null;
  }

  const parsed = ClassificationResponseSchema.safeParse(raw);
  if (!parsed.success) return null;

  const risk = normalizeRiskLevel(parsed.data.risk_level);
  if (!risk) return null;

  return {
    risk,
    summary: toOneLine(parsed.data.summary),
    credentialCount: parsed.data.credentials?.length ?? 0,
    credentialKinds: credentialKindsOf(parsed.data.credentials ?? []),
  };
}

const CredentialEntrySchema = z.object({ kind: z.string() });

/**
 * Distinct kinds of the listed credentials. Only the kind is read; accounts and values are dropped here.
 */
export function credentialKindsOf(entries: unknown[]): CredentialKind[] {
  const seen = new Set<CredentialKind>();

  for (const entry of entries) {
    const parsed = CredentialEntrySchema.safeParse(entry);
    const kind = parsed.success ? parsed.data.kind.trim().toLowerCase() : '';
    seen.add(CREDENTIAL_KINDS.find(known => known === kind) ?? 'other');
  }

  return CREDENTIAL_KINDS.filter(kind => seen.has(kind));
}

/**
 * Reduce a summary to a single bounded line
 */
export function toOneLine(summary: unknown, maxLength = MAX_SUMMARY_LENGTH): string {
  const text = typeof summary === 'string' ? normalizeWhitespace(summary) : '';
  return text ? truncateText(text, maxLength) : EMPTY_SUMMARY;
}

const TAG_KEYWORDS: Array<[RationaleTag, RegExp]> = [
  ['credentials', /\b(credential|password|passwd|login|username|api[ _-]?key|token|secret)s?\b/i],
  ['pii', /\b(pii|personal|phone|address|ssn|social security|date of birth|dob|passport|national id)\b/i],
  ['hashes', /\b(hash|hashes|hashed|bcrypt|md5|sha-?1|sha-?256|ntlm)\b/i],
  ['financial', /\b(credit card|card number|iban|bank|payment|financial)\b/i],
  ['config-only', /\b(config|configuration|settings|env file|\.env)\b/i],
];

/**
 * Best-effort advisory tags from keywords in a summary
 */
export function extractRationaleTags(summary: string, credentialCount = 0): RationaleTag[] {
  const tags = TAG_KEYWORDS.filter(([, pattern]) => pattern.test(summary)).map(([tag]) => tag);

  if (credentialCount > 0 && !tags.includes('credentials')) {
    tags.unshift('credentials');
  }

  return tags;
}

/**
 * Minimal round trip used by every provider's healthCheck
 */
export async function checkProviderHealth(provider: AIProvider): Promise<ProviderHealth> {
  const startTime = Date.now();

  try {
    await provider.sendPrompt('Reply with "ok"', { maxTokens: 10, timeout: 10000 });

    return {
      available: true,
      latencyMs: Date.now() - startTime,
      lastChecked: new Date(),
    };
  } catch (error) {
    return {
      available: false,
      latencyMs: Date.now() - startTime,
      lastError: error instanceof Error ? error.message : String(error),
      lastChecked: new Date(),
    };
  }
}

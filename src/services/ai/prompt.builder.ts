/**
 * Prompt Builder Service
 * Constructs leak-classification prompts for AI providers
 */

import { LeakRecord, Preview } from '../../types';

// Maximum characters of preview content sent to the model
export const MAX_PREVIEW_CHARS = 3000;

export const CLASSIFIER_SYSTEM_PROMPT = 'Output only valid JSON.';

/**
 * Build the classification prompt for one preview.
 * The output contract is fixed: risk_level must be exactly High, Medium or Low.
 */
export function buildLeakClassificationPrompt(preview: Preview, record?: LeakRecord): string {
  let content = preview.content;
  let truncationNote = preview.truncated ? '\n[... preview cut at the byte budget ...]' : '';

  if (content.length > MAX_PREVIEW_CHARS) {
    content = content.substring(0, MAX_PREVIEW_CHARS);
    truncationNote = '\n[... preview truncated for analysis ...]';
  }

  const recordSection = record
    ? `--- RECORD ---
SOURCE: ${record.source}
BUCKET: ${record.bucket || 'unknown'} (${record.visibility})
DECLARED SIZE: ${record.sizeBytes} bytes
DISCOVERED: ${record.discoveredAt ? record.discoveredAt.toISOString() : 'unknown'}

`
    : '';

  return `You are a senior security analyst triaging excerpts of leaked data found by a threat-intelligence search. Judge the real-world risk of the excerpt for the people and organization it exposes.

${recordSection}--- EXCERPT ---
${content}${truncationNote}

Classify the excerpt:
- High: working credentials (plaintext passwords, API keys, tokens, private keys) or sensitive personal data in bulk
- Medium: password hashes, internal configuration, or limited personal data
- Low: public or irrelevant content, noise, or nothing that exposes anyone

Return ONLY a JSON object in this format:
{
  "risk_level": "High" | "Medium" | "Low",
  "summary": "one line describing what the excerpt contains",
  "credentials": [{"account": "...", "kind": "password" | "hash" | "token"}]
}

risk_level must be exactly one of High, Medium or Low. List each exposed credential by account and kind only, never its value. If there are none, return an empty list.`;
}

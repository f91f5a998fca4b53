/**
 * Declarative rule table for the content scrubber.
 *
 * Keys are compared after normalizeKey(), so "Matched_Keywords",
 * "matchedKeywords" and "matched-keywords" all hit the same rule.
 */
export type ScrubRules = {
  rawTextKeys: ReadonlySet<string>;
  derivedExactKeys: ReadonlySet<string>;
  derivedPrefixes: readonly string[];
  signalSubstrings: readonly string[];
  maxStringChars: number;
  maxListItems: number;
  maxObjectKeys: number;
  maxDepth: number;
};

export const SCRUB_RULES: ScrubRules = {
  rawTextKeys: new Set([
    "text",
    "input_text",
    "original",
    "normalized",
    "repaired_text",
    "raw_ai_output",
    "llm_raw_output",
    "llm_raw_response",
    "prompt",
    "messages",
    "completion",
    "response_text",
    "content",
  ]),
  derivedExactKeys: new Set([
    "oos_matched",
    "lexicon_hits",
    "pattern_hits",
    "spans",
    "entities",
    "phrases",
  ]),
  derivedPrefixes: ["matched", "keywords", "trigger", "detected_"],
  signalSubstrings: [
    "text",
    "content",
    "message",
    "prompt",
    "completion",
    "response",
    "utterance",
    "transcript",
    "input",
    "output",
    "matched",
    "keyword",
    "trigger",
    "lexicon",
    "pattern",
    "phrase",
  ],
  maxStringChars: 600,
  maxListItems: 80,
  maxObjectKeys: 120,
  maxDepth: 64,
};

export function normalizeKey(key: string): string {
  return key
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/[^A-Za-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .toLowerCase();
}

export function isRawTextKey(normalized: string, rules: ScrubRules = SCRUB_RULES): boolean {
  return rules.rawTextKeys.has(normalized);
}

export function isContentDerivedKey(normalized: string, rules: ScrubRules = SCRUB_RULES): boolean {
  if (rules.derivedExactKeys.has(normalized)) return true;
  return rules.derivedPrefixes.some((prefix) => normalized.startsWith(prefix));
}

export function hasSignalSubstring(normalized: string, rules: ScrubRules = SCRUB_RULES): boolean {
  return rules.signalSubstrings.some((signal) => normalized.includes(signal));
}

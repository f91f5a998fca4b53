import type { Verdict } from "../contracts/verdict";
import { parseVerdict, type DecisionEngine } from "./decision_engine";

export type FakeVerdictFn = (text: string) => unknown;

const defaultVerdict: FakeVerdictFn = (text) => ({
  freq_type: "Neutral",
  mode: "no-op",
  confidence: { final: 0.5, classifier: 0.5 },
  output: {
    scenario: "general",
    repaired_text: `[no-op] Stub verdict: received ${Array.from(text).length} chars.`,
  },
  safety: { flag: "none", confidence: 0 },
  llm_used: false,
  cache_hit: false,
  model: "fake-engine",
  usage: {},
  audit: {},
  metrics: {},
  output_source: "fake",
  pipeline_version_fingerprint: "fake-engine-v0",
});

/**
 * Deterministic in-process engine for development and tests.
 * Replies go through the same verdict parsing as the HTTP client.
 */
export class FakeDecisionEngine implements DecisionEngine {
  readonly kind = "fake" as const;
  calls = 0;

  constructor(private readonly reply: FakeVerdictFn = defaultVerdict) {}

  async evaluate(text: string): Promise<Verdict> {
    this.calls += 1;
    return parseVerdict(this.reply(text));
  }
}

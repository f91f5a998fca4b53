import { randomUUID } from "node:crypto";

import type {
  AnalysisEvent,
  AnalysisEventMetadata,
  EvidenceRecord,
  FeedbackEvent,
} from "../contracts/evidence";
import type { FeedbackRequest } from "../contracts/analyze";

type EventClock = {
  now?: () => Date;
  newId?: () => string;
};

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) deepFreeze(child);
  }
  return value;
}

/**
 * One immutable event per analyzed request. Carries the input fingerprint, never the text.
 */
export function createAnalysisEvent(
  args: { evidence: EvidenceRecord; metadata: AnalysisEventMetadata; salted: boolean },
  clock: EventClock = {}
): AnalysisEvent {
  return deepFreeze({
    id: (clock.newId ?? randomUUID)(),
    timestamp: (clock.now?.() ?? new Date()).toISOString(),
    input: {
      fingerprint_sha256: args.evidence.input_fp_sha256,
      length: args.evidence.input_length,
      salted: args.salted,
    },
    evidence: args.evidence,
    metadata: args.metadata,
  });
}

export function createFeedbackEvent(feedback: FeedbackRequest, clock: EventClock = {}): FeedbackEvent {
  return deepFreeze({
    id: (clock.newId ?? randomUUID)(),
    timestamp: (clock.now?.() ?? new Date()).toISOString(),
    target_log_id: feedback.log_id,
    feedback: {
      accuracy: feedback.accuracy,
      helpful: feedback.helpful,
      accepted: feedback.accepted,
    },
  });
}

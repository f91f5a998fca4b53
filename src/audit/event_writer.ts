import type { AnalysisEvent, FeedbackEvent } from "../contracts/evidence";
import { errorMessage } from "../errors";
import type { AuditLogger } from "../logging/logger";
import { scrub } from "../privacy/scrub";
import type { EventStore, EventStoreKind } from "../store/event_store";

export type AuditEventKind = "analysis" | "feedback";

export type WriteOutcome = {
  status: "written" | "failed" | "skipped";
  path: string;
  store: EventStoreKind;
  error?: string;
};

export type WriterCounters = {
  written: number;
  failed: number;
  skipped: number;
};

export function eventPath(prefix: string, kind: AuditEventKind, id: string, timestamp: string): string {
  const date = new Date(timestamp);
  const day = Number.isNaN(date.getTime()) ? new Date() : date;
  const yyyy = String(day.getUTCFullYear());
  const mm = String(day.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(day.getUTCDate()).padStart(2, "0");
  const parts = [prefix.replace(/^\/+|\/+$/g, ""), kind, yyyy, mm, dd, `${id}.json`];
  return parts.filter((part) => part.length > 0).join("/");
}

/**
 * Writes each audit event to the configured store exactly once.
 * The payload is scrubbed again right before serialization. Never rejects; failures come back as outcomes.
 */
export class EventWriter {
  private readonly store: EventStore;
  private readonly prefix: string;
  private readonly log: AuditLogger;
  private readonly counts: WriterCounters = { written: 0, failed: 0, skipped: 0 };

  constructor(opts: { store: EventStore; prefix?: string; log: AuditLogger }) {
    this.store = opts.store;
    this.prefix = opts.prefix ?? "logs";
    this.log = opts.log;
  }

  get storeKind(): EventStoreKind {
    return this.store.kind;
  }

  get enabled(): boolean {
    return this.store.enabled;
  }

  counters(): WriterCounters {
    return { ...this.counts };
  }

  writeAnalysis(event: AnalysisEvent): Promise<WriteOutcome> {
    return this.write("analysis", event.id, event.timestamp, event);
  }

  writeFeedback(event: FeedbackEvent): Promise<WriteOutcome> {
    return this.write("feedback", event.id, event.timestamp, event);
  }

  private async write(kind: AuditEventKind, id: string, timestamp: string, event: unknown): Promise<WriteOutcome> {
    const path = eventPath(this.prefix, kind, id, timestamp);

    if (!this.store.enabled) {
      this.counts.skipped += 1;
      return { status: "skipped", path, store: this.store.kind };
    }

    try {
      const body = `${JSON.stringify(scrub(event), null, 2)}\n`;
      await this.store.put({ path, body, message: `audit: ${kind} ${id}` });
      this.counts.written += 1;
      this.log.debug?.({ evt: "audit.written", kind, path, store: this.store.kind }, "audit.written");
      return { status: "written", path, store: this.store.kind };
    } catch (error) {
      const message = errorMessage(error);
      this.counts.failed += 1;
      this.log.warn(
        { evt: "audit.write_failed", kind, path, store: this.store.kind, error: message },
        "audit.write_failed"
      );
      return { status: "failed", path, store: this.store.kind, error: message };
    }
  }
}

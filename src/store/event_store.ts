export type EventStoreKind = "github" | "sqlite" | "memory" | "none";

export type PutObjectArgs = {
  path: string;
  body: string;
  message: string;
};

/**
 * Write-once object store for audit events. One `put` per event; implementations
 * throw `EventStoreWriteError` on failure and never retry.
 */
export interface EventStore {
  readonly kind: EventStoreKind;
  readonly enabled: boolean;
  put(args: PutObjectArgs): Promise<void>;
  // Stores holding a connection release it here.
  close?(): void;
}

export type StoredObject = {
  path: string;
  body: string;
  message: string;
  createdAt: string;
};

export const DEFAULT_MEMORY_STORE_MAX_OBJECTS = 1000;

/**
 * In-process store holding the most recent `maxObjects` events; the oldest are evicted first.
 */
export class MemoryEventStore implements EventStore {
  readonly kind = "memory" as const;
  readonly enabled = true;
  readonly maxObjects: number;
  private objects = new Map<string, StoredObject>();

  constructor(opts: { maxObjects?: number } = {}) {
    this.maxObjects = Math.max(1, Math.floor(opts.maxObjects ?? DEFAULT_MEMORY_STORE_MAX_OBJECTS));
  }

  async put(args: PutObjectArgs): Promise<void> {
    this.objects.delete(args.path);
    this.objects.set(args.path, { ...args, createdAt: new Date().toISOString() });

    for (const oldest of this.objects.keys()) {
      if (this.objects.size <= this.maxObjects) break;
      this.objects.delete(oldest);
    }
  }

  get(path: string): StoredObject | null {
    return this.objects.get(path) ?? null;
  }

  list(prefix = ""): StoredObject[] {
    return [...this.objects.values()].filter((obj) => obj.path.startsWith(prefix));
  }

  get size(): number {
    return this.objects.size;
  }
}

/**
 * Selected when no store is configured; the writer reports every event as skipped.
 */
export class DisabledEventStore implements EventStore {
  readonly kind = "none" as const;
  readonly enabled = false;

  async put(): Promise<void> {
    throw new Error("event store disabled");
  }
}

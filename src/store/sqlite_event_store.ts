import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

import { EventStoreWriteError, errorMessage } from "../errors";
import type { EventStore, PutObjectArgs, StoredObject } from "./event_store";

type AuditObjectRow = {
  path: string;
  body: string;
  message: string;
  created_at: string;
};

/**
 * Local append-only journal of audit objects, keyed by path.
 */
export class SqliteEventStore implements EventStore {
  readonly kind = "sqlite" as const;
  readonly enabled = true;
  private db: Database.Database;

  constructor(dbPath: string = "./data/audit.db") {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.initSchema();
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS audit_objects (
        path TEXT PRIMARY KEY,
        body TEXT NOT NULL,
        message TEXT NOT NULL,
        created_at TEXT NOT NULL
      );
    `);
  }

  async put(args: PutObjectArgs): Promise<void> {
    try {
      const stmt = this.db.prepare<[string, string, string, string]>(`
        INSERT INTO audit_objects (path, body, message, created_at)
        VALUES (?, ?, ?, ?)
      `);
      stmt.run(args.path, args.body, args.message, new Date().toISOString());
    } catch (error) {
      throw new EventStoreWriteError(`sqlite ${errorMessage(error)}`, { store: this.kind });
    }
  }

  get(path: string): StoredObject | null {
    const row = this.db
      .prepare<[string], AuditObjectRow>("SELECT path, body, message, created_at FROM audit_objects WHERE path = ?")
      .get(path);
    return row ? toStoredObject(row) : null;
  }

  list(prefix = ""): StoredObject[] {
    return this.db
      .prepare<[number, string], AuditObjectRow>(
        "SELECT path, body, message, created_at FROM audit_objects WHERE substr(path, 1, ?) = ? ORDER BY path"
      )
      .all(prefix.length, prefix)
      .map(toStoredObject);
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}

const toStoredObject = (row: AuditObjectRow): StoredObject => ({
  path: row.path,
  body: row.body,
  message: row.message,
  createdAt: row.created_at,
});

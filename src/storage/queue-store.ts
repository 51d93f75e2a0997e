/**
 * Durable storage for queued writes.
 *
 * The SQLite implementation keeps one row per outstanding write in the
 * `write_queue` table. Rows are read back in enqueue order.
 */

import { mkdirSync } from "node:fs";
import { join } from "node:path";
import Database from "libsql";
import { z } from "zod";
import { type Logger, defaultLogger } from "../lib/logger.ts";
import { type QueuedWriteRecord, queuedWriteRecordSchema } from "../lib/types.ts";

export interface PersistentQueueStore {
  /** Insert or replace a record. Resolves only once the write is on disk. */
  put(record: QueuedWriteRecord): Promise<void>;
  /** Insert or replace several records in one transaction. */
  putAll(records: QueuedWriteRecord[]): Promise<void>;
  /** All records, oldest first. */
  getAll(): Promise<QueuedWriteRecord[]>;
  remove(id: string): Promise<void>;
  close(): void;
}

export const QUEUE_DB_FILE = "ledger-sync.db";
export const QUEUE_CONTAINER = "write_queue";

export interface SqliteQueueStoreOptions {
  /** Database file name inside dataDir, or ":memory:". */
  fileName?: string;
  logger?: Logger;
}

export class SqliteQueueStore implements PersistentQueueStore {
  private db: Database.Database;
  private logger: Logger;
  private closed = false;

  constructor(dataDir: string, options: SqliteQueueStoreOptions = {}) {
    const fileName = options.fileName ?? QUEUE_DB_FILE;
    this.logger = (options.logger ?? defaultLogger).child({ component: "queue-store" });

    let dbPath = fileName;
    if (fileName !== ":memory:") {
      mkdirSync(dataDir, { recursive: true });
      dbPath = join(dataDir, fileName);
    }

    this.db = new Database(dbPath);
    this.db.exec("PRAGMA journal_mode = WAL");
    // Every commit fsyncs the WAL before returning
    this.db.exec("PRAGMA synchronous = FULL");

    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${QUEUE_CONTAINER} (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        status TEXT NOT NULL,
        record TEXT NOT NULL,
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);
    this.db.exec(
      `CREATE INDEX IF NOT EXISTS idx_${QUEUE_CONTAINER}_status ON ${QUEUE_CONTAINER}(status)`,
    );
  }

  private upsert(record: QueuedWriteRecord): void {
    const stmt = this.db.prepare(`
      INSERT INTO ${QUEUE_CONTAINER} (id, status, record) VALUES (?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        status = excluded.status,
        record = excluded.record,
        updated_at = datetime('now')
    `);
    stmt.run(record.id, record.status, JSON.stringify(record));
  }

  async put(record: QueuedWriteRecord): Promise<void> {
    this.upsert(record);
  }

  async putAll(records: QueuedWriteRecord[]): Promise<void> {
    const insertMany = this.db.transaction((batch: QueuedWriteRecord[]) => {
      for (const record of batch) {
        this.upsert(record);
      }
    });
    insertMany(records);
  }

  async getAll(): Promise<QueuedWriteRecord[]> {
    const rows = queueRowsSchema.parse(
      this.db.prepare(`SELECT id, record FROM ${QUEUE_CONTAINER} ORDER BY seq`).all(),
    );

    const records: QueuedWriteRecord[] = [];
    for (const row of rows) {
      const record = parseRecord(row.record);
      if (record) {
        records.push(record);
      } else {
        this.logger.error({ recordId: row.id }, "Skipping unreadable queue record");
      }
    }
    return records;
  }

  async remove(id: string): Promise<void> {
    this.db.prepare(`DELETE FROM ${QUEUE_CONTAINER} WHERE id = ?`).run(id);
  }

  close(): void {
    if (!this.closed) {
      this.closed = true;
      this.db.close();
    }
  }
}

const queueRowsSchema = z.array(z.object({ id: z.string(), record: z.string() }));

function parseRecord(raw: string): QueuedWriteRecord | null {
  try {
    const result = queuedWriteRecordSchema.safeParse(JSON.parse(raw));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

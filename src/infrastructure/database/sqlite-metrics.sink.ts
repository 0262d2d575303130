import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { ExtractionRecord } from "../../core/domain/entities/extraction-record.entity.js";
import type { IMetricsSink } from "../../core/domain/repositories/metrics-store.repository.js";

const IN_MEMORY = ":memory:";

/**
 * SQLite flush target: one row per record, full record kept as a JSON
 * document in `data`. Rows are only ever inserted.
 */
export class SqliteMetricsSink implements IMetricsSink {
  readonly name = "SqliteMetricsSink";
  private _db: Database.Database | null = null;

  constructor(private dbPath: string) {}

  private getDb() {
    if (this._db) return this._db;
    if (this.dbPath !== IN_MEMORY) {
      mkdirSync(dirname(this.dbPath), { recursive: true });
    }
    this._db = new Database(this.dbPath);
    this._db.pragma("journal_mode = DELETE");
    this._db.pragma("synchronous = FULL");
    this._db.exec(`
      CREATE TABLE IF NOT EXISTS tbl_extraction_records (
        id        INTEGER PRIMARY KEY,
        createdAt TEXT NOT NULL,
        data      TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_extraction_records_createdAt
        ON tbl_extraction_records(createdAt);
    `);
    return this._db;
  }

  async write(record: ExtractionRecord): Promise<void> {
    this.getDb()
      .prepare(
        "INSERT INTO tbl_extraction_records (id, createdAt, data) VALUES (?, ?, ?)",
      )
      .run(record.id, record.createdAt, JSON.stringify(record));
  }

  /** Stored documents in id order. */
  readAll(): ExtractionRecord[] {
    const rows = this.getDb()
      .prepare("SELECT data FROM tbl_extraction_records ORDER BY id ASC")
      .all() as Array<{ data: string }>;
    return rows.map((r) => JSON.parse(r.data) as ExtractionRecord);
  }

  async close(): Promise<void> {
    if (this._db) {
      this._db.close();
      this._db = null;
    }
  }
}

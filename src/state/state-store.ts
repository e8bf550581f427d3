/**
 * State Store
 * Durable map from document key to the record of its last successful conversion
 */

import Database from "better-sqlite3";
import type BetterSqlite3 from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import type { DocumentRecord } from "../types";

interface DocumentRow {
  key: string;
  source_digest: string;
  artifact_digest: string;
  fingerprint: string;
  converted_at: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS document_state (
    key TEXT PRIMARY KEY,
    source_digest TEXT NOT NULL,
    artifact_digest TEXT NOT NULL,
    fingerprint TEXT NOT NULL,
    converted_at TEXT NOT NULL
  )
`;

/**
 * One connection per worker. SQLite file locking (WAL + busy timeout) makes
 * concurrent upserts from separate processes and threads safe.
 */
export class StateStore {
  private readonly db: BetterSqlite3.Database;
  private readonly selectStmt: BetterSqlite3.Statement<[string], DocumentRow>;
  private readonly upsertStmt: BetterSqlite3.Statement<[DocumentRow]>;
  private readonly countStmt: BetterSqlite3.Statement<[], { total: number }>;
  private closed = false;

  constructor(readonly path: string) {
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }

    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(SCHEMA);

    this.selectStmt = this.db.prepare<[string], DocumentRow>(
      "SELECT key, source_digest, artifact_digest, fingerprint, converted_at FROM document_state WHERE key = ?",
    );
    this.upsertStmt = this.db.prepare<[DocumentRow]>(`
      INSERT INTO document_state (key, source_digest, artifact_digest, fingerprint, converted_at)
      VALUES (@key, @source_digest, @artifact_digest, @fingerprint, @converted_at)
      ON CONFLICT(key) DO UPDATE SET
        source_digest = excluded.source_digest,
        artifact_digest = excluded.artifact_digest,
        fingerprint = excluded.fingerprint,
        converted_at = excluded.converted_at
    `);
    this.countStmt = this.db.prepare<[], { total: number }>(
      "SELECT COUNT(*) AS total FROM document_state",
    );
  }

  get(key: string): DocumentRecord | undefined {
    const row = this.selectStmt.get(key);
    if (!row) return undefined;

    return {
      key: row.key,
      sourceDigest: row.source_digest,
      artifactDigest: row.artifact_digest,
      fingerprint: row.fingerprint,
      convertedAt: new Date(row.converted_at),
    };
  }

  /**
   * Insert or replace the record for `record.key`; last write wins
   */
  upsert(record: DocumentRecord): void {
    this.upsertStmt.run({
      key: record.key,
      source_digest: record.sourceDigest,
      artifact_digest: record.artifactDigest,
      fingerprint: record.fingerprint,
      converted_at: record.convertedAt.toISOString(),
    });
  }

  /**
   * Remove every record; returns how many were deleted
   */
  deleteAll(): number {
    return this.db.prepare("DELETE FROM document_state").run().changes;
  }

  count(): number {
    return this.countStmt.get()?.total ?? 0;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }
}

/**
 * Migration 002: applied pattern writes.
 *
 * Records every write id folded into memory_records so a write that is
 * replayed from the fallback queue after its original call timed out (but
 * still landed) is applied only once.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const migration002PatternWriteLedger: Migration = {
  version: 2,
  name: '002-pattern-write-ledger',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS memory_applied_writes (
        write_id   TEXT PRIMARY KEY,
        record_id  TEXT NOT NULL REFERENCES memory_records(id) ON DELETE CASCADE,
        applied_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_memory_applied_writes_record ON memory_applied_writes(record_id);
    `)
  },
}

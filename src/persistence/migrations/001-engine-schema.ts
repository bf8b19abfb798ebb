/**
 * Migration 001: engine schema.
 *
 * Creates the per-project tables (projects, tasks, signal log), the shared
 * pattern store (memory records + tag index) and the review / intent /
 * escalation / instruction-outbox tables.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const migration001EngineSchema: Migration = {
  version: 1,
  name: '001-engine-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS projects (
        namespace          TEXT PRIMARY KEY,
        goal               TEXT NOT NULL,
        current_phase      TEXT NOT NULL,
        status             TEXT NOT NULL DEFAULT 'active'
                             CHECK(status IN ('active','paused','completed','cancelled')),
        phase_history_json TEXT NOT NULL DEFAULT '[]',
        created_at         TEXT NOT NULL,
        updated_at         TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS tasks (
        id                TEXT PRIMARY KEY,
        namespace         TEXT NOT NULL REFERENCES projects(namespace),
        phase             TEXT NOT NULL,
        worker_name       TEXT NOT NULL,
        status            TEXT NOT NULL DEFAULT 'pending'
                            CHECK(status IN ('pending','in-progress','completed','failed')),
        dependencies_json TEXT NOT NULL DEFAULT '[]',
        created_at        TEXT NOT NULL,
        updated_at        TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tasks_namespace_phase ON tasks(namespace, phase);

      CREATE TABLE IF NOT EXISTS signal_log (
        id                 INTEGER PRIMARY KEY AUTOINCREMENT,
        namespace          TEXT NOT NULL,
        signal_id          TEXT NOT NULL,
        phase              TEXT NOT NULL,
        worker_name        TEXT NOT NULL,
        artifact_refs_json TEXT NOT NULL,
        outcome            TEXT NOT NULL DEFAULT 'received',
        signal_timestamp   TEXT NOT NULL,
        received_at        TEXT NOT NULL,
        UNIQUE(namespace, signal_id)
      );

      CREATE TABLE IF NOT EXISTS memory_records (
        id               TEXT PRIMARY KEY,
        namespace        TEXT,
        pattern_text     TEXT NOT NULL,
        confidence_score REAL NOT NULL CHECK(confidence_score >= 0 AND confidence_score <= 1),
        success_count    INTEGER NOT NULL DEFAULT 0,
        failure_count    INTEGER NOT NULL DEFAULT 0,
        embedding_json   TEXT NOT NULL,
        created_at       TEXT NOT NULL,
        updated_at       TEXT NOT NULL,
        last_used_at     TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_memory_records_updated ON memory_records(updated_at);

      CREATE TABLE IF NOT EXISTS memory_record_tags (
        record_id TEXT NOT NULL REFERENCES memory_records(id) ON DELETE CASCADE,
        tag       TEXT NOT NULL,
        PRIMARY KEY (record_id, tag)
      );

      CREATE INDEX IF NOT EXISTS idx_memory_record_tags_tag ON memory_record_tags(tag);

      CREATE TABLE IF NOT EXISTS triangulation_results (
        id               TEXT PRIMARY KEY,
        namespace        TEXT NOT NULL,
        artifact_ref     TEXT NOT NULL,
        phase            TEXT NOT NULL,
        consensus_score  REAL NOT NULL,
        passed           INTEGER NOT NULL,
        viewpoints_json  TEXT NOT NULL,
        conflicts_json   TEXT NOT NULL,
        created_at       TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS review_gate_results (
        id               TEXT PRIMARY KEY,
        namespace        TEXT NOT NULL,
        phase            TEXT NOT NULL,
        gate_name        TEXT NOT NULL,
        artifact_ref     TEXT NOT NULL,
        passed           INTEGER NOT NULL,
        score            REAL NOT NULL,
        issues_json      TEXT NOT NULL,
        retry_count      INTEGER NOT NULL,
        triangulation_id TEXT REFERENCES triangulation_results(id),
        created_at       TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_review_gate_results_ns ON review_gate_results(namespace, phase);

      CREATE TABLE IF NOT EXISTS review_progress (
        namespace          TEXT NOT NULL,
        phase              TEXT NOT NULL,
        artifact_ref       TEXT,
        gate_index         INTEGER NOT NULL DEFAULT 0,
        retry_counts_json  TEXT NOT NULL DEFAULT '{}',
        intent_modify_count INTEGER NOT NULL DEFAULT 0,
        updated_at         TEXT NOT NULL,
        PRIMARY KEY (namespace, phase)
      );

      CREATE TABLE IF NOT EXISTS intent_entries (
        id         TEXT PRIMARY KEY,
        namespace  TEXT NOT NULL,
        kind       TEXT NOT NULL CHECK(kind IN ('goal','anti-goal','constraint')),
        text       TEXT NOT NULL,
        normalized TEXT NOT NULL,
        source     TEXT NOT NULL CHECK(source IN ('explicit','inferred','custom-answer')),
        confidence REAL NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        UNIQUE(namespace, kind, normalized)
      );

      CREATE TABLE IF NOT EXISTS escalations (
        id              TEXT PRIMARY KEY,
        namespace       TEXT NOT NULL,
        phase           TEXT NOT NULL,
        kind            TEXT NOT NULL CHECK(kind IN ('gate','intent')),
        gate_name       TEXT,
        reason          TEXT NOT NULL,
        status          TEXT NOT NULL DEFAULT 'open' CHECK(status IN ('open','approved','rejected')),
        resolution_note TEXT,
        created_at      TEXT NOT NULL,
        resolved_at     TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_escalations_status ON escalations(status);

      CREATE TABLE IF NOT EXISTS instructions (
        id           TEXT PRIMARY KEY,
        namespace    TEXT NOT NULL,
        phase        TEXT NOT NULL,
        worker_name  TEXT NOT NULL,
        tier         TEXT NOT NULL,
        kind         TEXT NOT NULL CHECK(kind IN ('work','remediation')),
        task_id      TEXT,
        payload_json TEXT NOT NULL,
        status       TEXT NOT NULL DEFAULT 'queued' CHECK(status IN ('queued','delivered')),
        created_at   TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_instructions_status ON instructions(status, created_at);
    `)
  },
}

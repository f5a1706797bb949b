import { createRequire } from 'module';
import { readFileSync, writeFileSync, existsSync } from 'fs';
import type { Database, SqlJsStatic, SqlValue } from 'sql.js';
import { config } from './config.js';
import type { Result } from './errors.js';
import type { JsonObject, JsonValue } from './types.js';

// sql.js is a CommonJS module; use createRequire to import it in ESM
const require = createRequire(import.meta.url);
const initSqlJs = require('sql.js') as (config?: object) => Promise<SqlJsStatic>;

export type Row = Record<string, SqlValue>;

let _db: Database | null = null;
let _in_transaction = false;

const MEMORY_PATH = ':memory:';

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS interviewer_availability (
  interviewer_id      TEXT    PRIMARY KEY,
  weekdays            TEXT    NOT NULL,
  start_time          TEXT    NOT NULL,
  end_time            TEXT    NOT NULL,
  buffer_minutes      INTEGER NOT NULL DEFAULT 15,
  max_per_day         INTEGER NOT NULL DEFAULT 5,
  blackout_dates      TEXT    NOT NULL DEFAULT '[]',
  utc_offset_minutes  INTEGER NOT NULL DEFAULT 0,
  updated_at          INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS interviews (
  id                     INTEGER PRIMARY KEY AUTOINCREMENT,
  candidate_id           TEXT    NOT NULL,
  interviewer_id         TEXT    NOT NULL,
  created_by             TEXT    NOT NULL,
  title                  TEXT,
  position               TEXT,
  interview_type         TEXT    NOT NULL,
  status                 TEXT    NOT NULL DEFAULT 'scheduled',
  scheduled_time         INTEGER NOT NULL,
  duration_minutes       INTEGER NOT NULL,
  round_number           INTEGER NOT NULL DEFAULT 1,
  room_id                TEXT    NOT NULL UNIQUE,
  meeting_url            TEXT    NOT NULL,
  actual_start_time      INTEGER,
  actual_end_time        INTEGER,
  interviewer_joined_at  INTEGER,
  candidate_joined_at    INTEGER,
  recording_enabled      INTEGER NOT NULL DEFAULT 1,
  code_editor_enabled    INTEGER NOT NULL DEFAULT 0,
  whiteboard_enabled     INTEGER NOT NULL DEFAULT 0,
  programming_languages  TEXT    NOT NULL DEFAULT '[]',
  evaluation_criteria    TEXT,
  recording_url          TEXT,
  cancellation_reason    TEXT,
  rescheduled_from_id    INTEGER REFERENCES interviews(id) ON DELETE SET NULL,
  created_at             INTEGER NOT NULL,
  updated_at             INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS evaluations (
  id                 INTEGER PRIMARY KEY AUTOINCREMENT,
  interview_id       INTEGER NOT NULL REFERENCES interviews(id) ON DELETE CASCADE,
  evaluator_id       TEXT    NOT NULL,
  technical_skills   INTEGER NOT NULL,
  problem_solving    INTEGER NOT NULL,
  communication      INTEGER NOT NULL,
  cultural_fit       INTEGER NOT NULL,
  overall_rating     INTEGER NOT NULL,
  recommendation     TEXT    NOT NULL,
  strengths          TEXT,
  weaknesses         TEXT,
  detailed_feedback  TEXT,
  notes              TEXT,
  custom_ratings     TEXT,
  submitted_at       INTEGER NOT NULL,
  updated_at         INTEGER NOT NULL,
  UNIQUE (interview_id, evaluator_id)
);

CREATE TABLE IF NOT EXISTS reschedule_requests (
  id                INTEGER PRIMARY KEY AUTOINCREMENT,
  interview_id      INTEGER NOT NULL REFERENCES interviews(id) ON DELETE CASCADE,
  requested_by      TEXT    NOT NULL,
  reason            TEXT    NOT NULL,
  proposed_times    TEXT    NOT NULL,
  status            TEXT    NOT NULL DEFAULT 'pending',
  chosen_time       INTEGER,
  new_interview_id  INTEGER,
  created_at        INTEGER NOT NULL,
  resolved_at       INTEGER
);

CREATE TABLE IF NOT EXISTS interview_recordings (
  id                INTEGER PRIMARY KEY AUTOINCREMENT,
  interview_id      INTEGER NOT NULL REFERENCES interviews(id) ON DELETE CASCADE,
  status            TEXT    NOT NULL DEFAULT 'recording',
  duration_seconds  INTEGER,
  file_size_bytes   INTEGER,
  video_url         TEXT,
  failure_reason    TEXT,
  started_at        INTEGER NOT NULL,
  ended_at          INTEGER,
  created_at        INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS code_snapshots (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  interview_id  INTEGER NOT NULL REFERENCES interviews(id) ON DELETE CASCADE,
  language      TEXT    NOT NULL,
  code          TEXT    NOT NULL,
  author_id     TEXT    NOT NULL,
  created_at    INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS whiteboard_snapshots (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  interview_id  INTEGER NOT NULL REFERENCES interviews(id) ON DELETE CASCADE,
  data          TEXT    NOT NULL,
  image_url     TEXT,
  created_at    INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS sent_reminders (
  interview_id  INTEGER PRIMARY KEY REFERENCES interviews(id) ON DELETE CASCADE,
  sent_at       INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS user_prefs (
  user_id  TEXT PRIMARY KEY,
  lang     TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_interviews_interviewer ON interviews(interviewer_id, scheduled_time);
CREATE INDEX IF NOT EXISTS idx_interviews_candidate   ON interviews(candidate_id);
CREATE INDEX IF NOT EXISTS idx_interviews_status      ON interviews(status);
CREATE INDEX IF NOT EXISTS idx_evaluations_interview  ON evaluations(interview_id);
CREATE INDEX IF NOT EXISTS idx_reschedule_interview   ON reschedule_requests(interview_id);
CREATE INDEX IF NOT EXISTS idx_recordings_interview   ON interview_recordings(interview_id);
CREATE UNIQUE INDEX IF NOT EXISTS idx_recordings_one_active
  ON interview_recordings(interview_id) WHERE status IN ('recording', 'processing');
CREATE INDEX IF NOT EXISTS idx_code_snapshots_interview       ON code_snapshots(interview_id);
CREATE INDEX IF NOT EXISTS idx_whiteboard_snapshots_interview ON whiteboard_snapshots(interview_id);
`;

export async function init_db(): Promise<void> {
  const SQL = await initSqlJs();

  if (config.db.path !== MEMORY_PATH && existsSync(config.db.path)) {
    const file_buffer = readFileSync(config.db.path);
    _db = new SQL.Database(file_buffer);
  } else {
    _db = new SQL.Database();
  }
  _in_transaction = false;

  _db.run('PRAGMA foreign_keys = ON');
  _db.run(SCHEMA_SQL);
  persist();
}

export function get_db(): Database {
  if (!_db) throw new Error('Database not initialized. Call init_db() first.');
  return _db;
}

function persist(): void {
  if (config.db.path === MEMORY_PATH) return;
  const db = get_db();
  writeFileSync(config.db.path, Buffer.from(db.export()));
  // export() reopens the database, which resets pragmas
  db.run('PRAGMA foreign_keys = ON');
}

// Helper: run a write statement and persist (deferred to COMMIT inside a transaction)
export function run(sql: string, params: SqlValue[] = []): void {
  get_db().run(sql, params);
  if (!_in_transaction) persist();
}

/** Runs an INSERT and returns the new row id. */
export function insert(sql: string, params: SqlValue[] = []): number {
  get_db().run(sql, params);
  // Read the id before persisting: export() reopens the database and forgets it
  const row = query_one('SELECT last_insert_rowid() AS id');
  if (!_in_transaction) persist();
  return row ? read_number(row, 'id') : 0;
}

export function query_all(sql: string, params: SqlValue[] = []): Row[] {
  const stmt = get_db().prepare(sql);
  try {
    stmt.bind(params);
    const rows: Row[] = [];
    while (stmt.step()) {
      rows.push(stmt.getAsObject());
    }
    return rows;
  } finally {
    stmt.free();
  }
}

export function query_one(sql: string, params: SqlValue[] = []): Row | null {
  const rows = query_all(sql, params);
  return rows[0] ?? null;
}

/**
 * Runs `fn` inside one SQLite transaction. sql.js executes synchronously, so
 * nothing else can touch the database between BEGIN and COMMIT. The
 * transaction commits only when `fn` returns an ok result; a failed result or a
 * thrown error rolls everything back.
 */
export function transact<T>(fn: () => Result<T>): Result<T> {
  if (_in_transaction) throw new Error('Nested transactions are not supported');
  const db = get_db();
  db.run('BEGIN IMMEDIATE');
  _in_transaction = true;
  let result: Result<T>;
  try {
    result = fn();
  } catch (err) {
    _in_transaction = false;
    db.run('ROLLBACK');
    throw err;
  }
  _in_transaction = false;
  if (!result.ok) {
    db.run('ROLLBACK');
    return result;
  }
  db.run('COMMIT');
  persist();
  return result;
}

// ─── Row readers ──────────────────────────────────────────────────────────────

export function read_number(row: Row, key: string): number {
  const value = row[key];
  if (typeof value !== 'number') throw new Error(`Column ${key} is not a number`);
  return value;
}

export function read_optional_number(row: Row, key: string): number | null {
  const value = row[key];
  if (value === null || value === undefined) return null;
  if (typeof value !== 'number') throw new Error(`Column ${key} is not a number`);
  return value;
}

export function read_string(row: Row, key: string): string {
  const value = row[key];
  if (typeof value !== 'string') throw new Error(`Column ${key} is not text`);
  return value;
}

export function read_optional_string(row: Row, key: string): string | null {
  const value = row[key];
  if (value === null || value === undefined) return null;
  if (typeof value !== 'string') throw new Error(`Column ${key} is not text`);
  return value;
}

export function read_boolean(row: Row, key: string): boolean {
  return read_number(row, key) !== 0;
}

export function read_enum<T extends string>(row: Row, key: string, allowed: readonly T[]): T {
  const value = read_string(row, key);
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) throw new Error(`Column ${key} holds unknown value "${value}"`);
  return match;
}

// ─── JSON columns ─────────────────────────────────────────────────────────────

export function is_json_value(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(is_json_value);
      return is_json_object(value);
    default:
      return false;
  }
}

export function is_json_object(value: unknown): value is JsonObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(is_json_value);
}

function safe_parse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function read_json_object(row: Row, key: string): JsonObject | null {
  const text = read_optional_string(row, key);
  if (text === null) return null;
  const parsed = safe_parse(text);
  return is_json_object(parsed) ? parsed : null;
}

export function read_string_array(row: Row, key: string): string[] {
  const parsed = safe_parse(read_string(row, key));
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((item): item is string => typeof item === 'string');
}

export function read_number_array(row: Row, key: string): number[] {
  const parsed = safe_parse(read_string(row, key));
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((item): item is number => typeof item === 'number');
}

export function read_number_record(row: Row, key: string): Record<string, number> | null {
  const parsed = read_json_object(row, key);
  if (!parsed) return null;
  const out: Record<string, number> = {};
  for (const [name, value] of Object.entries(parsed)) {
    if (typeof value === 'number') out[name] = value;
  }
  return out;
}

// ─── User preferences ─────────────────────────────────────────────────────────

export function get_user_lang(user_id: string): string | null {
  const row = query_one('SELECT lang FROM user_prefs WHERE user_id = ?', [user_id]);
  return row ? read_string(row, 'lang') : null;
}

export function set_user_lang(user_id: string, lang: string): void {
  run(
    'INSERT INTO user_prefs (user_id, lang) VALUES (?, ?) ON CONFLICT(user_id) DO UPDATE SET lang = excluded.lang',
    [user_id, lang],
  );
}

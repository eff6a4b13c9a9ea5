import Database from 'better-sqlite3';
import config from 'config';
import fs from 'node:fs';
import path from 'node:path';
import type { EventRecord, EventSeverity } from './types.js';
import type { SessionStore, SleepSessionRecord } from './sleep/sessionManager.js';
import { isSleepState, type TimelineEntry } from './sleep/stateMachine.js';

const IN_MEMORY = ':memory:';
const dbPath = config.get<string>('database.path');
if (dbPath !== IN_MEMORY) {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
}

const db = new Database(dbPath);

export const databasePath = dbPath === IN_MEMORY ? dbPath : path.resolve(dbPath);

db.exec(`
  CREATE TABLE IF NOT EXISTS events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    ts INTEGER NOT NULL,
    source TEXT NOT NULL,
    detector TEXT NOT NULL,
    severity TEXT NOT NULL,
    message TEXT NOT NULL,
    meta TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_events_ts ON events (ts);
  CREATE INDEX IF NOT EXISTS idx_events_detector ON events (detector);

  CREATE TABLE IF NOT EXISTS sleep_sessions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id TEXT NOT NULL UNIQUE,
    start_time INTEGER NOT NULL,
    end_time INTEGER NOT NULL,
    total_sleep_seconds INTEGER NOT NULL,
    wake_up_count INTEGER NOT NULL,
    quality_score INTEGER NOT NULL,
    deep_sleep_seconds INTEGER NOT NULL,
    light_sleep_seconds INTEGER NOT NULL,
    spasm_count INTEGER NOT NULL,
    avg_breathing_bpm REAL NOT NULL,
    timeline TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_sleep_sessions_start ON sleep_sessions (start_time);
`);

type EventRow = {
  id: number;
  ts: number;
  source: string;
  detector: string;
  severity: string;
  message: string;
  meta: string | null;
};

type SleepSessionRow = {
  id: number;
  session_id: string;
  start_time: number;
  end_time: number;
  total_sleep_seconds: number;
  wake_up_count: number;
  quality_score: number;
  deep_sleep_seconds: number;
  light_sleep_seconds: number;
  spasm_count: number;
  avg_breathing_bpm: number;
  timeline: string;
};

export type EventRecordWithId = EventRecord & { id: number };

export type StoredSleepSession = SleepSessionRecord & { rowId: number };

export interface ListEventsOptions {
  limit?: number;
  detector?: string;
}

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 1000;

const insertEventStatement = db.prepare<Omit<EventRow, 'id'>>(
  `INSERT INTO events (ts, source, detector, severity, message, meta)
   VALUES (@ts, @source, @detector, @severity, @message, @meta)`
);

const upsertSessionStatement = db.prepare<Omit<SleepSessionRow, 'id'>>(
  `INSERT INTO sleep_sessions (
     session_id, start_time, end_time, total_sleep_seconds, wake_up_count, quality_score,
     deep_sleep_seconds, light_sleep_seconds, spasm_count, avg_breathing_bpm, timeline
   ) VALUES (
     @session_id, @start_time, @end_time, @total_sleep_seconds, @wake_up_count, @quality_score,
     @deep_sleep_seconds, @light_sleep_seconds, @spasm_count, @avg_breathing_bpm, @timeline
   )
   ON CONFLICT(session_id) DO UPDATE SET
     start_time = excluded.start_time,
     end_time = excluded.end_time,
     total_sleep_seconds = excluded.total_sleep_seconds,
     wake_up_count = excluded.wake_up_count,
     quality_score = excluded.quality_score,
     deep_sleep_seconds = excluded.deep_sleep_seconds,
     light_sleep_seconds = excluded.light_sleep_seconds,
     spasm_count = excluded.spasm_count,
     avg_breathing_bpm = excluded.avg_breathing_bpm,
     timeline = excluded.timeline`
);

const sessionIdStatement = db.prepare<[string], { id: number }>(
  'SELECT id FROM sleep_sessions WHERE session_id = ?'
);

export function storeEvent(event: EventRecord) {
  insertEventStatement.run({
    ts: event.ts,
    source: event.source,
    detector: event.detector,
    severity: event.severity,
    message: event.message,
    meta: event.meta ? JSON.stringify(event.meta) : null
  });
}

export function listEvents(options: ListEventsOptions = {}): EventRecordWithId[] {
  const whereClause = options.detector ? 'WHERE detector = @detector' : '';
  const rows = db
    .prepare<{ detector?: string; limit: number }, EventRow>(
      `SELECT id, ts, source, detector, severity, message, meta
       FROM events
       ${whereClause}
       ORDER BY ts DESC, id DESC
       LIMIT @limit`
    )
    .all({
      ...(options.detector ? { detector: options.detector } : {}),
      limit: clampLimit(options.limit)
    });
  return rows.map(mapEventRow);
}

export function clearEvents() {
  db.prepare('DELETE FROM events').run();
}

export function storeSleepSession(record: SleepSessionRecord): number {
  upsertSessionStatement.run({
    session_id: record.id,
    start_time: record.startTime,
    end_time: record.endTime,
    total_sleep_seconds: record.totalSleepSeconds,
    wake_up_count: record.wakeUpCount,
    quality_score: record.qualityScore,
    deep_sleep_seconds: record.deepSleepSeconds,
    light_sleep_seconds: record.lightSleepSeconds,
    spasm_count: record.spasmCount,
    avg_breathing_bpm: record.avgBreathingBpm,
    timeline: JSON.stringify(record.stateTimeline)
  });
  const row = sessionIdStatement.get(record.id);
  if (!row) {
    throw new Error(`Sleep session ${record.id} was not stored`);
  }
  return row.id;
}

export function listSleepSessions(limit?: number): StoredSleepSession[] {
  const rows = db
    .prepare<[number], SleepSessionRow>(
      'SELECT * FROM sleep_sessions ORDER BY start_time DESC, id DESC LIMIT ?'
    )
    .all(clampLimit(limit));
  return rows.map(mapSessionRow);
}

export function getSleepSession(sessionId: string): StoredSleepSession | null {
  const row = db
    .prepare<[string], SleepSessionRow>('SELECT * FROM sleep_sessions WHERE session_id = ?')
    .get(sessionId);
  return row ? mapSessionRow(row) : null;
}

export function clearSleepSessions() {
  db.prepare('DELETE FROM sleep_sessions').run();
}

export const sessionStore: SessionStore = {
  saveSession(record) {
    storeSleepSession(record);
  }
};

function clampLimit(limit: number | undefined) {
  if (typeof limit !== 'number' || !Number.isFinite(limit) || limit <= 0) {
    return DEFAULT_LIMIT;
  }
  return Math.min(MAX_LIMIT, Math.floor(limit));
}

function mapEventRow(row: EventRow): EventRecordWithId {
  return {
    id: row.id,
    ts: row.ts,
    source: row.source,
    detector: row.detector,
    severity: toSeverity(row.severity),
    message: row.message,
    meta: parseMeta(row.meta)
  };
}

function mapSessionRow(row: SleepSessionRow): StoredSleepSession {
  return {
    rowId: row.id,
    id: row.session_id,
    startTime: row.start_time,
    endTime: row.end_time,
    totalSleepSeconds: row.total_sleep_seconds,
    wakeUpCount: row.wake_up_count,
    qualityScore: row.quality_score,
    deepSleepSeconds: row.deep_sleep_seconds,
    lightSleepSeconds: row.light_sleep_seconds,
    spasmCount: row.spasm_count,
    avgBreathingBpm: row.avg_breathing_bpm,
    stateTimeline: parseTimeline(row.timeline)
  };
}

function toSeverity(value: string): EventSeverity {
  return value === 'warning' || value === 'critical' ? value : 'info';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseMeta(raw: string | null): Record<string, unknown> | undefined {
  if (!raw) {
    return undefined;
  }
  const parsed: unknown = JSON.parse(raw);
  return isRecord(parsed) ? parsed : undefined;
}

function parseTimeline(raw: string): TimelineEntry[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    return [];
  }
  const entries: TimelineEntry[] = [];
  for (const item of parsed) {
    if (isRecord(item) && typeof item.ts === 'number' && isSleepState(item.state)) {
      entries.push({ ts: item.ts, state: item.state });
    }
  }
  return entries;
}

export default db;

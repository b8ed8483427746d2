import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { SCALAR_FIELDS } from './types.js';
import type { AppendResult, RecordSink, SensorRecord } from './types.js';

export const TABLE = 'sensor_data';

// Concurrent connections each hold a handle; writers wait for the lock this long
const BUSY_TIMEOUT_MS = 5000;

const COLUMNS = ['sessionID', 'timestamp', ...SCALAR_FIELDS] as const;

const INSERT_SQL =
  `INSERT INTO ${TABLE} (${COLUMNS.join(', ')}) ` +
  `VALUES (@sessionId, @timestamp, ${SCALAR_FIELDS.map((f) => `@${f}`).join(', ')})`;

export type DB = Database.Database;

/** Open (or create) the store and ensure the `sensor_data` table exists. */
export function initDb(path: string): DB {
  if (path !== ':memory:') mkdirSync(dirname(path), { recursive: true });
  const db = new Database(path, { timeout: BUSY_TIMEOUT_MS });
  db.pragma('journal_mode = WAL');
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${TABLE} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      sessionID INTEGER,
      timestamp TEXT,
      latitude REAL,
      longitude REAL,
      altitude REAL,
      accel_x REAL,
      accel_y REAL,
      accel_z REAL,
      gyro_x REAL,
      gyro_y REAL,
      gyro_z REAL,
      dac_1 REAL,
      dac_2 REAL,
      dac_3 REAL,
      dac_4 REAL
    );
  `);
  return db;
}

/** Prepare and return an insert statement for one reading. */
export function prepareInsert(db: DB): Database.Statement<[SensorRecord]> {
  return db.prepare<[SensorRecord]>(INSERT_SQL);
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/**
 * A connection's own handle on the store. Appends are single-row units of
 * work; failures are returned, never thrown.
 */
export class SqliteSink implements RecordSink {
  private readonly db: DB;
  private readonly insert: Database.Statement<[SensorRecord]>;

  constructor(db: DB) {
    this.db = db;
    this.insert = prepareInsert(db);
  }

  append(record: SensorRecord): AppendResult {
    try {
      this.insert.run(record);
      return { ok: true };
    } catch (e) {
      return { ok: false, error: toError(e) };
    }
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}

/** Open a dedicated sink against an already initialised store. */
export function openSink(path: string): SqliteSink {
  const db = new Database(path, { timeout: BUSY_TIMEOUT_MS, fileMustExist: true });
  return new SqliteSink(db);
}

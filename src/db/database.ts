import Database from 'better-sqlite3';
import { config } from '../config.js';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('db');

let _db: Database.Database | null = null;

export function getDb(): Database.Database {
  if (!_db) {
    _db = openDatabase(config.db.path);
    log.info({ path: config.db.path }, 'Database initialized');
  }
  return _db;
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

/** 독립 연결 (테스트는 ':memory:') */
export function openDatabase(path: string): Database.Database {
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  initSchema(db);
  return db;
}

/**
 * 재시작 후 리스크 추적 재개에 필요한 최소 상태만 저장
 */
function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS positions (
      id              TEXT PRIMARY KEY,
      symbol          TEXT NOT NULL,
      state           TEXT NOT NULL,
      quantity        REAL NOT NULL,
      entry_price     REAL NOT NULL,
      entry_time      INTEGER NOT NULL,
      stop_loss       REAL NOT NULL,
      profit_target   REAL NOT NULL,
      entry_order     TEXT NOT NULL,
      exit_order      TEXT,
      exit_reason     TEXT,
      exit_price      REAL,
      closed_at       INTEGER,
      reservation_id  TEXT NOT NULL,
      updated_at      INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS reservations (
      id              TEXT PRIMARY KEY,
      symbol          TEXT NOT NULL,
      asset           TEXT NOT NULL,
      amount          REAL NOT NULL,
      placed_version  INTEGER
    );

    CREATE TABLE IF NOT EXISTS quotes (
      symbol          TEXT NOT NULL,
      side            TEXT NOT NULL,
      client_order_id TEXT NOT NULL,
      order_id        TEXT,
      price           REAL NOT NULL,
      quantity        REAL NOT NULL,
      placed_at       INTEGER NOT NULL,
      reference_mid   REAL NOT NULL,
      reservation_id  TEXT NOT NULL,
      PRIMARY KEY (symbol, side)
    );

    CREATE TABLE IF NOT EXISTS pair_status (
      symbol               TEXT PRIMARY KEY,
      state                TEXT NOT NULL,
      consecutive_failures INTEGER NOT NULL,
      reason               TEXT,
      updated_at           INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS audit_log (
      id         INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp  INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000),
      level      TEXT NOT NULL,
      module     TEXT NOT NULL,
      action     TEXT NOT NULL,
      detail     TEXT,
      symbol     TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_positions_symbol_state ON positions(symbol, state);
    CREATE INDEX IF NOT EXISTS idx_audit_ts ON audit_log(timestamp);
  `);
}

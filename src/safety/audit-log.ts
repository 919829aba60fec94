import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { EngineEvent } from '../types/index.js';

export type AuditLevel = 'INFO' | 'WARN' | 'ERROR' | 'CRITICAL';

const auditRow = z.object({
  id: z.number(),
  timestamp: z.number(),
  level: z.string(),
  module: z.string(),
  action: z.string(),
  detail: z.string().nullable(),
  symbol: z.string().nullable(),
});
export type AuditEntry = z.infer<typeof auditRow>;

/**
 * SQLite audit log: 모든 중요 이벤트 기록
 */
export class AuditLog {
  constructor(private readonly db: Database.Database) {}

  log(level: AuditLevel, module: string, action: string, detail?: string, symbol?: string): void {
    this.db.prepare(`
      INSERT INTO audit_log (timestamp, level, module, action, detail, symbol)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(Date.now(), level, module, action, detail ?? null, symbol ?? null);
  }

  info(module: string, action: string, detail?: string, symbol?: string): void {
    this.log('INFO', module, action, detail, symbol);
  }

  warn(module: string, action: string, detail?: string, symbol?: string): void {
    this.log('WARN', module, action, detail, symbol);
  }

  error(module: string, action: string, detail?: string, symbol?: string): void {
    this.log('ERROR', module, action, detail, symbol);
  }

  critical(module: string, action: string, detail?: string, symbol?: string): void {
    this.log('CRITICAL', module, action, detail, symbol);
  }

  /** 엔진 이벤트 기록 (TICK_SKIPPED 는 로그로 충분하므로 제외) */
  record(event: EngineEvent): void {
    if (event.type === 'TICK_SKIPPED') return;
    const { type, symbol, timestamp: _ts, ...rest } = event;
    this.log(levelOf(event), 'engine', type, JSON.stringify(rest), symbol);
  }

  getRecent(limit: number = 50): AuditEntry[] {
    const rows = this.db.prepare('SELECT * FROM audit_log ORDER BY id DESC LIMIT ?').all(limit);
    return z.array(auditRow).parse(rows);
  }
}

function levelOf(event: EngineEvent): AuditLevel {
  switch (event.type) {
    case 'INVARIANT_VIOLATION':
      return 'CRITICAL';
    case 'PAIR_SUSPENDED':
      return 'ERROR';
    case 'ORDER_FAILED':
      return 'WARN';
    default:
      return 'INFO';
  }
}

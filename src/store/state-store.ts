import type Database from 'better-sqlite3';
import { z } from 'zod';
import type {
  LiveQuote,
  OrderTicket,
  PairStatus,
  Position,
  QuotedOrderPair,
  Reservation,
} from '../types/index.js';

const ticketSchema = z.object({
  clientOrderId: z.string(),
  orderId: z.string().optional(),
  side: z.enum(['BUY', 'SELL']),
  quantity: z.number(),
  submittedAt: z.number(),
});

const ticketJson = z.string().transform((text, ctx): OrderTicket => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'order ticket is not JSON' });
    return z.NEVER;
  }
  const parsed = ticketSchema.safeParse(raw);
  if (!parsed.success) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message });
    return z.NEVER;
  }
  return parsed.data;
});

const positionRow = z.object({
  id: z.string(),
  symbol: z.string(),
  state: z.enum(['PENDING', 'OPEN', 'EXIT_PENDING', 'CLOSED', 'CANCELLED']),
  quantity: z.number(),
  entry_price: z.number(),
  entry_time: z.number(),
  stop_loss: z.number(),
  profit_target: z.number(),
  entry_order: ticketJson,
  exit_order: ticketJson.nullable(),
  exit_reason: z.enum(['STOP_LOSS', 'PROFIT_TARGET', 'DOWNTREND']).nullable(),
  exit_price: z.number().nullable(),
  closed_at: z.number().nullable(),
  reservation_id: z.string(),
});

const reservationRow = z.object({
  id: z.string(),
  symbol: z.string(),
  asset: z.string(),
  amount: z.number(),
  placed_version: z.number().nullable(),
});

const quoteRow = z.object({
  side: z.enum(['BUY', 'SELL']),
  client_order_id: z.string(),
  order_id: z.string().nullable(),
  price: z.number(),
  quantity: z.number(),
  placed_at: z.number(),
  reference_mid: z.number(),
  reservation_id: z.string(),
});

const pairStatusRow = z.object({
  symbol: z.string(),
  state: z.enum(['RUNNING', 'PAUSED', 'SUSPENDED']),
  consecutive_failures: z.number(),
  reason: z.string().nullable(),
});

/**
 * 재시작 복구용 상태 저장소 (SQLite)
 * 미종결 포지션, 잔고 예약, 살아있는 호가, 정지된 페어
 */
export class StateStore {
  constructor(private readonly db: Database.Database) {}

  savePosition(p: Readonly<Position>): void {
    this.db.prepare(`
      INSERT INTO positions (id, symbol, state, quantity, entry_price, entry_time, stop_loss, profit_target,
                             entry_order, exit_order, exit_reason, exit_price, closed_at, reservation_id, updated_at)
      VALUES (@id, @symbol, @state, @quantity, @entryPrice, @entryTime, @stopLoss, @profitTarget,
              @entryOrder, @exitOrder, @exitReason, @exitPrice, @closedAt, @reservationId, @updatedAt)
      ON CONFLICT(id) DO UPDATE SET
        state = excluded.state, quantity = excluded.quantity, entry_price = excluded.entry_price,
        entry_time = excluded.entry_time, stop_loss = excluded.stop_loss, profit_target = excluded.profit_target,
        entry_order = excluded.entry_order, exit_order = excluded.exit_order, exit_reason = excluded.exit_reason,
        exit_price = excluded.exit_price, closed_at = excluded.closed_at, updated_at = excluded.updated_at
    `).run({
      id: p.id,
      symbol: p.symbol,
      state: p.state,
      quantity: p.quantity,
      entryPrice: p.entryPrice,
      entryTime: p.entryTime,
      stopLoss: p.stopLossPrice,
      profitTarget: p.profitTargetPrice,
      entryOrder: JSON.stringify(p.entryOrder),
      exitOrder: p.exitOrder ? JSON.stringify(p.exitOrder) : null,
      exitReason: p.exitReason ?? null,
      exitPrice: p.exitPrice ?? null,
      closedAt: p.closedAt ?? null,
      reservationId: p.reservationId,
      updatedAt: Date.now(),
    });
  }

  /** 미종결 포지션 (PENDING/OPEN/EXIT_PENDING) */
  loadActivePositions(symbol: string): Position[] {
    const rows = this.db
      .prepare(`SELECT * FROM positions WHERE symbol = ? AND state NOT IN ('CLOSED', 'CANCELLED') ORDER BY entry_time`)
      .all(symbol);
    return z.array(positionRow).parse(rows).map((r) => {
      const position: Position = {
        id: r.id,
        symbol: r.symbol,
        side: 'LONG',
        state: r.state,
        quantity: r.quantity,
        entryPrice: r.entry_price,
        entryTime: r.entry_time,
        stopLossPrice: r.stop_loss,
        profitTargetPrice: r.profit_target,
        entryOrder: r.entry_order,
        reservationId: r.reservation_id,
      };
      if (r.exit_order) position.exitOrder = r.exit_order;
      if (r.exit_reason) position.exitReason = r.exit_reason;
      if (r.exit_price !== null) position.exitPrice = r.exit_price;
      if (r.closed_at !== null) position.closedAt = r.closed_at;
      return position;
    });
  }

  countPositions(symbol: string, state: Position['state']): number {
    const row = z
      .object({ n: z.number() })
      .parse(this.db.prepare('SELECT COUNT(*) AS n FROM positions WHERE symbol = ? AND state = ?').get(symbol, state));
    return row.n;
  }

  /** 페어의 예약 전체 교체 */
  replaceReservations(symbol: string, reservations: readonly Reservation[]): void {
    const del = this.db.prepare('DELETE FROM reservations WHERE symbol = ?');
    const ins = this.db.prepare(`
      INSERT INTO reservations (id, symbol, asset, amount, placed_version) VALUES (?, ?, ?, ?, ?)
    `);
    this.db.transaction(() => {
      del.run(symbol);
      for (const r of reservations) {
        ins.run(r.id, r.symbol, r.asset, r.amount, r.placedVersion ?? null);
      }
    })();
  }

  loadReservations(): Reservation[] {
    const rows = z.array(reservationRow).parse(this.db.prepare('SELECT * FROM reservations').all());
    return rows.map((r) => {
      const reservation: Reservation = { id: r.id, symbol: r.symbol, asset: r.asset, amount: r.amount };
      if (r.placed_version !== null) reservation.placedVersion = r.placed_version;
      return reservation;
    });
  }

  replaceQuotes(symbol: string, quotes: Readonly<QuotedOrderPair>): void {
    const del = this.db.prepare('DELETE FROM quotes WHERE symbol = ?');
    const ins = this.db.prepare(`
      INSERT INTO quotes (symbol, side, client_order_id, order_id, price, quantity, placed_at, reference_mid, reservation_id)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.db.transaction(() => {
      del.run(symbol);
      for (const q of [quotes.bid, quotes.ask]) {
        if (!q) continue;
        ins.run(symbol, q.side, q.clientOrderId, q.orderId ?? null, q.price, q.quantity, q.placedAt, q.referenceMid, q.reservationId);
      }
    })();
  }

  loadQuotes(symbol: string): QuotedOrderPair {
    const rows = z.array(quoteRow).parse(this.db.prepare('SELECT * FROM quotes WHERE symbol = ?').all(symbol));
    const pair: QuotedOrderPair = {};
    for (const r of rows) {
      const quote: LiveQuote = {
        side: r.side,
        clientOrderId: r.client_order_id,
        price: r.price,
        quantity: r.quantity,
        placedAt: r.placed_at,
        referenceMid: r.reference_mid,
        reservationId: r.reservation_id,
      };
      if (r.order_id !== null) quote.orderId = r.order_id;
      if (r.side === 'BUY') pair.bid = quote;
      else pair.ask = quote;
    }
    return pair;
  }

  savePairStatus(status: PairStatus): void {
    this.db.prepare(`
      INSERT INTO pair_status (symbol, state, consecutive_failures, reason, updated_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(symbol) DO UPDATE SET
        state = excluded.state, consecutive_failures = excluded.consecutive_failures,
        reason = excluded.reason, updated_at = excluded.updated_at
    `).run(status.symbol, status.state, status.consecutiveFailures, status.reason ?? null, Date.now());
  }

  loadPairStatus(symbol: string): PairStatus | undefined {
    const row = this.db.prepare('SELECT * FROM pair_status WHERE symbol = ?').get(symbol);
    if (row === undefined) return undefined;
    const r = pairStatusRow.parse(row);
    const status: PairStatus = {
      symbol: r.symbol,
      state: r.state,
      consecutiveFailures: r.consecutive_failures,
    };
    return r.reason !== null ? { ...status, reason: r.reason } : status;
  }
}

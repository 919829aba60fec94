import { randomUUID } from 'node:crypto';
import { createChildLogger } from '../logger.js';
import { InvariantViolationError } from '../errors.js';
import { PositionStateMachine } from './state-machine.js';
import { profitTargetPrice, stopLossPrice } from './position-sizer.js';
import type { ExitReason, OrderTicket, Position } from '../types/index.js';

const log = createChildLogger('position-tracker');

export interface ExitThresholds {
  readonly stopLossPct: number;
  readonly profitTargetPct: number;
}

export type PositionListener = (position: Readonly<Position>) => void;

interface Entry {
  readonly position: Position;
  readonly sm: PositionStateMachine;
}

/**
 * 페어별 포지션 추적기
 *
 * 상태 머신이 "자본이 아직 묶여 있는가"의 단일 기준.
 * 손절/익절가는 진입 체결 시 한 번만 계산하고 이후 재계산하지 않는다.
 */
export class PositionTracker {
  private readonly entries = new Map<string, Entry>();
  private readonly listeners: PositionListener[] = [];

  constructor(
    readonly symbol: string,
    private readonly thresholds: ExitThresholds,
  ) {}

  onChange(listener: PositionListener): void {
    this.listeners.push(listener);
  }

  /** 진입 주문 제출 → PENDING */
  openEntry(ticket: OrderTicket, reservationId: string): Position {
    const position: Position = {
      id: randomUUID(),
      symbol: this.symbol,
      side: 'LONG',
      state: 'PENDING',
      quantity: ticket.quantity,
      entryPrice: 0,
      entryTime: ticket.submittedAt,
      stopLossPrice: 0,
      profitTargetPrice: 0,
      entryOrder: { ...ticket },
      reservationId,
    };
    this.entries.set(position.id, {
      position,
      sm: new PositionStateMachine(position.id, 'PENDING', ticket.submittedAt),
    });
    this.emit(position);
    return position;
  }

  /** 거래소 주문 ID 확인 (결과 불명 제출이 조회로 확인된 경우 포함) */
  attachOrderId(id: string, leg: 'entry' | 'exit', orderId: string): void {
    const { position } = this.require(id);
    const ticket = leg === 'entry' ? position.entryOrder : position.exitOrder;
    if (!ticket) {
      throw new InvariantViolationError(`Position ${id} has no ${leg} order`);
    }
    ticket.orderId = orderId;
    this.emit(position);
  }

  /** PENDING → OPEN: 체결가 기준 손절/익절가 고정 */
  confirmEntry(id: string, fillPrice: number, filledQty: number, at: number): Position {
    const { position, sm } = this.require(id);
    sm.transition('OPEN', at);
    position.state = 'OPEN';
    position.entryPrice = fillPrice;
    position.quantity = filledQty;
    position.entryTime = at;
    position.stopLossPrice = stopLossPrice(fillPrice, this.thresholds.stopLossPct);
    position.profitTargetPrice = profitTargetPrice(fillPrice, this.thresholds.profitTargetPct);
    log.info({
      positionId: id,
      symbol: this.symbol,
      entryPrice: fillPrice,
      qty: filledQty,
      sl: position.stopLossPrice,
      tp: position.profitTargetPrice,
    }, 'Position opened');
    this.emit(position);
    return position;
  }

  /** PENDING → CANCELLED */
  cancelEntry(id: string, at: number): Position {
    const { position, sm } = this.require(id);
    sm.transition('CANCELLED', at);
    position.state = 'CANCELLED';
    position.closedAt = at;
    log.info({ positionId: id, symbol: this.symbol }, 'Entry cancelled');
    this.emit(position);
    return position;
  }

  /** OPEN → EXIT_PENDING */
  requestExit(id: string, reason: ExitReason, ticket: OrderTicket): Position {
    const { position, sm } = this.require(id);
    sm.transition('EXIT_PENDING', ticket.submittedAt);
    position.state = 'EXIT_PENDING';
    position.exitReason = reason;
    position.exitOrder = { ...ticket };
    this.emit(position);
    return position;
  }

  /** EXIT_PENDING → CLOSED */
  confirmExit(id: string, exitPrice: number, at: number): Position {
    const { position, sm } = this.require(id);
    sm.transition('CLOSED', at);
    position.state = 'CLOSED';
    position.exitPrice = exitPrice;
    position.closedAt = at;
    log.info({
      positionId: id,
      symbol: this.symbol,
      exitPrice,
      reason: position.exitReason,
    }, 'Position closed');
    this.emit(position);
    return position;
  }

  /** EXIT_PENDING → OPEN: 청산 주문 실패/취소: 포지션은 버리지 않고 다음 틱 재평가 */
  revertExit(id: string, at: number): Position {
    const { position, sm } = this.require(id);
    sm.transition('OPEN', at);
    position.state = 'OPEN';
    delete position.exitOrder;
    delete position.exitReason;
    const exitAttempts = sm.getHistory().filter((c) => c.to === 'EXIT_PENDING').length;
    log.warn({ positionId: id, symbol: this.symbol, exitAttempts }, 'Exit reverted, monitoring again');
    this.emit(position);
    return position;
  }

  /** 청산 주문의 부분 체결 후 남은 수량 반영 */
  reduceQuantity(id: string, remaining: number): void {
    const { position } = this.require(id);
    position.quantity = remaining;
    this.emit(position);
  }

  get(id: string): Readonly<Position> | undefined {
    return this.entries.get(id)?.position;
  }

  /** 종결 전 포지션 (PENDING/OPEN/EXIT_PENDING) */
  active(): Readonly<Position>[] {
    return [...this.entries.values()]
      .filter((e) => !e.sm.isTerminal())
      .map((e) => e.position);
  }

  /** 종결 포지션 정리 (메모리) */
  prune(): number {
    let removed = 0;
    for (const [id, e] of this.entries) {
      if (e.sm.isTerminal()) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  /** 재시작 복구: 저장된 상태 그대로 */
  restore(position: Position): void {
    this.entries.set(position.id, {
      position: { ...position },
      sm: new PositionStateMachine(position.id, position.state, position.entryTime),
    });
  }

  private require(id: string): Entry {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new InvariantViolationError(`Unknown position ${id} on ${this.symbol}`);
    }
    return entry;
  }

  private emit(position: Position): void {
    for (const l of this.listeners) l(position);
  }
}

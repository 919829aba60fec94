import type { ExitSignal } from './risk.js';
import type { OrderTicket } from './order.js';

export type PositionState =
  | 'PENDING'        // 진입 주문 제출, 미체결
  | 'OPEN'           // 진입 체결
  | 'EXIT_PENDING'   // 청산 주문 제출
  | 'CLOSED'         // 청산 체결 (종결)
  | 'CANCELLED';     // 진입 미체결 철회 (종결)

export type ExitReason = ExitSignal | 'DOWNTREND';

/** 롱 전용 포지션 (숏 미지원) */
export interface Position {
  readonly id: string;
  readonly symbol: string;
  readonly side: 'LONG';
  state: PositionState;
  quantity: number;
  /** 진입 체결가: PENDING 동안은 0 */
  entryPrice: number;
  entryTime: number;
  /** 진입 체결 시 고정, 이후 재계산 없음 */
  stopLossPrice: number;
  profitTargetPrice: number;
  entryOrder: OrderTicket;
  exitOrder?: OrderTicket;
  exitReason?: ExitReason;
  exitPrice?: number;
  closedAt?: number;
  /** 잔고 원장 예약 키 */
  readonly reservationId: string;
}

export function isTerminal(state: PositionState): boolean {
  return state === 'CLOSED' || state === 'CANCELLED';
}

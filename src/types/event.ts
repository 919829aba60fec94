import type { OrderSide } from './order.js';
import type { ExitReason } from './position.js';

export type EventType =
  | 'ORDER_PLACED'
  | 'ORDER_FAILED'
  | 'ORDER_CANCELLED'
  | 'POSITION_OPENED'
  | 'POSITION_CLOSED'
  | 'POSITION_CANCELLED'
  | 'QUOTE_FILLED'
  | 'TICK_SKIPPED'
  | 'PAIR_SUSPENDED'
  | 'PAIR_RESUMED'
  | 'INVARIANT_VIOLATION';

export interface BaseEvent {
  readonly type: EventType;
  readonly symbol: string;
  readonly timestamp: number;
}

export interface OrderPlacedEvent extends BaseEvent {
  readonly type: 'ORDER_PLACED';
  readonly clientOrderId: string;
  readonly orderId: string;
  readonly side: OrderSide;
  readonly quantity: number;
  readonly price?: number;        // 시장가면 undefined
}

export interface OrderFailedEvent extends BaseEvent {
  readonly type: 'ORDER_FAILED';
  readonly action: 'PLACE' | 'CANCEL' | 'MODIFY';
  readonly clientOrderId?: string;
  readonly orderId?: string;
  readonly error: string;
}

export interface OrderCancelledEvent extends BaseEvent {
  readonly type: 'ORDER_CANCELLED';
  readonly orderId: string;
}

export interface PositionOpenedEvent extends BaseEvent {
  readonly type: 'POSITION_OPENED';
  readonly positionId: string;
  readonly entryPrice: number;
  readonly quantity: number;
  readonly stopLossPrice: number;
  readonly profitTargetPrice: number;
}

export interface PositionClosedEvent extends BaseEvent {
  readonly type: 'POSITION_CLOSED';
  readonly positionId: string;
  readonly entryPrice: number;
  readonly exitPrice: number;
  readonly quantity: number;
  readonly pnl: number;
  readonly reason: ExitReason;
}

export interface PositionCancelledEvent extends BaseEvent {
  readonly type: 'POSITION_CANCELLED';
  readonly positionId: string;
  readonly reason: string;
}

export interface QuoteFilledEvent extends BaseEvent {
  readonly type: 'QUOTE_FILLED';
  readonly side: OrderSide;
  readonly price: number;
  readonly quantity: number;
}

export interface TickSkippedEvent extends BaseEvent {
  readonly type: 'TICK_SKIPPED';
  readonly reason: 'STALE_DATA' | 'STRATEGY';
  readonly detail: string;
}

export interface PairSuspendedEvent extends BaseEvent {
  readonly type: 'PAIR_SUSPENDED';
  readonly reason: string;
  readonly consecutiveFailures: number;
}

export interface PairResumedEvent extends BaseEvent {
  readonly type: 'PAIR_RESUMED';
}

export interface InvariantViolationEvent extends BaseEvent {
  readonly type: 'INVARIANT_VIOLATION';
  readonly detail: string;
}

export type EngineEvent =
  | OrderPlacedEvent
  | OrderFailedEvent
  | OrderCancelledEvent
  | PositionOpenedEvent
  | PositionClosedEvent
  | PositionCancelledEvent
  | QuoteFilledEvent
  | TickSkippedEvent
  | PairSuspendedEvent
  | PairResumedEvent
  | InvariantViolationEvent;

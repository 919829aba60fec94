export type { TradingPair, Ticker, MarketSnapshot, SymbolRules } from './market.js';
export { parsePair } from './market.js';
export type {
  OrderSide,
  OrderType,
  OrderStatus,
  PlaceOrderRequest,
  ExchangeOrder,
  OrderRef,
  OrderTicket,
} from './order.js';
export { isOrderLive, averageFillPrice } from './order.js';
export type { Position, PositionState, ExitReason } from './position.js';
export { isTerminal } from './position.js';
export type { ExitSignal, Reservation } from './risk.js';
export type { LiveQuote, QuotedOrderPair } from './quote.js';
export type {
  EventType,
  BaseEvent,
  OrderPlacedEvent,
  OrderFailedEvent,
  OrderCancelledEvent,
  PositionOpenedEvent,
  PositionClosedEvent,
  PositionCancelledEvent,
  QuoteFilledEvent,
  TickSkippedEvent,
  PairSuspendedEvent,
  PairResumedEvent,
  InvariantViolationEvent,
  EngineEvent,
} from './event.js';
export type { PairRunState, PairStatus } from './pair.js';

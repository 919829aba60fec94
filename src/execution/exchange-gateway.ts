import type {
  ExchangeOrder,
  OrderRef,
  PlaceOrderRequest,
  SymbolRules,
  Ticker,
  TradingPair,
} from '../types/index.js';

export interface AssetBalance {
  readonly free: number;
  readonly locked: number;
}

export interface ClosedCandle {
  readonly close: number;
  readonly closeTime: number;
}

/**
 * 거래소 게이트웨이: 엔진이 의존하는 유일한 I/O 경계.
 * 모든 실패는 GatewayError 로 던진다.
 */
export interface ExchangeGateway {
  getTicker(pair: TradingPair): Promise<Ticker>;
  getBalance(asset: string): Promise<AssetBalance>;
  /** 재시도하지 않음: 결과 불명(outcomeUnknown)이면 getOrder(clientOrderId)로 확정 */
  placeOrder(req: PlaceOrderRequest): Promise<ExchangeOrder>;
  cancelOrder(pair: TradingPair, orderId: string): Promise<ExchangeOrder>;
  getOpenOrders(pair: TradingPair): Promise<ExchangeOrder[]>;
  /** 없는 주문이면 null */
  getOrder(pair: TradingPair, ref: OrderRef): Promise<ExchangeOrder | null>;
  getSymbolRules(pair: TradingPair): Promise<SymbolRules>;
  /** 마감된 캔들 종가 (오래된 것부터) */
  getCloses(pair: TradingPair, timeframe: string, limit: number): Promise<ClosedCandle[]>;
}

export type OrderSide = 'BUY' | 'SELL';
export type OrderType = 'MARKET' | 'LIMIT';

/**
 * 거래소 주문 상태 (바이낸스 기준)
 * NEW/PARTIALLY_FILLED → 살아있음, 나머지는 종결
 */
export type OrderStatus =
  | 'NEW'
  | 'PARTIALLY_FILLED'
  | 'FILLED'
  | 'CANCELED'
  | 'PENDING_CANCEL'
  | 'REJECTED'
  | 'EXPIRED'
  | 'EXPIRED_IN_MATCH';

export interface PlaceOrderRequest {
  readonly symbol: string;        // 'ADA/USDT'
  readonly side: OrderSide;
  readonly type: OrderType;
  readonly quantity: number;      // 베이스 자산 수량
  readonly price?: number;        // LIMIT 전용
  /** 중복 제출 방지용 클라이언트 주문 ID */
  readonly clientOrderId: string;
}

export interface ExchangeOrder {
  readonly orderId: string;
  readonly clientOrderId: string;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly type: OrderType;
  readonly price: number;         // 지정가 (시장가면 0)
  readonly quantity: number;
  readonly executedQty: number;
  /** 체결 총액 (쿼트 자산) */
  readonly cumulativeQuote: number;
  readonly status: OrderStatus;
  readonly createdAt: number;     // Unix ms
}

/** 주문 조회 키: 거래소 ID 또는 클라이언트 ID */
export type OrderRef = { readonly orderId: string } | { readonly clientOrderId: string };

export function isOrderLive(status: OrderStatus): boolean {
  return status === 'NEW' || status === 'PARTIALLY_FILLED' || status === 'PENDING_CANCEL';
}

/** 평균 체결가 (체결 없음이면 0) */
export function averageFillPrice(order: ExchangeOrder): number {
  return order.executedQty > 0 ? order.cumulativeQuote / order.executedQty : 0;
}

/** 엔진이 추적하는 제출 주문 */
export interface OrderTicket {
  readonly clientOrderId: string;
  /** 거래소 확인 전이면 undefined (결과 불명 제출) */
  orderId?: string;
  readonly side: OrderSide;
  readonly quantity: number;
  readonly submittedAt: number;
}

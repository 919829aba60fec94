/** 마켓메이킹 호가 한쪽 */
export interface LiveQuote {
  readonly side: 'BUY' | 'SELL';
  readonly clientOrderId: string;
  /** 거래소 확인 전이면 undefined */
  orderId?: string;
  readonly price: number;
  readonly quantity: number;
  readonly placedAt: number;
  /** 호가 산정 기준 mid */
  readonly referenceMid: number;
  readonly reservationId: string;
}

/** 페어당 살아있는 bid/ask 각 1개 이하 */
export interface QuotedOrderPair {
  bid?: LiveQuote;
  ask?: LiveQuote;
}

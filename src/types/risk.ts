/** 가격 기반 청산 시그널 */
export type ExitSignal = 'STOP_LOSS' | 'PROFIT_TARGET';

/** 잔고 원장 예약 */
export interface Reservation {
  readonly id: string;            // `${symbol}:${clientOrderId}`
  readonly symbol: string;
  readonly asset: string;         // 예약 자산 (매수=쿼트, 매도=베이스)
  readonly amount: number;
  /** 거래소 접수 확인 시점의 원장 버전 (미접수면 undefined) */
  placedVersion?: number;
}

/** 거래 페어 (예: ADA/USDT): 모든 페어별 상태의 키 */
export interface TradingPair {
  readonly base: string;
  readonly quote: string;
  /** 'ADA/USDT' 형식 표기 */
  readonly symbol: string;
}

const PAIR_RE = /^([A-Z0-9]{2,15})\/([A-Z0-9]{2,15})$/;

export function parsePair(text: string): TradingPair {
  const m = PAIR_RE.exec(text.trim().toUpperCase());
  if (!m || !m[1] || !m[2]) {
    throw new Error(`Invalid trading pair "${text}" (expected BASE/QUOTE)`);
  }
  if (m[1] === m[2]) {
    throw new Error(`Invalid trading pair "${text}" (base equals quote)`);
  }
  return Object.freeze({ base: m[1], quote: m[2], symbol: `${m[1]}/${m[2]}` });
}

/** 거래소 티커 응답 (게이트웨이 정규화 후) */
export interface Ticker {
  readonly bid: number;
  readonly ask: number;
  readonly last: number;
  /** 관측 시각 (Unix ms) */
  readonly timestamp: number;
}

/** 마지막 관측 시세 + EMA */
export interface MarketSnapshot extends Ticker {
  readonly pair: TradingPair;
  /** 설정 타임프레임 종가 기준 EMA (워밍업 전이면 undefined) */
  readonly ema?: number;
}

/** 거래소 심볼 규칙 (LOT_SIZE / PRICE_FILTER / NOTIONAL) */
export interface SymbolRules {
  readonly stepSize: number;
  readonly minQty: number;
  readonly tickSize: number;
  readonly minNotional: number;
}

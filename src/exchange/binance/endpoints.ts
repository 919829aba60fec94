/**
 * 바이낸스 Spot REST 엔드포인트: 단일 정의.
 * 코드 어디에서도 문자열 URL을 직접 쓰지 않고 이 상수만 사용한다.
 */

export const BINANCE_REST_BASE = 'https://api.binance.com';

/** SANDBOX_MODE: 모든 호출을 테스트넷으로 */
export const BINANCE_TESTNET_BASE = 'https://testnet.binance.vision';

export function restBaseUrl(sandbox: boolean, override?: string): string {
  if (override) return override;
  return sandbox ? BINANCE_TESTNET_BASE : BINANCE_REST_BASE;
}

// ─── PUBLIC ─────────────────────────────────────────────────────────────

/** GET 심볼 규칙 (LOT_SIZE, PRICE_FILTER, NOTIONAL) */
export const PUBLIC_EXCHANGE_INFO = '/api/v3/exchangeInfo';

/** GET 24시간 티커 (최근가 + 최우선 호가) */
export const PUBLIC_TICKER_24HR = '/api/v3/ticker/24hr';

/** GET 캔들 */
export const PUBLIC_KLINES = '/api/v3/klines';

// ─── SIGNED ─────────────────────────────────────────────────────────────

/** GET 계정 잔고 */
export const SIGNED_ACCOUNT = '/api/v3/account';

/** POST 주문 / DELETE 취소 / GET 개별 조회 */
export const SIGNED_ORDER = '/api/v3/order';

/** GET 미체결 주문 */
export const SIGNED_OPEN_ORDERS = '/api/v3/openOrders';

/** 'ADA/USDT' → 'ADAUSDT' */
export function toExchangeSymbol(symbol: string): string {
  return symbol.replace('/', '');
}

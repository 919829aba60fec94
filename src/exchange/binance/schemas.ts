import { z } from 'zod';

/** 바이낸스는 가격/수량을 문자열로 준다 */
const decimal = z.union([z.string(), z.number()]).transform((v, ctx) => {
  const n = typeof v === 'number' ? v : Number(v);
  if (!Number.isFinite(n)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${String(v)}` });
    return z.NEVER;
  }
  return n;
});

/** 에러 응답 본문 {code, msg} */
export const BinanceErrorBodySchema = z.object({
  code: z.number(),
  msg: z.string(),
});
export type BinanceErrorBody = z.infer<typeof BinanceErrorBodySchema>;

/** GET /api/v3/ticker/24hr?symbol= */
export const Ticker24hrSchema = z.object({
  symbol: z.string(),
  lastPrice: decimal,
  bidPrice: decimal,
  askPrice: decimal,
  closeTime: z.number(),
});
export type Ticker24hr = z.infer<typeof Ticker24hrSchema>;

/** GET /api/v3/account */
export const AccountSchema = z.object({
  balances: z.array(
    z.object({
      asset: z.string(),
      free: decimal,
      locked: decimal,
    }),
  ),
});
export type Account = z.infer<typeof AccountSchema>;

/** 주문 응답 (POST RESULT / DELETE / GET 공통 필드) */
export const OrderSchema = z.object({
  symbol: z.string(),
  orderId: z.number(),
  clientOrderId: z.string(),
  price: decimal,
  origQty: decimal,
  executedQty: decimal,
  cummulativeQuoteQty: decimal,
  status: z.enum(['NEW', 'PARTIALLY_FILLED', 'FILLED', 'CANCELED', 'PENDING_CANCEL', 'REJECTED', 'EXPIRED', 'EXPIRED_IN_MATCH']),
  type: z.string(),
  side: z.enum(['BUY', 'SELL']),
  time: z.number().optional(),
  transactTime: z.number().optional(),
});
export type BinanceOrder = z.infer<typeof OrderSchema>;

export const OrderListSchema = z.array(OrderSchema);

/** exchangeInfo 필터: 필요한 것만 개별 검증, 나머지는 통과 */
export const LotSizeFilterSchema = z.object({
  filterType: z.literal('LOT_SIZE'),
  minQty: decimal,
  stepSize: decimal,
});
export const PriceFilterSchema = z.object({
  filterType: z.literal('PRICE_FILTER'),
  tickSize: decimal,
});
export const NotionalFilterSchema = z.object({
  filterType: z.enum(['NOTIONAL', 'MIN_NOTIONAL']),
  minNotional: decimal,
});
export const SymbolFilterSchema = z.object({ filterType: z.string() }).passthrough();
export type SymbolFilter = z.infer<typeof SymbolFilterSchema>;

/** GET /api/v3/exchangeInfo?symbol= */
export const ExchangeInfoSchema = z.object({
  symbols: z.array(
    z.object({
      symbol: z.string(),
      status: z.string(),
      filters: z.array(SymbolFilterSchema),
    }),
  ),
});
export type ExchangeInfo = z.infer<typeof ExchangeInfoSchema>;

/**
 * GET /api/v3/klines: [openTime, open, high, low, close, volume, closeTime, ...]
 */
export const KlineSchema = z
  .tuple([z.number(), decimal, decimal, decimal, decimal, decimal, z.number()])
  .rest(z.unknown())
  .transform((k) => ({ openTime: k[0], close: k[4], closeTime: k[6] }));
export const KlinesSchema = z.array(KlineSchema);
export type Kline = z.infer<typeof KlineSchema>;

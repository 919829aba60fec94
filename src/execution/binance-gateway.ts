import type { Dispatcher } from 'undici';
import { GatewayError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { stepDecimals } from '../risk/position-sizer.js';
import type {
  ExchangeOrder,
  OrderRef,
  OrderType,
  PlaceOrderRequest,
  SymbolRules,
  Ticker,
  TradingPair,
} from '../types/index.js';
import { BinanceRestClient } from '../exchange/binance/client.js';
import {
  PUBLIC_EXCHANGE_INFO,
  PUBLIC_KLINES,
  PUBLIC_TICKER_24HR,
  SIGNED_ACCOUNT,
  SIGNED_OPEN_ORDERS,
  SIGNED_ORDER,
  restBaseUrl,
  toExchangeSymbol,
} from '../exchange/binance/endpoints.js';
import {
  AccountSchema,
  ExchangeInfoSchema,
  KlinesSchema,
  LotSizeFilterSchema,
  NotionalFilterSchema,
  OrderListSchema,
  OrderSchema,
  PriceFilterSchema,
  Ticker24hrSchema,
  type BinanceOrder,
  type SymbolFilter,
} from '../exchange/binance/schemas.js';
import type { AssetBalance, ClosedCandle, ExchangeGateway } from './exchange-gateway.js';
import { RateLimiter } from './rate-limiter.js';

const log = createChildLogger('binance-gateway');

/** 엔드포인트별 요청 가중치 (바이낸스 문서 기준) */
const WEIGHT = {
  ticker: 2,
  account: 20,
  order: 1,
  cancel: 1,
  queryOrder: 4,
  openOrders: 6,
  exchangeInfo: 20,
  klines: 2,
} as const;

export interface BinanceGatewayOptions {
  apiKey: string;
  apiSecret: string;
  sandboxMode: boolean;
  baseUrl?: string;
  maxRetries: number;
  /** 초당 요청 가중치 예산 (분당 6000 한도 대비 보수적으로) */
  weightPerSec?: number;
  timeoutMs?: number;
  retryBaseMs?: number;
  dispatcher?: Dispatcher;
}

/**
 * 바이낸스 Spot 게이트웨이: REST 클라이언트 + 레이트 리미터
 */
export class BinanceGateway implements ExchangeGateway {
  private readonly client: BinanceRestClient;
  private readonly limiter: RateLimiter;
  private readonly rulesCache = new Map<string, SymbolRules>();

  constructor(opts: BinanceGatewayOptions) {
    const baseUrl = restBaseUrl(opts.sandboxMode, opts.baseUrl);
    this.client = new BinanceRestClient({
      baseUrl,
      apiKey: opts.apiKey,
      apiSecret: opts.apiSecret,
      maxRetries: opts.maxRetries,
      timeoutMs: opts.timeoutMs,
      retryBaseMs: opts.retryBaseMs,
      dispatcher: opts.dispatcher,
    });
    this.limiter = new RateLimiter(opts.weightPerSec ?? 50);
    log.info({ baseUrl, sandbox: opts.sandboxMode }, 'Binance gateway configured');
  }

  async getTicker(pair: TradingPair): Promise<Ticker> {
    await this.limiter.acquire(WEIGHT.ticker);
    const t = await this.client.requestPublic(
      PUBLIC_TICKER_24HR,
      { symbol: toExchangeSymbol(pair.symbol) },
      Ticker24hrSchema,
    );
    // 관측 시각은 거래소 기준 (24hr 롤링 윈도 종료 시각)
    return { bid: t.bidPrice, ask: t.askPrice, last: t.lastPrice, timestamp: t.closeTime };
  }

  async getBalance(asset: string): Promise<AssetBalance> {
    await this.limiter.acquire(WEIGHT.account);
    const account = await this.client.requestSigned('GET', SIGNED_ACCOUNT, { omitZeroBalances: 'true' }, AccountSchema);
    const entry = account.balances.find((b) => b.asset === asset);
    return entry ? { free: entry.free, locked: entry.locked } : { free: 0, locked: 0 };
  }

  async placeOrder(req: PlaceOrderRequest): Promise<ExchangeOrder> {
    const rules = await this.getSymbolRules(symbolPair(req.symbol));
    const params: Record<string, string> = {
      symbol: toExchangeSymbol(req.symbol),
      side: req.side,
      type: req.type,
      quantity: formatStep(req.quantity, rules.stepSize),
      newClientOrderId: req.clientOrderId,
      newOrderRespType: 'RESULT',
    };
    if (req.type === 'LIMIT') {
      if (req.price === undefined) {
        throw new GatewayError('rejected', `LIMIT order ${req.clientOrderId} has no price`);
      }
      params.price = formatStep(req.price, rules.tickSize);
      params.timeInForce = 'GTC';
    }

    await this.limiter.acquire(WEIGHT.order);
    const raw = await this.client.requestSigned('POST', SIGNED_ORDER, params, OrderSchema, { retry: false });
    return toExchangeOrder(req.symbol, raw);
  }

  async cancelOrder(pair: TradingPair, orderId: string): Promise<ExchangeOrder> {
    await this.limiter.acquire(WEIGHT.cancel);
    const raw = await this.client.requestSigned(
      'DELETE',
      SIGNED_ORDER,
      { symbol: toExchangeSymbol(pair.symbol), orderId },
      OrderSchema,
    );
    return toExchangeOrder(pair.symbol, raw);
  }

  async getOpenOrders(pair: TradingPair): Promise<ExchangeOrder[]> {
    await this.limiter.acquire(WEIGHT.openOrders);
    const list = await this.client.requestSigned(
      'GET',
      SIGNED_OPEN_ORDERS,
      { symbol: toExchangeSymbol(pair.symbol) },
      OrderListSchema,
    );
    return list.map((o) => toExchangeOrder(pair.symbol, o));
  }

  async getOrder(pair: TradingPair, ref: OrderRef): Promise<ExchangeOrder | null> {
    const params: Record<string, string> = { symbol: toExchangeSymbol(pair.symbol) };
    if ('orderId' in ref) params.orderId = ref.orderId;
    else params.origClientOrderId = ref.clientOrderId;

    await this.limiter.acquire(WEIGHT.queryOrder);
    try {
      const raw = await this.client.requestSigned('GET', SIGNED_ORDER, params, OrderSchema);
      return toExchangeOrder(pair.symbol, raw);
    } catch (err) {
      if (err instanceof GatewayError && err.reason === 'not_found') return null;
      throw err;
    }
  }

  /** 심볼 규칙: 세션 동안 캐시 */
  async getSymbolRules(pair: TradingPair): Promise<SymbolRules> {
    const cached = this.rulesCache.get(pair.symbol);
    if (cached) return cached;

    await this.limiter.acquire(WEIGHT.exchangeInfo);
    const info = await this.client.requestPublic(
      PUBLIC_EXCHANGE_INFO,
      { symbol: toExchangeSymbol(pair.symbol) },
      ExchangeInfoSchema,
    );
    const symbol = info.symbols.find((s) => s.symbol === toExchangeSymbol(pair.symbol));
    if (!symbol) {
      throw new GatewayError('not_found', `Symbol ${pair.symbol} not listed`);
    }
    const rules = rulesFromFilters(symbol.filters);
    this.rulesCache.set(pair.symbol, rules);
    log.info({ pair: pair.symbol, ...rules }, 'Symbol rules loaded');
    return rules;
  }

  async getCloses(pair: TradingPair, timeframe: string, limit: number): Promise<ClosedCandle[]> {
    await this.limiter.acquire(WEIGHT.klines);
    const klines = await this.client.requestPublic(
      PUBLIC_KLINES,
      // 마지막 캔들은 진행 중이므로 하나 더 받아 버린다
      { symbol: toExchangeSymbol(pair.symbol), interval: timeframe, limit: String(limit + 1) },
      KlinesSchema,
    );
    const now = Date.now();
    return klines
      .filter((k) => k.closeTime < now)
      .slice(-limit)
      .map((k) => ({ close: k.close, closeTime: k.closeTime }));
  }
}

/** exchangeInfo 필터 → SymbolRules (없는 필터는 0 = 제약 없음) */
export function rulesFromFilters(filters: readonly SymbolFilter[]): SymbolRules {
  let stepSize = 0;
  let minQty = 0;
  let tickSize = 0;
  let minNotional = 0;
  for (const f of filters) {
    const lot = LotSizeFilterSchema.safeParse(f);
    if (lot.success) {
      stepSize = lot.data.stepSize;
      minQty = lot.data.minQty;
      continue;
    }
    const price = PriceFilterSchema.safeParse(f);
    if (price.success) {
      tickSize = price.data.tickSize;
      continue;
    }
    const notional = NotionalFilterSchema.safeParse(f);
    if (notional.success) {
      minNotional = Math.max(minNotional, notional.data.minNotional);
    }
  }
  return { stepSize, minQty, tickSize, minNotional };
}

/** 스텝 자릿수로 지수 표기 없이 문자열화 */
export function formatStep(value: number, step: number): string {
  const decimals = step > 0 ? stepDecimals(step) : 8;
  return value.toFixed(decimals);
}

function symbolPair(symbol: string): TradingPair {
  const [base = '', quote = ''] = symbol.split('/');
  return { base, quote, symbol };
}

function toOrderType(type: string): OrderType {
  return type === 'MARKET' ? 'MARKET' : 'LIMIT';
}

function toExchangeOrder(symbol: string, o: BinanceOrder): ExchangeOrder {
  return {
    orderId: String(o.orderId),
    clientOrderId: o.clientOrderId,
    symbol,
    side: o.side,
    type: toOrderType(o.type),
    price: o.price,
    quantity: o.origQty,
    executedQty: o.executedQty,
    cumulativeQuote: o.cummulativeQuoteQty,
    status: o.status,
    createdAt: o.time ?? o.transactTime ?? Date.now(),
  };
}

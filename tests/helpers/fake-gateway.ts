import { GatewayError } from '../../src/errors.js';
import type { AssetBalance, ClosedCandle, ExchangeGateway } from '../../src/execution/exchange-gateway.js';
import {
  isOrderLive,
  type ExchangeOrder,
  type OrderRef,
  type PlaceOrderRequest,
  type SymbolRules,
  type Ticker,
  type TradingPair,
} from '../../src/types/index.js';

type Method = keyof ExchangeGateway;

interface FailureRule {
  readonly method: Method;
  readonly error: Error;
  remaining: number;
  readonly symbol?: string;
  /** placeOrder 전용: 에러를 던지기 전에 주문은 거래소에 기록 (결과 불명 재현) */
  readonly executed: boolean;
}

export interface FailOptions {
  times?: number;
  symbol?: string;
  executed?: boolean;
}

const DEFAULT_RULES: SymbolRules = { stepSize: 1, minQty: 1, tickSize: 0.0001, minNotional: 5 };

/**
 * 프로세스 내 거래소 대역
 *
 * 시장가 주문은 즉시 체결 (BUY는 ask, SELL은 bid), 지정가 주문은 NEW로 대기 → fill()로 체결.
 * 잔고는 테스트가 직접 설정한다 (체결로 바뀌지 않음).
 */
export class FakeGateway implements ExchangeGateway {
  readonly calls: Array<{ method: Method; args: unknown[] }> = [];
  readonly orders = new Map<string, ExchangeOrder>();
  /** 제출된 주문 요청 (실패 포함) */
  readonly placed: PlaceOrderRequest[] = [];
  closes: ClosedCandle[] = [];
  /** 티커 관측 시각을 clock()보다 이만큼 과거로 */
  tickerLagMs = 0;
  /** true면 시장가 주문도 NEW로 대기 */
  marketOrdersRest = false;
  /** 다음 시장가 주문 1건만 이 수량까지 체결, 나머지는 EXPIRED */
  nextMarketFillQty: number | undefined;
  /** 호출마다 먼저 실행 (테스트 시계 조작 등) */
  beforeCall: ((method: Method) => void) | undefined;

  private readonly tickers = new Map<string, Omit<Ticker, 'timestamp'>>();
  private readonly balances = new Map<string, AssetBalance>();
  private readonly rules = new Map<string, SymbolRules>();
  private readonly failures: FailureRule[] = [];
  private nextOrderId = 1;

  constructor(private readonly clock: () => number) {}

  setTicker(symbol: string, bid: number, ask: number, last: number = (bid + ask) / 2): void {
    this.tickers.set(symbol, { bid, ask, last });
  }

  setBalance(asset: string, free: number, locked = 0): void {
    this.balances.set(asset, { free, locked });
  }

  setRules(symbol: string, rules: SymbolRules): void {
    this.rules.set(symbol, rules);
  }

  failNext(method: Method, error: Error, opts: FailOptions = {}): void {
    this.failures.push({
      method,
      error,
      remaining: opts.times ?? 1,
      executed: opts.executed ?? false,
      ...(opts.symbol !== undefined ? { symbol: opts.symbol } : {}),
    });
  }

  /** 테스트용 주문 직접 추가 (외부에서 들어온 주문 등) */
  addOrder(order: Partial<ExchangeOrder> & Pick<ExchangeOrder, 'symbol' | 'side' | 'clientOrderId'>): ExchangeOrder {
    const full: ExchangeOrder = {
      orderId: String(this.nextOrderId++),
      type: 'LIMIT',
      price: 1,
      quantity: 1,
      executedQty: 0,
      cumulativeQuote: 0,
      status: 'NEW',
      createdAt: this.clock(),
      ...order,
    };
    this.orders.set(full.orderId, full);
    return full;
  }

  /** 대기 주문 체결 (qty 생략 시 전량) */
  fill(orderId: string, qty?: number): ExchangeOrder {
    const order = this.orders.get(orderId);
    if (!order) throw new Error(`No order ${orderId}`);
    const executedQty = qty ?? order.quantity;
    const filled: ExchangeOrder = {
      ...order,
      executedQty,
      cumulativeQuote: executedQty * order.price,
      status: executedQty >= order.quantity ? 'FILLED' : 'PARTIALLY_FILLED',
    };
    this.orders.set(orderId, filled);
    return filled;
  }

  callsOf(method: Method): unknown[][] {
    return this.calls.filter((c) => c.method === method).map((c) => c.args);
  }

  async getTicker(pair: TradingPair): Promise<Ticker> {
    this.record('getTicker', [pair.symbol], pair.symbol);
    const t = this.tickers.get(pair.symbol);
    if (!t) throw new GatewayError('not_found', `No ticker for ${pair.symbol}`);
    return { ...t, timestamp: this.clock() - this.tickerLagMs };
  }

  async getBalance(asset: string): Promise<AssetBalance> {
    this.record('getBalance', [asset]);
    return this.balances.get(asset) ?? { free: 0, locked: 0 };
  }

  async placeOrder(req: PlaceOrderRequest): Promise<ExchangeOrder> {
    this.beforeCall?.('placeOrder');
    const failure = this.takeFailure('placeOrder', req.symbol);
    this.calls.push({ method: 'placeOrder', args: [req] });
    this.placed.push(req);
    if (failure && !failure.executed) throw failure.error;

    const t = this.tickers.get(req.symbol);
    const marketPrice = req.side === 'BUY' ? t?.ask : t?.bid;
    const immediate = req.type === 'MARKET' && !this.marketOrdersRest;
    const price = req.price ?? marketPrice ?? 0;
    const order = this.addOrder({
      symbol: req.symbol,
      side: req.side,
      type: req.type,
      clientOrderId: req.clientOrderId,
      quantity: req.quantity,
      price: req.type === 'MARKET' ? 0 : price,
    });
    let result = order;
    if (immediate) {
      const executedQty = Math.min(order.quantity, this.nextMarketFillQty ?? order.quantity);
      this.nextMarketFillQty = undefined;
      result = {
        ...order,
        executedQty,
        cumulativeQuote: executedQty * price,
        status: executedQty < order.quantity ? 'EXPIRED' : 'FILLED',
      };
      this.orders.set(order.orderId, result);
    }
    if (failure) throw failure.error;
    return result;
  }

  async cancelOrder(pair: TradingPair, orderId: string): Promise<ExchangeOrder> {
    this.record('cancelOrder', [pair.symbol, orderId], pair.symbol);
    const order = this.orders.get(orderId);
    if (!order || order.symbol !== pair.symbol || !isOrderLive(order.status)) {
      throw new GatewayError('not_found', 'Unknown order sent.', -2011);
    }
    const cancelled: ExchangeOrder = { ...order, status: 'CANCELED' };
    this.orders.set(orderId, cancelled);
    return cancelled;
  }

  async getOpenOrders(pair: TradingPair): Promise<ExchangeOrder[]> {
    this.record('getOpenOrders', [pair.symbol], pair.symbol);
    return [...this.orders.values()].filter((o) => o.symbol === pair.symbol && isOrderLive(o.status));
  }

  async getOrder(pair: TradingPair, ref: OrderRef): Promise<ExchangeOrder | null> {
    this.record('getOrder', [pair.symbol, ref], pair.symbol);
    for (const order of this.orders.values()) {
      if (order.symbol !== pair.symbol) continue;
      if ('orderId' in ref ? order.orderId === ref.orderId : order.clientOrderId === ref.clientOrderId) {
        return order;
      }
    }
    return null;
  }

  async getSymbolRules(pair: TradingPair): Promise<SymbolRules> {
    this.record('getSymbolRules', [pair.symbol], pair.symbol);
    return this.rules.get(pair.symbol) ?? DEFAULT_RULES;
  }

  async getCloses(pair: TradingPair, timeframe: string, limit: number): Promise<ClosedCandle[]> {
    this.record('getCloses', [pair.symbol, timeframe, limit], pair.symbol);
    return this.closes.slice(-limit);
  }

  private record(method: Method, args: unknown[], symbol?: string): void {
    this.beforeCall?.(method);
    this.calls.push({ method, args });
    const failure = this.takeFailure(method, symbol);
    if (failure) throw failure.error;
  }

  private takeFailure(method: Method, symbol?: string): FailureRule | undefined {
    const rule = this.failures.find(
      (f) => f.method === method && f.remaining > 0 && (f.symbol === undefined || f.symbol === symbol),
    );
    if (rule) rule.remaining--;
    return rule;
  }
}

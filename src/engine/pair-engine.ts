import { randomUUID } from 'node:crypto';
import {
  InvariantViolationError,
  StaleDataError,
  describeError,
  isGatewayError,
  isInvariantViolation,
} from '../errors.js';
import { createPairLogger, type Logger } from '../logger.js';
import type { BalanceLedger } from '../risk/balance-ledger.js';
import { PositionTracker, type ExitThresholds } from '../risk/position-tracker.js';
import { isDust } from '../risk/position-sizer.js';
import { evaluate, type PlaceAction, type OrderAction, type StrategyConfig } from '../strategy/strategy.js';
import type { ExchangeGateway } from '../execution/exchange-gateway.js';
import type { StateStore } from '../store/state-store.js';
import {
  averageFillPrice,
  isOrderLive,
  type EngineEvent,
  type ExchangeOrder,
  type LiveQuote,
  type MarketSnapshot,
  type OrderSide,
  type OrderTicket,
  type PairRunState,
  type PairStatus,
  type Position,
  type QuotedOrderPair,
  type SymbolRules,
  type TradingPair,
} from '../types/index.js';
import type { EventBus } from './event-bus.js';
import type { MarketCache } from './market-cache.js';

const CLIENT_ID_PREFIX = 'st';
const QUOTE_TAG = 'q';

type IntentTag = 'e' | 'x' | 'q';

/** 거래소 clientOrderId (36자 이내): 재제출 없이 결과 조회에 쓰는 멱등 키 */
export function newClientOrderId(tag: IntentTag, now: number = Date.now()): string {
  const rand = randomUUID().replace(/-/g, '').slice(0, 10);
  return `${CLIENT_ID_PREFIX}-${tag}-${now.toString(36)}-${rand}`;
}

export function isOwnQuoteOrder(clientOrderId: string): boolean {
  return clientOrderId.startsWith(`${CLIENT_ID_PREFIX}-${QUOTE_TAG}-`);
}

export interface PairEngineOptions {
  strategy: StrategyConfig;
  thresholds: ExitThresholds;
  /** 미체결 진입 주문 철회 기준 (ms) */
  entryTimeoutMs: number;
  maxConsecutiveFailures: number;
  now?: () => number;
}

export interface PairEngineDeps {
  gateway: ExchangeGateway;
  ledger: BalanceLedger;
  cache: MarketCache;
  bus: EventBus;
  store?: StateStore;
}

export type TickOutcome = 'OK' | 'SKIPPED' | 'FAILED' | 'SUSPENDED' | 'IDLE';

type QuoteKey = keyof QuotedOrderPair;

function usesEma(strategy: StrategyConfig): boolean {
  switch (strategy.kind) {
    case 'trend_following':
      return true;
    case 'market_making':
      return strategy.downtrendProtect;
    case 'scalping':
      return false;
  }
}

function quoteKey(side: OrderSide): QuoteKey {
  return side === 'BUY' ? 'bid' : 'ask';
}

/**
 * 페어 하나의 틱 실행기
 *
 * 틱 순서: 규칙 → 시세 → 포지션 대사(진입 타임아웃 포함) → 호가 대사 → 불변식 검사
 *         → 잔고 조회(원장 토큰) → 전략 평가 → 예약 → 주문 실행
 *
 * 게이트웨이 실패는 페어별 연속 카운트, 한도 도달 시 이 페어만 정지.
 * 불변식 위반은 즉시 정지. 다른 페어에는 영향 없음.
 */
export class PairEngine {
  readonly tracker: PositionTracker;
  private quotes: QuotedOrderPair = {};
  private state: PairRunState = 'RUNNING';
  private failures = 0;
  private reason: string | undefined;
  private rules: SymbolRules | undefined;
  private lastTickAt: number | undefined;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(
    readonly pair: TradingPair,
    private readonly opts: PairEngineOptions,
    private readonly deps: PairEngineDeps,
  ) {
    this.now = opts.now ?? Date.now;
    this.log = createPairLogger('pair-engine', pair);
    this.tracker = new PositionTracker(pair.symbol, opts.thresholds);
    const store = deps.store;
    if (store) {
      this.tracker.onChange((p) => store.savePosition(p));
    }
  }

  // ── 운영 제어 ──

  status(): PairStatus {
    const status: PairStatus = {
      symbol: this.pair.symbol,
      state: this.state,
      consecutiveFailures: this.failures,
    };
    return {
      ...status,
      ...(this.reason !== undefined ? { reason: this.reason } : {}),
      ...(this.lastTickAt !== undefined ? { lastTickAt: this.lastTickAt } : {}),
    };
  }

  get runState(): PairRunState {
    return this.state;
  }

  liveQuotes(): Readonly<QuotedOrderPair> {
    return this.quotes;
  }

  lastPrice(): number | undefined {
    return this.deps.cache.peek(this.pair.symbol)?.last;
  }

  pause(): boolean {
    if (this.state !== 'RUNNING') return false;
    this.state = 'PAUSED';
    this.log.info('Pair paused');
    this.persist();
    return true;
  }

  resume(): boolean {
    if (this.state !== 'PAUSED') return false;
    this.state = 'RUNNING';
    this.log.info('Pair resumed');
    this.emit({ type: 'PAIR_RESUMED', symbol: this.pair.symbol, timestamp: this.now() });
    this.persist();
    return true;
  }

  /** 정지 해제: 실패 카운트 초기화 */
  reset(): boolean {
    if (this.state !== 'SUSPENDED') return false;
    this.state = 'RUNNING';
    this.failures = 0;
    this.reason = undefined;
    this.log.warn('Pair suspension cleared');
    this.emit({ type: 'PAIR_RESUMED', symbol: this.pair.symbol, timestamp: this.now() });
    this.persist();
    return true;
  }

  /** 저장 상태 복구 (포지션, 호가, 정지 상태). 예약은 공유 원장에서 복구 */
  restore(): void {
    const store = this.deps.store;
    if (!store) return;
    for (const position of store.loadActivePositions(this.pair.symbol)) {
      this.tracker.restore(position);
    }
    this.quotes = store.loadQuotes(this.pair.symbol);
    const saved = store.loadPairStatus(this.pair.symbol);
    if (saved && saved.state !== 'RUNNING') {
      this.state = saved.state;
      this.failures = saved.consecutiveFailures;
      this.reason = saved.reason;
    }
    this.log.info(
      { positions: this.tracker.active().length, quotes: Object.keys(this.quotes).length, state: this.state },
      'State restored',
    );
  }

  /** 과거 캔들로 EMA 워밍업: 실패해도 실시간 관측으로 채워진다 */
  async warmUp(): Promise<void> {
    if (!usesEma(this.opts.strategy)) return;
    try {
      await this.deps.cache.warmUp(this.pair, this.deps.gateway);
    } catch (err) {
      this.log.warn({ err: describeError(err) }, 'EMA warm-up failed; filling from live prices');
    }
  }

  // ── 틱 ──

  /** 한 번의 틱. 예외를 던지지 않는다 (페어 격리) */
  async tick(): Promise<TickOutcome> {
    if (this.state !== 'RUNNING') return 'IDLE';
    const now = this.now();
    this.lastTickAt = now;
    try {
      await this.step(now);
      this.failures = 0;
      return 'OK';
    } catch (err) {
      return this.handleFailure(err);
    } finally {
      this.persist();
      // 종결 포지션은 변경 시점에 이미 저장됨: 메모리에서만 정리
      this.tracker.prune();
    }
  }

  private async step(now: number): Promise<void> {
    const { gateway, ledger, cache } = this.deps;

    const rules = await this.loadRules();
    const ticker = await gateway.getTicker(this.pair);
    cache.update(this.pair, ticker);
    cache.latest(this.pair.symbol, now); // 거래소 관측 시각 기준 신선도

    await this.reconcilePositions(now);
    const openOrders = await gateway.getOpenOrders(this.pair);
    await this.reconcileQuotes(openOrders, now);
    this.checkQuoteInvariant(openOrders);

    const token = ledger.beginRead();
    const quoteBalance = await gateway.getBalance(this.pair.quote);
    const baseBalance = await gateway.getBalance(this.pair.base);

    // 대사/잔고 조회 동안 시간이 흘렀을 수 있다: 판단 직전에 신선도 재확인
    const snapshot = cache.latest(this.pair.symbol, this.now());

    const { actions, skipped } = evaluate(
      {
        pair: this.pair,
        snapshot,
        previous: cache.previous(this.pair.symbol),
        positions: this.tracker.active(),
        openOrders,
        quotes: this.quotes,
        balances: {
          quote: ledger.available(this.pair.quote, quoteBalance.free, token),
          base: ledger.available(this.pair.base, baseBalance.free, token),
        },
        committedQuote: ledger.committed(this.pair.symbol, this.pair.quote),
        rules,
        now,
      },
      this.opts.strategy,
    );

    for (const detail of skipped) {
      this.log.info({ detail }, 'Decision skipped');
      this.emit({ type: 'TICK_SKIPPED', symbol: this.pair.symbol, timestamp: now, reason: 'STRATEGY', detail });
    }

    for (const action of actions) {
      await this.execute(action, snapshot, now);
    }
  }

  private async loadRules(): Promise<SymbolRules> {
    if (!this.rules) {
      this.rules = await this.deps.gateway.getSymbolRules(this.pair);
    }
    return this.rules;
  }

  private handleFailure(err: unknown): TickOutcome {
    const now = this.now();
    if (err instanceof StaleDataError) {
      this.log.warn({ ageMs: err.ageMs, maxAgeMs: err.maxAgeMs }, 'Stale market data, skipping decision');
      this.emit({ type: 'TICK_SKIPPED', symbol: this.pair.symbol, timestamp: now, reason: 'STALE_DATA', detail: err.message });
      return 'SKIPPED';
    }
    if (isInvariantViolation(err)) {
      this.log.error({ err }, 'Invariant violation — halting pair');
      this.emit({ type: 'INVARIANT_VIOLATION', symbol: this.pair.symbol, timestamp: now, detail: err.message });
      this.suspend(`invariant violation: ${err.message}`, now);
      return 'SUSPENDED';
    }

    this.failures++;
    this.log.warn(
      { err: describeError(err), consecutiveFailures: this.failures, max: this.opts.maxConsecutiveFailures },
      'Tick failed',
    );
    if (this.failures >= this.opts.maxConsecutiveFailures) {
      this.suspend(`${this.failures} consecutive failures: ${describeError(err)}`, now);
      return 'SUSPENDED';
    }
    return 'FAILED';
  }

  private suspend(reason: string, now: number): void {
    this.state = 'SUSPENDED';
    this.reason = reason;
    this.log.error({ reason }, 'Pair suspended');
    this.emit({
      type: 'PAIR_SUSPENDED',
      symbol: this.pair.symbol,
      timestamp: now,
      reason,
      consecutiveFailures: this.failures,
    });
  }

  // ── 대사 (reconcile) ──

  private async lookup(ticket: OrderTicket): Promise<ExchangeOrder | null> {
    const ref = ticket.orderId !== undefined ? { orderId: ticket.orderId } : { clientOrderId: ticket.clientOrderId };
    return this.deps.gateway.getOrder(this.pair, ref);
  }

  private async reconcilePositions(now: number): Promise<void> {
    for (const position of this.tracker.active()) {
      if (position.state === 'PENDING') {
        await this.reconcileEntry(position, now);
      } else if (position.state === 'EXIT_PENDING') {
        await this.reconcileExit(position, now);
      }
    }
  }

  private async reconcileEntry(position: Readonly<Position>, now: number): Promise<void> {
    const order = await this.lookup(position.entryOrder);
    if (!order) {
      // 결과 불명 제출이 거래소에 없음 → 미제출로 확정 (재제출하지 않음)
      this.abandonEntry(position, 'entry order unknown to exchange', now);
      return;
    }
    if (position.entryOrder.orderId === undefined) {
      this.tracker.attachOrderId(position.id, 'entry', order.orderId);
      this.deps.ledger.markPlaced(position.reservationId);
      this.log.info({ positionId: position.id, orderId: order.orderId }, 'Unknown entry outcome resolved');
    }
    await this.applyEntryOrder(position, order, now);
  }

  private async applyEntryOrder(position: Readonly<Position>, order: ExchangeOrder, now: number): Promise<void> {
    if (isOrderLive(order.status)) {
      if (now - position.entryOrder.submittedAt <= this.opts.entryTimeoutMs) return;
      this.log.warn({ positionId: position.id, orderId: order.orderId }, 'Entry order timed out, withdrawing');
      const final = await this.cancelAndFetch(order.orderId);
      if (final && final.executedQty > 0) {
        this.openFromFill(position, final, now);
      } else {
        this.abandonEntry(position, 'entry timed out', now);
      }
      return;
    }
    if (order.executedQty > 0) {
      // FILLED, 또는 부분 체결 후 취소/만료 → 체결 수량으로 오픈
      this.openFromFill(position, order, now);
      return;
    }
    this.abandonEntry(position, `entry ${order.status}`, now);
  }

  private openFromFill(position: Readonly<Position>, order: ExchangeOrder, now: number): void {
    const opened = this.tracker.confirmEntry(position.id, averageFillPrice(order), order.executedQty, now);
    this.emit({
      type: 'POSITION_OPENED',
      symbol: this.pair.symbol,
      timestamp: now,
      positionId: opened.id,
      entryPrice: opened.entryPrice,
      quantity: opened.quantity,
      stopLossPrice: opened.stopLossPrice,
      profitTargetPrice: opened.profitTargetPrice,
    });
  }

  private abandonEntry(position: Readonly<Position>, reason: string, now: number): void {
    this.tracker.cancelEntry(position.id, now);
    this.deps.ledger.release(position.reservationId);
    this.emit({ type: 'POSITION_CANCELLED', symbol: this.pair.symbol, timestamp: now, positionId: position.id, reason });
  }

  private async reconcileExit(position: Readonly<Position>, now: number): Promise<void> {
    const ticket = position.exitOrder;
    if (!ticket) {
      throw new InvariantViolationError(`Position ${position.id} is EXIT_PENDING without an exit order`);
    }
    const order = await this.lookup(ticket);
    if (!order) {
      this.tracker.revertExit(position.id, now);
      return;
    }
    if (ticket.orderId === undefined) {
      this.tracker.attachOrderId(position.id, 'exit', order.orderId);
      this.log.info({ positionId: position.id, orderId: order.orderId }, 'Unknown exit outcome resolved');
    }
    await this.applyExitOrder(position, order, now);
  }

  private async applyExitOrder(position: Readonly<Position>, order: ExchangeOrder, now: number): Promise<void> {
    let final: ExchangeOrder | null = order;
    if (isOrderLive(order.status)) {
      const submittedAt = position.exitOrder?.submittedAt ?? now;
      if (now - submittedAt <= this.opts.entryTimeoutMs) return;
      this.log.warn({ positionId: position.id, orderId: order.orderId }, 'Exit order timed out, cancelling');
      final = await this.cancelAndFetch(order.orderId);
    }
    if (final && final.status === 'FILLED') {
      this.closeFromFill(position, final, now);
      return;
    }
    if (final && final.executedQty > 0) {
      const remaining = Math.max(0, position.quantity - final.executedQty);
      if (isDust(remaining, averageFillPrice(final), await this.loadRules())) {
        // 남은 수량은 거래소 최소 단위 미만이라 팔 수 없다: 체결분으로 종결
        this.log.warn({ positionId: position.id, remaining }, 'Exit left untradeable dust, closing position');
        this.closeFromFill(position, final, now);
        return;
      }
      this.tracker.reduceQuantity(position.id, remaining);
    }
    // 청산 실패/부분 체결 → OPEN 복귀, 다음 틱에 재평가
    this.tracker.revertExit(position.id, now);
  }

  private closeFromFill(position: Readonly<Position>, order: ExchangeOrder, now: number): void {
    const exitPrice = averageFillPrice(order);
    const { entryPrice } = position;
    const quantity = order.executedQty;
    const reason = position.exitReason;
    if (!reason) {
      throw new InvariantViolationError(`Position ${position.id} is closing without an exit reason`);
    }
    this.tracker.confirmExit(position.id, exitPrice, now);
    this.deps.ledger.release(position.reservationId);
    this.emit({
      type: 'POSITION_CLOSED',
      symbol: this.pair.symbol,
      timestamp: now,
      positionId: position.id,
      entryPrice,
      exitPrice,
      quantity,
      pnl: (exitPrice - entryPrice) * quantity,
      reason,
    });
  }

  private async reconcileQuotes(openOrders: readonly ExchangeOrder[], now: number): Promise<void> {
    for (const key of ['bid', 'ask'] as const) {
      const quote = this.quotes[key];
      if (!quote) continue;

      if (quote.orderId === undefined) {
        const order = await this.deps.gateway.getOrder(this.pair, { clientOrderId: quote.clientOrderId });
        if (!order) {
          this.dropQuote(key, 'quote unknown to exchange');
          continue;
        }
        quote.orderId = order.orderId;
        this.deps.ledger.markPlaced(quote.reservationId);
        this.log.info({ side: quote.side, orderId: order.orderId }, 'Unknown quote outcome resolved');
        if (!isOrderLive(order.status)) this.finishQuote(key, order, now);
        continue;
      }

      if (openOrders.some((o) => o.orderId === quote.orderId)) continue;
      const order = await this.deps.gateway.getOrder(this.pair, { orderId: quote.orderId });
      this.finishQuote(key, order, now);
    }
  }

  /** 호가 종료 (체결/취소): 체결분 이벤트 후 예약 해제 */
  private finishQuote(key: QuoteKey, order: ExchangeOrder | null, now: number): void {
    const quote = this.quotes[key];
    if (!quote) return;
    if (order && order.executedQty > 0) {
      this.emit({
        type: 'QUOTE_FILLED',
        symbol: this.pair.symbol,
        timestamp: now,
        side: quote.side,
        price: averageFillPrice(order) || quote.price,
        quantity: order.executedQty,
      });
    }
    this.dropQuote(key, order ? `quote ${order.status}` : 'quote gone');
  }

  private dropQuote(key: QuoteKey, reason: string): void {
    const quote = this.quotes[key];
    if (!quote) return;
    this.deps.ledger.release(quote.reservationId);
    delete this.quotes[key];
    this.log.debug({ side: quote.side, reason }, 'Quote dropped');
  }

  /** 페어당 살아있는 자체 bid/ask 각 1개 이하 */
  private checkQuoteInvariant(openOrders: readonly ExchangeOrder[]): void {
    for (const side of ['BUY', 'SELL'] as const) {
      const live = openOrders.filter((o) => o.side === side && isOwnQuoteOrder(o.clientOrderId));
      if (live.length > 1) {
        throw new InvariantViolationError(
          `${live.length} live ${side} quotes on ${this.pair.symbol}: ${live.map((o) => o.orderId).join(', ')}`,
        );
      }
    }
  }

  // ── 실행 ──

  private async execute(action: OrderAction, snapshot: MarketSnapshot, now: number): Promise<void> {
    switch (action.kind) {
      case 'PLACE':
        return this.executePlace(action, snapshot, now);
      case 'CANCEL':
        return this.executeCancel(action.orderId, action.reason, now);
      case 'MODIFY': {
        // 취소 후 재주문 (거래소에 원자적 정정 없음)
        const key = this.quoteKeyOf(action.orderId);
        const quote = key ? this.quotes[key] : undefined;
        if (!quote) {
          this.log.warn({ orderId: action.orderId }, 'Modify target is not a live quote, ignoring');
          return;
        }
        await this.executeCancel(action.orderId, 'modify', now);
        return this.executePlace(
          {
            kind: 'PLACE',
            side: quote.side,
            quantity: quote.quantity,
            price: action.newPrice,
            intent: { type: 'QUOTE', referenceMid: (snapshot.bid + snapshot.ask) / 2 },
          },
          snapshot,
          now,
        );
      }
      default: {
        const never: never = action;
        throw new InvariantViolationError(`Unknown action ${JSON.stringify(never)}`);
      }
    }
  }

  private quoteKeyOf(orderId: string): QuoteKey | undefined {
    if (this.quotes.bid?.orderId === orderId) return 'bid';
    if (this.quotes.ask?.orderId === orderId) return 'ask';
    return undefined;
  }

  private async cancelAndFetch(orderId: string): Promise<ExchangeOrder | null> {
    try {
      return await this.deps.gateway.cancelOrder(this.pair, orderId);
    } catch (err) {
      // 이미 체결/취소된 주문 → 최종 상태 조회
      if (isGatewayError(err) && err.reason === 'not_found') {
        return this.deps.gateway.getOrder(this.pair, { orderId });
      }
      throw err;
    }
  }

  private async executeCancel(orderId: string, reason: string, now: number): Promise<void> {
    const key = this.quoteKeyOf(orderId);
    let order: ExchangeOrder | null;
    try {
      order = await this.cancelAndFetch(orderId);
    } catch (err) {
      this.emit({
        type: 'ORDER_FAILED',
        symbol: this.pair.symbol,
        timestamp: now,
        action: 'CANCEL',
        orderId,
        error: describeError(err),
      });
      throw err;
    }
    if (key) this.finishQuote(key, order, now);
    this.log.info({ orderId, reason }, 'Order cancelled');
    this.emit({ type: 'ORDER_CANCELLED', symbol: this.pair.symbol, timestamp: now, orderId });
  }

  private async executePlace(action: PlaceAction, snapshot: MarketSnapshot, now: number): Promise<void> {
    const { intent, side, quantity } = action;
    const limitPrice = action.price === 'MARKET' ? undefined : action.price;
    const clientOrderId = newClientOrderId(intent.type === 'ENTRY' ? 'e' : intent.type === 'EXIT' ? 'x' : 'q', now);
    const ticket: OrderTicket = { clientOrderId, side, quantity, submittedAt: now };
    const { ledger } = this.deps;

    // 제출 전에 예약 + 추적 상태 등록 (결과 불명이어도 다음 틱에 조회로 확정)
    let positionId: string | undefined;
    let reservationId: string | undefined;
    switch (intent.type) {
      case 'ENTRY': {
        const reservation = ledger.reserve(
          this.pair.symbol,
          clientOrderId,
          this.pair.quote,
          quantity * (limitPrice ?? snapshot.ask),
        );
        reservationId = reservation.id;
        positionId = this.tracker.openEntry(ticket, reservation.id).id;
        break;
      }
      case 'EXIT':
        positionId = intent.positionId;
        this.tracker.requestExit(positionId, intent.reason, ticket);
        break;
      case 'QUOTE': {
        if (limitPrice === undefined) {
          throw new InvariantViolationError('Quote without a limit price');
        }
        const key = quoteKey(side);
        if (this.quotes[key]) {
          throw new InvariantViolationError(`A ${side} quote is already live on ${this.pair.symbol}`);
        }
        const reservation = side === 'BUY'
          ? ledger.reserve(this.pair.symbol, clientOrderId, this.pair.quote, quantity * limitPrice)
          : ledger.reserve(this.pair.symbol, clientOrderId, this.pair.base, quantity);
        reservationId = reservation.id;
        const quote: LiveQuote = {
          side,
          clientOrderId,
          price: limitPrice,
          quantity,
          placedAt: now,
          referenceMid: intent.referenceMid,
          reservationId: reservation.id,
        };
        this.quotes[key] = quote;
        break;
      }
    }
    this.persist();

    let order: ExchangeOrder;
    try {
      order = await this.deps.gateway.placeOrder({
        symbol: this.pair.symbol,
        side,
        type: limitPrice === undefined ? 'MARKET' : 'LIMIT',
        quantity,
        price: limitPrice,
        clientOrderId,
      });
    } catch (err) {
      this.emit({
        type: 'ORDER_FAILED',
        symbol: this.pair.symbol,
        timestamp: now,
        action: 'PLACE',
        clientOrderId,
        error: describeError(err),
      });
      if (isGatewayError(err) && err.outcomeUnknown) {
        this.log.warn({ clientOrderId, err: err.message }, 'Order outcome unknown; resolving by client id next tick');
      } else {
        this.rollbackPlace(action, positionId, now);
      }
      throw err;
    }

    if (reservationId) ledger.markPlaced(reservationId);
    this.log.info(
      { clientOrderId, orderId: order.orderId, side, quantity, price: limitPrice, intent: intent.type, status: order.status },
      'Order placed',
    );
    this.emit({
      type: 'ORDER_PLACED',
      symbol: this.pair.symbol,
      timestamp: now,
      clientOrderId,
      orderId: order.orderId,
      side,
      quantity,
      ...(limitPrice !== undefined ? { price: limitPrice } : {}),
    });

    switch (intent.type) {
      case 'ENTRY':
      case 'EXIT': {
        const id = positionId;
        if (id === undefined) throw new InvariantViolationError(`Placed ${intent.type} order has no position`);
        this.tracker.attachOrderId(id, intent.type === 'ENTRY' ? 'entry' : 'exit', order.orderId);
        const position = this.tracker.get(id);
        if (!position || isOrderLive(order.status)) return;
        if (intent.type === 'ENTRY') await this.applyEntryOrder(position, order, now);
        else await this.applyExitOrder(position, order, now);
        return;
      }
      case 'QUOTE': {
        const key = quoteKey(side);
        const quote = this.quotes[key];
        if (quote) quote.orderId = order.orderId;
        if (!isOrderLive(order.status)) this.finishQuote(key, order, now);
        return;
      }
    }
  }

  /** 거래소가 거절한 제출 되돌리기 */
  private rollbackPlace(action: PlaceAction, positionId: string | undefined, now: number): void {
    switch (action.intent.type) {
      case 'ENTRY': {
        const position = positionId ? this.tracker.get(positionId) : undefined;
        if (position) this.abandonEntry(position, 'entry rejected', now);
        return;
      }
      case 'EXIT':
        if (positionId) this.tracker.revertExit(positionId, now);
        return;
      case 'QUOTE':
        this.dropQuote(quoteKey(action.side), 'quote rejected');
        return;
    }
  }

  private emit(event: EngineEvent): void {
    this.deps.bus.emit(event);
  }

  private persist(): void {
    const store = this.deps.store;
    if (!store) return;
    store.replaceReservations(this.pair.symbol, this.deps.ledger.list(this.pair.symbol));
    store.replaceQuotes(this.pair.symbol, this.quotes);
    store.savePairStatus(this.status());
  }
}

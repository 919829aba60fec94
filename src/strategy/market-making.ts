import { describeError, isInsufficientBalance } from '../errors.js';
import { ceilToStep, floorToStep, sizeFixed } from '../risk/position-sizer.js';
import type { LiveQuote, OrderSide } from '../types/index.js';
import type { Evaluation, MarketMakingConfig, OrderAction, StrategyContext } from './strategy.js';
import { isDowntrend } from './trend-following.js';

export interface QuotePrices {
  readonly mid: number;
  readonly bid: number;
  readonly ask: number;
}

/**
 * mid 기준 호가 산정: bid = mid × (1 − s/2), ask = mid × (1 + s/2)
 * 틱 사이즈로 bid는 내림, ask는 올림 (스프레드가 좁아지지 않도록)
 */
export function quotePrices(bestBid: number, bestAsk: number, spreadPct: number, tickSize: number): QuotePrices {
  const mid = (bestBid + bestAsk) / 2;
  return {
    mid,
    bid: floorToStep(mid * (1 - spreadPct / 2), tickSize),
    ask: ceilToStep(mid * (1 + spreadPct / 2), tickSize),
  };
}

/** 재호가 필요 여부: mid 이동 > 스프레드 × threshold 또는 호가 나이 초과 */
export function needsRequote(quote: LiveQuote, mid: number, now: number, cfg: MarketMakingConfig): boolean {
  const drift = Math.abs(mid - quote.referenceMid) / quote.referenceMid;
  if (drift > cfg.spreadPct * cfg.requoteThreshold) return true;
  return now - quote.placedAt >= cfg.maxQuoteAgeMs;
}

/**
 * 마켓메이킹
 *
 * - 호가 없음 → 양쪽 지정가 주문
 * - mid 이동/나이 초과 → 가격 정정(MODIFY). 수량이 바뀌면 취소 직후 재주문 (짧은 호가 공백은 알려진 한계)
 * - BUY_ONLY, 또는 DOWNTREND_PROTECT 중 가격 < EMA → 매수 호가만 유지
 * - 확인 전(주문 ID 없음) 호가는 건드리지 않음
 */
export function evaluateMarketMaking(ctx: StrategyContext, cfg: MarketMakingConfig): Evaluation {
  const skipped: string[] = [];
  const actions: OrderAction[] = [];
  const { snapshot, quotes, rules } = ctx;

  const prices = quotePrices(snapshot.bid, snapshot.ask, cfg.spreadPct, rules.tickSize);
  if (!(prices.bid > 0 && prices.bid < prices.mid && prices.mid < prices.ask)) {
    skipped.push(`quote: spread collapses at tick ${rules.tickSize} (bid ${prices.bid}, mid ${prices.mid}, ask ${prices.ask})`);
    return { actions, skipped };
  }

  const downtrend = cfg.downtrendProtect && isDowntrend(snapshot);
  const bidOnly = cfg.buyOnly || downtrend;

  const sides: Array<{ side: OrderSide; live: LiveQuote | undefined; price: number; enabled: boolean }> = [
    { side: 'BUY', live: quotes.bid, price: prices.bid, enabled: true },
    { side: 'SELL', live: quotes.ask, price: prices.ask, enabled: !bidOnly },
  ];

  for (const { side, live, price, enabled } of sides) {
    if (live && live.orderId === undefined) continue; // 결과 불명 주문: 조회로 확정될 때까지 대기

    if (!enabled) {
      if (live?.orderId) {
        actions.push({ kind: 'CANCEL', orderId: live.orderId, reason: downtrend ? 'downtrend: bid only' : 'buy-only' });
      }
      continue;
    }

    let available = side === 'BUY' ? ctx.balances.quote : ctx.balances.base;
    const replacing = live?.orderId;
    if (live && replacing) {
      if (!needsRequote(live, prices.mid, ctx.now, cfg)) continue;
      // 취소될 주문에 묶인 금액은 재주문에 다시 사용 가능
      available += side === 'BUY' ? live.quantity * live.price : live.quantity;
    }

    let quantity: number;
    try {
      quantity = sizeFixed(available, cfg.orderSize, price, side, rules);
    } catch (err) {
      if (!isInsufficientBalance(err)) throw err;
      skipped.push(`quote ${side}: ${describeError(err)}`);
      if (replacing) actions.push({ kind: 'CANCEL', orderId: replacing, reason: 'requote' });
      continue;
    }

    // 수량이 같으면 가격 정정, 다르면 취소 후 신규
    if (live && replacing && quantity === live.quantity) {
      actions.push({ kind: 'MODIFY', orderId: replacing, newPrice: price });
      continue;
    }
    if (replacing) actions.push({ kind: 'CANCEL', orderId: replacing, reason: 'requote' });
    actions.push({
      kind: 'PLACE',
      side,
      quantity,
      price,
      intent: { type: 'QUOTE', referenceMid: prices.mid },
    });
  }

  return { actions, skipped };
}

import type { MarketSnapshot } from '../types/index.js';
import { marketEntry, marketExit, priceExits } from './actions.js';
import type { Evaluation, OrderAction, StrategyContext, TrendFollowingConfig } from './strategy.js';

export type EmaCross = 'UP' | 'DOWN' | null;

/** 직전 → 현재 스냅샷 사이 가격의 EMA 교차 */
export function emaCross(previous: MarketSnapshot | undefined, current: MarketSnapshot): EmaCross {
  if (!previous || previous.ema === undefined || current.ema === undefined) return null;
  if (previous.last <= previous.ema && current.last > current.ema) return 'UP';
  if (previous.last >= previous.ema && current.last < current.ema) return 'DOWN';
  return null;
}

/** 가격이 EMA 아래 */
export function isDowntrend(snapshot: MarketSnapshot): boolean {
  return snapshot.ema !== undefined && snapshot.last < snapshot.ema;
}

/**
 * 추세추종 (EMA 필터, 롱전용)
 *
 * 진입: 가격이 EMA 상향 돌파 + 미종결 포지션 없음
 * 청산: 손절/익절 (손절 우선) → 그다음 가격 < EMA (DOWNTREND_PROTECT)
 *       교차 시점이 아닌 수준 기준이라 청산 실패 시 다음 틱에 다시 시도된다
 * BUY_ONLY: 하락 추세 청산은 buyOnlyDowntrendAction 에 따름 (hold면 보유 유지),
 *           손절/익절 청산은 그대로 실행
 */
export function evaluateTrendFollowing(ctx: StrategyContext, cfg: TrendFollowingConfig): Evaluation {
  const skipped: string[] = [];

  if (ctx.snapshot.ema === undefined) {
    skipped.push('trend: EMA warming up');
    return { actions: [], skipped };
  }

  if (ctx.positions.length > 0) {
    const { actions, exiting } = priceExits(ctx, skipped);
    if (isDowntrend(ctx.snapshot) && cfg.downtrendProtect && downtrendExitAllowed(cfg)) {
      for (const position of ctx.positions) {
        if (position.state !== 'OPEN' || exiting.has(position.id)) continue;
        const exit = marketExit(ctx, position, 'DOWNTREND', skipped);
        if (exit) actions.push(exit);
      }
    }
    return { actions, skipped };
  }

  const actions: OrderAction[] = [];
  if (emaCross(ctx.previous, ctx.snapshot) === 'UP') {
    const entry = marketEntry(ctx, cfg.balancePct, skipped);
    if (entry) actions.push(entry);
  }
  return { actions, skipped };
}

function downtrendExitAllowed(cfg: TrendFollowingConfig): boolean {
  if (!cfg.buyOnly) return true;
  return cfg.buyOnlyDowntrendAction === 'exit';
}

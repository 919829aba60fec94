import { marketEntry, priceExits } from './actions.js';
import type { Evaluation, ScalpingConfig, StrategyContext } from './strategy.js';

/**
 * 스캘핑 (롱전용)
 *
 * 진입: 페어에 미종결 포지션이 없으면 시장가 매수 (잔고 × balancePct)
 * 청산: OPEN 포지션이 손절/익절가 도달 시 시장가 매도
 */
export function evaluateScalping(ctx: StrategyContext, cfg: ScalpingConfig): Evaluation {
  const skipped: string[] = [];

  if (ctx.positions.length > 0) {
    const { actions } = priceExits(ctx, skipped);
    return { actions, skipped };
  }

  const entry = marketEntry(ctx, cfg.balancePct, skipped);
  return { actions: entry ? [entry] : [], skipped };
}

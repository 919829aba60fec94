import { isInsufficientBalance, describeError } from '../errors.js';
import { checkExit, sizeExit, sizeWithinCap } from '../risk/position-sizer.js';
import type { ExitReason, Position } from '../types/index.js';
import type { OrderAction, StrategyContext } from './strategy.js';

/**
 * 시장가 진입 (사이징 포함). 잔고 부족이면 null + 사유
 */
export function marketEntry(
  ctx: StrategyContext,
  balancePct: number,
  skipped: string[],
): OrderAction | null {
  try {
    const quantity = sizeWithinCap(
      ctx.balances.quote,
      ctx.committedQuote,
      balancePct,
      ctx.snapshot.ask,
      ctx.rules,
    );
    return { kind: 'PLACE', side: 'BUY', quantity, price: 'MARKET', intent: { type: 'ENTRY' } };
  } catch (err) {
    if (!isInsufficientBalance(err)) throw err;
    skipped.push(`entry: ${describeError(err)}`);
    return null;
  }
}

/** 시장가 청산 (보유 수량/베이스 잔고 기준) */
export function marketExit(
  ctx: StrategyContext,
  position: Readonly<Position>,
  reason: ExitReason,
  skipped: string[],
): OrderAction | null {
  try {
    const quantity = sizeExit(position.quantity, ctx.balances.base, ctx.snapshot.bid, ctx.rules);
    return {
      kind: 'PLACE',
      side: 'SELL',
      quantity,
      price: 'MARKET',
      intent: { type: 'EXIT', positionId: position.id, reason },
    };
  } catch (err) {
    if (!isInsufficientBalance(err)) throw err;
    skipped.push(`exit ${position.id}: ${describeError(err)}`);
    return null;
  }
}

/** OPEN 포지션의 손절/익절 청산 */
export function priceExits(ctx: StrategyContext, skipped: string[]): {
  actions: OrderAction[];
  exiting: Set<string>;
} {
  const actions: OrderAction[] = [];
  const exiting = new Set<string>();
  for (const position of ctx.positions) {
    if (position.state !== 'OPEN') continue;
    const signal = checkExit(position, ctx.snapshot.last);
    if (!signal) continue;
    exiting.add(position.id);
    const action = marketExit(ctx, position, signal, skipped);
    if (action) actions.push(action);
  }
  return { actions, exiting };
}

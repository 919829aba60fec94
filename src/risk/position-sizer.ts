import { InsufficientBalanceError } from '../errors.js';
import type { ExitSignal, OrderSide, Position, SymbolRules } from '../types/index.js';

/** 규칙이 없을 때: 스텝/최소 제한 없음 */
const NO_RULES: SymbolRules = { stepSize: 0, minQty: 0, tickSize: 0, minNotional: 0 };

/**
 * 비율 기반 포지션 사이징 (롱전용)
 *
 * 배분 금액 = 잔고 × allocationPct
 * 수량 = 배분 금액 / 가격 → 거래소 LOT 스텝으로 내림
 * 최소 수량/최소 주문금액 미달 시 InsufficientBalanceError
 *
 * 순수 함수: I/O 없음.
 */
export function size(
  balance: number,
  allocationPct: number,
  price: number,
  rules: SymbolRules = NO_RULES,
): number {
  if (!(price > 0)) throw new RangeError(`price must be > 0 (got ${price})`);
  if (!(allocationPct > 0 && allocationPct <= 1)) {
    throw new RangeError(`allocationPct must be in (0, 1] (got ${allocationPct})`);
  }

  const budget = Math.max(0, balance) * allocationPct;
  let qty = floorToStep(budget / price, rules.stepSize);

  // 부동소수 오차로 배분 금액을 넘으면 한 스텝(스텝 없으면 1ulp 수준) 내림
  if (qty * price > budget) {
    qty = rules.stepSize > 0
      ? floorToStep(qty - rules.stepSize, rules.stepSize)
      : qty * (1 - 4 * Number.EPSILON);
  }

  assertTradable(qty, price, rules, budget, `allocation ${budget} at ${price}`);
  return qty;
}

/**
 * 고정 수량 주문 검증 (마켓메이킹 호가)
 * BUY: 쿼트 잔고 ≥ 수량 × 가격, SELL: 베이스 잔고 ≥ 수량
 */
export function sizeFixed(
  available: number,
  quantity: number,
  price: number,
  side: OrderSide,
  rules: SymbolRules = NO_RULES,
): number {
  if (!(price > 0)) throw new RangeError(`price must be > 0 (got ${price})`);
  const qty = floorToStep(quantity, rules.stepSize);
  const required = side === 'BUY' ? qty * price : qty;
  if (available < required) {
    throw new InsufficientBalanceError(
      available,
      required,
      `${side} ${qty} @ ${price} needs ${required}, available ${available}`,
    );
  }
  assertTradable(qty, price, rules, available, `${side} ${qty} @ ${price}`);
  return qty;
}

/** 스텝 내림 후 최소 수량/최소 주문금액 미달이면 주문 불가 잔량 */
export function isDust(quantity: number, price: number, rules: SymbolRules = NO_RULES): boolean {
  const qty = floorToStep(quantity, rules.stepSize);
  return qty <= 0 || qty < rules.minQty || qty * price < rules.minNotional;
}

function assertTradable(qty: number, price: number, rules: SymbolRules, available: number, what: string): void {
  const minRequired = Math.max(rules.minQty * price, rules.minNotional);
  if (isDust(qty, price, rules)) {
    throw new InsufficientBalanceError(
      available,
      minRequired,
      `${what} → qty ${qty} below exchange minimum (minQty ${rules.minQty}, minNotional ${rules.minNotional})`,
    );
  }
}

export function stopLossPrice(entryPrice: number, stopLossPct: number): number {
  return entryPrice * (1 - stopLossPct);
}

export function profitTargetPrice(entryPrice: number, profitTargetPct: number): number {
  return entryPrice * (1 + profitTargetPct);
}

/**
 * 가격 기반 청산 체크
 * 손절/익절 동시 충족 시 손절 우선 (리스크 억제가 수익 실현보다 우선)
 */
export function checkExit(
  position: Pick<Position, 'stopLossPrice' | 'profitTargetPrice'>,
  currentPrice: number,
): ExitSignal | null {
  if (currentPrice <= position.stopLossPrice) return 'STOP_LOSS';
  if (currentPrice >= position.profitTargetPrice) return 'PROFIT_TARGET';
  return null;
}

// ── 정밀도 ──

/** 스텝 소수 자릿수 (1e-8 표기 포함) */
export function stepDecimals(step: number): number {
  if (!(step > 0)) return 0;
  const text = step.toString();
  const exp = /e-(\d+)$/.exec(text);
  if (exp && exp[1]) {
    const mantissa = text.split('e')[0] ?? '';
    const frac = mantissa.split('.')[1]?.length ?? 0;
    return Number(exp[1]) + frac;
  }
  return text.split('.')[1]?.length ?? 0;
}

export function floorToStep(value: number, step: number): number {
  if (!(step > 0)) return value;
  const units = Math.floor(value / step + 1e-9);
  return Number((units * step).toFixed(stepDecimals(step)));
}

export function ceilToStep(value: number, step: number): number {
  if (!(step > 0)) return value;
  const units = Math.ceil(value / step - 1e-9);
  return Number((units * step).toFixed(stepDecimals(step)));
}

/**
 * 페어 단위 배분 상한을 지키는 진입 사이징
 *
 * 같은 페어의 미종결 포지션/예약(committed)까지 합산해
 * (잔고 + committed) × allocationPct 를 넘지 않도록 잔고를 줄여 size()에 넘긴다.
 */
export function sizeWithinCap(
  balance: number,
  committed: number,
  allocationPct: number,
  price: number,
  rules: SymbolRules = NO_RULES,
): number {
  const effective = Math.min(balance, balance + committed - committed / allocationPct);
  return size(effective, allocationPct, price, rules);
}

/**
 * 청산 수량: 보유 수량과 실제 베이스 잔고(수수료 차감분 반영) 중 작은 값을 스텝 내림
 */
export function sizeExit(
  heldQty: number,
  availableBase: number,
  price: number,
  rules: SymbolRules = NO_RULES,
): number {
  const qty = floorToStep(Math.min(heldQty, availableBase), rules.stepSize);
  assertTradable(qty, price, rules, availableBase, `exit ${heldQty} with ${availableBase} base available`);
  return qty;
}

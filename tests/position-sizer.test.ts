import { describe, it, expect } from 'vitest';
import {
  size,
  sizeFixed,
  sizeWithinCap,
  sizeExit,
  stopLossPrice,
  profitTargetPrice,
  checkExit,
  floorToStep,
  ceilToStep,
  stepDecimals,
} from '../src/risk/position-sizer.js';
import { InsufficientBalanceError } from '../src/errors.js';
import type { SymbolRules } from '../src/types/index.js';

const ADA_RULES: SymbolRules = { stepSize: 1, minQty: 1, tickSize: 0.0001, minNotional: 5 };

describe('size', () => {
  it('should size 5% of 1000 USDT at 0.40 to 125 units', () => {
    expect(size(1000, 0.05, 0.4, ADA_RULES)).toBe(125);
  });

  it('should floor to the lot step and never exceed the allocation', () => {
    const qty = size(1000, 0.05, 0.3, ADA_RULES);
    // 50 / 0.3 = 166.66… → 166
    expect(qty).toBe(166);
    expect(qty * 0.3).toBeLessThanOrEqual(50);
  });

  it('should throw InsufficientBalanceError below min notional', () => {
    // budget 5, qty 12, notional 4.8 < 5
    expect(() => size(100, 0.05, 0.4, ADA_RULES)).toThrow(InsufficientBalanceError);
  });

  it('should throw InsufficientBalanceError for an empty balance', () => {
    expect(() => size(0, 0.05, 0.4)).toThrow(InsufficientBalanceError);
  });

  it('should reject a non-positive price', () => {
    expect(() => size(1000, 0.05, 0)).toThrow(RangeError);
  });
});

describe('size sweep', () => {
  const balances = [0, 3, 10, 99.99, 1000, 12345.67];
  const fractions = [0.01, 0.05, 0.333, 1];
  const prices = [0.0001234, 0.4, 1.1, 63250.5];
  const ruleSets: Array<SymbolRules | undefined> = [
    undefined,
    { stepSize: 1, minQty: 1, tickSize: 0.0001, minNotional: 5 },
    { stepSize: 0.001, minQty: 0.001, tickSize: 0.01, minNotional: 5 },
    { stepSize: 1e-8, minQty: 1e-8, tickSize: 0.01, minNotional: 10 },
  ];

  it('should never spend more than balance × fraction', () => {
    let sized = 0;
    for (const balance of balances) {
      for (const pct of fractions) {
        for (const price of prices) {
          for (const rules of ruleSets) {
            let qty: number;
            try {
              qty = size(balance, pct, price, rules);
            } catch (err) {
              expect(err).toBeInstanceOf(InsufficientBalanceError);
              continue;
            }
            sized++;
            expect(qty).toBeGreaterThan(0);
            expect(qty * price).toBeLessThanOrEqual(balance * pct);
            if (rules) {
              const units = qty / rules.stepSize;
              expect(Math.abs(units - Math.round(units))).toBeLessThan(1e-6);
              expect(qty).toBeGreaterThanOrEqual(rules.minQty);
              expect(qty * price).toBeGreaterThanOrEqual(rules.minNotional);
            }
          }
        }
      }
    }
    expect(sized).toBeGreaterThan(0);
  });
});

describe('sizeWithinCap', () => {
  it('should size normally when nothing is committed', () => {
    expect(sizeWithinCap(1000, 0, 0.05, 0.4, ADA_RULES)).toBe(125);
  });

  it('should refuse a second allocation once the pair cap is used', () => {
    // 50 already committed out of (950 + 50) × 0.05 = 50
    expect(() => sizeWithinCap(950, 50, 0.05, 0.4, ADA_RULES)).toThrow(InsufficientBalanceError);
  });

  it('should allow only the remaining headroom', () => {
    // total 1000 × 0.5 = 500 cap, 200 committed → 300 left
    const qty = sizeWithinCap(800, 200, 0.5, 1, { stepSize: 1, minQty: 1, tickSize: 0.01, minNotional: 1 });
    expect(qty).toBe(300);
  });
});

describe('sizeFixed', () => {
  const rules: SymbolRules = { stepSize: 0.001, minQty: 0.001, tickSize: 0.01, minNotional: 1 };

  it('should accept a quote the balance covers', () => {
    expect(sizeFixed(1000, 10, 99.9, 'BUY', rules)).toBe(10);
  });

  it('should reject a bid the quote balance cannot cover', () => {
    expect(() => sizeFixed(500, 10, 99.9, 'BUY', rules)).toThrow(InsufficientBalanceError);
  });

  it('should check the base balance for asks', () => {
    expect(sizeFixed(10, 10, 100.1, 'SELL', rules)).toBe(10);
    expect(() => sizeFixed(9.5, 10, 100.1, 'SELL', rules)).toThrow(InsufficientBalanceError);
  });
});

describe('sizeExit', () => {
  it('should cap the exit at the base balance left after fees', () => {
    expect(sizeExit(125, 124.875, 0.39, { stepSize: 0.1, minQty: 0.1, tickSize: 0.0001, minNotional: 5 })).toBe(124.8);
  });

  it('should sell the full holding when the balance covers it', () => {
    expect(sizeExit(125, 300, 0.39, ADA_RULES)).toBe(125);
  });
});

describe('exit thresholds', () => {
  it('should fix stop and target from the entry price', () => {
    expect(stopLossPrice(0.4, 0.015)).toBeCloseTo(0.394, 10);
    expect(profitTargetPrice(0.4, 0.03)).toBeCloseTo(0.412, 10);
  });

  it('should signal STOP_LOSS when price falls to 0.393', () => {
    const position = { stopLossPrice: stopLossPrice(0.4, 0.015), profitTargetPrice: profitTargetPrice(0.4, 0.03) };
    expect(checkExit(position, 0.393)).toBe('STOP_LOSS');
    expect(checkExit(position, 0.413)).toBe('PROFIT_TARGET');
    expect(checkExit(position, 0.4)).toBeNull();
  });

  it('should prefer STOP_LOSS when both conditions hold', () => {
    expect(checkExit({ stopLossPrice: 1.05, profitTargetPrice: 1.0 }, 1.02)).toBe('STOP_LOSS');
  });
});

describe('step rounding', () => {
  it('should count step decimals including exponent notation', () => {
    expect(stepDecimals(0.001)).toBe(3);
    expect(stepDecimals(1)).toBe(0);
    expect(stepDecimals(1e-8)).toBe(8);
  });

  it('should floor and ceil to the step', () => {
    expect(floorToStep(0.123456, 0.001)).toBe(0.123);
    expect(ceilToStep(0.123456, 0.001)).toBe(0.124);
    expect(floorToStep(0.3, 0.1)).toBe(0.3);
    expect(ceilToStep(100.1, 0.01)).toBe(100.1);
  });
});

import { describe, it, expect } from 'vitest';
import { EMA, TimeframeEma } from '../src/indicators/ema.js';

describe('EMA', () => {
  it('should compute EMA correctly', () => {
    const ema = new EMA(3);
    ema.update(10);
    ema.update(20);
    const v = ema.update(30); // SMA seed = 20
    expect(ema.isReady).toBe(true);
    expect(v).toBeCloseTo(20, 5);

    // EMA = (40 - 20) * 0.5 + 20 = 30
    const v2 = ema.update(40);
    expect(v2).toBeCloseTo(30, 5);
  });

  it('should reject a non-integer period', () => {
    expect(() => new EMA(0)).toThrow('period');
    expect(() => new EMA(2.5)).toThrow('period');
  });
});

describe('TimeframeEma', () => {
  it('should stay undefined until the period is filled', () => {
    const ema = new TimeframeEma(2, 1000);
    ema.observe(1, 0);
    expect(ema.value).toBeUndefined();
    ema.observe(2, 1000); // 0번 봉 종가 1
    expect(ema.value).toBeUndefined();
    ema.observe(3, 2000); // 1번 봉 종가 2 → SMA 1.5
    expect(ema.value).toBeCloseTo(1.5, 10);
  });

  it('should fold the last price of each finished bucket after seeding', () => {
    const ema = new TimeframeEma(2, 1000);
    ema.seed([1, 2, 3], 2999);
    expect(ema.value).toBeCloseTo(2.5, 10);

    ema.observe(4, 3100);
    ema.observe(5, 3900);
    expect(ema.value).toBeCloseTo(2.5, 10);

    ema.observe(6, 4050); // 3번 봉 종가 5: (5 - 2.5) × 2/3 + 2.5
    expect(ema.value).toBeCloseTo(2.5 + 2.5 * (2 / 3), 10);

    ema.observe(1, 3500); // 지난 봉 관측은 무시
    ema.observe(7, 5000); // 4번 봉 종가 6
    const expected = (6 - (2.5 + 2.5 * (2 / 3))) * (2 / 3) + (2.5 + 2.5 * (2 / 3));
    expect(ema.value).toBeCloseTo(expected, 10);
  });
});

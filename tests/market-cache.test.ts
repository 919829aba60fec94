import { describe, it, expect } from 'vitest';
import { MarketCache } from '../src/engine/market-cache.js';
import { StaleDataError } from '../src/errors.js';
import { parsePair } from '../src/types/index.js';
import { FakeGateway } from './helpers/fake-gateway.js';

const ADA = parsePair('ADA/USDT');

function cache(): MarketCache {
  return new MarketCache({ intervalMs: 1000, emaPeriod: 2, emaTimeframe: '1m', emaTimeframeMs: 60_000 });
}

describe('MarketCache', () => {
  it('should treat a missing snapshot as stale', () => {
    expect(() => cache().latest('ADA/USDT', 0)).toThrow(StaleDataError);
  });

  it('should serve snapshots up to twice the polling interval old', () => {
    const c = cache();
    expect(c.maxAgeMs).toBe(2000);
    c.update(ADA, { bid: 0.3999, ask: 0.4, last: 0.4, timestamp: 10_000 });

    expect(c.latest('ADA/USDT', 12_000).last).toBe(0.4);
    try {
      c.latest('ADA/USDT', 12_001);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(StaleDataError);
      if (err instanceof StaleDataError) expect(err.ageMs).toBe(2001);
    }
    // 상태 조회는 신선도와 무관
    expect(c.peek('ADA/USDT')?.timestamp).toBe(10_000);
  });

  it('should keep the previous snapshot for cross detection', () => {
    const c = cache();
    c.update(ADA, { bid: 1, ask: 1, last: 1, timestamp: 1_000 });
    c.update(ADA, { bid: 2, ask: 2, last: 2, timestamp: 2_000 });
    expect(c.previous('ADA/USDT')?.last).toBe(1);
    expect(c.latest('ADA/USDT', 2_000).last).toBe(2);
  });

  it('should warm the EMA from closed candles', async () => {
    const gateway = new FakeGateway(() => 0);
    gateway.closes = [
      { close: 1, closeTime: 59_999 },
      { close: 2, closeTime: 119_999 },
      { close: 3, closeTime: 179_999 },
    ];
    const c = cache();
    await c.warmUp(ADA, gateway);
    expect(gateway.callsOf('getCloses')).toEqual([['ADA/USDT', '1m', 6]]);

    const snapshot = c.update(ADA, { bid: 3.1, ask: 3.1, last: 3.1, timestamp: 185_000 });
    expect(snapshot.ema).toBeCloseTo(2.5, 10);
  });
});

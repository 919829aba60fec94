import { describe, it, expect, vi, afterEach } from 'vitest';
import { PairScheduler, startStatusReport } from '../src/engine/scheduler.js';
import { PairEngine } from '../src/engine/pair-engine.js';
import { EventBus } from '../src/engine/event-bus.js';
import { MarketCache } from '../src/engine/market-cache.js';
import { BalanceLedger } from '../src/risk/balance-ledger.js';
import { parsePair } from '../src/types/index.js';
import { FakeGateway } from './helpers/fake-gateway.js';

const NOW = 1_700_000_000_000;

function setup(): { gateway: FakeGateway; engines: PairEngine[] } {
  const gateway = new FakeGateway(() => NOW);
  gateway.setTicker('ADA/USDT', 0.3999, 0.4, 0.4);
  gateway.setTicker('XRP/USDT', 0.4999, 0.5, 0.5);
  gateway.setBalance('USDT', 1000);
  const ledger = new BalanceLedger();
  const cache = new MarketCache({ intervalMs: 30_000, emaPeriod: 5, emaTimeframe: '5m', emaTimeframeMs: 300_000 });
  const bus = new EventBus();
  const engines = ['ADA/USDT', 'XRP/USDT'].map(
    (symbol) =>
      new PairEngine(
        parsePair(symbol),
        {
          strategy: { kind: 'scalping', balancePct: 0.05 },
          thresholds: { stopLossPct: 0.015, profitTargetPct: 0.03 },
          entryTimeoutMs: 90_000,
          maxConsecutiveFailures: 5,
          now: () => NOW,
        },
        { gateway, ledger, cache, bus },
      ),
  );
  return { gateway, engines };
}

function tickerCalls(gateway: FakeGateway, symbol: string): number {
  return gateway.callsOf('getTicker').filter(([s]) => s === symbol).length;
}

describe('PairScheduler', () => {
  let scheduler: PairScheduler | undefined;

  afterEach(async () => {
    await scheduler?.stop();
  });

  it('should tick every pair repeatedly until stopped', async () => {
    const { gateway, engines } = setup();
    scheduler = new PairScheduler(engines, { intervalMs: 10, staggerMs: 0 });
    scheduler.start();
    expect(scheduler.isRunning).toBe(true);

    await vi.waitFor(() => {
      expect(tickerCalls(gateway, 'ADA/USDT')).toBeGreaterThanOrEqual(2);
      expect(tickerCalls(gateway, 'XRP/USDT')).toBeGreaterThanOrEqual(2);
    });

    await scheduler.stop();
    expect(scheduler.isRunning).toBe(false);
    const after = gateway.callsOf('getTicker').length;
    await new Promise((r) => setTimeout(r, 30));
    expect(gateway.callsOf('getTicker').length).toBe(after);
  });

  it('should stagger pair starts and wake sleeping loops on stop', async () => {
    const { gateway, engines } = setup();
    scheduler = new PairScheduler(engines, { intervalMs: 60_000, staggerMs: 60_000 });
    scheduler.start();

    await vi.waitFor(() => expect(tickerCalls(gateway, 'ADA/USDT')).toBe(1));
    expect(tickerCalls(gateway, 'XRP/USDT')).toBe(0);

    const started = Date.now();
    await scheduler.stop();
    expect(Date.now() - started).toBeLessThan(1_000);
    expect(tickerCalls(gateway, 'XRP/USDT')).toBe(0);
  });

  it('should route pair controls and report per-pair state', async () => {
    const { engines } = setup();
    scheduler = new PairScheduler(engines, { intervalMs: 60_000, staggerMs: 0 });
    await engines[0]?.tick();

    expect(scheduler.pause('XRP/USDT')).toBe(true);
    expect(scheduler.pause('DOGE/USDT')).toBe(false);
    expect(scheduler.resume('XRP/USDT')).toBe(true);
    expect(scheduler.reset('XRP/USDT')).toBe(false);
    expect(scheduler.positions('ADA/USDT')).toHaveLength(1);
    expect(scheduler.positions('DOGE/USDT')).toBeUndefined();

    const [ada, xrp] = scheduler.report();
    expect(ada).toEqual({
      status: { symbol: 'ADA/USDT', state: 'RUNNING', consecutiveFailures: 0, lastTickAt: NOW },
      openPositions: 1,
      pendingOrders: 0,
      liveQuotes: 0,
      lastPrice: 0.4,
    });
    expect(xrp).toEqual({
      status: { symbol: 'XRP/USDT', state: 'RUNNING', consecutiveFailures: 0 },
      openPositions: 0,
      pendingOrders: 0,
      liveQuotes: 0,
    });
  });
});

describe('startStatusReport', () => {
  it('should stay off for an empty or invalid expression', () => {
    const { engines } = setup();
    const scheduler = new PairScheduler(engines, { intervalMs: 60_000, staggerMs: 0 });
    expect(startStatusReport('', scheduler, () => undefined)).toBeNull();
    expect(startStatusReport('every morning', scheduler, () => undefined)).toBeNull();
  });

  it('should schedule a valid expression', () => {
    const { engines } = setup();
    const scheduler = new PairScheduler(engines, { intervalMs: 60_000, staggerMs: 0 });
    const task = startStatusReport('*/15 * * * *', scheduler, () => undefined);
    expect(task).not.toBeNull();
    task?.stop();
  });
});

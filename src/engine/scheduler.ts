import cron from 'node-cron';
import { createChildLogger } from '../logger.js';
import type { PairStatus, Position } from '../types/index.js';
import type { PairEngine } from './pair-engine.js';

const log = createChildLogger('scheduler');

export interface SchedulerOptions {
  intervalMs: number;
  /** 페어 루프 시작 간격 (ms) */
  staggerMs: number;
}

export interface PairReport {
  readonly status: PairStatus;
  readonly openPositions: number;
  readonly pendingOrders: number;
  readonly liveQuotes: number;
  readonly lastPrice?: number;
}

/**
 * 페어별 순차 루프
 *
 * - 페어마다 독립 루프: 한 페어의 틱은 겹치지 않고, 다른 페어의 실패/지연과 무관
 * - 시작은 staggerMs 간격으로 분산 (호출 몰림 방지)
 * - pause/resume 은 틱 사이에서만 적용
 * - stop() 은 진행 중인 틱이 끝날 때까지 기다린다
 */
export class PairScheduler {
  private readonly engines = new Map<string, PairEngine>();
  private readonly wakers = new Set<() => void>();
  private loops: Promise<void>[] = [];
  private running = false;

  constructor(
    engines: readonly PairEngine[],
    private readonly opts: SchedulerOptions,
  ) {
    for (const engine of engines) this.engines.set(engine.pair.symbol, engine);
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    let index = 0;
    for (const engine of this.engines.values()) {
      const delayMs = index * this.opts.staggerMs;
      this.loops.push(
        this.loop(engine, delayMs).catch((err) => {
          log.error({ err, pair: engine.pair.symbol }, 'Pair loop crashed');
        }),
      );
      index++;
    }
    log.info({ pairs: [...this.engines.keys()], intervalMs: this.opts.intervalMs }, 'Scheduler started');
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    for (const wake of this.wakers) wake();
    await Promise.all(this.loops);
    this.loops = [];
    log.info('Scheduler stopped');
  }

  get(symbol: string): PairEngine | undefined {
    return this.engines.get(symbol);
  }

  pause(symbol: string): boolean {
    return this.engines.get(symbol)?.pause() ?? false;
  }

  resume(symbol: string): boolean {
    return this.engines.get(symbol)?.resume() ?? false;
  }

  reset(symbol: string): boolean {
    return this.engines.get(symbol)?.reset() ?? false;
  }

  positions(symbol: string): readonly Readonly<Position>[] | undefined {
    return this.engines.get(symbol)?.tracker.active();
  }

  report(): PairReport[] {
    return [...this.engines.values()].map((engine) => {
      const active = engine.tracker.active();
      const quotes = engine.liveQuotes();
      const report: PairReport = {
        status: engine.status(),
        openPositions: active.filter((p) => p.state === 'OPEN').length,
        pendingOrders: active.filter((p) => p.state !== 'OPEN').length,
        liveQuotes: (quotes.bid ? 1 : 0) + (quotes.ask ? 1 : 0),
      };
      const price = engine.lastPrice();
      return price !== undefined ? { ...report, lastPrice: price } : report;
    });
  }

  private async loop(engine: PairEngine, delayMs: number): Promise<void> {
    await this.sleep(delayMs);
    if (!this.running) return;
    await engine.warmUp();
    while (this.running) {
      const started = Date.now();
      await engine.tick();
      const elapsed = Date.now() - started;
      await this.sleep(Math.max(0, this.opts.intervalMs - elapsed));
    }
  }

  /** stop() 시 즉시 깨어나는 대기 */
  private sleep(ms: number): Promise<void> {
    if (ms <= 0 || !this.running) return Promise.resolve();
    return new Promise((resolve) => {
      const wake = (): void => {
        clearTimeout(timer);
        this.wakers.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, ms);
      this.wakers.add(wake);
    });
  }
}

/**
 * 주기 상태 리포트 (node-cron). 빈 표현식이면 미사용
 */
export function startStatusReport(
  expression: string,
  scheduler: PairScheduler,
  onReport: (reports: PairReport[]) => void | Promise<void>,
): cron.ScheduledTask | null {
  if (!expression) return null;
  if (!cron.validate(expression)) {
    log.warn({ expression }, 'Invalid status report cron expression; report disabled');
    return null;
  }
  const task = cron.schedule(expression, () => {
    Promise.resolve(onReport(scheduler.report())).catch((err) => {
      log.error({ err }, 'Status report callback error');
    });
  });
  log.info({ expression }, 'Status report scheduled');
  return task;
}

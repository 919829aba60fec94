import type { Server } from 'node:http';
import { config, loadTradingConfig, timeframeToMs, type TradingConfig } from './config.js';
import { ConfigError, describeError } from './errors.js';
import { createChildLogger } from './logger.js';
import { getDb, closeDb } from './db/database.js';
import { StateStore } from './store/state-store.js';
import { AuditLog } from './safety/audit-log.js';
import { BinanceGateway } from './execution/binance-gateway.js';
import { BalanceLedger } from './risk/balance-ledger.js';
import { EventBus } from './engine/event-bus.js';
import { MarketCache } from './engine/market-cache.js';
import { PairEngine } from './engine/pair-engine.js';
import { PairScheduler, startStatusReport } from './engine/scheduler.js';
import { strategyFromConfig } from './strategy/strategy.js';
import { Notifier } from './notification/notifier.js';
import { startApiServer } from './api-server.js';

const log = createChildLogger('main');

function loadConfigOrExit(): TradingConfig {
  try {
    return loadTradingConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      log.fatal({ key: err.key }, err.message);
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const cfg = loadConfigOrExit();
  log.info(
    {
      strategy: cfg.strategy,
      pairs: cfg.pairs.map((p) => p.symbol),
      sandbox: cfg.sandboxMode,
      intervalMs: cfg.tradeIntervalMs,
    },
    'Starting spot trader',
  );

  // ── DB / 복구 저장소 ──
  const db = getDb();
  const store = new StateStore(db);
  const audit = new AuditLog(db);
  const notifier = new Notifier();

  // ── 이벤트 싱크 ──
  const bus = new EventBus((err, event) => {
    log.error({ err, type: event.type }, 'Event handler error');
  });
  bus.onAny((event) => audit.record(event));
  bus.onAny((event) => notifier.handle(event));

  // ── 공용 컴포넌트 ──
  const gateway = new BinanceGateway({
    apiKey: cfg.apiKey,
    apiSecret: cfg.apiSecret,
    sandboxMode: cfg.sandboxMode,
    baseUrl: cfg.baseUrl,
    maxRetries: cfg.maxRetries,
  });
  const ledger = new BalanceLedger();
  for (const reservation of store.loadReservations()) ledger.restore(reservation);

  const cache = new MarketCache({
    intervalMs: cfg.tradeIntervalMs,
    emaPeriod: cfg.emaPeriod,
    emaTimeframe: cfg.emaTimeframe,
    emaTimeframeMs: timeframeToMs(cfg.emaTimeframe),
  });

  const strategy = strategyFromConfig(cfg);
  const engines = cfg.pairs.map((pair) => {
    const engine = new PairEngine(
      pair,
      {
        strategy,
        thresholds: { stopLossPct: cfg.stopLossPct, profitTargetPct: cfg.profitTargetPct },
        entryTimeoutMs: cfg.tradeIntervalMs * cfg.entryTimeoutMultiple,
        maxConsecutiveFailures: cfg.maxConsecutiveFailures,
      },
      { gateway, ledger, cache, bus, store },
    );
    engine.restore();
    return engine;
  });

  // ── 스케줄러 ──
  const scheduler = new PairScheduler(engines, {
    intervalMs: cfg.tradeIntervalMs,
    staggerMs: cfg.pairStartStaggerMs,
  });
  scheduler.start();

  const reportTask = startStatusReport(config.statusReportCron, scheduler, (reports) => {
    for (const r of reports) {
      log.info({ pair: r.status.symbol, ...r }, 'Status report');
    }
    notifier.notifyStatus(reports);
  });

  // ── 관리 API ──
  let server: Server | null = null;
  if (config.apiServerPort > 0) {
    server = startApiServer(scheduler, config.apiServerPort);
  }

  audit.info('main', 'BOT_STARTED', `strategy=${cfg.strategy} pairs=${cfg.pairs.map((p) => p.symbol).join(',')}`);
  notifier.notifyStartup(cfg.strategy, cfg.pairs.map((p) => p.symbol), cfg.sandboxMode);

  // ── Graceful shutdown ──
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');
    audit.info('main', 'SHUTDOWN', signal);

    reportTask?.stop();
    server?.close();
    // 진행 중인 틱 완료 대기 (주문 제출 도중 종료 방지)
    await scheduler.stop();

    notifier.notifyShutdown();
    await notifier.flush();
    closeDb();
    log.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err) => {
      log.error({ err: describeError(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  log.info('Bot running');
}

main().catch((err) => {
  log.fatal({ err }, 'Fatal error');
  process.exit(1);
});

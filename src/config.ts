import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { parsePair, type TradingPair } from './types/index.js';

dotenv.config();

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  return v !== undefined && v !== '' ? Number(v) : fallback;
}

/**
 * 프로세스 공통 설정 (로그, DB, 알림, 관리 API).
 * 잘못된 값이 있어도 기동을 막지 않는다. 트레이딩 설정 검증은 loadTradingConfig 담당.
 */
export const config = {
  db: {
    path: env('DB_PATH', './data/spot-trader.db'),
  },

  log: {
    level: env('LOG_LEVEL', 'info'),
  },

  telegram: {
    enabled: env('TELEGRAM_ENABLED', 'false') === 'true',
    botToken: env('TELEGRAM_BOT_TOKEN', ''),
    chatId: env('TELEGRAM_CHAT_ID', ''),
  },

  /** 관리 API 포트 (0이면 미기동) */
  apiServerPort: envNum('API_SERVER_PORT', 4000),

  /** 상태 리포트 cron 표현식 (빈 문자열이면 미사용) */
  statusReportCron: env('STATUS_REPORT_CRON', '*/15 * * * *'),
} as const;

export const STRATEGY_KINDS = ['scalping', 'market_making', 'trend_following'] as const;
export type StrategyKind = (typeof STRATEGY_KINDS)[number];

export const EMA_TIMEFRAMES = ['1m', '3m', '5m', '15m', '30m', '1h', '2h', '4h', '1d'] as const;
export type EmaTimeframe = (typeof EMA_TIMEFRAMES)[number];

export type DowntrendAction = 'exit' | 'hold';

export interface TradingConfig {
  readonly apiKey: string;
  readonly apiSecret: string;
  readonly sandboxMode: boolean;
  readonly baseUrl: string | undefined;
  readonly pairs: readonly TradingPair[];
  readonly strategy: StrategyKind;
  /** 틱 간격 (ms) */
  readonly tradeIntervalMs: number;
  readonly stopLossPct: number;
  readonly profitTargetPct: number;
  readonly balancePct: number;
  readonly mmSpreadPct: number;
  readonly mmOrderSize: number;
  /** 재호가 기준: 스프레드 대비 mid 이동 비율 */
  readonly mmRequoteThreshold: number;
  readonly emaTimeframe: EmaTimeframe;
  readonly emaPeriod: number;
  readonly downtrendProtect: boolean;
  readonly buyOnly: boolean;
  /** DOWNTREND_PROTECT + BUY_ONLY 동시 사용 시 보유 포지션 처리 (추세추종 전용) */
  readonly buyOnlyDowntrendAction: DowntrendAction | undefined;
  readonly tradingFee: number;
  readonly maxConsecutiveFailures: number;
  readonly entryTimeoutMultiple: number;
  readonly pairStartStaggerMs: number;
  readonly maxRetries: number;
}

const boolFromEnv = z
  .enum(['true', 'false', '1', '0', 'TRUE', 'FALSE', 'True', 'False'])
  .transform((v) => v.toLowerCase() === 'true' || v === '1');

const fraction = z.coerce.number().gt(0).lt(1);

const tradingEnvSchema = z.object({
  API_KEY: z.string().min(1, 'API_KEY must be set'),
  API_SECRET: z.string().min(1, 'API_SECRET must be set'),
  SANDBOX_MODE: boolFromEnv.default('true'),
  BINANCE_BASE_URL: z.string().url().optional(),
  TRADING_PAIRS: z.string().default('ADA/USDT'),
  STRATEGY: z.enum(STRATEGY_KINDS).default('scalping'),
  TRADE_INTERVAL: z.coerce.number().positive().default(30),
  STOP_LOSS_PERCENTAGE: fraction.default(0.015),
  PROFIT_TARGET_PERCENTAGE: fraction.default(0.03),
  PERCENTAGE_OF_BALANCE: z.coerce.number().gt(0).lte(1).default(0.05),
  MM_SPREAD_PERCENTAGE: fraction.default(0.002),
  MM_ORDER_SIZE: z.coerce.number().positive().default(10),
  MM_REQUOTE_THRESHOLD: z.coerce.number().positive().default(0.5),
  MOVING_EMA_TIMEFRAME: z.enum(EMA_TIMEFRAMES).default('5m'),
  MOVING_EMA_PERIOD: z.coerce.number().int().min(1).default(5),
  DOWNTREND_PROTECT: boolFromEnv.default('false'),
  BUY_ONLY: boolFromEnv.default('false'),
  BUY_ONLY_DOWNTREND_ACTION: z.enum(['exit', 'hold']).optional(),
  TRADING_FEE: z.coerce.number().min(0).lt(1).default(0.001),
  MAX_CONSECUTIVE_FAILURES: z.coerce.number().int().min(1).default(5),
  ENTRY_TIMEOUT_MULTIPLE: z.coerce.number().positive().default(3),
  PAIR_START_STAGGER_SECONDS: z.coerce.number().min(0).default(5),
  MAX_RETRIES: z.coerce.number().int().min(0).default(3),
});

/** 빈 문자열은 미설정으로 취급 (docker --env-file 등) */
function stripEmpty(source: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(source)) {
    if (v !== undefined && v.trim() !== '') out[k] = v.trim();
  }
  return out;
}

function parsePairs(raw: string): TradingPair[] {
  const pairs: TradingPair[] = [];
  for (const item of raw.split(',')) {
    const text = item.trim();
    if (!text) continue;
    let pair: TradingPair;
    try {
      pair = parsePair(text);
    } catch (err) {
      throw new ConfigError('TRADING_PAIRS', err instanceof Error ? err.message : String(err));
    }
    if (pairs.some((p) => p.symbol === pair.symbol)) {
      throw new ConfigError('TRADING_PAIRS', `duplicate pair ${pair.symbol}`);
    }
    pairs.push(pair);
  }
  if (pairs.length === 0) {
    throw new ConfigError('TRADING_PAIRS', 'at least one pair is required');
  }
  return pairs;
}

/**
 * 트레이딩 설정 로드 + 검증. 실패 시 ConfigError (기동 중단).
 */
export function loadTradingConfig(source: NodeJS.ProcessEnv = process.env): TradingConfig {
  const parsed = tradingEnvSchema.safeParse(stripEmpty(source));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue ? issue.path.join('.') : 'unknown';
    throw new ConfigError(key, issue?.message ?? parsed.error.message);
  }
  const e = parsed.data;

  if (e.STRATEGY === 'market_making' && e.MM_SPREAD_PERCENTAGE < 2 * e.TRADING_FEE) {
    throw new ConfigError(
      'MM_SPREAD_PERCENTAGE',
      `spread ${e.MM_SPREAD_PERCENTAGE} does not cover round-trip fees ${2 * e.TRADING_FEE}`,
    );
  }

  // 하락 추세 감지 시 BUY_ONLY 포지션을 청산할지 보유할지는 운영자가 명시해야 한다
  const needsDowntrendAction =
    e.STRATEGY === 'trend_following' && e.DOWNTREND_PROTECT && e.BUY_ONLY;
  if (needsDowntrendAction && !e.BUY_ONLY_DOWNTREND_ACTION) {
    throw new ConfigError(
      'BUY_ONLY_DOWNTREND_ACTION',
      'DOWNTREND_PROTECT and BUY_ONLY are both enabled; set BUY_ONLY_DOWNTREND_ACTION to exit or hold',
    );
  }

  return {
    apiKey: e.API_KEY,
    apiSecret: e.API_SECRET,
    sandboxMode: e.SANDBOX_MODE,
    baseUrl: e.BINANCE_BASE_URL,
    pairs: parsePairs(e.TRADING_PAIRS),
    strategy: e.STRATEGY,
    tradeIntervalMs: e.TRADE_INTERVAL * 1000,
    stopLossPct: e.STOP_LOSS_PERCENTAGE,
    profitTargetPct: e.PROFIT_TARGET_PERCENTAGE,
    balancePct: e.PERCENTAGE_OF_BALANCE,
    mmSpreadPct: e.MM_SPREAD_PERCENTAGE,
    mmOrderSize: e.MM_ORDER_SIZE,
    mmRequoteThreshold: e.MM_REQUOTE_THRESHOLD,
    emaTimeframe: e.MOVING_EMA_TIMEFRAME,
    emaPeriod: e.MOVING_EMA_PERIOD,
    downtrendProtect: e.DOWNTREND_PROTECT,
    buyOnly: e.BUY_ONLY,
    buyOnlyDowntrendAction: needsDowntrendAction ? e.BUY_ONLY_DOWNTREND_ACTION : undefined,
    tradingFee: e.TRADING_FEE,
    maxConsecutiveFailures: e.MAX_CONSECUTIVE_FAILURES,
    entryTimeoutMultiple: e.ENTRY_TIMEOUT_MULTIPLE,
    pairStartStaggerMs: e.PAIR_START_STAGGER_SECONDS * 1000,
    maxRetries: e.MAX_RETRIES,
  };
}

/** 타임프레임 문자열 → ms */
export function timeframeToMs(tf: EmaTimeframe): number {
  const unit = tf.slice(-1);
  const n = Number(tf.slice(0, -1));
  switch (unit) {
    case 'm':
      return n * 60_000;
    case 'h':
      return n * 3_600_000;
    default:
      return n * 86_400_000;
  }
}

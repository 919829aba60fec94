import pino from 'pino';
import { config } from './config.js';
import type { TradingPair } from './types/index.js';

export const logger = pino({
  level: config.log.level,
  transport: {
    target: 'pino/file',
    options: { destination: 1 }, // stdout
  },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}

/** 페어별 로그: 모든 라인에 pair 필드 */
export function createPairLogger(module: string, pair: TradingPair): Logger {
  return logger.child({ module, pair: pair.symbol });
}

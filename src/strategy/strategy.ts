import type {
  ExchangeOrder,
  ExitReason,
  MarketSnapshot,
  OrderSide,
  Position,
  QuotedOrderPair,
  SymbolRules,
  TradingPair,
} from '../types/index.js';
import type { DowntrendAction, TradingConfig } from '../config.js';
import { evaluateScalping } from './scalping.js';
import { evaluateMarketMaking } from './market-making.js';
import { evaluateTrendFollowing } from './trend-following.js';

/** 주문 목적: 실행 결과를 포지션/호가 상태에 반영하는 데 사용 */
export type PlaceIntent =
  | { readonly type: 'ENTRY' }
  | { readonly type: 'EXIT'; readonly positionId: string; readonly reason: ExitReason }
  | { readonly type: 'QUOTE'; readonly referenceMid: number };

export interface PlaceAction {
  readonly kind: 'PLACE';
  readonly side: OrderSide;
  readonly quantity: number;
  /** 지정가 또는 시장가 */
  readonly price: number | 'MARKET';
  readonly intent: PlaceIntent;
}

export interface CancelAction {
  readonly kind: 'CANCEL';
  readonly orderId: string;
  readonly reason: string;
}

export interface ModifyAction {
  readonly kind: 'MODIFY';
  readonly orderId: string;
  readonly newPrice: number;
}

export type OrderAction = PlaceAction | CancelAction | ModifyAction;

export interface ScalpingConfig {
  readonly kind: 'scalping';
  readonly balancePct: number;
}

export interface MarketMakingConfig {
  readonly kind: 'market_making';
  readonly spreadPct: number;
  readonly orderSize: number;
  /** 스프레드 대비 mid 이동 비율 (0.5 = 스프레드의 50%) */
  readonly requoteThreshold: number;
  /** 호가 최대 유지 시간 (ms) */
  readonly maxQuoteAgeMs: number;
  readonly buyOnly: boolean;
  readonly downtrendProtect: boolean;
}

export interface TrendFollowingConfig {
  readonly kind: 'trend_following';
  readonly balancePct: number;
  readonly downtrendProtect: boolean;
  readonly buyOnly: boolean;
  /** downtrendProtect + buyOnly 동시 사용 시 필수 */
  readonly buyOnlyDowntrendAction?: DowntrendAction;
}

/** 전략 변형은 닫힌 합 타입: switch 완전성 검사 */
export type StrategyConfig = ScalpingConfig | MarketMakingConfig | TrendFollowingConfig;

/** 틱 입력 (모든 전략 공통 계약) */
export interface StrategyContext {
  readonly pair: TradingPair;
  readonly snapshot: MarketSnapshot;
  /** 직전 스냅샷: 교차 판정용 */
  readonly previous?: MarketSnapshot;
  /** 이 페어의 미종결 포지션 */
  readonly positions: readonly Readonly<Position>[];
  readonly openOrders: readonly ExchangeOrder[];
  readonly quotes: Readonly<QuotedOrderPair>;
  /** 원장 예약 차감 후 가용 잔고 */
  readonly balances: { readonly quote: number; readonly base: number };
  /** 이 페어에 이미 묶인 쿼트 자산 (배분 상한 집계) */
  readonly committedQuote: number;
  readonly rules: SymbolRules;
  readonly now: number;
}

export interface Evaluation {
  readonly actions: OrderAction[];
  /** 이번 틱에 건너뛴 판단 사유 (로그용) */
  readonly skipped: string[];
}

/**
 * 전략 평가: 동기, I/O 없음
 */
export function evaluate(ctx: StrategyContext, cfg: StrategyConfig): Evaluation {
  switch (cfg.kind) {
    case 'scalping':
      return evaluateScalping(ctx, cfg);
    case 'market_making':
      return evaluateMarketMaking(ctx, cfg);
    case 'trend_following':
      return evaluateTrendFollowing(ctx, cfg);
    default: {
      const never: never = cfg;
      throw new Error(`Unknown strategy ${JSON.stringify(never)}`);
    }
  }
}

/**
 * 설정 → 전략 변형. 호가 최대 유지 시간은 진입 타임아웃과 같은 기준
 */
export function strategyFromConfig(cfg: TradingConfig): StrategyConfig {
  switch (cfg.strategy) {
    case 'scalping':
      return { kind: 'scalping', balancePct: cfg.balancePct };
    case 'market_making':
      return {
        kind: 'market_making',
        spreadPct: cfg.mmSpreadPct,
        orderSize: cfg.mmOrderSize,
        requoteThreshold: cfg.mmRequoteThreshold,
        maxQuoteAgeMs: cfg.tradeIntervalMs * cfg.entryTimeoutMultiple,
        buyOnly: cfg.buyOnly,
        downtrendProtect: cfg.downtrendProtect,
      };
    case 'trend_following':
      return {
        kind: 'trend_following',
        balancePct: cfg.balancePct,
        downtrendProtect: cfg.downtrendProtect,
        buyOnly: cfg.buyOnly,
        ...(cfg.buyOnlyDowntrendAction ? { buyOnlyDowntrendAction: cfg.buyOnlyDowntrendAction } : {}),
      };
  }
}

import { StaleDataError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { TimeframeEma } from '../indicators/ema.js';
import type { MarketSnapshot, Ticker, TradingPair } from '../types/index.js';
import type { ExchangeGateway } from '../execution/exchange-gateway.js';

const log = createChildLogger('market-cache');

export interface MarketCacheOptions {
  /** 폴링 간격 (ms): 신선도 기준은 2배 */
  intervalMs: number;
  emaPeriod: number;
  emaTimeframe: string;
  emaTimeframeMs: number;
}

interface PairMarket {
  readonly ema: TimeframeEma;
  current?: MarketSnapshot;
  previous?: MarketSnapshot;
}

/**
 * 페어별 최근 시세 + EMA
 * 오래된 스냅샷은 latest()에서 StaleDataError: 판단에 쓰이지 않는다.
 */
export class MarketCache {
  private readonly markets = new Map<string, PairMarket>();

  constructor(private readonly opts: MarketCacheOptions) {}

  get maxAgeMs(): number {
    return this.opts.intervalMs * 2;
  }

  /** 과거 종가로 EMA 워밍업 */
  async warmUp(pair: TradingPair, gateway: ExchangeGateway): Promise<void> {
    const market = this.market(pair);
    const closes = await gateway.getCloses(pair, this.opts.emaTimeframe, this.opts.emaPeriod * 3);
    const last = closes.at(-1);
    market.ema.seed(
      closes.map((c) => c.close),
      last?.closeTime,
    );
    log.info({ pair: pair.symbol, candles: closes.length, ema: market.ema.value }, 'EMA warmed up');
  }

  update(pair: TradingPair, ticker: Ticker): MarketSnapshot {
    const market = this.market(pair);
    market.ema.observe(ticker.last, ticker.timestamp);
    const snapshot: MarketSnapshot = {
      pair,
      bid: ticker.bid,
      ask: ticker.ask,
      last: ticker.last,
      timestamp: ticker.timestamp,
      ema: market.ema.value,
    };
    market.previous = market.current;
    market.current = snapshot;
    return snapshot;
  }

  /** 신선한 최신 스냅샷 (없거나 오래됐으면 StaleDataError) */
  latest(symbol: string, now: number): MarketSnapshot {
    const current = this.markets.get(symbol)?.current;
    if (!current) throw new StaleDataError(Number.POSITIVE_INFINITY, this.maxAgeMs);
    const age = now - current.timestamp;
    if (age > this.maxAgeMs) throw new StaleDataError(age, this.maxAgeMs);
    return current;
  }

  previous(symbol: string): MarketSnapshot | undefined {
    return this.markets.get(symbol)?.previous;
  }

  /** 상태 조회용 (신선도 무관) */
  peek(symbol: string): MarketSnapshot | undefined {
    return this.markets.get(symbol)?.current;
  }

  private market(pair: TradingPair): PairMarket {
    let market = this.markets.get(pair.symbol);
    if (!market) {
      market = { ema: new TimeframeEma(this.opts.emaPeriod, this.opts.emaTimeframeMs) };
      this.markets.set(pair.symbol, market);
    }
    return market;
  }
}

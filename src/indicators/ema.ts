/**
 * Exponential Moving Average
 * 기간 채우기 전에는 단순평균, 이후 지수평활
 */
export class EMA {
  private readonly multiplier: number;
  private current: number = 0;
  private count: number = 0;
  private sum: number = 0;
  private ready: boolean = false;

  constructor(readonly period: number) {
    if (!Number.isInteger(period) || period < 1) throw new Error('EMA period must be an integer >= 1');
    this.multiplier = 2 / (period + 1);
  }

  update(value: number): number {
    if (!this.ready) {
      this.sum += value;
      this.count++;
      this.current = this.sum / this.count;
      if (this.count === this.period) this.ready = true;
    } else {
      this.current = (value - this.current) * this.multiplier + this.current;
    }
    return this.current;
  }

  /** 과거 종가로 워밍업 (오래된 것부터) */
  seed(values: readonly number[]): void {
    for (const v of values) this.update(v);
  }

  get value(): number { return this.current; }
  get isReady(): boolean { return this.ready; }
}

/**
 * 타임프레임 봉 종가로 EMA 갱신
 * 폴링 가격을 받아 봉 구간이 바뀌면 직전 구간 마지막 가격을 종가로 반영한다.
 */
export class TimeframeEma {
  private readonly ema: EMA;
  private bucket: number | null = null;
  private lastPrice: number | null = null;

  constructor(
    period: number,
    private readonly timeframeMs: number,
  ) {
    this.ema = new EMA(period);
  }

  seed(closes: readonly number[], lastCloseTime?: number): void {
    this.ema.seed(closes);
    if (lastCloseTime !== undefined) {
      this.bucket = Math.floor(lastCloseTime / this.timeframeMs);
    }
  }

  observe(price: number, timestamp: number): void {
    const bucket = Math.floor(timestamp / this.timeframeMs);
    if (this.bucket !== null && bucket > this.bucket && this.lastPrice !== null) {
      this.ema.update(this.lastPrice);
    }
    if (this.bucket === null || bucket >= this.bucket) {
      this.bucket = bucket;
      this.lastPrice = price;
    }
  }

  /** 워밍업 전이면 undefined */
  get value(): number | undefined {
    return this.ema.isReady ? this.ema.value : undefined;
  }
}

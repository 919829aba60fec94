/**
 * 토큰 버킷 레이트 리미터
 * 바이낸스 REST: 요청 가중치(weight) 기준 분당 한도: 초당 예산으로 환산해 사용
 */
export class RateLimiter {
  private tokens: number;
  private readonly maxTokens: number;
  private readonly refillRate: number;  // tokens/ms
  private lastRefill: number;

  constructor(
    maxPerSec: number = 10,
    private readonly now: () => number = Date.now,
  ) {
    this.maxTokens = maxPerSec;
    this.tokens = maxPerSec;
    this.refillRate = maxPerSec / 1000;
    this.lastRefill = now();
  }

  /** weight 만큼 토큰 소비 (부족하면 대기) */
  async acquire(weight: number = 1): Promise<void> {
    const cost = Math.min(weight, this.maxTokens);
    this.refill();

    if (this.tokens >= cost) {
      this.tokens -= cost;
      return;
    }

    const waitMs = Math.ceil((cost - this.tokens) / this.refillRate);
    await sleep(waitMs);
    this.refill();
    this.tokens = Math.max(0, this.tokens - cost);
  }

  private refill(): void {
    const now = this.now();
    const elapsed = Math.max(0, now - this.lastRefill);
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

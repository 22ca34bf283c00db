import { Clock, systemClock } from "./clock";

/**
 * Token-bucket limiter for exchange request weight.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;

  constructor(
    private maxTokens: number,
    private refillRate: number, // tokens per second
    private clock: Clock = systemClock,
    private pollMs: number = 50
  ) {
    this.tokens = maxTokens;
    this.lastRefill = clock.now();
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsed = now - this.lastRefill;
    const newTokens = (elapsed / 1000) * this.refillRate;
    this.tokens = Math.min(this.maxTokens, this.tokens + newTokens);
    this.lastRefill = now;
  }

  canProceed(weight = 1): boolean {
    this.refill();
    return this.tokens >= Math.min(weight, this.maxTokens);
  }

  async acquire(weight = 1): Promise<void> {
    while (!this.canProceed(weight)) {
      await new Promise((resolve) => setTimeout(resolve, this.pollMs));
    }
    this.tokens -= Math.min(weight, this.maxTokens);
  }

  getAvailableTokens(): number {
    this.refill();
    return Math.floor(this.tokens);
  }
}

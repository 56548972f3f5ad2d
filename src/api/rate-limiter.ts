// Token bucket rate limiter - allows bursts up to capacity
// Conservative defaults: capacity 10, refill 3/sec
// pause() holds every caller until a deadline, used when Canvas answers 429

export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private pausedUntil = 0;
  private readonly capacity: number;
  private readonly refillRate: number; // tokens per second

  constructor(capacity: number, refillRate: number) {
    if (capacity <= 0 || refillRate <= 0) {
      throw new RangeError("TokenBucket capacity and refillRate must be positive");
    }
    this.capacity = capacity;
    this.refillRate = refillRate;
    this.tokens = capacity;
    this.lastRefill = Date.now();
  }

  private refill(): void {
    const now = Date.now();
    if (now <= this.lastRefill) return;
    const elapsedSeconds = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillRate);
    this.lastRefill = now;
  }

  async consume(count: number = 1): Promise<void> {
    const pauseMs = this.pausedUntil - Date.now();
    if (pauseMs > 0) {
      await sleep(pauseMs);
    }

    this.refill();

    if (this.tokens >= count) {
      this.tokens -= count;
      return;
    }

    const tokensNeeded = count - this.tokens;
    await sleep((tokensNeeded / this.refillRate) * 1000);

    this.refill();
    this.tokens -= count;
  }

  /**
   * Block all consumers for the given duration and empty the bucket, so
   * requests resume gradually once the server-imposed wait is over.
   */
  pause(ms: number): void {
    this.pausedUntil = Math.max(this.pausedUntil, Date.now() + ms);
    this.tokens = 0;
    this.lastRefill = this.pausedUntil;
  }

  get isPaused(): boolean {
    return this.pausedUntil > Date.now();
  }

  get availableTokens(): number {
    if (this.isPaused) return 0;
    this.refill();
    return this.tokens;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

import type { Logger } from "pino";

/**
 * Result of a rate limit check.
 */
export interface RateLimitResult {
  allowed: boolean;
  remainingTokens: number;
  resetAt: Date;
}

interface Bucket {
  tokens: number;
  lastRefill: number;
}

/**
 * Leaky bucket rate limiter keyed by client. Tokens refill at a constant
 * rate based on the configured window. State lives in memory only.
 */
export class RateLimiter {
  private readonly maxTokens: number;
  /**
   * Refill rate in tokens per second.
   */
  private readonly tokensPerSec: number;
  private readonly buckets = new Map<string, Bucket>();
  private readonly log: Logger;

  /**
   * @param maxRequests Maximum number of requests allowed per window
   * @param windowSecs Time window in seconds
   */
  constructor(maxRequests: number, windowSecs: number, log: Logger) {
    this.maxTokens = maxRequests;
    this.tokensPerSec = maxRequests / windowSecs;
    this.log = log.child({ component: "RateLimiter" });
  }

  /**
   * Check whether a client may make a request and consume a token if so.
   * @param key Client identifier, usually the remote address
   * @param at Optional timestamp for testing
   */
  consume(key: string, at?: Date): RateLimitResult {
    const now = at !== undefined ? at.getTime() : Date.now();
    const bucket = this.refill(key, now);

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return {
        allowed: true,
        remainingTokens: Math.floor(bucket.tokens),
        resetAt: new Date(now + ((this.maxTokens - bucket.tokens) / this.tokensPerSec) * 1000),
      };
    }

    this.log.info({ key, tokens: bucket.tokens }, "Rate limit exceeded");
    return {
      allowed: false,
      remainingTokens: 0,
      resetAt: new Date(now + ((1 - bucket.tokens) / this.tokensPerSec) * 1000),
    };
  }

  /**
   * Get the current state for a client without consuming a token.
   * @param at Optional timestamp for testing
   */
  getState(key: string, at?: Date): RateLimitResult {
    const now = at !== undefined ? at.getTime() : Date.now();
    const bucket = this.buckets.get(key);
    const tokens = bucket
      ? Math.min(this.maxTokens, bucket.tokens + ((now - bucket.lastRefill) / 1000) * this.tokensPerSec)
      : this.maxTokens;

    return {
      allowed: tokens >= 1,
      remainingTokens: Math.floor(tokens),
      resetAt: new Date(now + ((this.maxTokens - tokens) / this.tokensPerSec) * 1000),
    };
  }

  /**
   * Forget every client.
   */
  clear(): void {
    this.buckets.clear();
  }

  private refill(key: string, now: number): Bucket {
    const bucket = this.buckets.get(key);
    if (!bucket) {
      const fresh = { tokens: this.maxTokens, lastRefill: now };
      this.buckets.set(key, fresh);
      return fresh;
    }

    const timePassedSec = (now - bucket.lastRefill) / 1000;
    bucket.tokens = Math.min(this.maxTokens, bucket.tokens + timePassedSec * this.tokensPerSec);
    bucket.lastRefill = now;
    return bucket;
  }
}

import type { CounterStore } from "../redis/kvStore";
import { RKeys } from "../redis/keys";
import type { Logger } from "../middleware/requestLogger";
import { AuthError, AuthErrorCode, isAuthError } from "./errors";

export interface BucketPolicy {
  max: number;
  windowSec: number;
  /** Deny when the counting store is down. Use for credential endpoints. */
  failClosed: boolean;
}

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetSeconds: number;
  /** True when the store was unreachable and the request was let through. */
  degraded: boolean;
}

export class RateLimiter {
  constructor(
    private readonly store: CounterStore,
    private readonly buckets: Record<string, BucketPolicy>,
    private readonly logger: Logger
  ) {}

  policy(bucket: string): BucketPolicy {
    const policy = this.buckets[bucket];
    if (!policy) throw new Error(`Unknown rate-limit bucket "${bucket}"`);
    return policy;
  }

  /**
   * Counts one request against (clientKey, bucket).
   * @throws AuthError StoreUnavailable for fail-closed buckets when the store is down
   */
  async consume(clientKey: string, bucket: string): Promise<RateLimitDecision> {
    const policy = this.policy(bucket);
    try {
      const { count, ttlMs } = await this.store.incrementWindow(
        RKeys.rlBucket(bucket, clientKey),
        policy.windowSec * 1000
      );
      return {
        allowed: count <= policy.max,
        limit: policy.max,
        remaining: Math.max(0, policy.max - count),
        resetSeconds: Math.max(0, Math.ceil(ttlMs / 1000)),
        degraded: false,
      };
    } catch (e) {
      if (!isAuthError(e, AuthErrorCode.StoreUnavailable)) throw e;
      if (policy.failClosed) {
        this.logger.error({ bucket, err: e.cause }, "[rateLimit] store unavailable, failing closed");
        throw e;
      }
      this.logger.warn({ bucket, err: e.cause }, "[rateLimit] store unavailable, failing open");
      return { allowed: true, limit: policy.max, remaining: policy.max, resetSeconds: 0, degraded: true };
    }
  }

  async allow(clientKey: string, bucket: string): Promise<boolean> {
    try {
      return (await this.consume(clientKey, bucket)).allowed;
    } catch (e) {
      if (isAuthError(e, AuthErrorCode.StoreUnavailable)) return false;
      throw e;
    }
  }

  /** Throws RateLimited when the request is over the ceiling. */
  async enforce(clientKey: string, bucket: string): Promise<RateLimitDecision> {
    const decision = await this.consume(clientKey, bucket);
    if (!decision.allowed) {
      throw new AuthError(AuthErrorCode.RateLimited, {
        details: { retryAfterSeconds: decision.resetSeconds },
      });
    }
    return decision;
  }
}

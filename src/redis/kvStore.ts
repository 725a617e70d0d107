import type { Redis } from "ioredis";
import { storeUnavailable } from "../auth/errors";

export interface WindowCount {
  count: number;
  /** Milliseconds until the window closes. */
  ttlMs: number;
}

/** Atomic fixed-window counter. Used by the rate limiter only. */
export interface CounterStore {
  incrementWindow(key: string, windowMs: number): Promise<WindowCount>;
}

/** Plain get/set-with-expiry. Used by the identity cache only. */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
  del(key: string): Promise<void>;
}

// INCR and the first-hit PEXPIRE run as one script so concurrent handlers
// never observe a counter without an expiry.
const INCREMENT_WINDOW = `
local n = redis.call('INCR', KEYS[1])
if n == 1 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
end
local ttl = redis.call('PTTL', KEYS[1])
if ttl < 0 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
  ttl = tonumber(ARGV[1])
end
return {n, ttl}
`;

export function toWindowCount(reply: unknown): WindowCount {
  if (!Array.isArray(reply) || reply.length !== 2) {
    throw new Error("Unexpected reply from window script");
  }
  const [count, ttlMs] = reply.map(Number);
  if (!Number.isFinite(count) || !Number.isFinite(ttlMs)) {
    throw new Error("Unexpected reply from window script");
  }
  return { count, ttlMs };
}

/** The ioredis commands the store needs. */
export type RedisCommands = Pick<Redis, "eval" | "get" | "set" | "del">;

/**
 * Both store contracts on one ioredis client. Every transport fault
 * surfaces as a StoreUnavailable AuthError.
 */
export class RedisKeyValueStore implements CounterStore, CacheStore {
  constructor(private readonly redis: RedisCommands) {}

  async incrementWindow(key: string, windowMs: number): Promise<WindowCount> {
    try {
      const reply = await this.redis.eval(INCREMENT_WINDOW, 1, key, String(windowMs));
      return toWindowCount(reply);
    } catch (e) {
      throw storeUnavailable(e, "Rate limit store unavailable");
    }
  }

  async get(key: string): Promise<string | null> {
    try {
      return await this.redis.get(key);
    } catch (e) {
      throw storeUnavailable(e, "Cache store unavailable");
    }
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    try {
      await this.redis.set(key, value, "PX", Math.max(1, Math.floor(ttlMs)));
    } catch (e) {
      throw storeUnavailable(e, "Cache store unavailable");
    }
  }

  async del(key: string): Promise<void> {
    try {
      await this.redis.del(key);
    } catch (e) {
      throw storeUnavailable(e, "Cache store unavailable");
    }
  }
}

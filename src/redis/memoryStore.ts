import type { CacheStore, CounterStore, WindowCount } from "./kvStore";

interface Entry {
  value: string;
  expiresAt: number;
}

/**
 * In-process stand-in for Redis with the same expiry semantics.
 * Single-threaded, so increments are trivially atomic.
 */
export class MemoryKeyValueStore implements CounterStore, CacheStore {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly now: () => number = Date.now) {}

  async incrementWindow(key: string, windowMs: number): Promise<WindowCount> {
    const t = this.now();
    const current = this.live(key, t);
    if (!current) {
      this.entries.set(key, { value: "1", expiresAt: t + windowMs });
      return { count: 1, ttlMs: windowMs };
    }
    const count = Number(current.value) + 1;
    current.value = String(count);
    return { count, ttlMs: current.expiresAt - t };
  }

  async get(key: string): Promise<string | null> {
    return this.live(key, this.now())?.value ?? null;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  async del(key: string): Promise<void> {
    this.entries.delete(key);
  }

  /** Remaining lifetime of a key, or null when absent. */
  ttl(key: string): number | null {
    const t = this.now();
    const entry = this.live(key, t);
    return entry ? entry.expiresAt - t : null;
  }

  private live(key: string, t: number): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt <= t) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}

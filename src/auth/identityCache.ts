import { z } from "zod";
import type { CacheStore } from "../redis/kvStore";
import { RKeys } from "../redis/keys";
import type { Logger } from "../middleware/requestLogger";

const identitySchema = z.object({
  id: z.string(),
  email: z.string(),
  name: z.string(),
  isVerified: z.boolean(),
});

/** What protected routes get to know about the caller. */
export type AuthenticatedUser = z.infer<typeof identitySchema>;

/**
 * Advisory token -> identity cache. Entries are keyed by the token's
 * fingerprint, never the raw token. A store failure reads as a miss.
 */
export class IdentityCache {
  constructor(
    private readonly store: CacheStore,
    private readonly fingerprint: (token: string) => string,
    private readonly maxTtlSeconds: number,
    private readonly logger: Logger
  ) {}

  async get(token: string): Promise<AuthenticatedUser | null> {
    let raw: string | null;
    try {
      raw = await this.store.get(this.key(token));
    } catch (e) {
      this.logger.warn({ err: e }, "[identityCache] read failed, treating as miss");
      return null;
    }
    if (raw === null) return null;

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      decoded = null;
    }
    const parsed = identitySchema.safeParse(decoded);
    return parsed.success ? parsed.data : null;
  }

  /** TTL is clamped to the configured ceiling; a non-positive TTL stores nothing. */
  async put(token: string, user: AuthenticatedUser, ttlSeconds: number): Promise<void> {
    const ttl = Math.min(ttlSeconds, this.maxTtlSeconds);
    if (ttl <= 0) return;
    try {
      await this.store.set(this.key(token), JSON.stringify(user), ttl * 1000);
    } catch (e) {
      this.logger.warn({ err: e }, "[identityCache] write failed");
    }
  }

  /** Propagates store failures so callers can decide whether eviction mattered. */
  async invalidate(token: string): Promise<void> {
    await this.store.del(this.key(token));
  }

  private key(token: string): string {
    return RKeys.identity(this.fingerprint(token));
  }
}

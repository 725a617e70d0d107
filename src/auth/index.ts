import type { Env } from "../config/env";
import type { Mailer } from "../mailer/resend";
import type { Logger } from "../middleware/requestLogger";
import type { CacheStore, CounterStore } from "../redis/kvStore";
import { AuthService } from "./authService";
import type { CredentialStore } from "./credentialStore";
import { IdentityCache } from "./identityCache";
import { BcryptPasswordHasher, type PasswordHasher } from "./passwordHasher";
import { RateLimiter, type BucketPolicy } from "./rateLimiter";
import { TokenService } from "./tokenService";

export interface AuthCoreDeps {
  store: CredentialStore;
  counters: CounterStore;
  cache: CacheStore;
  mailer: Mailer;
  logger: Logger;
  hasher?: PasswordHasher;
  now?: () => number;
}

export interface AuthCore {
  auth: AuthService;
  tokens: TokenService;
  limiter: RateLimiter;
  identityCache: IdentityCache;
  hasher: PasswordHasher;
}

export function rateLimitBuckets(env: Env): Record<string, BucketPolicy> {
  return {
    // login, register, resend-verification
    auth: { max: env.AUTH_RATE_LIMIT_MAX, windowSec: env.RATE_LIMIT_WINDOW_SEC, failClosed: true },
    api: { max: env.RATE_LIMIT_MAX, windowSec: env.RATE_LIMIT_WINDOW_SEC, failClosed: false },
  };
}

/** Wires the auth core from validated config and its external collaborators. */
export function createAuthCore(env: Env, deps: AuthCoreDeps): AuthCore {
  const tokens = new TokenService({
    secret: env.JWT_SECRET,
    accessExpires: env.JWT_ACCESS_EXPIRES,
    refreshExpires: env.JWT_REFRESH_EXPIRES,
    emailExpires: env.JWT_EMAIL_EXPIRES,
    now: deps.now,
  });
  const hasher = deps.hasher ?? new BcryptPasswordHasher(env.BCRYPT_ROUNDS);
  const limiter = new RateLimiter(deps.counters, rateLimitBuckets(env), deps.logger);
  const identityCache = new IdentityCache(
    deps.cache,
    (token) => tokens.fingerprint(token),
    env.IDENTITY_CACHE_TTL_SEC,
    deps.logger
  );
  const auth = new AuthService({
    store: deps.store,
    hasher,
    tokens,
    identityCache,
    mailer: deps.mailer,
    logger: deps.logger,
    appUrl: env.APP_URL,
  });
  return { auth, tokens, limiter, identityCache, hasher };
}

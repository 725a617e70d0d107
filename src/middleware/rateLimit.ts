import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { RateLimiter } from "../auth/rateLimiter";
import { AuthErrorCode, isAuthError } from "../auth/errors";

function retryAfterSeconds(details: unknown): number | null {
  if (
    typeof details === "object" &&
    details !== null &&
    "retryAfterSeconds" in details &&
    typeof details.retryAfterSeconds === "number"
  ) {
    return details.retryAfterSeconds;
  }
  return null;
}

/** Counts each request against `bucket`, keyed on the client IP. */
export function rateLimit(limiter: RateLimiter, bucket: string): RequestHandler {
  // fail fast on a typo'd bucket at wiring time, not on first request
  const { max } = limiter.policy(bucket);

  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const decision = await limiter.enforce(req.ip || "ip:unknown", bucket);

      if (!decision.degraded) {
        res.setHeader("X-RateLimit-Limit", String(decision.limit));
        res.setHeader("X-RateLimit-Remaining", String(decision.remaining));
        res.setHeader("X-RateLimit-Reset", String(decision.resetSeconds));
      }
      next();
    } catch (e) {
      if (isAuthError(e, AuthErrorCode.RateLimited)) {
        const retryAfter = retryAfterSeconds(e.details) ?? 0;
        res.setHeader("X-RateLimit-Limit", String(max));
        res.setHeader("X-RateLimit-Remaining", "0");
        res.setHeader("X-RateLimit-Reset", String(retryAfter));
        res.setHeader("Retry-After", String(retryAfter));
      }
      next(e);
    }
  };
}

import { Router, type CookieOptions } from "express";
import { z } from "zod";
import type { AuthService } from "../auth/authService";
import type { RateLimiter } from "../auth/rateLimiter";
import { AuthError, AuthErrorCode } from "../auth/errors";
import { rateLimit } from "../middleware/rateLimit";
import { requireJWT } from "../middleware/requireJWT";

export interface AuthRouterDeps {
  auth: AuthService;
  limiter: RateLimiter;
  refreshCookieName: string;
  refreshCookieMaxAgeMs: number;
  secureCookies: boolean;
}

/** REGISTER */
const registerSchema = z.object({
  email: z.string().trim().email(),
  name: z.string().trim().min(1).max(100),
  password: z.string().min(8).max(128),
});

/** LOGIN */
const loginSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1),
});

const refreshSchema = z.object({
  refreshToken: z.string().min(1).optional(),
});

const requestEmailSchema = z.object({
  email: z.string().trim().email(),
});

export function createAuthRouter(deps: AuthRouterDeps) {
  const { auth, limiter, refreshCookieName } = deps;
  const router = Router();
  const authLimit = rateLimit(limiter, "auth");
  const apiLimit = rateLimit(limiter, "api");
  const protect = requireJWT(auth);

  const cookieOptions: CookieOptions = {
    httpOnly: true,
    sameSite: "lax",
    secure: deps.secureCookies,
    path: "/api/auth",
  };

  router.post("/register", authLimit, async (req, res, next) => {
    try {
      const body = registerSchema.parse(req.body);
      const user = await auth.register(body);
      return res.status(201).json({
        user,
        detail: "User successfully created. Check your email for confirmation.",
      });
    } catch (err) {
      next(err);
    }
  });

  router.post("/login", authLimit, async (req, res, next) => {
    try {
      const body = loginSchema.parse(req.body);
      const pair = await auth.login(body);
      res.cookie(refreshCookieName, pair.refreshToken, { ...cookieOptions, maxAge: deps.refreshCookieMaxAgeMs });
      return res.json(pair);
    } catch (err) {
      next(err);
    }
  });

  /** REFRESH (rotate RT) — body first, cookie as fallback */
  router.post("/refresh", apiLimit, async (req, res, next) => {
    try {
      const body = refreshSchema.parse(req.body ?? {});
      const cookies: Record<string, unknown> = req.cookies ?? {};
      const fromCookie = cookies[refreshCookieName];
      const token = body.refreshToken ?? (typeof fromCookie === "string" ? fromCookie : undefined);
      if (!token) {
        throw new AuthError(AuthErrorCode.Unauthorized, { message: "Missing refresh token" });
      }

      try {
        const pair = await auth.refresh(token);
        res.cookie(refreshCookieName, pair.refreshToken, { ...cookieOptions, maxAge: deps.refreshCookieMaxAgeMs });
        return res.json(pair);
      } catch (err) {
        if (err instanceof AuthError && err.code === AuthErrorCode.RefreshReuseDetected) {
          res.clearCookie(refreshCookieName, cookieOptions);
        }
        throw err;
      }
    } catch (err) {
      next(err);
    }
  });

  /** LOGOUT — idempotent */
  router.post("/logout", apiLimit, protect, async (req, res, next) => {
    try {
      if (!req.user) throw new AuthError(AuthErrorCode.Unauthorized);
      await auth.logout(req.user.id, req.accessToken);
      res.clearCookie(refreshCookieName, cookieOptions);
      return res.status(204).send();
    } catch (err) {
      next(err);
    }
  });

  router.get("/verify-email/:token", apiLimit, async (req, res, next) => {
    try {
      const { alreadyVerified } = await auth.verifyEmail(req.params.token);
      return res.json({ message: alreadyVerified ? "Your email is already confirmed" : "Email confirmed" });
    } catch (err) {
      next(err);
    }
  });

  router.post("/request-email", authLimit, async (req, res, next) => {
    try {
      const { email } = requestEmailSchema.parse(req.body);
      const { alreadyVerified } = await auth.resendVerification(email);
      return res.json({
        message: alreadyVerified ? "Your email is already confirmed" : "Check your email for confirmation.",
      });
    } catch (err) {
      next(err);
    }
  });

  router.get("/me", apiLimit, protect, (req, res) => {
    res.json({ user: req.user });
  });

  return router;
}

// src/middleware/requireJWT.ts
import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { AuthService } from "../auth/authService";
import { AuthError, AuthErrorCode } from "../auth/errors";

export function bearerToken(req: Request): string | null {
  const header = req.headers.authorization || "";
  return header.startsWith("Bearer ") ? header.slice(7).trim() || null : null;
}

export function requireJWT(auth: AuthService): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      const token = bearerToken(req);
      if (!token) {
        return next(new AuthError(AuthErrorCode.Unauthorized, { message: "Missing token" }));
      }
      req.user = await auth.resolveIdentity(token);
      req.accessToken = token;
      return next();
    } catch (e) {
      return next(e);
    }
  };
}

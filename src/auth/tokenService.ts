// src/auth/tokenService.ts
import jwt from "jsonwebtoken";
import crypto from "crypto";
import { z } from "zod";
import { durationMs } from "../config/env";
import { AuthError, AuthErrorCode } from "./errors";

export const TokenType = {
  Access: "access",
  Refresh: "refresh",
  EmailVerification: "email_verification",
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

/**
 * Everything we embed in a token. No PII beyond the subject id.
 */
const claimsSchema = z.object({
  sub: z.string().min(1),
  type: z.enum([TokenType.Access, TokenType.Refresh, TokenType.EmailVerification]),
  iat: z.number().int(),
  exp: z.number().int(),
  jti: z.string().min(1),
});

export type TokenClaims = z.infer<typeof claimsSchema>;

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: "bearer";
}

export interface TokenServiceOptions {
  secret: string;
  /** ms-style durations, e.g. "15m", "7d" */
  accessExpires: string;
  refreshExpires: string;
  emailExpires: string;
  /** epoch milliseconds; defaults to Date.now */
  now?: () => number;
}

/** Random token id so two tokens minted in the same second never collide. */
function newJti(bytes: number = 16) {
  return crypto.randomBytes(bytes).toString("hex");
}

export class TokenService {
  private readonly secret: string;
  private readonly lifetimes: Record<TokenType, number>;
  private readonly now: () => number;

  constructor(options: TokenServiceOptions) {
    if (!options.secret) {
      throw new Error("TokenService requires a signing secret");
    }
    this.secret = options.secret;
    this.now = options.now ?? Date.now;
    this.lifetimes = {
      access: Math.floor(durationMs(options.accessExpires) / 1000),
      refresh: Math.floor(durationMs(options.refreshExpires) / 1000),
      email_verification: Math.floor(durationMs(options.emailExpires) / 1000),
    };
  }

  issueAccess(subject: string): string {
    return this.sign(subject, TokenType.Access);
  }

  issueRefresh(subject: string): string {
    return this.sign(subject, TokenType.Refresh);
  }

  issueEmailVerification(subject: string): string {
    return this.sign(subject, TokenType.EmailVerification);
  }

  issuePair(subject: string): TokenPair {
    return {
      accessToken: this.issueAccess(subject),
      refreshToken: this.issueRefresh(subject),
      tokenType: "bearer",
    };
  }

  /** Returns the subject of a valid token of the expected type. */
  decode(token: string, expectedType: TokenType): string {
    return this.verify(token, expectedType).sub;
  }

  /**
   * Signature first, then expiry, then the type discriminator.
   * @throws AuthError TokenInvalid | TokenExpired | TokenTypeMismatch
   */
  verify(token: string, expectedType: TokenType): TokenClaims {
    let raw: unknown;
    try {
      raw = jwt.verify(token, this.secret, {
        algorithms: ["HS256"],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        throw new AuthError(AuthErrorCode.TokenExpired, { cause: err });
      }
      throw new AuthError(AuthErrorCode.TokenInvalid, { cause: err });
    }

    const parsed = claimsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AuthError(AuthErrorCode.TokenInvalid, { message: "Token is missing required claims" });
    }
    if (parsed.data.type !== expectedType) {
      throw new AuthError(AuthErrorCode.TokenTypeMismatch, {
        message: `Expected a ${expectedType} token`,
      });
    }
    return parsed.data;
  }

  /** Expiry instant of already verified claims. */
  expiresAt(claims: TokenClaims): Date {
    return new Date(claims.exp * 1000);
  }

  /** Seconds left before the claims expire (never negative). */
  secondsLeft(claims: TokenClaims): number {
    return Math.max(0, Math.floor((this.expiresAt(claims).getTime() - this.now()) / 1000));
  }

  /** Opaque, storable marker of a token (SHA-256 hex). */
  fingerprint(token: string): string {
    return crypto.createHash("sha256").update(token).digest("hex");
  }

  private sign(subject: string, type: TokenType): string {
    const iat = this.nowSeconds();
    const claims: TokenClaims = {
      sub: subject,
      type,
      iat,
      exp: iat + this.lifetimes[type],
      jti: newJti(),
    };
    return jwt.sign(claims, this.secret, { algorithm: "HS256" });
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }
}

// src/auth/errors.ts

export const AuthErrorCode = {
  InvalidCredentials: "InvalidCredentials",
  EmailTaken: "EmailTaken",
  EmailNotVerified: "EmailNotVerified",
  TokenInvalid: "TokenInvalid",
  TokenExpired: "TokenExpired",
  TokenTypeMismatch: "TokenTypeMismatch",
  RefreshReuseDetected: "RefreshReuseDetected",
  Unauthorized: "Unauthorized",
  RateLimited: "RateLimited",
  StoreUnavailable: "StoreUnavailable",
  ValidationFailed: "ValidationFailed",
} as const;

export type AuthErrorCode = (typeof AuthErrorCode)[keyof typeof AuthErrorCode];

const STATUS: Record<AuthErrorCode, number> = {
  InvalidCredentials: 401,
  EmailTaken: 409,
  EmailNotVerified: 403,
  TokenInvalid: 401,
  TokenExpired: 401,
  TokenTypeMismatch: 401,
  RefreshReuseDetected: 401,
  Unauthorized: 401,
  RateLimited: 429,
  StoreUnavailable: 503,
  ValidationFailed: 400,
};

const MESSAGES: Record<AuthErrorCode, string> = {
  InvalidCredentials: "Invalid credentials",
  EmailTaken: "Email already in use",
  EmailNotVerified: "Email not confirmed",
  TokenInvalid: "Invalid token",
  TokenExpired: "Token expired",
  TokenTypeMismatch: "Wrong token type",
  RefreshReuseDetected: "Invalid refresh token",
  Unauthorized: "Unauthorized",
  RateLimited: "Too many requests. Please slow down.",
  StoreUnavailable: "Auth service unavailable",
  ValidationFailed: "Invalid input",
};

/**
 * Typed failure of the auth core. `cause` is kept for logs and never sent to clients.
 */
export class AuthError extends Error {
  readonly code: AuthErrorCode;
  readonly status: number;
  readonly details?: unknown;

  constructor(code: AuthErrorCode, options: { message?: string; cause?: unknown; details?: unknown } = {}) {
    super(options.message ?? MESSAGES[code], { cause: options.cause });
    this.name = "AuthError";
    this.code = code;
    this.status = STATUS[code];
    this.details = options.details;
  }
}

export function isAuthError(err: unknown, code?: AuthErrorCode): err is AuthError {
  return err instanceof AuthError && (code === undefined || err.code === code);
}

/** Wraps a transport-level fault; AuthErrors pass through untouched. */
export function storeUnavailable(cause: unknown, message?: string): AuthError {
  if (cause instanceof AuthError) return cause;
  return new AuthError(AuthErrorCode.StoreUnavailable, { cause, message });
}

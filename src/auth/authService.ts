// src/auth/authService.ts
import crypto from "crypto";
import type { Logger } from "../middleware/requestLogger";
import type { Mailer } from "../mailer/resend";
import { normalizeEmail, type CredentialStore, type UserRecord } from "./credentialStore";
import { AuthError, AuthErrorCode } from "./errors";
import type { AuthenticatedUser, IdentityCache } from "./identityCache";
import type { PasswordHasher } from "./passwordHasher";
import { TokenType, type TokenClaims, type TokenPair, type TokenService } from "./tokenService";

export interface AuthServiceDeps {
  store: CredentialStore;
  hasher: PasswordHasher;
  tokens: TokenService;
  identityCache: IdentityCache;
  mailer: Mailer;
  logger: Logger;
  /** Public origin used to build the verification link. */
  appUrl: string;
}

export interface RegisterInput {
  email: string;
  name: string;
  password: string;
}

export interface LoginInput {
  email: string;
  password: string;
}

/** Safe projection of a user; never carries the hash or fingerprint. */
export interface UserSummary {
  id: string;
  email: string;
  name: string;
  avatarUrl: string | null;
  isVerified: boolean;
  createdAt: Date;
}

export function toSummary(user: UserRecord): UserSummary {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    avatarUrl: user.avatarUrl,
    isVerified: user.isVerified,
    createdAt: user.createdAt,
  };
}

function toIdentity(user: UserRecord): AuthenticatedUser {
  return { id: user.id, email: user.email, name: user.name, isVerified: user.isVerified };
}

export class AuthService {
  private readonly store: CredentialStore;
  private readonly hasher: PasswordHasher;
  private readonly tokens: TokenService;
  private readonly identityCache: IdentityCache;
  private readonly mailer: Mailer;
  private readonly logger: Logger;
  private readonly appUrl: string;
  private timingHash: Promise<string> | null = null;

  constructor(deps: AuthServiceDeps) {
    this.store = deps.store;
    this.hasher = deps.hasher;
    this.tokens = deps.tokens;
    this.identityCache = deps.identityCache;
    this.mailer = deps.mailer;
    this.logger = deps.logger;
    this.appUrl = deps.appUrl.replace(/\/+$/, "");
  }

  /**
   * Creates an unverified user and mails a verification link.
   * Mail delivery is fire-and-forget; registration succeeds even if it fails.
   * @throws AuthError EmailTaken
   */
  async register(input: RegisterInput): Promise<UserSummary> {
    const email = normalizeEmail(input.email);
    if (await this.store.findByEmail(email)) {
      throw new AuthError(AuthErrorCode.EmailTaken);
    }

    const passwordHash = await this.hasher.hash(input.password);
    // the store's unique index still arbitrates concurrent registrations
    const user = await this.store.create({ email, name: input.name, passwordHash });
    this.logger.info({ userId: user.id }, "[auth] user registered");

    this.dispatchVerification(user);
    return toSummary(user);
  }

  /**
   * Unknown email and wrong password are indistinguishable to the caller,
   * in both error and time spent hashing.
   * @throws AuthError InvalidCredentials | EmailNotVerified
   */
  async login(input: LoginInput): Promise<TokenPair> {
    const user = await this.store.findByEmail(input.email);
    if (!user) {
      await this.hasher.verify(input.password, await this.dummyHash());
      throw new AuthError(AuthErrorCode.InvalidCredentials);
    }

    const match = await this.hasher.verify(input.password, user.passwordHash);
    if (!match) throw new AuthError(AuthErrorCode.InvalidCredentials);

    if (!user.isVerified) throw new AuthError(AuthErrorCode.EmailNotVerified);

    const pair = this.tokens.issuePair(user.id);
    // overwrite: any refresh token issued before this login is now dead
    await this.store.updateFingerprint(user.id, this.tokens.fingerprint(pair.refreshToken));
    this.logger.info({ userId: user.id }, "[auth] login");
    return pair;
  }

  /**
   * One-time-use refresh. A presented token that is not the current one, or
   * that loses a concurrent rotation, ends the session.
   * @throws AuthError TokenInvalid | TokenExpired | TokenTypeMismatch | Unauthorized | RefreshReuseDetected
   */
  async refresh(refreshToken: string): Promise<TokenPair> {
    const userId = this.tokens.decode(refreshToken, TokenType.Refresh);
    const user = await this.store.findById(userId);
    if (!user) throw new AuthError(AuthErrorCode.Unauthorized);

    const presented = this.tokens.fingerprint(refreshToken);
    if (user.refreshTokenFingerprint !== presented) {
      return this.terminateSession(user.id, "fingerprint mismatch");
    }

    const pair = this.tokens.issuePair(user.id);
    const swapped = await this.store.rotateFingerprint(
      user.id,
      presented,
      this.tokens.fingerprint(pair.refreshToken)
    );
    if (!swapped) {
      return this.terminateSession(user.id, "lost concurrent rotation");
    }
    return pair;
  }

  /**
   * Ends the refresh session and drops the cached identity of the presented
   * access token. The access token itself stays valid until it expires.
   */
  async logout(userId: string, accessToken?: string): Promise<void> {
    await this.store.updateFingerprint(userId, null);
    if (accessToken) {
      try {
        await this.identityCache.invalidate(accessToken);
      } catch (e) {
        this.logger.warn({ userId, err: e }, "[auth] could not evict cached identity on logout");
      }
    }
    this.logger.info({ userId }, "[auth] logout");
  }

  /**
   * @throws AuthError TokenInvalid | TokenExpired | TokenTypeMismatch
   */
  async verifyEmail(token: string): Promise<{ alreadyVerified: boolean }> {
    const userId = this.tokens.decode(token, TokenType.EmailVerification);
    const user = await this.store.findById(userId);
    if (!user) throw new AuthError(AuthErrorCode.TokenInvalid, { message: "Verification error" });
    if (user.isVerified) return { alreadyVerified: true };

    const changed = await this.store.setVerified(user.id);
    if (changed) this.logger.info({ userId: user.id }, "[auth] email verified");
    return { alreadyVerified: !changed };
  }

  /** Re-sends the verification link. Silent for unknown addresses. */
  async resendVerification(email: string): Promise<{ alreadyVerified: boolean }> {
    const user = await this.store.findByEmail(email);
    if (!user) return { alreadyVerified: false };
    if (user.isVerified) return { alreadyVerified: true };
    this.dispatchVerification(user);
    return { alreadyVerified: false };
  }

  /**
   * Maps a bearer access token to the caller. Cache first, store on a miss.
   * @throws AuthError Unauthorized | StoreUnavailable
   */
  async resolveIdentity(accessToken: string): Promise<AuthenticatedUser> {
    let claims: TokenClaims;
    try {
      claims = this.tokens.verify(accessToken, TokenType.Access);
    } catch (e) {
      throw new AuthError(AuthErrorCode.Unauthorized, {
        message: "Invalid or expired token",
        cause: e,
      });
    }

    const cached = await this.identityCache.get(accessToken);
    if (cached && cached.id === claims.sub) return cached;

    const user = await this.store.findById(claims.sub);
    if (!user) throw new AuthError(AuthErrorCode.Unauthorized);

    const identity = toIdentity(user);
    await this.identityCache.put(accessToken, identity, this.tokens.secondsLeft(claims));
    return identity;
  }

  private async terminateSession(userId: string, reason: string): Promise<never> {
    this.logger.warn({ userId, reason }, "[auth] refresh token reuse detected, session terminated");
    await this.store.updateFingerprint(userId, null);
    throw new AuthError(AuthErrorCode.RefreshReuseDetected);
  }

  private dispatchVerification(user: UserRecord): void {
    const token = this.tokens.issueEmailVerification(user.id);
    const link = `${this.appUrl}/api/auth/verify-email/${encodeURIComponent(token)}`;
    this.mailer
      .sendVerificationEmail({ to: user.email, name: user.name, link })
      .then((result) => {
        if (!result.success) {
          this.logger.warn({ userId: user.id, error: result.error }, "[auth] verification email not sent");
        }
      })
      .catch((err: unknown) => {
        this.logger.error({ userId: user.id, err }, "[auth] verification email failed");
      });
  }

  private dummyHash(): Promise<string> {
    if (!this.timingHash) {
      this.timingHash = this.hasher.hash(crypto.randomBytes(16).toString("hex"));
    }
    return this.timingHash;
  }
}

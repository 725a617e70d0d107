import crypto from "crypto";
import { AuthError, AuthErrorCode } from "./errors";
import { normalizeEmail, type CredentialStore, type NewUser, type UserRecord } from "./credentialStore";

/**
 * In-process CredentialStore with the same conditional-update semantics as
 * the Mongo implementation. Records are copied in and out so callers cannot
 * mutate stored state.
 */
export class MemoryCredentialStore implements CredentialStore {
  private readonly byId = new Map<string, UserRecord>();

  async findByEmail(email: string): Promise<UserRecord | null> {
    const user = this.lookupEmail(normalizeEmail(email));
    return user ? { ...user } : null;
  }

  async findById(id: string): Promise<UserRecord | null> {
    const user = this.byId.get(id);
    return user ? { ...user } : null;
  }

  async create(input: NewUser): Promise<UserRecord> {
    // checked and inserted in the same tick, like a unique index
    if (this.lookupEmail(normalizeEmail(input.email))) {
      throw new AuthError(AuthErrorCode.EmailTaken);
    }
    const user: UserRecord = {
      id: crypto.randomBytes(12).toString("hex"),
      email: normalizeEmail(input.email),
      name: input.name,
      passwordHash: input.passwordHash,
      avatarUrl: null,
      isVerified: false,
      refreshTokenFingerprint: null,
      createdAt: new Date(),
    };
    this.byId.set(user.id, user);
    return { ...user };
  }

  async updateFingerprint(id: string, fingerprint: string | null): Promise<void> {
    const user = this.byId.get(id);
    if (user) user.refreshTokenFingerprint = fingerprint;
  }

  async rotateFingerprint(id: string, expected: string, next: string): Promise<boolean> {
    const user = this.byId.get(id);
    if (!user || user.refreshTokenFingerprint !== expected) return false;
    user.refreshTokenFingerprint = next;
    return true;
  }

  async setVerified(id: string): Promise<boolean> {
    const user = this.byId.get(id);
    if (!user || user.isVerified) return false;
    user.isVerified = true;
    return true;
  }

  private lookupEmail(email: string): UserRecord | undefined {
    for (const user of this.byId.values()) {
      if (user.email === email) return user;
    }
    return undefined;
  }
}

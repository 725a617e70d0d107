// src/auth/credentialStore.ts
import mongoose from "mongoose";
import { User, type IUser } from "../models/user.model";
import { AuthError, AuthErrorCode, storeUnavailable } from "./errors";

export interface UserRecord {
  id: string;
  email: string;
  name: string;
  passwordHash: string;
  avatarUrl: string | null;
  isVerified: boolean;
  refreshTokenFingerprint: string | null;
  createdAt: Date;
}

export interface NewUser {
  email: string;
  name: string;
  passwordHash: string;
}

/**
 * Persistence boundary of the auth core. Every mutation is a single
 * conditional statement; nothing here reads-then-writes.
 */
export interface CredentialStore {
  findByEmail(email: string): Promise<UserRecord | null>;
  findById(id: string): Promise<UserRecord | null>;
  /** @throws AuthError EmailTaken when the email is already registered */
  create(user: NewUser): Promise<UserRecord>;
  /** Unconditional overwrite; `null` clears the session. */
  updateFingerprint(id: string, fingerprint: string | null): Promise<void>;
  /** Compare-and-swap: true only if the stored value still equaled `expected`. */
  rotateFingerprint(id: string, expected: string, next: string): Promise<boolean>;
  /** Flips unverified -> verified. Returns false when it was already verified. */
  setVerified(id: string): Promise<boolean>;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

type UserFields = Pick<
  IUser,
  "email" | "name" | "password" | "verified" | "avatarUrl" | "refreshTokenFingerprint" | "createdAt"
> & { _id: unknown };

function toRecord(doc: UserFields): UserRecord {
  return {
    id: String(doc._id),
    email: doc.email,
    name: doc.name,
    passwordHash: doc.password,
    avatarUrl: doc.avatarUrl ?? null,
    isVerified: !!doc.verified,
    refreshTokenFingerprint: doc.refreshTokenFingerprint ?? null,
    createdAt: doc.createdAt,
  };
}

function isDuplicateKey(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === 11000;
}

export class MongoCredentialStore implements CredentialStore {
  async findByEmail(email: string): Promise<UserRecord | null> {
    try {
      const doc = await User.findOne({ email: normalizeEmail(email) });
      return doc ? toRecord(doc) : null;
    } catch (err) {
      throw storeUnavailable(err);
    }
  }

  async findById(id: string): Promise<UserRecord | null> {
    // a malformed id can never match; asking Mongo would only raise a CastError
    if (!mongoose.isValidObjectId(id)) return null;
    try {
      const doc = await User.findById(id);
      return doc ? toRecord(doc) : null;
    } catch (err) {
      throw storeUnavailable(err);
    }
  }

  async create(user: NewUser): Promise<UserRecord> {
    try {
      const created = await User.create({
        email: normalizeEmail(user.email),
        name: user.name,
        password: user.passwordHash,
        verified: false,
        refreshTokenFingerprint: null,
      });
      return toRecord(created);
    } catch (err) {
      if (isDuplicateKey(err)) {
        throw new AuthError(AuthErrorCode.EmailTaken, { cause: err });
      }
      throw storeUnavailable(err);
    }
  }

  async updateFingerprint(id: string, fingerprint: string | null): Promise<void> {
    if (!mongoose.isValidObjectId(id)) return;
    try {
      await User.updateOne({ _id: id }, { $set: { refreshTokenFingerprint: fingerprint } });
    } catch (err) {
      throw storeUnavailable(err);
    }
  }

  async rotateFingerprint(id: string, expected: string, next: string): Promise<boolean> {
    if (!mongoose.isValidObjectId(id)) return false;
    try {
      const res = await User.updateOne(
        { _id: id, refreshTokenFingerprint: expected },
        { $set: { refreshTokenFingerprint: next } }
      );
      return res.modifiedCount === 1;
    } catch (err) {
      throw storeUnavailable(err);
    }
  }

  async setVerified(id: string): Promise<boolean> {
    if (!mongoose.isValidObjectId(id)) return false;
    try {
      const res = await User.updateOne({ _id: id, verified: false }, { $set: { verified: true } });
      return res.modifiedCount === 1;
    } catch (err) {
      throw storeUnavailable(err);
    }
  }
}

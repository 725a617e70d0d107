import crypto from "crypto";
import bcrypt from "bcryptjs";

export interface PasswordHasher {
  hash(plaintext: string): Promise<string>;
  verify(plaintext: string, hash: string): Promise<boolean>;
}

// bcrypt reads only the first 72 bytes; a SHA-256 digest (44 base64 chars)
// keeps every byte of the password significant.
function prehash(plaintext: string): string {
  return crypto.createHash("sha256").update(plaintext, "utf8").digest("base64");
}

export class BcryptPasswordHasher implements PasswordHasher {
  constructor(private readonly rounds: number = 10) {}

  async hash(plaintext: string): Promise<string> {
    return bcrypt.hash(prehash(plaintext), this.rounds);
  }

  // bcrypt.compare does not short-circuit on the first differing byte.
  async verify(plaintext: string, hash: string): Promise<boolean> {
    try {
      return await bcrypt.compare(prehash(plaintext), hash);
    } catch {
      return false;
    }
  }
}

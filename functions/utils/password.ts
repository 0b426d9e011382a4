import bcrypt from 'bcryptjs';
import type { AppConfig } from './config.js';

export const MIN_PASSWORD_LENGTH = 8;

/** bcrypt only reads the first 72 bytes of its input */
export const MAX_PASSWORD_BYTES = 72;

export interface PasswordHasher {
  hash(plaintext: string): Promise<string>;
  verify(plaintext: string, digest: string): Promise<boolean>;
}

export function exceedsPasswordLimit(plaintext: string): boolean {
  return Buffer.byteLength(plaintext, 'utf8') > MAX_PASSWORD_BYTES;
}

export function createPasswordHasher(config: Pick<AppConfig, 'bcryptRounds'>): PasswordHasher {
  return {
    async hash(plaintext) {
      if (exceedsPasswordLimit(plaintext)) {
        throw new RangeError(`Password exceeds ${MAX_PASSWORD_BYTES} bytes`);
      }
      return bcrypt.hash(plaintext, config.bcryptRounds);
    },

    async verify(plaintext, digest) {
      // Nothing longer than the limit was ever hashed
      if (exceedsPasswordLimit(plaintext)) return false;

      try {
        return await bcrypt.compare(plaintext, digest);
      } catch {
        // bcryptjs rejects digests with an unknown salt version
        return false;
      }
    },
  };
}

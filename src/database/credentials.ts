/**
 * Credential hashing and verification
 *
 * Passwords are stored as bcrypt hashes (bcrypt-ts, synchronous API).
 * bcrypt reads at most 72 bytes, so each password is first reduced to a
 * base64 SHA-256 digest (44 bytes) and every byte of it counts.
 *
 * Verification always runs one bcrypt comparison, against a dummy hash
 * when the account does not exist, so a missing email costs the same as
 * a wrong password.
 */

import { createHash } from 'node:crypto';
import { compareSync, genSaltSync, getRounds, hashSync } from 'bcrypt-ts';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

export const DEFAULT_BCRYPT_ROUNDS = 10;

const DUMMY_SECRET = 'forumdb-no-such-account';

/** Fixed-length bcrypt input; base64 never contains a NUL byte */
function digest(password: string): string {
  return createHash('sha256').update(password, 'utf8').digest('base64');
}

/**
 * Hashes passwords and checks them against stored hashes.
 */
export class CredentialVerifier {
  readonly rounds: number;
  private readonly logger: Logger;
  private readonly dummyHash: string;

  constructor(rounds: number = DEFAULT_BCRYPT_ROUNDS, logger: Logger = silentLogger) {
    this.rounds = rounds;
    this.logger = logger;
    // Same cost as real hashes
    this.dummyHash = this.hash(DUMMY_SECRET);
  }

  /**
   * Hash a plaintext password for storage.
   */
  hash(password: string): string {
    return hashSync(digest(password), genSaltSync(this.rounds));
  }

  /**
   * Check a plaintext password against a stored hash.
   *
   * Pass `undefined` when there is no stored credential; the comparison
   * still runs and the result is false.
   */
  verify(password: string, storedHash: string | undefined): boolean {
    const matched = this.compare(password, storedHash ?? this.dummyHash);
    return storedHash !== undefined && matched;
  }

  /**
   * True when a stored hash was made at a cost other than the current one.
   */
  needsRehash(storedHash: string): boolean {
    try {
      return getRounds(storedHash) !== this.rounds;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Stored credential is not a valid bcrypt hash (${reason})`);
      return false;
    }
  }

  private compare(password: string, hash: string): boolean {
    try {
      return compareSync(digest(password), hash);
    } catch (error) {
      // A value that is not a bcrypt hash can never match
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Stored credential is not a valid bcrypt hash (${reason})`);
      return false;
    }
  }
}

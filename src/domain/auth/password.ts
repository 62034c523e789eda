import argon2 from 'argon2';

// argon2id at the OWASP minimum for interactive logins
const HASH_OPTIONS = {
  type: argon2.argon2id,
  memoryCost: 19_456,
  timeCost: 2,
  parallelism: 1,
} as const;

const DIGEST_PREFIX = '$argon2';

export class Password {
  static async hash(plain: string): Promise<string> {
    return await argon2.hash(plain, HASH_OPTIONS);
  }

  /**
   * A digest that argon2 cannot read counts as a mismatch.
   */
  static async verify(plain: string, digest: string): Promise<boolean> {
    if (!digest.startsWith(DIGEST_PREFIX)) {
      return false;
    }
    try {
      return await argon2.verify(digest, plain);
    } catch {
      return false;
    }
  }

  /**
   * True when `digest` was made with other cost parameters than `hash` uses now.
   * Only call this on a digest that has just verified.
   */
  static needsRehash(digest: string): boolean {
    return argon2.needsRehash(digest, {
      memoryCost: HASH_OPTIONS.memoryCost,
      timeCost: HASH_OPTIONS.timeCost,
    });
  }
}

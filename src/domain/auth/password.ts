import { hash, verify } from 'argon2';

/**
 * Characters accepted as the "special character" class of the password policy.
 */
export const PASSWORD_SPECIAL_CHARACTERS = '!@#$%^&*(),.?":{}|<>';

export const PASSWORD_MIN_LENGTH = 8;

const complexityRules: ReadonlyArray<{ pattern: RegExp; message: string }> = [
  { pattern: /[A-Z]/, message: 'Password must contain at least one uppercase letter' },
  { pattern: /[a-z]/, message: 'Password must contain at least one lowercase letter' },
  { pattern: /\d/, message: 'Password must contain at least one digit' },
  {
    pattern: /[!@#$%^&*(),.?":{}|<>]/,
    message: `Password must contain at least one special character (${PASSWORD_SPECIAL_CHARACTERS})`,
  },
];

/**
 * Argon2 hashing and verification, plus the complexity rules applied at
 * registration.
 */
export class Password {
  /**
   * Hash a plain text password. Salted, so equal inputs give different hashes.
   */
  static async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword);
  }

  /**
   * Verify a plain password against a hash.
   */
  static async verify(plainPassword: string, hash: string): Promise<boolean> {
    try {
      return await verify(hash, plainPassword);
    } catch {
      return false;
    }
  }

  /**
   * Character-class violations of the password policy, one message per
   * missing class. Length is checked by the request schema.
   */
  static complexityViolations(plainPassword: string): string[] {
    return complexityRules
      .filter((rule) => !rule.pattern.test(plainPassword))
      .map((rule) => rule.message);
  }
}

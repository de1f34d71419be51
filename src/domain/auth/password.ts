import { hash, verify } from 'argon2';

export const MIN_PASSWORD_LENGTH = 8;

/**
 * Password hashing (Argon2) and the strength rules applied at registration.
 */
export class Password {
  static async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword);
  }

  /**
   * Verify a plain password against a hash. A malformed hash never matches.
   */
  static async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }

  /**
   * Returns the list of rule violations; empty when the password is acceptable.
   */
  static weaknesses(plainPassword: string, personalInfo: string[] = []): string[] {
    const problems: string[] = [];

    if (plainPassword.length < MIN_PASSWORD_LENGTH) {
      problems.push(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
    }
    if (/^\d+$/.test(plainPassword)) {
      problems.push('Password cannot be entirely numeric');
    }

    const lowered = plainPassword.toLowerCase();
    const tooSimilar = personalInfo
      .map((value) => value.toLowerCase().split('@')[0])
      .some((value) => value.length >= 3 && lowered.includes(value));
    if (tooSimilar) {
      problems.push('Password is too similar to the username or email');
    }

    return problems;
  }
}

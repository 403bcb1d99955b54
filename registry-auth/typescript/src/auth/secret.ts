/**
 * Wrapper for registry passwords and tokens.
 * @module auth/secret
 */

const REDACTED = '[redacted]';

/**
 * Holds a credential so it stays out of logs, JSON and `util.inspect`.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Returns the raw credential.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [Symbol.for('nodejs.util.inspect.custom')](): string {
    return `SecretString(${REDACTED})`;
  }
}

/**
 * API token handling.
 * @module auth
 */

/**
 * Wraps a secret so it never appears in logs or serialized output.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   * Only for building the Authorization header.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '***';
  }

  toJSON(): string {
    return '***';
  }

  isEmpty(): boolean {
    return this.value.length === 0;
  }
}

/**
 * Builds the Authorization header value for an API token.
 */
export function bearerHeader(token: SecretString): string {
  return `Bearer ${token.expose()}`;
}

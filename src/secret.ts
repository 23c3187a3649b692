/**
 * Secret string wrapper to prevent accidental exposure.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   * Use with caution - avoid logging or displaying.
   */
  expose(): string {
    return this.value;
  }

  /**
   * Returns a safe representation for logging.
   */
  toString(): string {
    return '***';
  }

  /**
   * Custom JSON serialization to prevent accidental exposure.
   */
  toJSON(): string {
    return '***';
  }

  /**
   * Checks if the value is empty.
   */
  isEmpty(): boolean {
    return this.value.length === 0;
  }
}

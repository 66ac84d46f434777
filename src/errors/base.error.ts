/**
 * Base class for every error raised by tendril.
 *
 * `code` is a stable identifier the CLI maps to messages and exit codes,
 * `recoverable` tells the caller whether retrying after user action can help.
 */
export abstract class BaseError extends Error {
  public abstract readonly code: string;
  public abstract readonly recoverable: boolean;
  public readonly details?: string | undefined;

  constructor(message: string, details?: string) {
    super(message);
    this.name = new.target.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Message including details when present
   */
  public toString(): string {
    return this.details ? `${this.message}: ${this.details}` : this.message;
  }
}

/**
 * Render an unknown thrown value as text
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

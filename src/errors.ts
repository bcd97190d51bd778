/**
 * Telegram I/O failed: the source could not be read, a send was refused,
 * or a subscription could not be set up.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly destination?: string,
    public readonly retryAfterSeconds?: number,
    public readonly cause?: unknown,
  ) {
    super(destination ? `${destination}: ${message}` : message);
    this.name = 'TransportError';
  }
}

/**
 * A configuration update was rejected. The previous configuration stays active.
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(issues.join('; '));
    this.name = 'ConfigError';
  }
}

export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'PersistenceError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

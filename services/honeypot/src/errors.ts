/**
 * Error taxonomy for the honeypot.
 *
 * Only ValidationError ever reaches the caller. Everything else is recovered
 * where it happens so the conversation keeps going.
 */
export abstract class HoneypotError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends HoneypotError {
  readonly code = "validation_error";

  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
  }
}

export class GenerationFailure extends HoneypotError {
  readonly code = "generation_failure";
}

export class CallbackFailure extends HoneypotError {
  readonly code = "callback_failure";
}

export class ConfigError extends HoneypotError {
  readonly code = "config_error";
}

/**
 * Normalize an unknown thrown value to a loggable message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class TimeoutError extends HoneypotError {
  readonly code = "timeout";

  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

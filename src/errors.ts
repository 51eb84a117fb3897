/**
 * Error types shared by the verification services.
 */

export class GateError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GateError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/** Malformed user input (address, amount, category). Never changes state. */
export class InputError extends GateError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InputError';
  }
}

/** A group has no configuration yet, so nothing can be verified against it. */
export class ConfigurationError extends GateError {
  constructor(message: string) {
    super(message, 'NOT_CONFIGURED');
    this.name = 'ConfigurationError';
  }
}

export type ChainErrorKind = 'RateLimited' | 'NotFound' | 'Transient';

export class ChainError extends GateError {
  readonly kind: ChainErrorKind;
  readonly retryable: boolean;

  constructor(kind: ChainErrorKind, message: string, cause?: unknown) {
    super(message, `CHAIN_${kind.toUpperCase()}`, { cause });
    this.name = 'ChainError';
    this.kind = kind;
    this.retryable = kind !== 'NotFound';
  }
}

export function isChainError(error: unknown): error is ChainError {
  return error instanceof ChainError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

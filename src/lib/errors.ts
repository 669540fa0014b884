import type { ApiError } from '../types/email.js';

export class AppError extends Error {
  constructor(message: string, readonly type: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): ApiError {
    return { success: false, error: { message: this.message, type: this.type } };
  }
}

/** Mail system used before initialisation, initialised twice, or missing a required setting. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
  }
}

export class InvalidAddressFormat extends AppError {
  constructor(readonly address: string) {
    super(`"${address}" is not a valid formatted address`, 'INVALID_ADDRESS');
  }
}

export type DeliveryErrorType =
  | 'DAILY_LIMIT'
  | 'INVALID_RECIPIENT'
  | 'AUTH_BROWSER_INTERACTION_REQUIRED'
  | 'AUTH_FAILED'
  | 'SMTP_SYNTAX'
  | 'CONNECTION'
  | 'SMTP_ERROR';

export class DeliveryError extends AppError {
  declare readonly type: DeliveryErrorType;

  constructor(message: string, type: DeliveryErrorType, options?: ErrorOptions) {
    super(message, type, options);
  }
}

// Interrupts always propagate, even out of code that otherwise swallows errors
export function isInterrupt(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

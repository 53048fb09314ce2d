export class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AdapterError extends AppError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class TelegramError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('TELEGRAM', message, options);
    this.name = 'TelegramError';
  }
}

/** The calendar grid could not be read from its source (network, auth, missing sheet or file). */
export class SheetFetchError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('SHEETS', message, options);
    this.name = 'SheetFetchError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'VALIDATION_ERROR', options);
    this.name = 'ValidationError';
  }
}

export class AuthError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'AUTH_ERROR', options);
    this.name = 'AuthError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'NOT_FOUND', options);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFLICT', options);
    this.name = 'ConflictError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import type { MessageParams } from '../i18n/messages.js';

export interface AppErrorOptions {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
  params?: MessageParams;
  cause?: Error;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  /** Values interpolated into the localized message for `code`. */
  public readonly params: MessageParams;

  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.statusCode = options.statusCode ?? 500;
    this.code = options.code ?? 'INTERNAL_ERROR';
    this.isOperational = options.isOperational ?? true;
    this.params = options.params ?? {};
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      success: false as const,
      error: this.message,
    };
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    options: { code?: string; params?: MessageParams; cause?: Error } = {},
  ) {
    super(message, {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      ...options,
    });
  }
}

export class NotFoundError extends AppError {
  constructor(
    message = 'Resource not found',
    options: { code?: string; cause?: Error } = {},
  ) {
    super(message, {
      statusCode: 404,
      code: 'NOT_FOUND',
      ...options,
    });
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

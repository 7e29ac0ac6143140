/**
 * Error taxonomy shared by the request pipeline and the runbooks
 */

import type { HttpMethod } from '../types';

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export class AuthenticationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RequestError extends Error {
  readonly statusCode?: number;
  readonly retryable: boolean;
  readonly method: HttpMethod;
  readonly uri: string;
  readonly retryAfterSeconds?: number;
  readonly timedOut: boolean;
  attempts: number;

  constructor(args: {
    message: string;
    method: HttpMethod;
    uri: string;
    statusCode?: number;
    retryable: boolean;
    retryAfterSeconds?: number;
    timedOut?: boolean;
    cause?: unknown;
  }) {
    super(args.message, { cause: args.cause });
    this.name = 'RequestError';
    this.statusCode = args.statusCode;
    this.retryable = args.retryable;
    this.method = args.method;
    this.uri = args.uri;
    this.retryAfterSeconds = args.retryAfterSeconds;
    this.timedOut = args.timedOut ?? false;
    this.attempts = 1;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 429 and every 5xx are worth another attempt, nothing else is.
 */
export const isRetryableStatus = (status: number): boolean => status === 429 || (status >= 500 && status <= 599);

export class PageFetchError extends Error {
  readonly page: number;
  readonly statusCode?: number;

  constructor(args: { message: string; page: number; statusCode?: number; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = 'PageFetchError';
    this.page = args.page;
    this.statusCode = args.statusCode;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ItemProcessingError extends Error {
  readonly index: number;

  constructor(index: number, cause: unknown) {
    super(`Item ${index} failed: ${toErrorMessage(cause)}`, { cause });
    this.name = 'ItemProcessingError';
    this.index = index;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DeadlineExceededError extends Error {
  readonly operation: string;
  readonly deadlineSeconds: number;

  constructor(operation: string, deadlineSeconds: number) {
    super(`Run deadline of ${deadlineSeconds}s exceeded during ${operation}`);
    this.name = 'DeadlineExceededError';
    this.operation = operation;
    this.deadlineSeconds = deadlineSeconds;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidResourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidResourceError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

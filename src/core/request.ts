/**
 * Resilient Request Executor
 * Sends one HTTP request with a bearer token and retries throttled or failed
 * calls with exponential backoff
 */

import type { FetchLike, HttpMethod, RequestSpec, RetryPolicy, Sleep } from '../types';
import { DEFAULT_RUN_OPTIONS } from '../utils/constants';
import { logger } from '../utils/logger';
import type { Deadline } from './deadline';
import { ConfigError, RequestError, isRetryableStatus, toErrorMessage } from './errors';

// setTimeout fires after 1ms for anything above this
export const MAX_TIMER_MS = 2 ** 31 - 1;

export const defaultSleep: Sleep = async (ms) => {
  let remaining = ms;
  while (remaining > 0) {
    const slice = Math.min(remaining, MAX_TIMER_MS);
    await new Promise<void>((resolve) => setTimeout(resolve, slice));
    remaining -= slice;
  }
};

export interface ExecutorOptions {
  retryPolicy?: Partial<RetryPolicy>;
  requestTimeoutSeconds?: number;
  fetch?: FetchLike;
  sleep?: Sleep;
  deadline?: Deadline;
}

/**
 * Merge policy layers left to right, later layers win.
 */
export const resolveRetryPolicy = (...layers: Array<Partial<RetryPolicy> | undefined>): RetryPolicy => {
  const policy: RetryPolicy = {
    maxRetries: DEFAULT_RUN_OPTIONS.maxRetries,
    initialBackoffSeconds: DEFAULT_RUN_OPTIONS.initialBackoffSeconds,
  };

  for (const layer of layers) {
    if (!layer) continue;
    if (layer.maxRetries != null) policy.maxRetries = layer.maxRetries;
    if (layer.initialBackoffSeconds != null) policy.initialBackoffSeconds = layer.initialBackoffSeconds;
  }

  if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
    throw new ConfigError(`maxRetries must be a non-negative integer. Received: ${policy.maxRetries}`);
  }
  if (!Number.isFinite(policy.initialBackoffSeconds) || policy.initialBackoffSeconds <= 0) {
    throw new ConfigError(
      `initialBackoffSeconds must be a positive number. Received: ${policy.initialBackoffSeconds}`
    );
  }

  return policy;
};

/**
 * Backoff before the n-th retry (1-indexed), ignoring any server hint.
 */
export const computeBackoffSeconds = (policy: RetryPolicy, retry: number): number =>
  policy.initialBackoffSeconds * Math.pow(2, retry - 1);

/**
 * Only the delay-seconds form of Retry-After is honored.
 */
export const parseRetryAfter = (value: string | null): number | undefined => {
  if (value == null) return undefined;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;

  const seconds = Number(trimmed);
  return Number.isSafeInteger(seconds) ? seconds : undefined;
};

/**
 * Strip query strings (SAS tokens, filters) before a URI reaches the logs.
 */
export const describeUri = (uri: string): string => {
  try {
    const url = new URL(uri);
    return `${url.origin}${url.pathname}`;
  } catch {
    return uri.split('?')[0];
  }
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

// Graph, Storage and Log Analytics all wrap failures in { error: { code, message } }
const extractErrorDetail = (text: string): string | undefined => {
  try {
    const parsed: unknown = JSON.parse(text);
    if (!isRecord(parsed) || !isRecord(parsed.error)) return undefined;
    const { code, message } = parsed.error;
    const parts = [code, message].filter((part): part is string => typeof part === 'string' && part !== '');
    return parts.length > 0 ? parts.join(': ') : undefined;
  } catch {
    return undefined;
  }
};

export class ResilientRequestExecutor {
  private readonly retryPolicy: RetryPolicy;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;
  private readonly deadline?: Deadline;

  constructor(
    private readonly token: string,
    options: ExecutorOptions = {}
  ) {
    this.retryPolicy = resolveRetryPolicy(options.retryPolicy);
    this.requestTimeoutMs =
      (options.requestTimeoutSeconds ?? DEFAULT_RUN_OPTIONS.requestTimeoutSeconds) * 1000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.deadline = options.deadline;
  }

  get defaultPolicy(): RetryPolicy {
    return { ...this.retryPolicy };
  }

  /**
   * Execute a request, retrying 429/5xx responses per the resolved policy.
   * Resolves with the parsed body of the first 2xx response.
   */
  async execute(spec: RequestSpec, policy?: Partial<RetryPolicy>): Promise<unknown> {
    const request: RequestSpec = Object.freeze({ ...spec });
    const retryPolicy = resolveRetryPolicy(this.retryPolicy, request.retryPolicy, policy);
    const operation = `${request.method} ${describeUri(request.uri)}`;

    let retries = 0;
    let backoffSeconds = retryPolicy.initialBackoffSeconds;

    while (true) {
      this.deadline?.assertCanContinue(operation);

      try {
        return await this.send(request);
      } catch (error) {
        if (!(error instanceof RequestError)) throw error;
        error.attempts = retries + 1;

        if (!error.retryable || retries >= retryPolicy.maxRetries) {
          logger.error('Request failed', {
            method: request.method,
            uri: describeUri(request.uri),
            status: error.statusCode ?? null,
            attempts: error.attempts,
            message: error.message,
          });
          throw error;
        }

        const waitSeconds = error.retryAfterSeconds ?? backoffSeconds;
        this.deadline?.assertCanContinue(operation, waitSeconds * 1000);
        retries += 1;

        logger.warn('Retrying request', {
          method: request.method,
          uri: describeUri(request.uri),
          status: error.statusCode ?? null,
          attempt: retries,
          maxRetries: retryPolicy.maxRetries,
          waitSeconds,
          retryAfterHint: error.retryAfterSeconds != null,
        });

        await this.sleep(waitSeconds * 1000);
        backoffSeconds *= 2;
      }
    }
  }

  private buildInit(request: RequestSpec): { headers: Record<string, string>; body?: string | Buffer } {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...request.headers,
      Authorization: `Bearer ${this.token}`,
    };

    if (request.body === undefined || request.method === 'GET') {
      return { headers };
    }

    if (typeof request.body === 'string') {
      if (request.contentType) headers['Content-Type'] = request.contentType;
      return { headers, body: request.body };
    }

    if (Buffer.isBuffer(request.body)) {
      headers['Content-Type'] = request.contentType ?? 'application/octet-stream';
      return { headers, body: request.body };
    }

    headers['Content-Type'] = request.contentType ?? 'application/json';
    return { headers, body: JSON.stringify(request.body) };
  }

  private async send(request: RequestSpec): Promise<unknown> {
    const { method, uri } = request;
    const { headers, body } = this.buildInit(request);

    // The timer stays armed until the body has been read
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    try {
      let res: Response;
      try {
        res = await this.fetchImpl(uri, { method, headers, body, signal: controller.signal });
      } catch (err) {
        if (controller.signal.aborted) throw this.timeoutError(method, uri, err);
        // No status code: cannot be classified as transient
        throw new RequestError({
          message: `${method} ${describeUri(uri)} could not be sent: ${toErrorMessage(err)}`,
          method,
          uri,
          retryable: false,
          cause: err,
        });
      }

      if (!res.ok) {
        const text = await this.readBody(res, controller.signal).catch(() => '');
        const detail = extractErrorDetail(text);
        const retryable = isRetryableStatus(res.status);
        throw new RequestError({
          message: `${method} ${describeUri(uri)} failed with ${res.status}${detail ? `: ${detail}` : ''}`,
          method,
          uri,
          statusCode: res.status,
          retryable,
          retryAfterSeconds: retryable ? parseRetryAfter(res.headers.get('retry-after')) : undefined,
        });
      }

      let text: string;
      try {
        text = await this.readBody(res, controller.signal);
      } catch (err) {
        if (controller.signal.aborted) throw this.timeoutError(method, uri, err);
        throw new RequestError({
          message: `${method} ${describeUri(uri)} response could not be read: ${toErrorMessage(err)}`,
          method,
          uri,
          statusCode: res.status,
          retryable: false,
          cause: err,
        });
      }

      return this.parseBody(res, text, method, uri);
    } finally {
      clearTimeout(timeout);
    }
  }

  private timeoutError(method: HttpMethod, uri: string, cause: unknown): RequestError {
    return new RequestError({
      message: `${method} ${describeUri(uri)} timed out after ${this.requestTimeoutMs / 1000}s`,
      method,
      uri,
      retryable: true,
      timedOut: true,
      cause,
    });
  }

  /**
   * Read the body, giving up as soon as the request's signal aborts.
   */
  private async readBody(res: Response, signal: AbortSignal): Promise<string> {
    if (signal.aborted) {
      throw new Error('Request aborted before the response body was read');
    }
    const aborted = new Promise<never>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(new Error('Response body read aborted')), { once: true });
    });
    return Promise.race([res.text(), aborted]);
  }

  private parseBody(res: Response, text: string, method: HttpMethod, uri: string): unknown {
    if (res.status === 204 || text === '') return undefined;

    const contentType = res.headers.get('content-type') ?? '';
    if (!contentType.includes('json')) return text;

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (err) {
      throw new RequestError({
        message: `${method} ${describeUri(uri)} returned invalid JSON`,
        method,
        uri,
        statusCode: res.status,
        retryable: false,
        cause: err,
      });
    }
  }
}

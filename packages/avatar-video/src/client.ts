import {
  AuthenticationError,
  AvatarVideoError,
  ConfigurationError,
  InvalidRequestError,
  NotFoundError,
  RateLimitError,
  TransportError,
} from './errors.js';
import type { AvatarVideoConfig, RequestOptions } from './types.js';

const DEFAULT_API_BASE_URL = 'https://api.heygen.com';
const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;
const DEFAULT_UPLOAD_BASE_URL = 'https://upload.heygen.com';
const USER_AGENT = 'avatar-video/0.1.0';

type Host = 'api' | 'upload';

export type RequestBody =
  | { kind: 'json'; value: unknown }
  | { kind: 'binary'; value: Blob; contentType: string }
  | { kind: 'form'; value: FormData };

interface RequestConfig {
  host: Host;
  path: string;
  method: 'GET' | 'POST';
  query?: Record<string, string | number | boolean | undefined>;
  body?: RequestBody;
  options?: RequestOptions;
}

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

function buildPath(path: string): string {
  return path.startsWith('/') ? path : `/${path}`;
}

function parseResponseBody(raw: string): unknown {
  if (!raw) return {};
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return { message: raw };
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function extractErrorMessage(payload: unknown): { code?: string; message?: string } {
  if (!isObject(payload)) return {};
  const { error, code, message } = payload;

  if (typeof error === 'string' && error) {
    return { message: error };
  }
  if (isObject(error)) {
    const nestedMessage = error.message || error.detail;
    return {
      code: typeof error.code === 'string' ? error.code : undefined,
      message: typeof nestedMessage === 'string' && nestedMessage ? nestedMessage : undefined,
    };
  }
  return {
    code: code !== undefined ? String(code) : undefined,
    message: typeof message === 'string' && message ? message : undefined,
  };
}

export class AvatarVideoHttpClient {
  private readonly apiKey: string;
  private readonly apiBaseUrl: string;
  private readonly uploadBaseUrl: string;
  private readonly requestTimeoutMs: number;

  constructor(config: AvatarVideoConfig) {
    const apiKey = config.apiKey?.trim();
    if (!apiKey) {
      throw new ConfigurationError('Missing avatar video API key');
    }
    this.apiKey = apiKey;
    this.apiBaseUrl = normalizeBaseUrl(config.apiBaseUrl ?? DEFAULT_API_BASE_URL);
    this.uploadBaseUrl = normalizeBaseUrl(config.uploadBaseUrl ?? DEFAULT_UPLOAD_BASE_URL);
    const timeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError('requestTimeoutMs must be a positive number of milliseconds');
    }
    this.requestTimeoutMs = timeoutMs;
  }

  async request<T>(config: RequestConfig): Promise<T> {
    const base = config.host === 'upload' ? this.uploadBaseUrl : this.apiBaseUrl;
    const url = new URL(`${base}${buildPath(config.path)}`);
    if (config.query) {
      for (const [key, value] of Object.entries(config.query)) {
        if (value === undefined) continue;
        url.searchParams.set(key, String(value));
      }
    }

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
      'X-Api-Key': this.apiKey,
    };

    let body: string | Blob | FormData | undefined;
    if (config.body?.kind === 'json') {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(config.body.value);
    } else if (config.body?.kind === 'binary') {
      headers['Content-Type'] = config.body.contentType;
      body = config.body.value;
    } else if (config.body?.kind === 'form') {
      // fetch writes the multipart boundary itself
      body = config.body.value;
    }

    const callerSignal = config.options?.signal;
    const timeoutSignal = AbortSignal.timeout(this.requestTimeoutMs);
    const signal = callerSignal ? AbortSignal.any([callerSignal, timeoutSignal]) : timeoutSignal;

    let response: Response;
    let rawText: string;
    try {
      response = await fetch(url.toString(), {
        method: config.method,
        headers,
        body,
        signal,
      });
      rawText = await response.text();
    } catch (error) {
      if (callerSignal?.aborted) throw error;
      if (timeoutSignal.aborted) {
        throw new TransportError(
          `${config.method} ${url.pathname} timed out after ${this.requestTimeoutMs}ms`,
          error,
        );
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`${config.method} ${url.pathname} failed: ${reason}`, error);
    }

    const parsedBody = parseResponseBody(rawText);

    if (!response.ok) {
      throw this.toApiError(response.status, parsedBody, response.headers);
    }

    return parsedBody as T;
  }

  private toApiError(status: number, payload: unknown, headers: Headers): AvatarVideoError {
    const extracted = extractErrorMessage(payload);
    const code = extracted.code ?? 'UNKNOWN';
    const message = extracted.message ?? `Avatar video API request failed with status ${status}`;
    const requestId = headers.get('x-request-id') ?? undefined;

    if (status === 401 || status === 403) {
      return new AuthenticationError(message, status, requestId, payload);
    }
    if (status === 400 || status === 422) {
      return new InvalidRequestError(message, code, undefined, requestId, payload);
    }
    if (status === 404) {
      return new NotFoundError(message, code, requestId, payload);
    }
    if (status === 429) {
      const retryFromHeader = headers.get('retry-after');
      const retryAfterSeconds = retryFromHeader ? Number.parseInt(retryFromHeader, 10) : undefined;
      return new RateLimitError(
        message,
        Number.isFinite(retryAfterSeconds) ? retryAfterSeconds : undefined,
        requestId,
        payload,
      );
    }

    return new AvatarVideoError(message, code, status, undefined, requestId, payload);
  }
}

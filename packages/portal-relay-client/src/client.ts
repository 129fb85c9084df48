import {
  AuthenticationError,
  ExpiredError,
  InvalidRequestError,
  NotFoundError,
  PortalRelayError,
  ServiceUnavailableError,
} from './errors.js';
import type { BinaryFile, ErrorResponse, PortalRelayConfig, RequestOptions } from './types.js';

const DEFAULT_BASE_URL = 'http://localhost:8000';
const USER_AGENT = 'portal-relay-client/0.1.0';

export interface RequestConfig {
  path: string;
  method: 'GET' | 'POST';
  query?: Record<string, string | number | undefined>;
  body?: unknown;
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

function isErrorResponse(input: unknown): input is ErrorResponse {
  if (!input || typeof input !== 'object' || !('error' in input)) return false;
  const err = input.error;
  if (!err || typeof err !== 'object') return false;
  return 'code' in err && typeof err.code === 'string' && 'message' in err && typeof err.message === 'string';
}

export function filenameFromDisposition(header: string | null, fallback: string): string {
  if (!header) return fallback;
  const encoded = /filename\*=UTF-8''([^;]+)/i.exec(header);
  if (encoded?.[1]) {
    try {
      return decodeURIComponent(encoded[1]);
    } catch {
      return encoded[1];
    }
  }
  const plain = /filename="([^"]+)"/i.exec(header) ?? /filename=([^;]+)/i.exec(header);
  return plain?.[1]?.trim() || fallback;
}

export class RelayHttpClient {
  private readonly baseUrl: string;
  private apiKey?: string;

  constructor(config: PortalRelayConfig = {}) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl ?? DEFAULT_BASE_URL);
    this.apiKey = config.apiKey;
  }

  setApiKey(apiKey: string): void {
    this.apiKey = apiKey;
  }

  async request<T>(config: RequestConfig): Promise<T> {
    const response = await this.send(config, 'application/json');
    const parsedBody = parseResponseBody(await response.text());

    if (!response.ok) {
      throw this.toApiError(response.status, parsedBody);
    }

    return parsedBody as T;
  }

  /** For endpoints that answer with an attachment on success and JSON on failure. */
  async requestBinary(config: RequestConfig, fallbackFilename: string): Promise<BinaryFile> {
    const response = await this.send(config, '*/*');

    if (!response.ok) {
      throw this.toApiError(response.status, parseResponseBody(await response.text()));
    }

    return {
      data: new Uint8Array(await response.arrayBuffer()),
      filename: filenameFromDisposition(response.headers.get('content-disposition'), fallbackFilename),
      contentType: response.headers.get('content-type') ?? 'application/octet-stream',
    };
  }

  private send(config: RequestConfig, accept: string): Promise<Response> {
    const url = new URL(`${this.baseUrl}${buildPath(config.path)}`);
    if (config.query) {
      for (const [key, value] of Object.entries(config.query)) {
        if (value === undefined) continue;
        url.searchParams.set(key, String(value));
      }
    }

    const headers: Record<string, string> = {
      Accept: accept,
      'User-Agent': USER_AGENT,
    };
    if (this.apiKey) {
      headers['x-api-key'] = this.apiKey;
    }

    let body: string | undefined;
    if (config.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(config.body);
    }

    return fetch(url.toString(), {
      method: config.method,
      headers,
      body,
      signal: config.options?.signal,
    });
  }

  private toApiError(status: number, payload: unknown): PortalRelayError {
    let code = 'UNKNOWN';
    let message = `Portal relay request failed with status ${status}`;
    let details: Record<string, unknown> | undefined;

    if (isErrorResponse(payload)) {
      code = payload.error.code;
      message = payload.error.message;
      details = payload.error.details;
    }

    if (status === 400) {
      return new InvalidRequestError(message, code, details, payload);
    }
    if (status === 401) {
      return new AuthenticationError(message, payload);
    }
    if (status === 404) {
      return new NotFoundError(message, code, payload);
    }
    if (status === 410) {
      return new ExpiredError(message, code, payload);
    }
    if (status === 503) {
      return new ServiceUnavailableError(message, code, payload);
    }

    return new PortalRelayError(message, code, status, details, payload);
  }
}

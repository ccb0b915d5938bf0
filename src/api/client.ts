import { GatewayError, errorMessage } from '../errors.js';
import type { ApiResult } from './types.js';

export type FetchLike = (
  input: string,
  init?: RequestInit,
) => Promise<Response>;

export interface HttpClientOptions {
  serverAddress: string;
  apiToken: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export type QueryValue = string | number | boolean | undefined;
export type Query = [string, QueryValue][];

const DEFAULT_TIMEOUT_MS = 30_000;
export const USER_AGENT = 'fluxreader/0.1';

export function buildQueryString(query: Query): string {
  const params = new URLSearchParams();
  for (const [key, value] of query) {
    if (value === undefined) continue;
    params.append(key, String(value));
  }
  const qs = params.toString();
  return qs ? `?${qs}` : '';
}

/**
 * Minimal JSON client for the server's /v1 API. Every call resolves to an
 * ApiResult; transport failures become `network` errors.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly apiToken: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(opts: HttpClientOptions) {
    this.baseUrl = opts.serverAddress.replace(/\/+$/, '') + '/v1';
    this.apiToken = opts.apiToken;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  url(endpoint: string, query: Query = []): string {
    return this.baseUrl + endpoint + buildQueryString(query);
  }

  async get<T>(endpoint: string, query: Query = []): Promise<ApiResult<T>> {
    const res = await this.request('GET', this.url(endpoint, query));
    if (!res.ok) return res;
    return this.parseJson<T>(res.value);
  }

  async put(endpoint: string, body?: unknown): Promise<ApiResult<void>> {
    const res = await this.request('PUT', this.url(endpoint), body);
    if (!res.ok) return res;
    return { ok: true, value: undefined };
  }

  private async request(
    method: 'GET' | 'PUT',
    url: string,
    body?: unknown,
  ): Promise<ApiResult<string>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const headers: Record<string, string> = {
      'X-Auth-Token': this.apiToken,
      'User-Agent': USER_AGENT,
      Accept: 'application/json',
    };
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });
    } catch (err) {
      clearTimeout(timeout);
      const reason = controller.signal.aborted
        ? `Request timed out after ${this.timeoutMs}ms`
        : errorMessage(err);
      return { ok: false, error: new GatewayError('network', reason) };
    }

    try {
      const text = await response.text();
      if (!response.ok) {
        return {
          ok: false,
          error: new GatewayError(
            'http',
            httpErrorMessage(response.status, text),
            response.status,
          ),
        };
      }
      return { ok: true, value: text };
    } catch (err) {
      return {
        ok: false,
        error: new GatewayError('network', errorMessage(err)),
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  private parseJson<T>(text: string): ApiResult<T> {
    try {
      return { ok: true, value: JSON.parse(text) as T };
    } catch {
      return {
        ok: false,
        error: new GatewayError('parse', 'Server returned invalid JSON'),
      };
    }
  }
}

function httpErrorMessage(status: number, body: string): string {
  try {
    const data: unknown = JSON.parse(body);
    if (
      typeof data === 'object' &&
      data !== null &&
      'error_message' in data &&
      typeof data.error_message === 'string'
    ) {
      return `HTTP ${status}: ${data.error_message}`;
    }
  } catch {
    return `HTTP ${status}`;
  }
  return `HTTP ${status}`;
}

/**
 * HTTP transport for the entitlement API.
 * Wraps fetch with a per-request timeout and maps fetch failures to TransportError.
 */
import { TransportError } from '../errors.js';
import type { HttpTransport, TransportRequestOptions, TransportResponse } from './types.js';

/**
 * Builds headers for API requests.
 */
export function buildHeaders(extra: Record<string, string> = {}): Record<string, string> {
  return {
    Accept: 'application/json',
    ...extra,
  };
}

/**
 * Appends query params to a URL.
 */
export function buildUrl(url: string, params: Readonly<Record<string, string>>): string {
  const query = new URLSearchParams(params).toString();
  return query !== '' ? `${url}?${query}` : url;
}

function parseBody(text: string): unknown {
  if (text.trim() === '') {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Maps an error thrown by fetch to a TransportError.
 */
export function toTransportError(err: unknown, timeoutMs: number): TransportError {
  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
    return new TransportError(`Request timed out after ${String(timeoutMs)}ms`, {
      cause: err,
      timedOut: true,
    });
  }
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? err.cause.message : undefined;
    const message = cause != null && cause !== '' ? `${err.message} (${cause})` : err.message;
    return new TransportError(message, { cause: err });
  }
  return new TransportError(String(err));
}

export class FetchTransport implements HttpTransport {
  private readonly headers: Record<string, string>;

  constructor(extraHeaders: Record<string, string> = {}) {
    this.headers = buildHeaders(extraHeaders);
  }

  async performGet(
    url: string,
    params: Readonly<Record<string, string>>,
    options: TransportRequestOptions
  ): Promise<TransportResponse> {
    let response: Response;
    let text: string;
    try {
      response = await fetch(buildUrl(url, params), {
        method: 'GET',
        headers: this.headers,
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      text = await response.text();
    } catch (err) {
      throw toTransportError(err, options.timeoutMs);
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, name) => {
      headers[name.toLowerCase()] = value;
    });

    return {
      status: response.status,
      headers,
      body: parseBody(text),
    };
  }
}

import { NetworkError, TimeoutError } from '../errors';

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** A response whose body was read before the deadline. */
export interface HttpTextResponse {
  ok: boolean;
  status: number;
  statusText: string;
  url: string;
  body: string;
}

export interface HttpClient {
  fetch(url: string, init?: RequestInit): Promise<Response>;
  /** Like `fetch`, but the body is read under the same deadline. */
  fetchText(url: string, init?: RequestInit): Promise<HttpTextResponse>;
}

export interface HttpClientOptions {
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

/**
 * Outbound HTTP for components. Every request carries a deadline; transport
 * failures surface as `TimeoutError` / `NetworkError` so they are recorded
 * against the calling component.
 */
export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));

  const withDeadline = async <T>(url: string, init: RequestInit, send: (init: RequestInit) => Promise<T>) => {
    const signal = AbortSignal.timeout(timeoutMs);
    try {
      return await send({ ...init, signal });
    } catch (error) {
      if (signal.aborted) {
        throw new TimeoutError(`Request to ${url} timed out after ${timeoutMs}ms`, {
          timeoutMs,
          url,
          cause: error,
        });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Request to ${url} failed: ${reason}`, { url, cause: error });
    }
  };

  return {
    fetch(url, init = {}) {
      return withDeadline(url, init, (signalled) => fetchImpl(url, signalled));
    },
    fetchText(url, init = {}) {
      return withDeadline(url, init, async (signalled) => {
        const response = await fetchImpl(url, signalled);
        const body = await response.text();
        return {
          ok: response.ok,
          status: response.status,
          statusText: response.statusText,
          url: response.url,
          body,
        };
      });
    },
  };
}

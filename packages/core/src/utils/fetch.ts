export const DEFAULT_TIMEOUT_MS = 5_000;

export type FetchImplementation = (
  input: string,
  init: {
    method: string;
    headers?: Record<string, string>;
    signal: AbortSignal;
  },
) => Promise<{
  text(): Promise<string>;
  status: number;
  statusText: string;
  ok: boolean;
}>;

export type HttpClientRequestOptions = {
  timeoutMs?: number;
  method?: string;
  headers?: Record<string, string>;
};

export type HttpResponse = {
  body: string;
  status: number;
  statusText: string;
  ok: boolean;
};

export type HttpClientDependencies = {
  fetchImpl?: FetchImplementation | null;
};

export type HttpClientInterface = {
  fetch: (url: string, options?: HttpClientRequestOptions) => Promise<HttpResponse>;
};

export class HttpTimeoutError extends Error {
  readonly aborted = true;

  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Thin wrapper over the Fetch API with a per-request timeout. The fetch
 * implementation is injectable so callers can be tested without a network.
 */
export class HttpClient implements HttpClientInterface {
  private readonly fetchImpl: FetchImplementation;

  constructor(deps: HttpClientDependencies = {}) {
    this.fetchImpl = deps.fetchImpl ?? ((input, init) => globalThis.fetch(input, init));
  }

  private resolveTimeoutMs(timeoutMs?: number): number {
    if (typeof timeoutMs === 'number' && Number.isFinite(timeoutMs) && timeoutMs > 0) {
      return Math.floor(timeoutMs);
    }
    return DEFAULT_TIMEOUT_MS;
  }

  async fetch(url: string, options: HttpClientRequestOptions = {}): Promise<HttpResponse> {
    const timeoutMs = this.resolveTimeoutMs(options.timeoutMs);
    const controller = new AbortController();
    let timedOut = false;
    const handle = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: options.method ?? 'GET',
        headers: options.headers,
        signal: controller.signal,
      });
      const body = await response.text();
      return {
        body,
        status: response.status,
        statusText: response.statusText,
        ok: response.ok,
      };
    } catch (error) {
      if (timedOut) {
        throw new HttpTimeoutError(url, timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(handle);
    }
  }
}

export default HttpClient;

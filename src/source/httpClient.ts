import { FetchError } from '../shared/errors.js';

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpClient {
  get(url: string): Promise<HttpResponse>;
  close(): Promise<void>;
}

export interface FetchHttpClientOptions {
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * HttpClient over the global fetch. Each request is bounded by the timeout;
 * close() aborts whatever is still in flight and refuses new requests.
 */
export class FetchHttpClient implements HttpClient {
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(private readonly options: FetchHttpClientOptions = {}) {}

  async get(url: string): Promise<HttpResponse> {
    if (this.closed) {
      throw new FetchError('HTTP client is closed', { url });
    }

    const timeoutMs = this.options.timeoutMs ?? 30000;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    this.inFlight.add(controller);

    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': this.options.userAgent ?? 'feedscout/0.1',
          Accept: 'text/html,application/xhtml+xml,application/rss+xml,application/xml;q=0.9,*/*;q=0.8',
        },
        signal: controller.signal,
        redirect: 'follow',
      });
      return { status: response.status, body: await response.text() };
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new FetchError(`Request aborted after ${timeoutMs}ms or on close: ${url}`, {
          url,
          timeout: timeoutMs,
        });
      }
      throw new FetchError(`Request failed: ${err instanceof Error ? err.message : String(err)}`, {
        url,
      });
    } finally {
      clearTimeout(timer);
      this.inFlight.delete(controller);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const controller of this.inFlight) controller.abort();
    this.inFlight.clear();
  }
}

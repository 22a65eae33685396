import {
  UpstreamMalformedError,
  UpstreamRejectedError,
  UpstreamUnavailableError,
  errorMessage,
} from "../errors";

// Browser-like headers to avoid being blocked
const browserHeaders = {
  "User-Agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "Accept-Language": "en-US,en;q=0.9",
  "Cache-Control": "no-cache",
  Pragma: "no-cache",
};

// Headers for Playtomic JSON API
export const playtomicApiHeaders: Record<string, string> = {
  ...browserHeaders,
  Accept: "application/json, text/plain, */*",
  Origin: "https://playtomic.com",
  Referer: "https://playtomic.com/",
};

// Headers for Playtomic club pages (HTML)
export const playtomicPageHeaders: Record<string, string> = {
  ...browserHeaders,
  Accept: "text/html,application/xhtml+xml",
};

export type FetchFn = typeof fetch;

export interface HttpClientOptions {
  timeoutMs: number;
  fetchFn?: FetchFn;
}

/**
 * Single upstream request, no retries: retry policy belongs to the cache
 * coordinator. Failures come back as the upstream error taxonomy.
 */
export class HttpClient {
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  private async request(url: string, headers: Record<string, string>): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: "GET",
        headers,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new UpstreamUnavailableError(`Request to ${url} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new UpstreamRejectedError(
        `Upstream returned ${response.status}: ${response.statusText}`,
        response.status
      );
    }

    return response;
  }

  private async readBody(url: string, response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw new UpstreamUnavailableError(`Reading response from ${url} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async getJson(url: string, headers: Record<string, string>): Promise<unknown> {
    const response = await this.request(url, headers);
    const body = await this.readBody(url, response);

    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch {
      throw new UpstreamMalformedError(`Response from ${url} is not valid JSON`);
    }
  }

  async getText(url: string, headers: Record<string, string>): Promise<string> {
    const response = await this.request(url, headers);
    return this.readBody(url, response);
  }
}

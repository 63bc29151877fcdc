/**
 * HTTP Session Client
 *
 * A small browser-like session over axios: keep-alive connection pool,
 * cookies carried across requests, redirects followed by hand so every hop
 * can set cookies and the final URL is known, and transport-level retry
 * with exponential backoff for transient server faults.
 */

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from "axios";
import { Agent as HttpAgent } from "http";
import { Agent as HttpsAgent } from "https";
import type { PoolConfig, RetryConfig } from "../types";

// ============================================================================
// Configuration
// ============================================================================

export const BROWSER_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.5",
  "Accept-Encoding": "gzip, deflate",
  Connection: "keep-alive",
  "Upgrade-Insecure-Requests": "1",
};

const DEFAULT_MAX_REDIRECTS = 10;

export interface SessionClientOptions {
  timeoutMs: number;
  verifySsl: boolean;
  retry: RetryConfig;
  pool: PoolConfig;
  headers?: Record<string, string>;
  maxRedirects?: number;
  /** Replaces the network transport; tests pass an in-process adapter here. */
  adapter?: AxiosAdapter;
  sleep?: (ms: number) => Promise<void>;
}

export interface SessionResponse {
  url: string;
  status: number;
  body: string;
  redirects: number;
}

type HttpMethod = "GET" | "POST";

// ============================================================================
// Errors
// ============================================================================

export class SessionRequestError extends Error {
  constructor(
    message: string,
    public readonly code: "NETWORK" | "HTTP_STATUS" | "TOO_MANY_REDIRECTS" | "CLOSED",
    public readonly url: string,
    public readonly status?: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "SessionRequestError";
  }
}

// ============================================================================
// Helpers
// ============================================================================

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function headerValues(headers: AxiosResponse["headers"], name: string): string[] {
  const value: unknown = headers[name];
  if (Array.isArray(value)) {
    return value.filter((entry): entry is string => typeof entry === "string");
  }
  return typeof value === "string" ? [value] : [];
}

function isRedirect(status: number): boolean {
  return status === 301 || status === 302 || status === 303 || status === 307 || status === 308;
}

// ============================================================================
// Client
// ============================================================================

export class SessionClient {
  private readonly http: AxiosInstance;
  private readonly httpAgent: HttpAgent;
  private readonly httpsAgent: HttpsAgent;
  private readonly cookies = new Map<string, string>();
  private readonly retry: RetryConfig;
  private readonly maxRedirects: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private closed = false;

  constructor(options: SessionClientOptions) {
    this.retry = options.retry;
    this.maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
    this.sleep = options.sleep ?? sleep;

    this.httpAgent = new HttpAgent({
      keepAlive: true,
      maxSockets: options.pool.maxSockets,
      maxFreeSockets: options.pool.maxFreeSockets,
    });
    this.httpsAgent = new HttpsAgent({
      keepAlive: true,
      maxSockets: options.pool.maxSockets,
      maxFreeSockets: options.pool.maxFreeSockets,
      rejectUnauthorized: options.verifySsl,
    });

    this.http = axios.create({
      timeout: options.timeoutMs,
      headers: { ...BROWSER_HEADERS, ...options.headers },
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      responseType: "text",
      maxRedirects: 0,
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async get(url: string): Promise<SessionResponse> {
    return this.request("GET", url);
  }

  async postForm(url: string, fields: Record<string, string>): Promise<SessionResponse> {
    return this.request("POST", url, new URLSearchParams(fields).toString());
  }

  /** Cookie header value the next request will carry. */
  cookieHeader(): string {
    return Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join("; ");
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Release pooled sockets and forget session cookies.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.cookies.clear();
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  // ==========================================================================
  // Redirect handling
  // ==========================================================================

  private async request(method: HttpMethod, url: string, body?: string): Promise<SessionResponse> {
    if (this.closed) {
      throw new SessionRequestError("Session is closed", "CLOSED", url);
    }

    let currentMethod = method;
    let currentUrl = url;
    let currentBody = body;

    for (let redirects = 0; redirects <= this.maxRedirects; redirects++) {
      const response = await this.send(currentMethod, currentUrl, currentBody);
      const location = headerValues(response.headers, "location")[0];

      if (isRedirect(response.status) && location) {
        currentUrl = new URL(location, currentUrl).toString();
        // Browsers turn a redirected POST into a GET except on 307/308
        if (response.status !== 307 && response.status !== 308) {
          currentMethod = "GET";
          currentBody = undefined;
        }
        continue;
      }

      if (response.status < 200 || response.status >= 300) {
        throw new SessionRequestError(
          `${currentMethod} ${currentUrl} failed with HTTP ${response.status}`,
          "HTTP_STATUS",
          currentUrl,
          response.status
        );
      }

      return {
        url: currentUrl,
        status: response.status,
        body: typeof response.data === "string" ? response.data : String(response.data ?? ""),
        redirects,
      };
    }

    throw new SessionRequestError(
      `Exceeded ${this.maxRedirects} redirects starting at ${url}`,
      "TOO_MANY_REDIRECTS",
      currentUrl
    );
  }

  // ==========================================================================
  // Transport with retry
  // ==========================================================================

  private async send(
    method: HttpMethod,
    url: string,
    body?: string
  ): Promise<AxiosResponse<string>> {
    const retryable = this.retry.allowedMethods.includes(method);
    const maxAttempts = retryable ? this.retry.maxRetries + 1 : 1;

    for (let attempt = 1; ; attempt++) {
      const cookie = this.cookieHeader();
      let response: AxiosResponse<string>;

      try {
        response = await this.http.request<string>({
          method,
          url,
          data: body,
          headers: {
            ...(cookie ? { Cookie: cookie } : {}),
            ...(body !== undefined ? { "Content-Type": "application/x-www-form-urlencoded" } : {}),
          },
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        if (attempt < maxAttempts) {
          await this.backoff(attempt, maxAttempts, `${method} ${url} failed (${message})`);
          continue;
        }
        throw new SessionRequestError(
          `${method} ${url} failed after ${attempt} attempt(s): ${message}`,
          "NETWORK",
          url,
          undefined,
          error
        );
      }

      this.storeCookies(headerValues(response.headers, "set-cookie"));

      if (this.retry.statusForcelist.includes(response.status)) {
        if (attempt < maxAttempts) {
          await this.backoff(attempt, maxAttempts, `${method} ${url} returned HTTP ${response.status}`);
          continue;
        }
        if (retryable) {
          throw new SessionRequestError(
            `${method} ${url} returned HTTP ${response.status} after ${attempt} attempt(s)`,
            "HTTP_STATUS",
            url,
            response.status
          );
        }
      }

      return response;
    }
  }

  private async backoff(attempt: number, maxAttempts: number, reason: string): Promise<void> {
    const delay = this.retry.backoffFactorMs * Math.pow(2, attempt - 1);
    console.warn(`[SessionClient] ${reason}; retrying in ${delay}ms (attempt ${attempt + 1}/${maxAttempts})`);
    await this.sleep(delay);
  }

  private storeCookies(setCookieHeaders: string[]): void {
    for (const header of setCookieHeaders) {
      const [pair, ...attributes] = header.split(";");
      const separator = pair.indexOf("=");
      if (separator <= 0) continue;

      const name = pair.slice(0, separator).trim();
      const value = pair.slice(separator + 1).trim();
      const expired = attributes.some((attr) => /^\s*max-age\s*=\s*0\s*$/i.test(attr));

      if (!value || expired) {
        this.cookies.delete(name);
      } else {
        this.cookies.set(name, value);
      }
    }
  }
}

/**
 * Polite HTTP client shared by the scrapers.
 *
 * One axios instance per client, a browser user agent picked at
 * construction, a bounded retry for idempotent GETs and a randomized delay
 * between page requests. All state lives on the instance.
 */

import axios, { isAxiosError, type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from "axios";
import { ScrapeError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

export const USER_AGENTS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.6 Safari/605.1.15",
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:133.0) Gecko/20100101 Firefox/133.0",
] as const;

/** Status codes worth another attempt. */
export const RETRY_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export interface HttpClientConfig {
  timeoutMs: number;
  maxRetries: number;
  /** Lower bound of the random pause before a page request. */
  minDelayMs: number;
  maxDelayMs: number;
  /** Base of the exponential backoff between retries (default 1000 ms). */
  backoffMs?: number;
  userAgent?: string;
  acceptLanguage?: string;
  /** Test seams. */
  adapter?: AxiosAdapter;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface BinaryResponse {
  data: Buffer;
  contentType: string;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((r) => setTimeout(r, ms));

export class HttpClient {
  private readonly client: AxiosInstance;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly backoffMs: number;
  readonly userAgent: string;

  constructor(
    private readonly config: HttpClientConfig,
    private readonly logger: Logger = silentLogger,
  ) {
    this.random = config.random ?? Math.random;
    this.sleep = config.sleep ?? defaultSleep;
    this.backoffMs = config.backoffMs ?? 1000;
    this.userAgent = config.userAgent ?? USER_AGENTS[Math.floor(this.random() * USER_AGENTS.length)];
    this.client = axios.create({
      headers: {
        "User-Agent": this.userAgent,
        "Accept-Language": config.acceptLanguage ?? "it-IT,it;q=0.9,en;q=0.8",
      },
      timeout: config.timeoutMs,
      maxRedirects: 5,
      adapter: config.adapter,
    });
  }

  get delayRange(): { minMs: number; maxMs: number } {
    return { minMs: this.config.minDelayMs, maxMs: this.config.maxDelayMs };
  }

  /**
   * Sleep for a random time in `[min, max]` ms, defaulting to the configured
   * page delay range.
   */
  async politeDelay(range?: { minMs: number; maxMs: number }): Promise<number> {
    const minMs = range?.minMs ?? this.config.minDelayMs;
    const maxMs = range?.maxMs ?? this.config.maxDelayMs;
    const delay = minMs + this.random() * Math.max(0, maxMs - minMs);
    if (delay > 0) {
      this.logger.debug(`Waiting ${(delay / 1000).toFixed(2)} seconds before making request`);
      await this.sleep(delay);
    }
    return delay;
  }

  async getText(url: string): Promise<string> {
    const resp = await this.get<unknown>(url, { responseType: "text" });
    if (typeof resp !== "string") {
      throw new ScrapeError(url, `Expected a text body from ${url}`);
    }
    return resp;
  }

  async getJson(url: string, params?: Record<string, string | number>): Promise<unknown> {
    return this.get<unknown>(url, { params, responseType: "json" });
  }

  async getBinary(url: string): Promise<BinaryResponse> {
    for (let attempt = 0; ; attempt++) {
      try {
        const resp = await this.client.get<ArrayBuffer>(url, { responseType: "arraybuffer" });
        const header = resp.headers["content-type"];
        return {
          data: Buffer.from(resp.data),
          contentType: typeof header === "string" ? header : "",
        };
      } catch (err) {
        await this.backoffOrThrow(url, err, attempt);
      }
    }
  }

  private async get<T>(url: string, options: AxiosRequestConfig): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        const resp = await this.client.get<T>(url, options);
        return resp.data;
      } catch (err) {
        await this.backoffOrThrow(url, err, attempt);
      }
    }
  }

  private async backoffOrThrow(url: string, err: unknown, attempt: number): Promise<void> {
    if (attempt >= this.config.maxRetries || !isRetryable(err)) {
      const status = isAxiosError(err) ? err.response?.status : undefined;
      throw new ScrapeError(
        url,
        status ? `GET ${url} failed with status ${status}` : `GET ${url} failed`,
        { status, cause: err },
      );
    }
    const wait = this.backoffMs * 2 ** attempt;
    this.logger.warn(`GET ${url} failed (attempt ${attempt + 1}), retrying in ${wait} ms`);
    await this.sleep(wait);
  }
}

/** Network failures and throttling/5xx answers are retried; everything else is final. */
export function isRetryable(err: unknown): boolean {
  if (!isAxiosError(err)) return false;
  if (!err.response) return err.code !== "ERR_CANCELED";
  return RETRY_STATUSES.has(err.response.status);
}

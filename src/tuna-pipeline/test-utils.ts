/**
 * In-process HTTP stand-in for tests: an axios adapter answering from a
 * route table keyed by URL.
 */

import {
  AxiosError,
  AxiosHeaders,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";
import { HttpClient, type HttpClientConfig } from "./http-client.js";

export interface StubResponse {
  status?: number;
  data: unknown;
  contentType?: string;
}

export type StubRoute = StubResponse | ((config: InternalAxiosRequestConfig) => StubResponse);

/**
 * Adapter that answers from `routes` (unknown URLs get a 404) and records
 * every requested URL in `calls`. Statuses >= 400 reject the way axios does.
 */
export function stubAdapter(routes: Record<string, StubRoute>, calls: string[] = []): AxiosAdapter {
  return async (config) => {
    const url = config.url ?? "";
    calls.push(url);
    const route = routes[url];
    const stub: StubResponse =
      route === undefined ? { status: 404, data: "Not Found" } : typeof route === "function" ? route(config) : route;
    const status = stub.status ?? 200;

    const response: AxiosResponse = {
      data: stub.data,
      status,
      statusText: status >= 400 ? "Error" : "OK",
      headers: new AxiosHeaders({ "content-type": stub.contentType ?? "text/html" }),
      config,
    };
    if (status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${status}`,
        status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
        config,
        null,
        response,
      );
    }
    return response;
  };
}

/** HttpClient with no delays, no retries by default and a stubbed transport. */
export function stubHttpClient(
  routes: Record<string, StubRoute>,
  options: { calls?: string[]; config?: Partial<HttpClientConfig> } = {},
): HttpClient {
  return new HttpClient({
    timeoutMs: 1000,
    maxRetries: 0,
    minDelayMs: 0,
    maxDelayMs: 0,
    sleep: async () => undefined,
    ...options.config,
    adapter: stubAdapter(routes, options.calls),
  });
}

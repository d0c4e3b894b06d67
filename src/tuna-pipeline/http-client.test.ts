import { AxiosError } from "axios";
import { describe, expect, it } from "vitest";
import { ScrapeError } from "./errors.js";
import { HttpClient, isRetryable, USER_AGENTS } from "./http-client.js";
import { stubAdapter, type StubRoute } from "./test-utils.js";

const URL_UNDER_TEST = "https://shop.example.com/page";

function clientWith(route: StubRoute, maxRetries = 3) {
  const calls: string[] = [];
  const sleeps: number[] = [];
  const http = new HttpClient({
    timeoutMs: 1000,
    maxRetries,
    minDelayMs: 2000,
    maxDelayMs: 5000,
    random: () => 0.5,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    adapter: stubAdapter({ [URL_UNDER_TEST]: route }, calls),
  });
  return { http, calls, sleeps };
}

/** Route that answers with the given statuses in turn, then repeats the last one. */
function sequence(...statuses: number[]): StubRoute {
  let i = 0;
  return () => {
    const status = statuses[Math.min(i++, statuses.length - 1)] ?? 200;
    return { status, data: status < 400 ? "<html>ok</html>" : "busy" };
  };
}

describe("HttpClient", () => {
  it("retries 503 with exponential backoff until it succeeds", async () => {
    const { http, calls, sleeps } = clientWith(sequence(503, 503, 200));
    await expect(http.getText(URL_UNDER_TEST)).resolves.toBe("<html>ok</html>");
    expect(calls).toHaveLength(3);
    expect(sleeps).toEqual([1000, 2000]);
  });

  it("gives up after the configured number of retries", async () => {
    const { http, calls, sleeps } = clientWith(sequence(500));
    const error = await http.getText(URL_UNDER_TEST).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ScrapeError);
    expect(error).toMatchObject({ status: 500, url: URL_UNDER_TEST });
    expect(calls).toHaveLength(4);
    expect(sleeps).toEqual([1000, 2000, 4000]);
  });

  it("does not retry a 404", async () => {
    const { http, calls, sleeps } = clientWith(sequence(404));
    await expect(http.getText(URL_UNDER_TEST)).rejects.toMatchObject({
      name: "ScrapeError",
      status: 404,
      message: `GET ${URL_UNDER_TEST} failed with status 404`,
    });
    expect(calls).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  it("retries network errors", async () => {
    let failed = false;
    const { http, calls } = clientWith((config) => {
      if (!failed) {
        failed = true;
        throw new AxiosError("socket hang up", "ECONNRESET", config);
      }
      return { data: { ok: true }, contentType: "application/json" };
    });
    await expect(http.getJson(URL_UNDER_TEST)).resolves.toEqual({ ok: true });
    expect(calls).toHaveLength(2);
  });

  it("waits a random time inside the configured range", async () => {
    const { http, sleeps } = clientWith(sequence(200));
    await expect(http.politeDelay()).resolves.toBe(3500);
    await expect(http.politeDelay({ minMs: 1000, maxMs: 1000 })).resolves.toBe(1000);
    expect(sleeps).toEqual([3500, 1000]);
  });

  it("picks a browser user agent", () => {
    const { http } = clientWith(sequence(200));
    expect(http.userAgent).toBe(USER_AGENTS[2]);
  });
});

describe("isRetryable", () => {
  it("only retries axios network failures and throttling or 5xx answers", () => {
    expect(isRetryable(new Error("boom"))).toBe(false);
    expect(isRetryable(new AxiosError("offline", "ECONNREFUSED"))).toBe(true);
    expect(isRetryable(new AxiosError("canceled", "ERR_CANCELED"))).toBe(false);
  });
});

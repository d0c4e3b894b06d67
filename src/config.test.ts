import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { httpConfigFrom, parseConfig } from "./config.js";

describe("parseConfig", () => {
  it("applies defaults", () => {
    expect(parseConfig({})).toEqual({
      port: 3031,
      geminiApiKey: undefined,
      geminiModel: "gemini-2.0-flash",
      logLevel: "info",
      minDelayMs: 2000,
      maxDelayMs: 5000,
      httpTimeoutMs: 30000,
      httpMaxRetries: 3,
      dataDir: ".",
    });
  });

  it("coerces values and orders the delay range", () => {
    const config = parseConfig({
      PORT: "8080",
      LOG_LEVEL: " DEBUG ",
      GEMINI_API_KEY: "test-secret",
      SCRAPER_MIN_DELAY_MS: "6000",
      SCRAPER_MAX_DELAY_MS: "1000",
    });
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe("debug");
    expect(config.geminiApiKey).toBe("test-secret");
    expect(config.minDelayMs).toBe(1000);
    expect(config.maxDelayMs).toBe(6000);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("treats an empty API key as missing", () => {
    expect(parseConfig({ GEMINI_API_KEY: "  " }).geminiApiKey).toBeUndefined();
  });

  it("rejects bad values", () => {
    expect(() => parseConfig({ LOG_LEVEL: "loud" })).toThrow(ZodError);
    expect(() => parseConfig({ PORT: "-1" })).toThrow(ZodError);
  });
});

describe("httpConfigFrom", () => {
  it("copies the HTTP settings", () => {
    expect(httpConfigFrom(parseConfig({ HTTP_TIMEOUT_MS: "500", HTTP_MAX_RETRIES: "1" }))).toEqual({
      timeoutMs: 500,
      maxRetries: 1,
      minDelayMs: 2000,
      maxDelayMs: 5000,
    });
  });
});

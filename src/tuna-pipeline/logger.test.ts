import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, isLogLevel } from "./logger.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes lines with the scope and filters by level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger("carrefour", "warn");
    logger.info("hidden");
    logger.warn("slow page");
    logger.error("failed", 42);

    expect(spy.mock.calls).toEqual([["[carrefour] WARN: slow page"], ["[carrefour] ERROR: failed", 42]]);
  });

  it("nests child scopes", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    createLogger("cli").child("http").info("GET");
    expect(spy).toHaveBeenCalledWith("[cli:http] GET");
  });

  it("stays quiet when silent", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    createLogger("quiet", "silent").error("nothing");
    expect(spy).not.toHaveBeenCalled();
  });
});

describe("isLogLevel", () => {
  it("accepts known levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});

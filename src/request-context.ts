/**
 * Per-request Gemini key for multi-user MCP clients. A request carrying
 * X-Gemini-Key (or Authorization: Bearer) runs inside this context, and
 * extract_product_info prefers that key over GEMINI_API_KEY.
 */
import { AsyncLocalStorage } from "node:async_hooks";

interface GeminiRequestContext {
  readonly geminiKey?: string;
}

const storage = new AsyncLocalStorage<GeminiRequestContext>();

/** Blank keys count as absent so the configured key still applies. */
export function normalizeGeminiKey(key: string | null | undefined): string | undefined {
  const trimmed = key?.trim();
  return trimmed ? trimmed : undefined;
}

export function runWithGeminiKey<T>(key: string | null | undefined, fn: () => T): T {
  return storage.run(Object.freeze({ geminiKey: normalizeGeminiKey(key) }), fn);
}

/** Key of the request being handled, if it sent one. */
export function getGeminiKey(): string | undefined {
  return storage.getStore()?.geminiKey;
}

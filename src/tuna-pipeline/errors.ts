/**
 * Error types shared by the scrapers, the extractor and the server.
 */

import { isAxiosError, type AxiosError } from "axios";

/** A page or asset could not be fetched. */
export class ScrapeError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ScrapeError";
    this.url = url;
    this.status = options?.status;
  }
}

/** Required configuration (an API key, a path) is missing or invalid. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** The LLM answered, but not with a usable product record. */
export class ExtractionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ExtractionError";
  }
}

const MAX_BODY_LEN = 200;

/**
 * Formats axios errors for tool output and logs.
 */
export function formatApiError(error: AxiosError): string {
  let message = "API request failed.";
  if (error.response) {
    message = `API Error: Status ${error.response.status} (${error.response.statusText || "Status text not available"}). `;
    const responseData: unknown = error.response.data;
    if (typeof responseData === "string") {
      message += `Response: ${responseData.substring(0, MAX_BODY_LEN)}${responseData.length > MAX_BODY_LEN ? "..." : ""}`;
    } else if (responseData) {
      try {
        const jsonString = JSON.stringify(responseData);
        message += `Response: ${jsonString.substring(0, MAX_BODY_LEN)}${jsonString.length > MAX_BODY_LEN ? "..." : ""}`;
      } catch {
        message += "Response: [Could not serialize data]";
      }
    } else {
      message += "No response body received.";
    }
  } else if (error.request) {
    message = "API Network Error: No response received from server.";
    if (error.code) message += ` (Code: ${error.code})`;
  } else {
    message += ` API Request Setup Error: ${error.message}`;
  }
  return message;
}

/** Best-effort one-line description of anything thrown. */
export function describeError(err: unknown): string {
  if (isAxiosError(err)) return formatApiError(err);
  if (err instanceof ScrapeError && err.cause !== undefined) {
    return `${err.message} (${describeError(err.cause)})`;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

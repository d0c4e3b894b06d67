/**
 * Image download helpers shared by the Carrefour and Open Food Facts scrapers.
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { HttpClient } from "./http-client.js";

/**
 * Pick a file extension from the response content type, falling back to
 * the URL's own extension and finally to ".jpg".
 */
export function imageExtension(contentType: string, imageUrl: string): string {
  const type = contentType.toLowerCase();
  if (type.includes("jpeg") || type.includes("jpg")) return ".jpg";
  if (type.includes("png")) return ".png";
  if (type.includes("gif")) return ".gif";
  if (type.includes("webp")) return ".webp";

  const pathname = URL.canParse(imageUrl) ? new URL(imageUrl).pathname : imageUrl;
  return path.posix.extname(pathname) || ".jpg";
}

/**
 * File-system safe version of a product name: anything other than letters,
 * digits, `.`, `_`, `-` and space becomes `_`; at most 50 characters.
 */
export function safeFileName(name: string): string {
  return name.replace(/[^\p{L}\p{N}._\- ]/gu, "_").slice(0, 50);
}

/** Last path segment of an image URL, without its query string. */
export function imageNameFromUrl(imageUrl: string): string {
  // relative URLs only lose their query string
  const pathname = URL.canParse(imageUrl) ? new URL(imageUrl).pathname : (imageUrl.split("?")[0] ?? "");
  return pathname.split("/").filter(Boolean).pop() ?? "";
}

export function isHttpUrl(url: string | null | undefined): url is string {
  return !!url && /^https?:\/\//i.test(url);
}

export async function writeBinary(filePath: string, data: Buffer): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, data);
}

/** Download `imageUrl` to `filePath`, creating the directory first. */
export async function downloadImage(http: HttpClient, imageUrl: string, filePath: string): Promise<string> {
  const { data } = await http.getBinary(imageUrl);
  await writeBinary(filePath, data);
  return filePath;
}

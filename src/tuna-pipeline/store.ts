/**
 * Flat-file persistence for pipeline records.
 *
 * Reads never throw: a missing or broken input is logged and read as an
 * empty collection. Writes never throw either; they report success as a
 * boolean.
 */

import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type { z } from "zod";
import { describeError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { ProductInfoSchema } from "./schemas.js";
import type { ProductInfoRecord } from "./types.js";

async function readJsonFile(filePath: string): Promise<unknown> {
  const text = await readFile(filePath, "utf-8");
  const parsed: unknown = JSON.parse(text);
  return parsed;
}

/**
 * Load a JSON array and validate each element. Elements failing the schema
 * are skipped with a warning naming their index.
 */
export async function loadJsonCollection<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S,
  logger: Logger = silentLogger,
): Promise<z.output<S>[]> {
  logger.info(`Loading ${filePath}`);
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (err) {
    logger.error(`Error loading JSON file ${filePath}: ${describeError(err)}`);
    return [];
  }
  if (!Array.isArray(raw)) {
    logger.error(`Expected a JSON array in ${filePath}, got ${raw === null ? "null" : typeof raw}`);
    return [];
  }

  const records: z.output<S>[] = [];
  raw.forEach((item: unknown, index) => {
    const result = schema.safeParse(item);
    if (result.success) {
      records.push(result.data);
    } else {
      logger.warn(`Skipping invalid record #${index} in ${filePath}: ${result.error.issues[0]?.message ?? "invalid"}`);
    }
  });
  return records;
}

/** Per-barcode files the extractor writes: `<barcode>.json` or `<barcode>_<n>_<weight>.json`. */
const EXTRACTED_FILE_PATTERN = /^\d+(?:_[^/\\]*)?\.json$/;

/**
 * Collect product-info records from a tree of per-barcode directories, in
 * directory-name order.
 */
export async function loadProductInfoDirectory(
  root: string,
  logger: Logger = silentLogger,
): Promise<ProductInfoRecord[]> {
  let dirs: string[];
  try {
    const entries = await readdir(root, { withFileTypes: true });
    dirs = entries.filter((e) => e.isDirectory()).map((e) => e.name).sort();
  } catch (err) {
    logger.error(`Error reading directory ${root}: ${describeError(err)}`);
    return [];
  }

  const records: ProductInfoRecord[] = [];
  for (const dir of dirs) {
    const dirPath = path.join(root, dir);
    let files: string[];
    try {
      files = (await readdir(dirPath)).filter((f) => EXTRACTED_FILE_PATTERN.test(f)).sort();
    } catch (err) {
      logger.warn(`Skipping directory ${dirPath}: ${describeError(err)}`);
      continue;
    }
    for (const file of files) {
      const filePath = path.join(dirPath, file);
      try {
        const parsed = ProductInfoSchema.safeParse(await readJsonFile(filePath));
        if (parsed.success && parsed.data.barcode) {
          records.push(parsed.data);
        } else {
          logger.warn(`Skipping ${filePath}: not a product-info record`);
        }
      } catch (err) {
        logger.warn(`Skipping ${filePath}: ${describeError(err)}`);
      }
    }
  }
  logger.info(`Loaded ${records.length} product-info records from ${root}`);
  return records;
}

/**
 * Write `data` as pretty-printed JSON, creating parent directories and
 * replacing any existing file.
 */
export async function writeJson(
  data: unknown,
  filePath: string,
  logger: Logger = silentLogger,
  indent = 2,
): Promise<boolean> {
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, JSON.stringify(data, null, indent), "utf-8");
    logger.info(`JSON output successfully saved to ${filePath}`);
    return true;
  } catch (err) {
    logger.error(`Error saving JSON file ${filePath}: ${describeError(err)}`);
    return false;
  }
}

/** Write a text file next to scraped assets, creating the directory. */
export async function writeText(filePath: string, text: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, text, "utf-8");
}

/**
 * Match step entry point: load both collections, join, write.
 */

import { stat } from "node:fs/promises";
import { describeError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { matchProducts } from "./matcher.js";
import { CatalogRecordSchema, ProductInfoSchema } from "./schemas.js";
import { loadJsonCollection, loadProductInfoDirectory, writeJson } from "./store.js";
import type { MatchedRecord, ProductInfoRecord } from "./types.js";

export const DEFAULT_PRODUCT_INFO_PATH = "carrefour/products_info.json";
export const DEFAULT_CATALOG_PATH = "carrefour/products.json";
export const DEFAULT_MATCHED_PATH = "carrefour/matched_products.json";

export interface MatchPipelineOptions {
  /** A JSON array file, or a directory of per-barcode extractor output. */
  productInfoPath?: string;
  catalogPath?: string;
  outputPath?: string;
}

export interface MatchPipelineResult {
  matched: MatchedRecord[];
  written: boolean;
  outputPath: string;
}

async function isDirectory(p: string, logger: Logger): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch (err) {
    logger.debug(`Cannot stat ${p}: ${describeError(err)}`);
    return false;
  }
}

async function loadProductInfo(p: string, logger: Logger): Promise<ProductInfoRecord[]> {
  if (await isDirectory(p, logger)) return loadProductInfoDirectory(p, logger);
  return loadJsonCollection(p, ProductInfoSchema, logger);
}

export async function runMatchPipeline(
  options: MatchPipelineOptions = {},
  logger: Logger = silentLogger,
): Promise<MatchPipelineResult> {
  const productInfoPath = options.productInfoPath ?? DEFAULT_PRODUCT_INFO_PATH;
  const catalogPath = options.catalogPath ?? DEFAULT_CATALOG_PATH;
  const outputPath = options.outputPath ?? DEFAULT_MATCHED_PATH;

  const productInfo = await loadProductInfo(productInfoPath, logger);
  const catalog = await loadJsonCollection(catalogPath, CatalogRecordSchema, logger);

  const matched = matchProducts(productInfo, catalog);
  logger.info(`Matched ${matched.length} of ${productInfo.length} products against ${catalog.length} catalog entries`);

  const written = await writeJson(matched, outputPath, logger);
  return { matched, written, outputPath };
}

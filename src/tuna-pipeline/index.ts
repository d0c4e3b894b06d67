/**
 * Tuna pipeline barrel export.
 */

export type {
  CatalogRecord,
  MatchedRecord,
  NutritionEntry,
  NutritionGrouping,
  NutritionTable,
  ProductInfoRecord,
  ScrapedProduct,
  TunaProduct,
} from "./types.js";
export { ConfigError, ExtractionError, ScrapeError, describeError } from "./errors.js";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./logger.js";
export { HttpClient, type HttpClientConfig } from "./http-client.js";
export { extractBarcode, groupNutrition, matchProducts, proteinPerEuro } from "./matcher.js";
export { loadJsonCollection, loadProductInfoDirectory, writeJson } from "./store.js";
export { runMatchPipeline } from "./pipeline.js";
export { CarrefourScraper, cleanPrice, parseListingHtml } from "./carrefour-scraper.js";
export { CarrefourProductPageScraper, parseNutritionPanel } from "./carrefour-product-page.js";
export { OpenFoodFactsScraper, formatTable, getHighResImageUrl } from "./off-scraper.js";
export { OpenFoodFactsApi } from "./off-api.js";
export { analyzePage } from "./page-analyzer.js";
export { GeminiExtractor, createGeminiGenerator, type ContentGenerator } from "./gemini-extractor.js";

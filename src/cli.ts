#!/usr/bin/env node
/**
 * Command-line entry point: one subcommand per pipeline step.
 *
 *   tuna-value scrape   [--url URL | --html-file FILE] [--output-file F] [--output-dir DIR]
 *   tuna-value details  [--url PRODUCT_URL | --catalog F] [--output-dir DIR]
 *   tuna-value off      --barcode CODE [--output-dir DIR]
 *   tuna-value analyze  [--url URL | --html-file FILE] [--container-class C] [--save-html F] [--output-file F]
 *   tuna-value extract  --barcode CODE [--directory DIR]
 *   tuna-value match    [--info F|DIR] [--catalog F] [--out F]
 *   tuna-value serve
 *
 * Common flags: --min-delay/--max-delay (seconds), --log-level.
 */

import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";

import { httpConfigFrom, loadConfig, type AppConfig } from "./config.js";
import { createMcpServer } from "./server.js";
import { setupStreamableHttpServer } from "./streamable-http.js";
import { CarrefourProductPageScraper } from "./tuna-pipeline/carrefour-product-page.js";
import { CarrefourScraper, DEFAULT_LISTING_URL } from "./tuna-pipeline/carrefour-scraper.js";
import { ConfigError, describeError } from "./tuna-pipeline/errors.js";
import { createGeminiGenerator, GeminiExtractor } from "./tuna-pipeline/gemini-extractor.js";
import { HttpClient } from "./tuna-pipeline/http-client.js";
import { createLogger, isLogLevel, type Logger } from "./tuna-pipeline/logger.js";
import { OpenFoodFactsScraper } from "./tuna-pipeline/off-scraper.js";
import { analyzePage } from "./tuna-pipeline/page-analyzer.js";
import {
  DEFAULT_CATALOG_PATH,
  DEFAULT_MATCHED_PATH,
  DEFAULT_PRODUCT_INFO_PATH,
  runMatchPipeline,
} from "./tuna-pipeline/pipeline.js";
import { CatalogRecordSchema } from "./tuna-pipeline/schemas.js";
import { loadJsonCollection, writeJson, writeText } from "./tuna-pipeline/store.js";

const COMMANDS = ["scrape", "details", "off", "analyze", "extract", "match", "serve"] as const;
type Command = (typeof COMMANDS)[number];

const USAGE = `Usage: tuna-value <${COMMANDS.join("|")}> [options]

  scrape    Scrape a Carrefour listing into products.json and download images
  details   Fetch product pages: nutrition.json and image carousel per product
  off       Scrape an Open Food Facts product page by barcode
  analyze   Analyze a listing page and suggest selectors
  extract   Extract a product record from label photos with Gemini
  match     Join product info with the catalog and compute protein per euro
  serve     Start the MCP server (Streamable HTTP)`;

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      url: { type: "string" },
      "html-file": { type: "string" },
      "output-file": { type: "string" },
      "output-dir": { type: "string" },
      "min-delay": { type: "string" },
      "max-delay": { type: "string" },
      "log-level": { type: "string" },
      barcode: { type: "string" },
      "container-class": { type: "string" },
      "save-html": { type: "string" },
      info: { type: "string" },
      catalog: { type: "string" },
      out: { type: "string" },
      directory: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}

type CliValues = ReturnType<typeof parseCli>["values"];

function seconds(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) throw new ConfigError(`--${flag} must be a non-negative number of seconds`);
  return n * 1000;
}

/** Apply command-line overrides on top of the environment config. */
function applyFlags(config: AppConfig, values: CliValues): AppConfig {
  let logLevel = config.logLevel;
  const rawLevel = values["log-level"];
  if (rawLevel !== undefined) {
    const level = rawLevel.toLowerCase();
    if (!isLogLevel(level)) throw new ConfigError(`Unknown log level "${rawLevel}"`);
    logLevel = level;
  }
  const minDelayMs = seconds("min-delay", values["min-delay"]) ?? config.minDelayMs;
  const maxDelayMs = seconds("max-delay", values["max-delay"]) ?? config.maxDelayMs;
  return Object.freeze({
    ...config,
    logLevel,
    minDelayMs: Math.min(minDelayMs, maxDelayMs),
    maxDelayMs: Math.max(minDelayMs, maxDelayMs),
  });
}

function requireBarcode(values: CliValues): string {
  const barcode = values.barcode?.trim();
  if (!barcode) throw new ConfigError("--barcode is required");
  return barcode;
}

function print(value: unknown): void {
  console.log(typeof value === "string" ? value : JSON.stringify(value, null, 2));
}

async function run(command: Command, values: CliValues, config: AppConfig, logger: Logger): Promise<boolean> {
  const http = new HttpClient(httpConfigFrom(config), logger.child("http"));

  switch (command) {
    case "scrape": {
      const scraper = new CarrefourScraper({ http, logger: logger.child("carrefour") });
      const htmlFile = values["html-file"];
      let products = await scraper.scrapeListing(
        htmlFile ? { htmlFile } : { url: values.url ?? DEFAULT_LISTING_URL },
      );
      logger.info(`Found ${products.length} products`);
      if (!products.length) return false;
      products = await scraper.saveListingImages(products, values["output-dir"] ?? "images");
      const written = await writeJson(products, values["output-file"] ?? "products.json", logger);
      const withImages = products.filter((p) => p.local_image_path).length;
      print(`Saved ${products.length} products (${withImages} images)`);
      return written;
    }

    case "details": {
      const scraper = new CarrefourProductPageScraper({ http, logger: logger.child("carrefour") });
      const outputRoot = values["output-dir"] ?? "carrefour/products";
      if (values.url) {
        print(await scraper.scrapeProduct(values.url, outputRoot));
        return true;
      }
      const catalog = await loadJsonCollection(values.catalog ?? DEFAULT_CATALOG_PATH, CatalogRecordSchema, logger);
      const details = await scraper.processCatalog(catalog, outputRoot);
      print(`Processed ${details.length} of ${catalog.length} products`);
      return details.length > 0;
    }

    case "off": {
      const scraper = new OpenFoodFactsScraper({ http, logger: logger.child("off") });
      const result = await scraper.scrapeProduct(requireBarcode(values), values["output-dir"] ?? ".");
      print(result.compactText);
      return true;
    }

    case "analyze": {
      let html: string;
      const htmlFile = values["html-file"];
      if (htmlFile) {
        html = await readFile(htmlFile, "utf-8");
      } else {
        await http.politeDelay();
        html = await http.getText(values.url ?? DEFAULT_LISTING_URL);
        const saveHtml = values["save-html"];
        if (saveHtml) {
          await writeText(saveHtml, html);
          logger.info(`Saved HTML to ${saveHtml}`);
        }
      }
      const analysis = analyzePage(html, { containerClass: values["container-class"] });
      const outputFile = values["output-file"];
      if (outputFile) return writeJson(analysis, outputFile, logger);
      print(analysis);
      return true;
    }

    case "extract": {
      const extractor = new GeminiExtractor({
        generator: createGeminiGenerator(config.geminiApiKey),
        model: config.geminiModel,
        logger: logger.child("gemini"),
      });
      const result = await extractor.extractBarcode(requireBarcode(values), values.directory ?? ".");
      print(result.product);
      return result.savedTo !== null;
    }

    case "match": {
      const result = await runMatchPipeline(
        {
          productInfoPath: values.info ?? DEFAULT_PRODUCT_INFO_PATH,
          catalogPath: values.catalog ?? DEFAULT_CATALOG_PATH,
          outputPath: values.out ?? DEFAULT_MATCHED_PATH,
        },
        logger,
      );
      print(`Matched ${result.matched.length} products -> ${result.outputPath}`);
      return result.written;
    }

    case "serve":
      setupStreamableHttpServer(() => createMcpServer({ config, logger, http }), config.port, logger);
      return true;
  }
}

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseCli(argv);
  const command = positionals[0];
  if (values.help || !isCommand(command)) {
    console.error(USAGE);
    return values.help ? 0 : 2;
  }

  const config = applyFlags(loadConfig(), values);
  const logger = createLogger(command, config.logLevel);
  try {
    return (await run(command, values, config, logger)) ? 0 : 1;
  } catch (err) {
    logger.error(describeError(err));
    return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Fatal: ${describeError(err)}`);
    process.exitCode = 1;
  },
);

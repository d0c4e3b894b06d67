/**
 * MCP server: one tool per pipeline step plus a workflow prompt.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type PromptMessage,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z, ZodError } from "zod";

import { httpConfigFrom, type AppConfig } from "./config.js";
import { getGeminiKey } from "./request-context.js";
import { CarrefourProductPageScraper } from "./tuna-pipeline/carrefour-product-page.js";
import { CarrefourScraper, DEFAULT_LISTING_URL, type ListingSource } from "./tuna-pipeline/carrefour-scraper.js";
import { describeError } from "./tuna-pipeline/errors.js";
import { createGeminiGenerator, GeminiExtractor, type ContentGenerator } from "./tuna-pipeline/gemini-extractor.js";
import { HttpClient } from "./tuna-pipeline/http-client.js";
import type { Logger } from "./tuna-pipeline/logger.js";
import { OpenFoodFactsApi } from "./tuna-pipeline/off-api.js";
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

/**
 * Server configuration
 */
export const SERVER_NAME = "tuna-value-mcp";
export const SERVER_VERSION = "1.0.0";

const INSTRUCTIONS = `You have seven tools for ranking canned tuna by protein per euro.

### Scraping
1. **carrefour_scrape_listing** — Scrape a Carrefour Italy listing page (or a saved HTML file) into catalog records: name, price in EUR, image URL, product URL. Optionally saves the records and the listing images.
2. **carrefour_product_details** — For one product URL, or every record of a saved catalog, fetch the product page, save its nutrition table as nutrition.json and download the image carousel.
3. **off_scrape_product** — Fetch an Open Food Facts product page by barcode; save the front/nutrition/ingredients photos and a compact product_info.txt.
4. **off_nutrition_lookup** — Nutrition per 100 g (and optionally a full product-info record) from the Open Food Facts API, no LLM needed.
5. **analyze_page** — Count tags and classes on a listing page and suggest selectors for a new layout.

### Extraction and valuation
6. **extract_product_info** — Send a barcode directory (photos + product_info.txt) to Gemini and save the structured product record beside the photos.
7. **match_products** — Join product-info records with the catalog by barcode and compute total weight, total protein and protein per euro.

## Typical order
carrefour_scrape_listing → off_scrape_product (per barcode) → extract_product_info (per barcode) → match_products.`;

export const PROMPTS: Record<string, { title: string; description: string; messages: PromptMessage[] }> = {
  tuna_value_workflow: {
    title: "Rank canned tuna by protein per euro",
    description: "Walk through scraping, extraction and matching, then summarize the best value products.",
    messages: [
      {
        role: "user",
        content: {
          type: "text",
          text: "Find the canned tuna on Carrefour Italy that gives the most protein per euro. Scrape the listing, collect label data for each barcode, extract the product info and match it with the catalog. Then show me the top five by protein per euro, with price, total weight and total protein.",
        },
      },
      {
        role: "assistant",
        content: {
          type: "text",
          text: `Here is my plan:

1. **carrefour_scrape_listing** with \`output_file: "carrefour/products.json"\` to get names, prices and product URLs.
2. For each barcode in the product URLs, **off_scrape_product** to fetch label photos and the nutrition table.
3. **extract_product_info** per barcode to turn photos and text into a structured record (weights, containers, nutrition).
4. **match_products** with \`product_info\` pointing at the barcode directories to compute protein per euro.

Drained weights are preferred over net weights when both the weight and matching nutrition are known. I'll report the ranking and call out records whose weight or protein could not be determined.`,
        },
      },
    ],
  },
};

export const TOOLS: Tool[] = [
  {
    name: "carrefour_scrape_listing",
    description:
      "Scrape a Carrefour Italy product listing into catalog records (name, price in EUR, image_url, product_url, source_url). Pass `url` to fetch a page (default: the canned tuna listing) or `html_file` to parse a saved page. Optional `output_file` saves the records as JSON; optional `image_dir` downloads each listing image.",
    inputSchema: {
      type: "object",
      properties: {
        url: { type: "string", description: "Listing URL (default: Carrefour canned tuna listing)" },
        html_file: { type: "string", description: "Path to a saved listing HTML file (instead of url)" },
        output_file: { type: "string", description: "Where to write the records as JSON (e.g. carrefour/products.json)" },
        image_dir: { type: "string", description: "Directory to save listing images in" },
      },
    },
  },
  {
    name: "carrefour_product_details",
    description:
      "Fetch Carrefour product pages: save each nutrition table as nutrition.json and download the image carousel into <output_dir>/<barcode>/images/. Pass `product_url` for one product, or `catalog_file` to process every record of a saved listing.",
    inputSchema: {
      type: "object",
      properties: {
        product_url: { type: "string", description: "A single product page URL" },
        catalog_file: { type: "string", description: `Catalog JSON from carrefour_scrape_listing (default: ${DEFAULT_CATALOG_PATH})` },
        output_dir: { type: "string", description: "Root directory for per-product folders (default: carrefour/products)" },
      },
    },
  },
  {
    name: "off_scrape_product",
    description:
      "Scrape an Open Food Facts product page by barcode. Saves front, nutrition and ingredients photos in full resolution and a compact product_info.txt (name, barcode, nutrition table) into <output_dir>/<barcode>/.",
    inputSchema: {
      type: "object",
      properties: {
        barcode: { type: "string", description: 'EAN barcode (e.g. "8001234567890")' },
        output_dir: { type: "string", description: "Root directory for the barcode folder (default: data directory)" },
      },
      required: ["barcode"],
    },
  },
  {
    name: "off_nutrition_lookup",
    description:
      "Look up nutrition per 100 g from the Open Food Facts API by barcode. Set `as_product_info` to get a full product-info record (name, package weight, nutrition) usable by match_products.",
    inputSchema: {
      type: "object",
      properties: {
        barcode: { type: "string", description: "EAN/UPC barcode" },
        as_product_info: { type: "boolean", description: "Return a product-info record instead of the nutrition entry (default: false)" },
      },
      required: ["barcode"],
    },
  },
  {
    name: "analyze_page",
    description:
      "Analyze a listing page to find product containers and suggest CSS selectors for title, price, unit price, image and link. Pass `url` or `html_file`; optional `container_class` forces the container.",
    inputSchema: {
      type: "object",
      properties: {
        url: { type: "string", description: "Page URL" },
        html_file: { type: "string", description: "Path to a saved HTML file" },
        container_class: { type: "string", description: "Class name of the product container" },
        save_html: { type: "string", description: "Save the fetched HTML to this path" },
      },
    },
  },
  {
    name: "extract_product_info",
    description:
      "Extract a structured product record (weights, number of containers, nutrition, ingredients, manufacturer) from the label photos and product_info.txt in <directory>/<barcode>/ using Gemini. The record is saved beside the photos. Needs a Gemini API key from the server env, the X-Gemini-Key header or `gemini_api_key`.",
    inputSchema: {
      type: "object",
      properties: {
        barcode: { type: "string", description: "Barcode directory name" },
        directory: { type: "string", description: "Root holding the barcode directories (default: data directory)" },
        user_prompt: { type: "string", description: "Override the user prompt" },
        system_prompt: { type: "string", description: "Override the system prompt" },
        gemini_api_key: { type: "string", description: "Optional: Gemini API key for this call (overrides env and header)" },
      },
      required: ["barcode"],
    },
  },
  {
    name: "match_products",
    description:
      "Join product-info records with the catalog by barcode (taken from the product URL) and compute total weight, total protein and protein per euro. Writes the matched records as JSON.",
    inputSchema: {
      type: "object",
      properties: {
        product_info: {
          type: "string",
          description: `Product-info JSON array, or a directory of per-barcode extractor output (default: ${DEFAULT_PRODUCT_INFO_PATH})`,
        },
        catalog: { type: "string", description: `Catalog JSON (default: ${DEFAULT_CATALOG_PATH})` },
        output: { type: "string", description: `Output JSON (default: ${DEFAULT_MATCHED_PATH})` },
      },
    },
  },
];

const barcodeArg = z.string().trim().regex(/^\d+$/, "barcode must be digits only");

const ArgSchemas = {
  carrefour_scrape_listing: z.object({
    url: z.string().url().optional(),
    html_file: z.string().min(1).optional(),
    output_file: z.string().min(1).optional(),
    image_dir: z.string().min(1).optional(),
  }),
  carrefour_product_details: z.object({
    product_url: z.string().url().optional(),
    catalog_file: z.string().min(1).optional(),
    output_dir: z.string().min(1).default("carrefour/products"),
  }),
  off_scrape_product: z.object({
    barcode: barcodeArg,
    output_dir: z.string().min(1).default("."),
  }),
  off_nutrition_lookup: z.object({
    barcode: barcodeArg,
    as_product_info: z.boolean().default(false),
  }),
  analyze_page: z
    .object({
      url: z.string().url().optional(),
      html_file: z.string().min(1).optional(),
      container_class: z.string().min(1).optional(),
      save_html: z.string().min(1).optional(),
    })
    .refine((a) => Boolean(a.url || a.html_file), { message: 'Provide either "url" or "html_file".' }),
  extract_product_info: z.object({
    barcode: barcodeArg,
    directory: z.string().min(1).default("."),
    user_prompt: z.string().optional(),
    system_prompt: z.string().optional(),
    gemini_api_key: z.string().trim().min(1).optional(),
  }),
  match_products: z.object({
    product_info: z.string().min(1).default(DEFAULT_PRODUCT_INFO_PATH),
    catalog: z.string().min(1).default(DEFAULT_CATALOG_PATH),
    output: z.string().min(1).default(DEFAULT_MATCHED_PATH),
  }),
} satisfies Record<string, z.ZodTypeAny>;

type ToolName = keyof typeof ArgSchemas;
type ToolHandler = (rawArgs: Record<string, unknown>) => Promise<string>;

export interface ServerDeps {
  config: AppConfig;
  logger: Logger;
  /** Shared HTTP client; one is built from the config when omitted. */
  http?: HttpClient;
  /** Gemini client factory, keyed by the API key in effect for the call. */
  createGenerator?: (apiKey: string | undefined) => ContentGenerator;
}

function textResult(text: string, isError = false): CallToolResult {
  return isError ? { content: [{ type: "text", text }], isError } : { content: [{ type: "text", text }] };
}

const json = (value: unknown): string => JSON.stringify(value, null, 2);

function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(ArgSchemas, name);
}

/** Validate raw tool arguments with `schema` before running the handler; throws ZodError. */
function withArgs<S extends z.ZodTypeAny>(
  schema: S,
  run: (args: z.output<S>) => Promise<string>,
): ToolHandler {
  return (rawArgs) => run(schema.parse(rawArgs));
}

/**
 * Tool implementations bound to one set of collaborators. Relative paths
 * resolve against the configured data directory.
 */
function createHandlers(deps: ServerDeps): Record<ToolName, ToolHandler> {
  const { config, logger } = deps;
  const http = deps.http ?? new HttpClient(httpConfigFrom(config), logger.child("http"));
  const createGenerator = deps.createGenerator ?? createGeminiGenerator;
  const resolve = (p: string): string => path.resolve(config.dataDir, p);

  return {
    carrefour_scrape_listing: withArgs(ArgSchemas.carrefour_scrape_listing, async (args) => {
      const scraper = new CarrefourScraper({ http, logger: logger.child("carrefour") });
      const source: ListingSource = args.html_file
        ? { htmlFile: resolve(args.html_file) }
        : { url: args.url ?? DEFAULT_LISTING_URL };
      let products = await scraper.scrapeListing(source);
      if (args.image_dir) products = await scraper.saveListingImages(products, resolve(args.image_dir));

      let savedTo: string | null = null;
      if (args.output_file) {
        const outputPath = resolve(args.output_file);
        if (await writeJson(products, outputPath, logger)) savedTo = outputPath;
      }
      if (!products.length) return "No products found on the listing page.";
      return json({ count: products.length, saved_to: savedTo, products });
    }),

    carrefour_product_details: withArgs(ArgSchemas.carrefour_product_details, async (args) => {
      const scraper = new CarrefourProductPageScraper({ http, logger: logger.child("carrefour") });
      const outputRoot = resolve(args.output_dir);
      if (args.product_url) {
        return json(await scraper.scrapeProduct(args.product_url, outputRoot));
      }
      const catalogPath = resolve(args.catalog_file ?? DEFAULT_CATALOG_PATH);
      const catalog = await loadJsonCollection(catalogPath, CatalogRecordSchema, logger);
      if (!catalog.length) return `No catalog records found in ${catalogPath}.`;
      const details = await scraper.processCatalog(catalog, outputRoot);
      return json({ processed: details.length, products: details });
    }),

    off_scrape_product: withArgs(ArgSchemas.off_scrape_product, async (args) => {
      const scraper = new OpenFoodFactsScraper({ http, logger: logger.child("off") });
      const result = await scraper.scrapeProduct(args.barcode, resolve(args.output_dir));
      return json({
        product_name: result.productName,
        barcode: result.barcode,
        directory: result.directory,
        text_file: result.textFile,
        images: result.images,
        product_info: result.compactText,
      });
    }),

    off_nutrition_lookup: withArgs(ArgSchemas.off_nutrition_lookup, async (args) => {
      const api = new OpenFoodFactsApi({ http, logger: logger.child("off") });
      const info = args.as_product_info
        ? await api.getProductInfo(args.barcode)
        : await api.getNutritionByBarcode(args.barcode);
      if (!info) return `No nutritional data found for barcode "${args.barcode}".`;
      return json(info);
    }),

    analyze_page: withArgs(ArgSchemas.analyze_page, async (args) => {
      let html: string;
      if (args.html_file) {
        html = await readFile(resolve(args.html_file), "utf-8");
      } else {
        html = await http.getText(args.url ?? "");
        if (args.save_html) await writeText(resolve(args.save_html), html);
      }
      return json(analyzePage(html, { containerClass: args.container_class }));
    }),

    extract_product_info: withArgs(ArgSchemas.extract_product_info, async (args) => {
      const apiKey = args.gemini_api_key ?? getGeminiKey() ?? config.geminiApiKey;
      const extractor = new GeminiExtractor({
        generator: createGenerator(apiKey),
        model: config.geminiModel,
        logger: logger.child("gemini"),
      });
      const imageDir = path.join(resolve(args.directory), args.barcode);
      const result = await extractor.extract({
        imageDir,
        textFile: path.join(imageDir, "product_info.txt"),
        userPrompt: args.user_prompt,
        systemPrompt: args.system_prompt,
      });
      return json({ saved_to: result.savedTo, product: result.product });
    }),

    match_products: withArgs(ArgSchemas.match_products, async (args) => {
      const result = await runMatchPipeline(
        {
          productInfoPath: resolve(args.product_info),
          catalogPath: resolve(args.catalog),
          outputPath: resolve(args.output),
        },
        logger.child("match"),
      );
      return json({
        matched_count: result.matched.length,
        written: result.written,
        output_path: result.outputPath,
        matched: result.matched,
      });
    }),
  };
}

/**
 * Creates a new MCP Server instance (one per connection).
 * Required because the SDK allows only one transport per Server; Streamable HTTP has multiple sessions.
 */
export function createMcpServer(deps: ServerDeps): Server {
  const { logger } = deps;
  const handlers = createHandlers(deps);

  const s = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      capabilities: { tools: {}, prompts: {} },
      instructions: INSTRUCTIONS,
    },
  );

  s.setRequestHandler(ListPromptsRequestSchema, async () => {
    const prompts = Object.entries(PROMPTS).map(([name, p]) => ({
      name,
      description: p.description,
      title: p.title,
    }));
    return { prompts };
  });

  s.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const name = request.params.name;
    const prompt = Object.prototype.hasOwnProperty.call(PROMPTS, name) ? PROMPTS[name] : undefined;
    if (!prompt) {
      return {
        description: `Unknown prompt: ${name}. Available: ${Object.keys(PROMPTS).join(", ")}.`,
        messages: [],
      };
    }
    return { description: prompt.description, messages: prompt.messages };
  });

  s.setRequestHandler(ListToolsRequestSchema, async () => {
    logger.debug(`ListTools: returning ${TOOLS.length} tools`);
    return { tools: TOOLS };
  });

  s.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name: toolName, arguments: toolArgs } = request.params;
    if (!isToolName(toolName)) {
      return textResult(
        `Error: Unknown tool requested: ${toolName}. Available tools: ${TOOLS.map((t) => t.name).join(", ")}.`,
        true,
      );
    }

    try {
      return textResult(await handlers[toolName](toolArgs ?? {}));
    } catch (error: unknown) {
      if (error instanceof ZodError) {
        const validationErrorMessage = `Invalid arguments for tool '${toolName}': ${error.errors
          .map((e) => `${e.path.join(".") || "(root)"} (${e.code}): ${e.message}`)
          .join(", ")}`;
        return textResult(validationErrorMessage, true);
      }
      logger.error(`Tool ${toolName} failed: ${describeError(error)}`);
      return textResult(`Error: ${describeError(error)}`, true);
    }
  });

  return s;
}

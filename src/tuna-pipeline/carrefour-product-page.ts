/**
 * Carrefour.it product page scraper: nutrition panel and image carousel.
 */

import path from "node:path";
import * as cheerio from "cheerio";
import { describeError } from "./errors.js";
import type { HttpClient } from "./http-client.js";
import { downloadImage, imageNameFromUrl } from "./images.js";
import { silentLogger, type Logger } from "./logger.js";
import { writeJson } from "./store.js";
import type { NutritionTable } from "./types.js";

/**
 * Parse the `#panel-nutritionInfo` table. The first `div.table-row` holds
 * the column headers; every later row with at least two cells maps its
 * first cell (the nutrient) to `{ header: value }`.
 *
 * Returns null when the page has no nutrition panel.
 */
export function parseNutritionPanel(html: string): NutritionTable | null {
  const $ = cheerio.load(html);
  const panel = $("div#panel-nutritionInfo").first();
  if (!panel.length) return null;

  const rows = panel.find("div.table-row").toArray();
  const table: NutritionTable = {};
  if (rows.length === 0) return table;

  const headers = $(rows[0])
    .find("span")
    .toArray()
    .map((span) => $(span).text().trim())
    .filter(Boolean);

  for (const row of rows.slice(1)) {
    const cells = $(row)
      .find("span")
      .toArray()
      .map((span) => $(span).text().trim());
    if (cells.length < 2) continue;

    const [nutrient, ...values] = cells;
    const columns: Record<string, string> = {};
    values.slice(0, headers.length).forEach((value, i) => {
      columns[headers[i]] = value;
    });
    table[nutrient] = columns;
  }
  return table;
}

/**
 * Absolute URLs of the alternative-image thumbnails, `data-src` preferred.
 * Returns an empty list when the page has no carousel.
 */
export function parseCarouselImages(html: string, productUrl: string): string[] {
  const $ = cheerio.load(html);
  const carousel = $("div.alternative-images").first();
  if (!carousel.length) return [];

  const urls: string[] = [];
  carousel.find("img.js-thumb-img").each((_i, img) => {
    const src = $(img).attr("data-src") || $(img).attr("src");
    if (!src) return;
    try {
      urls.push(new URL(src, productUrl).toString());
    } catch {
      urls.push(src);
    }
  });
  return urls;
}

/**
 * Directory name for a product: the last URL segment up to its first dot.
 *
 *   ".../tonno/8004030105096.html" -> "8004030105096"
 */
export function productDirName(productUrl: string): string {
  const segment = productUrl.replace(/\/+$/, "").split("/").pop() ?? "";
  return segment.split(".")[0];
}

export interface ProductDetails {
  productUrl: string;
  directory: string;
  nutrition: NutritionTable | null;
  images: string[];
}

export class CarrefourProductPageScraper {
  private readonly http: HttpClient;
  private readonly logger: Logger;

  constructor(options: { http: HttpClient; logger?: Logger }) {
    this.http = options.http;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Fetch one product page, write `nutrition.json` and download the
   * carousel into `<outputRoot>/<barcode>/images/`.
   */
  async scrapeProduct(productUrl: string, outputRoot: string): Promise<ProductDetails> {
    const directory = path.join(outputRoot, productDirName(productUrl));

    await this.http.politeDelay();
    const html = await this.http.getText(productUrl);

    const nutrition = parseNutritionPanel(html);
    if (nutrition) {
      await writeJson(nutrition, path.join(directory, "nutrition.json"), this.logger);
    } else {
      this.logger.warn(`Nutritional info not found for ${productDirName(productUrl)}.`);
    }

    const imageUrls = parseCarouselImages(html, productUrl);
    const images: string[] = [];
    for (const [i, url] of imageUrls.entries()) {
      const fileName = imageNameFromUrl(url) || `image_${i}.jpg`;
      try {
        images.push(await downloadImage(this.http, url, path.join(directory, "images", fileName)));
      } catch (err) {
        this.logger.error(`Error downloading image ${url}: ${describeError(err)}`);
      }
    }
    this.logger.info(
      `Processed product ${productDirName(productUrl)}: ` +
        (imageUrls.length ? `Downloaded ${images.length} images to ${path.join(directory, "images")}` : "No image carousel found."),
    );

    return { productUrl, directory, nutrition, images };
  }

  /**
   * Run {@link scrapeProduct} for every catalog record that has a product
   * URL. A failing product is logged and skipped.
   */
  async processCatalog(
    products: ReadonlyArray<{ product_url?: string | null }>,
    outputRoot: string,
  ): Promise<ProductDetails[]> {
    const done: ProductDetails[] = [];
    for (const product of products) {
      if (!product.product_url) continue;
      try {
        done.push(await this.scrapeProduct(product.product_url, outputRoot));
      } catch (err) {
        this.logger.error(`Error processing ${product.product_url}: ${describeError(err)}`);
      }
    }
    return done;
  }
}

/**
 * Carrefour.it category listing scraper.
 *
 * The listing page renders one `div.product-item` tile per product. We
 * parse the tiles with cheerio (server-side jQuery-like HTML parser) and
 * fall back to the page's JSON-LD `Product` data when no tile is found.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import * as cheerio from "cheerio";
import type { Cheerio } from "cheerio";
import type { Element } from "domhandler";
import { describeError } from "./errors.js";
import type { HttpClient } from "./http-client.js";
import { imageExtension, safeFileName, writeBinary } from "./images.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ScrapedProduct } from "./types.js";

export const CARREFOUR_BASE_URL = "https://www.carrefour.it";
export const DEFAULT_LISTING_URL =
  "https://www.carrefour.it/spesa-online/condimenti-e-conserve/tonno-e-pesce-in-scatola/tonno-sott-olio/";

/** Where the page comes from: a live URL or a saved HTML file. */
export type ListingSource = { url: string } | { htmlFile: string };

/**
 * Turn a displayed price into a number.
 *
 * Examples:
 *   "€ 3,49" -> 3.49
 *   "2.10"   -> 2.1
 *   "n/d"    -> null
 */
export function cleanPrice(priceText: string): number | null {
  const cleaned = priceText.replace(/[€$£¥]/g, "").trim().replace(",", ".");
  if (!/^[+-]?(\d+\.?\d*|\.\d+)$/.test(cleaned)) return null;
  const value = parseFloat(cleaned);
  return Number.isFinite(value) ? value : null;
}

/** Site root for resolving relative links: everything before "/spesa-online". */
export function listingBaseUrl(url: string): string {
  const idx = url.indexOf("/spesa-online");
  return idx >= 0 ? url.slice(0, idx) : url;
}

/** `<scheme>://<host>/robots.txt` for a page URL. */
export function robotsTxtUrl(pageUrl: string): string {
  const { protocol, host } = new URL(pageUrl);
  return `${protocol}//${host}/robots.txt`;
}

function absolutize(href: string, baseUrl: string): string {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return href;
  }
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function parseTile(el: Cheerio<Element>, baseUrl: string, sourceUrl: string): ScrapedProduct {
  // Name and link
  let name: string;
  let productUrl: string | null = null;
  const linkEl = el.find("a.product-link").first();
  if (linkEl.length) {
    name = linkEl.text();
    const href = linkEl.attr("href");
    if (href) productUrl = href.startsWith("http") ? href : absolutize(href, baseUrl);
  } else {
    const nameEl = el.find("div.product-name").first();
    name = nameEl.length ? nameEl.text() : "N/A";
  }

  // Discounted price wins over the regular one
  const discounted = el.find("span.value.discounted").first();
  const regular = el.find("span.value").first();
  const priceEl = discounted.length ? discounted : regular;
  const price = priceEl.length ? cleanPrice(priceEl.text().trim()) : null;

  // Image
  const imgEl = el.find("img.tile-image").first();
  let imageUrl: string | null = null;
  if (imgEl.length) {
    imageUrl = imgEl.attr("src") || imgEl.attr("data-src") || null;
  }
  if (imageUrl?.startsWith("/")) imageUrl = absolutize(imageUrl, baseUrl);

  return {
    name: collapseWhitespace(name),
    price,
    image_url: imageUrl,
    product_url: productUrl,
    source_url: sourceUrl,
  };
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isProduct(value: unknown): value is JsonObject {
  return isObject(value) && value["@type"] === "Product";
}

/**
 * Extract `Product` objects from JSON-LD scripts: a bare Product, an
 * ItemList of `{ item: Product }`, or an array of Products.
 */
export function parseJsonLdProducts($: cheerio.CheerioAPI, logger: Logger = silentLogger): JsonObject[] {
  const products: JsonObject[] = [];
  $('script[type="application/ld+json"]').each((_i, script) => {
    let data: unknown;
    try {
      data = JSON.parse($(script).text());
    } catch (err) {
      logger.debug(`Error parsing JSON-LD: ${describeError(err)}`);
      return;
    }
    if (Array.isArray(data)) {
      products.push(...data.filter(isProduct));
    } else if (isProduct(data)) {
      products.push(data);
    } else if (isObject(data) && Array.isArray(data.itemListElement)) {
      for (const entry of data.itemListElement) {
        if (isObject(entry) && isProduct(entry.item)) products.push(entry.item);
      }
    }
  });
  return products;
}

function jsonLdToProduct(prod: JsonObject, baseUrl: string, sourceUrl: string): ScrapedProduct {
  const offers = prod.offers;
  const rawPrice = isObject(offers) ? offers.price : undefined;
  const price =
    typeof rawPrice === "number" ? rawPrice : typeof rawPrice === "string" ? cleanPrice(rawPrice) : null;

  let image: unknown = prod.image;
  if (Array.isArray(image)) image = image[0];

  return {
    name: typeof prod.name === "string" ? collapseWhitespace(prod.name) : "N/A",
    price,
    image_url: typeof image === "string" ? image : null,
    product_url: typeof prod.url === "string" ? absolutize(prod.url, baseUrl) : null,
    source_url: sourceUrl,
  };
}

/**
 * Parse a listing page. `sourceUrl` is recorded on every product;
 * `baseUrl` resolves relative links.
 */
export function parseListingHtml(
  html: string,
  options: { sourceUrl: string; baseUrl: string },
  logger: Logger = silentLogger,
): ScrapedProduct[] {
  const $ = cheerio.load(html);
  const tiles = $("div.product-item").toArray();
  logger.info(`Found ${tiles.length} product items`);

  if (tiles.length === 0) {
    logger.info("No HTML product elements found. Trying JSON-LD extraction.");
    const jsonProducts = parseJsonLdProducts($, logger);
    logger.info(`Found ${jsonProducts.length} JSON-LD products`);
    return jsonProducts.map((p) => jsonLdToProduct(p, options.baseUrl, options.sourceUrl));
  }

  const results: ScrapedProduct[] = [];
  for (const tile of tiles) {
    try {
      const product = parseTile($(tile), options.baseUrl, options.sourceUrl);
      results.push(product);
      logger.debug(`Extracted product: ${product.name.slice(0, 50)} - ${product.price ?? "N/A"}`);
    } catch (err) {
      logger.error(`Error extracting data from item: ${describeError(err)}`);
    }
  }
  return results;
}

export interface CarrefourScraperOptions {
  http: HttpClient;
  logger?: Logger;
}

export class CarrefourScraper {
  private readonly http: HttpClient;
  private readonly logger: Logger;

  constructor(options: CarrefourScraperOptions) {
    this.http = options.http;
    this.logger = options.logger ?? silentLogger;
  }

  /** Download a listing page (after the polite delay). */
  async fetchPage(url: string): Promise<string> {
    await this.http.politeDelay();
    this.logger.info(`Scraping URL: ${url}`);
    return this.http.getText(url);
  }

  /**
   * Look for a `Disallow: <path>` line covering the page in the site's
   * robots.txt. Only warns; returns false when the path is disallowed and
   * true otherwise, including when robots.txt cannot be read.
   */
  async checkRobotsTxt(url: string): Promise<boolean> {
    try {
      const robots = await this.http.getText(robotsTxtUrl(url));
      if (robots.includes(`Disallow: ${new URL(url).pathname}`)) {
        this.logger.warn(`Scraping ${url} may not be allowed according to robots.txt`);
        return false;
      }
      return true;
    } catch (err) {
      this.logger.warn(`Could not check robots.txt: ${describeError(err)}`);
      return true;
    }
  }

  async scrapeListing(source: ListingSource): Promise<ScrapedProduct[]> {
    if ("htmlFile" in source) {
      this.logger.info(`Loading HTML from file: ${source.htmlFile}`);
      const html = await readFile(source.htmlFile, "utf-8");
      return parseListingHtml(html, { sourceUrl: "Local file", baseUrl: CARREFOUR_BASE_URL }, this.logger);
    }
    if (!(await this.checkRobotsTxt(source.url))) {
      this.logger.warn("Proceeding with caution as robots.txt may disallow scraping this URL");
    }
    const html = await this.fetchPage(source.url);
    return parseListingHtml(html, { sourceUrl: source.url, baseUrl: listingBaseUrl(source.url) }, this.logger);
  }

  /**
   * Download each product's listing image into `outputDir`, named after the
   * product. Returns new records carrying `local_image_path` where the
   * download worked; failures are logged and leave the record unchanged.
   */
  async saveListingImages(products: readonly ScrapedProduct[], outputDir: string): Promise<ScrapedProduct[]> {
    this.logger.info(`Saving images to ${path.resolve(outputDir)}`);
    const saved: ScrapedProduct[] = [];
    for (const [i, product] of products.entries()) {
      if (!product.image_url) {
        this.logger.warn(`No image URL for product: ${product.name || "Unknown"}`);
        saved.push(product);
        continue;
      }
      try {
        await this.http.politeDelay({
          minMs: this.politeImageDelay("min"),
          maxMs: this.politeImageDelay("max"),
        });
        const { data, contentType } = await this.http.getBinary(product.image_url);
        const fileName = `${safeFileName(product.name || `product_${i}`)}${imageExtension(contentType, product.image_url)}`;
        const filePath = path.join(outputDir, fileName);
        await writeBinary(filePath, data);
        this.logger.info(`Saved image: ${filePath}`);
        saved.push({ ...product, local_image_path: filePath });
      } catch (err) {
        this.logger.error(`Error saving image for ${product.name || "Unknown"}: ${describeError(err)}`);
        saved.push(product);
      }
    }
    return saved;
  }

  /** Images use half the page delay. */
  private politeImageDelay(bound: "min" | "max"): number {
    const range = this.http.delayRange;
    return (bound === "min" ? range.minMs : range.maxMs) / 2;
  }
}

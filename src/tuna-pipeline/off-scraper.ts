/**
 * Open Food Facts product page scraper.
 *
 * Pulls the nutrition facts table, the product name and barcode and the
 * front/nutrition/ingredients photos from the Italian product page, then
 * leaves a compact `product_info.txt` plus the full-size photos in a
 * per-barcode directory, ready for the Gemini extractor.
 */

import path from "node:path";
import * as cheerio from "cheerio";
import { hasChildren, isText, type AnyNode, type Element } from "domhandler";
import { describeError } from "./errors.js";
import type { HttpClient } from "./http-client.js";
import { downloadImage, isHttpUrl } from "./images.js";
import { silentLogger, type Logger } from "./logger.js";
import { writeText } from "./store.js";

export const OFF_PRODUCT_PAGE_URL = "https://it.openfoodfacts.org/product";

const PRODUCT_NAME_SELECTOR =
  "#product > div > div > div.card-section > div > div.medium-8.small-12.columns > h2";

export interface OffProductPage {
  productName: string;
  barcode: string;
  headers: string[];
  rows: string[][];
  frontImageUrl: string;
  nutritionImageUrl: string;
  ingredientsImageUrl: string;
}

export interface OffScrapeResult extends OffProductPage {
  directory: string;
  textFile: string;
  compactText: string;
  images: { front?: string; nutrition?: string; ingredients?: string };
}

/**
 * Rewrite a sized OFF image URL to its full-resolution variant.
 *
 *   ".../front_it.12.400.jpg" -> ".../front_it.12.full.jpg"
 */
export function getHighResImageUrl(imageUrl: string): string {
  if (!imageUrl) return "";
  return imageUrl.replace(/(\.\d+)\.\d+\.jpg$/, "$1.full.jpg");
}

/**
 * Render headers and rows as an aligned text table: columns padded to
 * their widest cell, ` | ` between cells, `-+-` in the separator line.
 */
export function formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  if (!headers.length || !rows.length) return "No table data found.";
  const widths = headers.map((header, col) =>
    Math.max(header.length, ...rows.map((row) => (row[col] ?? "").length)),
  );
  const line = (cells: readonly string[]): string =>
    widths.map((w, col) => (cells[col] ?? "").padEnd(w)).join(" | ");

  return [line(headers), widths.map((w) => "-".repeat(w)).join("-+-"), ...rows.map(line)].join("\n");
}

function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    const text = node.data.trim();
    if (text) parts.push(text);
  } else if (hasChildren(node)) {
    for (const child of node.children) collectText(child, parts);
  }
}

/** Every text node of the cell, trimmed and joined by single spaces. */
function cellText(cell: Element): string {
  const parts: string[] = [];
  collectText(cell, parts);
  return parts.join(" ");
}

/** Parse everything the pipeline needs from an OFF product page. */
export function parseOffProductPage(html: string): OffProductPage {
  const $ = cheerio.load(html);
  $("div.alert-box.info").remove();

  const nameText = $(PRODUCT_NAME_SELECTOR).first().text().trim();
  const barcodeText = $("span#barcode").first().text().trim();

  const table = $("#panel_nutrition_facts_table table").first();
  const headers = table.length
    ? table.find("thead th").toArray().map(cellText)
    : [];
  const rows = table.length
    ? table
        .find("tbody tr")
        .toArray()
        .map((tr) => $(tr).find("td").toArray().map(cellText))
    : [];

  const imageSrc = (selector: string): string => $(selector).first().attr("src") ?? "";

  return {
    productName: nameText || "Product Name Not Found",
    barcode: barcodeText || "Barcode Not Found",
    headers,
    rows,
    frontImageUrl: imageSrc("#image_box_front img"),
    nutritionImageUrl: imageSrc("#image_box_nutrition img"),
    ingredientsImageUrl: imageSrc("#image_box_ingredients img"),
  };
}

/** Filename stem: first " - " part of the name, spaces to "_", no apostrophes, 20 chars. */
export function shortProductName(productName: string): string {
  return productName.split(" - ")[0].replace(/ /g, "_").replace(/'/g, "").slice(0, 20);
}

/** The text handed to the extractor alongside the photos; blank lines removed. */
export function buildCompactText(page: OffProductPage, formattedTable: string, ingredientsPath?: string): string {
  let text =
    `Product Name: ${page.productName}\nBarcode: ${page.barcode}\n\n` +
    `Nutrition Facts:\n${formattedTable}\n\n`;
  if (ingredientsPath) text += `Ingredients Image: ${ingredientsPath}\n`;
  return text.replace(/\n\s*\n+/g, "\n");
}

export class OpenFoodFactsScraper {
  private readonly http: HttpClient;
  private readonly logger: Logger;

  constructor(options: { http: HttpClient; logger?: Logger }) {
    this.http = options.http;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Scrape `barcode` into `<outputRoot>/<barcode shown on the page>/`.
   */
  async scrapeProduct(barcode: string, outputRoot: string): Promise<OffScrapeResult> {
    const url = `${OFF_PRODUCT_PAGE_URL}/${encodeURIComponent(barcode)}`;
    const html = await this.http.getText(url);
    const page = parseOffProductPage(html);
    this.logger.info(`Product Name: ${page.productName}`);
    this.logger.info(`Barcode: ${page.barcode}`);

    const directory = path.join(outputRoot, page.barcode);

    let formattedTable: string;
    if (page.headers.length && page.rows.length) {
      formattedTable = formatTable(page.headers, page.rows);
      this.logger.info(`Valori Nutrizionali (as table):\n${formattedTable}`);
    } else {
      formattedTable = "No nutrition data found.";
      this.logger.info("Nutrition facts section not found or empty.");
    }

    const stem = shortProductName(page.productName);
    const images: OffScrapeResult["images"] = {};
    const kinds = [
      ["front", page.frontImageUrl],
      ["nutrition", page.nutritionImageUrl],
      ["ingredients", page.ingredientsImageUrl],
    ] as const;
    for (const [kind, src] of kinds) {
      if (!src) {
        this.logger.info(`${kind} image not found.`);
        continue;
      }
      const fullUrl = getHighResImageUrl(src);
      if (!isHttpUrl(fullUrl)) continue;
      try {
        images[kind] = await downloadImage(this.http, fullUrl, path.join(directory, `${stem}_${kind}.jpg`));
        this.logger.info(`Image downloaded: ${images[kind]}`);
      } catch (err) {
        this.logger.error(`Error downloading image ${stem}_${kind}.jpg: ${describeError(err)}`);
      }
    }

    const compactText = buildCompactText(page, formattedTable, images.ingredients);
    const textFile = path.join(directory, "product_info.txt");
    await writeText(textFile, compactText);
    this.logger.info(`Text saved to: ${textFile}`);

    return { ...page, directory, textFile, compactText, images };
  }
}

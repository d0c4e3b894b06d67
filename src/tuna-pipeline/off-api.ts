/**
 * Open Food Facts REST lookup.
 *
 * Uses the v2 product endpoint directly (no SDK needed) to build a
 * product-info record from a barcode: package weight from
 * `product_quantity` and a `full` nutrition entry per 100 g from
 * `nutriments`. Useful when no label photos are available for the LLM.
 *
 * @see https://wiki.openfoodfacts.org/API
 */

import { z } from "zod";
import { describeError } from "./errors.js";
import type { HttpClient } from "./http-client.js";
import { silentLogger, type Logger } from "./logger.js";
import type { NutritionEntry, TunaProduct } from "./types.js";

export const OFF_PRODUCT_API_URL = "https://world.openfoodfacts.org/api/v2/product";

const OFF_FIELDS = ["code", "product_name", "brands", "product_quantity", "ingredients_text", "nutriments"];

const numeric = z.union([z.number(), z.string()]).optional();

const OffResponseSchema = z.object({
  status: z.number().optional(),
  product: z
    .object({
      product_name: z.string().optional(),
      brands: z.string().optional(),
      product_quantity: numeric,
      ingredients_text: z.string().optional(),
      nutriments: z.record(z.unknown()).optional(),
    })
    .optional(),
});

export function safeFloat(val: unknown): number | undefined {
  if (val == null) return undefined;
  const n = parseFloat(String(val));
  return isNaN(n) ? undefined : n;
}

/**
 * Nutrition entry per 100 g from an OFF `nutriments` map, or null when it
 * carries neither protein nor energy.
 */
export function extractNutrition(nutriments: Record<string, unknown>): NutritionEntry | null {
  const protein = safeFloat(nutriments["proteins_100g"]);
  let kcal = safeFloat(nutriments["energy-kcal_100g"]);
  if (kcal == null) {
    const kj = safeFloat(nutriments["energy_100g"]);
    if (kj != null) kcal = Math.round((kj / 4.184) * 10) / 10;
  }

  if (protein == null && kcal == null) return null;

  return {
    per_grams: 100,
    type: "full",
    energy_kcal: kcal ?? null,
    fat_grams: safeFloat(nutriments["fat_100g"]) ?? null,
    saturated_fat_grams: safeFloat(nutriments["saturated-fat_100g"]) ?? null,
    protein_grams: protein ?? 0,
    salt_grams: safeFloat(nutriments["salt_100g"]) ?? null,
  };
}

export class OpenFoodFactsApi {
  private readonly http: HttpClient;
  private readonly logger: Logger;

  constructor(options: { http: HttpClient; logger?: Logger }) {
    this.http = options.http;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Look up a product by barcode (EAN/UPC). Returns null when OFF does not
   * know the product or has no usable nutrition data; HTTP failures are
   * logged and also yield null.
   */
  async getProductInfo(barcode: string): Promise<TunaProduct | null> {
    let body: unknown;
    try {
      body = await this.http.getJson(`${OFF_PRODUCT_API_URL}/${encodeURIComponent(barcode)}.json`, {
        fields: OFF_FIELDS.join(","),
      });
    } catch (err) {
      this.logger.error(`Error fetching barcode '${barcode}': ${describeError(err)}`);
      return null;
    }

    const parsed = OffResponseSchema.safeParse(body);
    if (!parsed.success || parsed.data.status !== 1 || !parsed.data.product) return null;
    const product = parsed.data.product;
    if (!product.nutriments) return null;

    const nutrition = extractNutrition(product.nutriments);
    if (!nutrition) return null;

    const name = [product.product_name, product.brands].filter(Boolean).join(" - ");
    return {
      barcode,
      product_name: name || null,
      ingredients: product.ingredients_text ?? null,
      num_containers: 1,
      weight_per_container_grams: safeFloat(product.product_quantity) ?? null,
      drained_weight_per_container_grams: null,
      nutritional_information: [nutrition],
    };
  }

  /** Just the nutrition entry for a barcode. */
  async getNutritionByBarcode(barcode: string): Promise<NutritionEntry | null> {
    const info = await this.getProductInfo(barcode);
    return info?.nutritional_information?.[0] ?? null;
  }
}

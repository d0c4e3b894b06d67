/**
 * Catalog-to-nutrition matching and valuation.
 *
 * Joins product-info records (weights and nutrition, keyed by barcode) with
 * scraped catalog records (name and price, barcode embedded in the product
 * URL) and derives total weight, total protein and protein per euro.
 *
 * Everything here is pure and synchronous; loading and writing live in
 * store.ts.
 */

import type {
  CatalogRecord,
  MatchedRecord,
  NutritionBucket,
  NutritionBucketKey,
  NutritionGrouping,
  NutritionInput,
  ProductInfoRecord,
} from "./types.js";

/** Digits forming the last path segment, right before a final ".html". */
const URL_BARCODE_PATTERN = /\/(\d+)\.html$/;

/**
 * Derive the barcode from a catalog product URL.
 *
 * Examples:
 *   ".../tonno-rio-mare/8004030105096.html"  -> "8004030105096"
 *   ".../8004030105096.html/"                -> "8004030105096"
 *   ".../8004030105096.html?color=red"       -> null
 */
export function extractBarcode(productUrl: string | null | undefined): string | null {
  if (!productUrl) return null;
  const match = URL_BARCODE_PATTERN.exec(productUrl.replace(/\/+$/, ""));
  return match ? match[1] : null;
}

function bucketKey(type: string | null | undefined): NutritionBucketKey {
  return type === "drained" || type === "full" ? type : "unknown";
}

/**
 * Group nutrition entries by type. A later entry of the same type replaces
 * an earlier one; no values are aggregated.
 */
export function groupNutrition(entries: readonly NutritionInput[] | null | undefined): NutritionGrouping {
  const grouped: NutritionGrouping = {};
  for (const entry of entries ?? []) {
    grouped[bucketKey(entry.type)] = {
      protein_grams: entry.protein_grams ?? null,
      per_grams: entry.per_grams ?? null,
    };
  }
  return grouped;
}

export interface WeightSelection {
  totalWeightGrams: number;
  /** Which bucket the protein value comes from; null when none applies. */
  source: "drained" | "full" | null;
  protein?: NutritionBucket;
}

/**
 * Pick the weight and the matching protein figure for a product.
 *
 * Drained weight is only ever paired with drained nutrition and full weight
 * with full nutrition; the last branch is the one place they may mix.
 */
export function selectWeightAndProtein(info: ProductInfoRecord, grouping: NutritionGrouping): WeightSelection {
  const containers = info.num_containers ?? 1;
  const drainedWeight = info.drained_weight_per_container_grams;
  const fullWeight = info.weight_per_container_grams;

  if (drainedWeight != null && grouping.drained) {
    return { totalWeightGrams: drainedWeight * containers, source: "drained", protein: grouping.drained };
  }
  if (fullWeight != null && grouping.full) {
    return { totalWeightGrams: fullWeight * containers, source: "full", protein: grouping.full };
  }
  return {
    totalWeightGrams: (fullWeight ?? 0) * containers,
    source: grouping.full ? "full" : null,
    protein: grouping.full,
  };
}

/**
 * Total protein in the package. The protein figure is read as grams per
 * 100 g whatever the entry's own `per_grams` says.
 */
export function totalProteinGrams(selection: WeightSelection): number {
  if (!selection.totalWeightGrams) return 0;
  const proteinPer100 = selection.protein?.protein_grams ?? 0;
  return (proteinPer100 * selection.totalWeightGrams) / 100;
}

/**
 * Round to two decimals from the exact binary value, ties to even.
 * A double sits exactly halfway between two cents only when it is an odd
 * number of eighths (.125, .375, .625, .875).
 */
export function roundCents(value: number): number {
  const eighths = value * 8;
  if (Number.isInteger(eighths) && eighths % 2 !== 0) {
    const lower = Math.floor(value * 100);
    return (lower % 2 === 0 ? lower : lower + 1) / 100;
  }
  return Number(value.toFixed(2));
}

export function proteinPerEuro(totalProtein: number, price: number): number {
  return roundCents(price > 0 ? totalProtein / price : 0);
}

function freezeGrouping(grouping: NutritionGrouping): NutritionGrouping {
  for (const bucket of Object.values(grouping)) Object.freeze(bucket);
  return Object.freeze(grouping);
}

function findCatalogEntry(barcode: string, catalog: readonly CatalogRecord[]): CatalogRecord | undefined {
  return catalog.find((record) => extractBarcode(record.product_url) === barcode);
}

/**
 * Join product info with catalog records. Output order follows
 * `productInfo`; records without a catalog entry are dropped, and the first
 * catalog entry wins when several share a barcode.
 */
export function matchProducts(
  productInfo: readonly ProductInfoRecord[],
  catalog: readonly CatalogRecord[],
): MatchedRecord[] {
  const matched: MatchedRecord[] = [];

  for (const info of productInfo) {
    const barcode = info.barcode;
    if (!barcode) continue;

    const product = findCatalogEntry(barcode, catalog);
    if (!product) continue;

    const grouping = groupNutrition(info.nutritional_information);
    const selection = selectWeightAndProtein(info, grouping);
    const totalProtein = totalProteinGrams(selection);
    const price = product.price ?? 0;

    matched.push(
      Object.freeze({
        barcode,
        name: product.name ?? null,
        price,
        total_weight_grams: selection.totalWeightGrams,
        num_containers: info.num_containers ?? 1,
        nutritional_information: freezeGrouping(grouping),
        total_protein_grams: totalProtein,
        protein_per_euro: proteinPerEuro(totalProtein, price),
      }),
    );
  }

  return matched;
}

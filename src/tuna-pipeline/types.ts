/**
 * Shared types for the tuna value pipeline.
 *
 * Record field names stay snake_case: they are the JSON contracts written to
 * and read from disk by the scrapers, the extractor and the matcher.
 */

export type {
  CatalogRecord,
  NutritionEntry,
  NutritionInput,
  NutritionType,
  ProductInfoRecord,
  TunaProduct,
} from "./schemas.js";

/** A product tile scraped from a Carrefour listing page. */
export interface ScrapedProduct {
  name: string;
  price: number | null;
  image_url: string | null;
  product_url: string | null;
  source_url: string;
  /** Set once the listing image has been downloaded. */
  local_image_path?: string;
}

/** Key of a nutrition bucket: the entry type, or "unknown" for anything else. */
export type NutritionBucketKey = "drained" | "full" | "unknown";

export interface NutritionBucket {
  protein_grams: number | null;
  per_grams: number | null;
}

export type NutritionGrouping = Partial<Record<NutritionBucketKey, NutritionBucket>>;

/** Catalog and nutrition data joined for one barcode. */
export interface MatchedRecord {
  readonly barcode: string;
  readonly name: string | null;
  readonly price: number;
  readonly total_weight_grams: number;
  readonly num_containers: number;
  readonly nutritional_information: Readonly<NutritionGrouping>;
  readonly total_protein_grams: number;
  readonly protein_per_euro: number;
}

/** Nutrition panel of a Carrefour product page: nutrient -> column -> value. */
export type NutritionTable = Record<string, Record<string, string>>;

/**
 * zod schemas for every record that crosses a file or LLM boundary.
 *
 * Two flavours of the product-info record exist: the strict shape the
 * extractor asks the model for, and the lenient shape the matcher accepts
 * from disk (hand-edited files, older extractor output).
 */

import { z } from "zod";

export const NUTRITION_TYPES = ["drained", "full"] as const;
export const NutritionTypeSchema = z.enum(NUTRITION_TYPES);

/** Nutrition facts as the extractor must produce them. */
export const NutritionEntrySchema = z.object({
  per_grams: z.number().positive(),
  type: NutritionTypeSchema,
  energy_kcal: z.number().nullable(),
  fat_grams: z.number().nullable(),
  saturated_fat_grams: z.number().nullable(),
  protein_grams: z.number(),
  salt_grams: z.number().nullable(),
});

export const OtherInformationSchema = z.object({
  portions_per_container: z.number().int().nullish(),
  dietary_advice: z.string().nullish(),
});

/** Full product sheet for a canned-tuna package, keyed by barcode. */
export const TunaProductSchema = z.object({
  barcode: z.string().trim().min(1),
  product_name: z.string().nullish(),
  ingredients: z.string().nullish(),
  num_containers: z.number().int().positive().nullish(),
  weight_per_container_grams: z.number().nonnegative().nullish(),
  drained_weight_per_container_grams: z.number().nonnegative().nullish(),
  nutritional_information: z.array(NutritionEntrySchema).nullish(),
  other_information: OtherInformationSchema.nullish(),
  manufacturer: z.string().nullish(),
  produced_in: z.string().nullish(),
  customer_service_number: z.string().nullish(),
});

/** Nutrition entry as read back from disk; only type/protein/per_grams matter downstream. */
export const NutritionInputSchema = z
  .object({
    type: z.string().nullish(),
    protein_grams: z.number().nullish(),
    per_grams: z.number().nullish(),
  })
  .passthrough();

export const ProductInfoSchema = z
  .object({
    barcode: z.string().nullish(),
    num_containers: z.number().int().positive().nullish(),
    weight_per_container_grams: z.number().nonnegative().nullish(),
    drained_weight_per_container_grams: z.number().nonnegative().nullish(),
    nutritional_information: z.array(NutritionInputSchema).nullish(),
  })
  .passthrough();

export const CatalogRecordSchema = z
  .object({
    product_url: z.string().nullish(),
    name: z.string().nullish(),
    price: z.number().nonnegative().nullish(),
    image_url: z.string().nullish(),
    source_url: z.string().nullish(),
  })
  .passthrough();

export type NutritionType = z.infer<typeof NutritionTypeSchema>;
export type NutritionEntry = z.infer<typeof NutritionEntrySchema>;
export type TunaProduct = z.infer<typeof TunaProductSchema>;
export type NutritionInput = z.infer<typeof NutritionInputSchema>;
export type ProductInfoRecord = z.infer<typeof ProductInfoSchema>;
export type CatalogRecord = z.infer<typeof CatalogRecordSchema>;

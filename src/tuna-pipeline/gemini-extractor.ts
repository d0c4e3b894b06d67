/**
 * Structured label extraction with Gemini.
 *
 * Sends the label photos and the scraped product text of one barcode to a
 * multimodal model with a response schema, validates the JSON it returns
 * and stores it next to the photos.
 */

import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { GoogleGenAI, Type, type GenerateContentParameters, type Part, type Schema } from "@google/genai";
import { ConfigError, describeError, ExtractionError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { DEFAULT_SYSTEM_PROMPT, DEFAULT_USER_PROMPT } from "./prompts.js";
import { NUTRITION_TYPES, TunaProductSchema } from "./schemas.js";
import { writeJson } from "./store.js";
import type { TunaProduct } from "./types.js";

export const DEFAULT_GEMINI_MODEL = "gemini-2.0-flash";

const nullableNumber: Schema = { type: Type.NUMBER, nullable: true };
const nullableString: Schema = { type: Type.STRING, nullable: true };

/** Response schema sent to the model; mirrors {@link TunaProductSchema}. */
export const TUNA_PRODUCT_RESPONSE_SCHEMA: Schema = {
  type: Type.OBJECT,
  properties: {
    barcode: { type: Type.STRING },
    product_name: nullableString,
    ingredients: nullableString,
    num_containers: { type: Type.INTEGER, nullable: true },
    weight_per_container_grams: nullableNumber,
    drained_weight_per_container_grams: nullableNumber,
    nutritional_information: {
      type: Type.ARRAY,
      nullable: true,
      items: {
        type: Type.OBJECT,
        properties: {
          per_grams: { type: Type.NUMBER },
          type: { type: Type.STRING, format: "enum", enum: [...NUTRITION_TYPES] },
          energy_kcal: nullableNumber,
          fat_grams: nullableNumber,
          saturated_fat_grams: nullableNumber,
          protein_grams: { type: Type.NUMBER },
          salt_grams: nullableNumber,
        },
        required: ["per_grams", "type", "protein_grams"],
      },
    },
    other_information: {
      type: Type.OBJECT,
      nullable: true,
      properties: {
        portions_per_container: { type: Type.INTEGER, nullable: true },
        dietary_advice: nullableString,
      },
    },
    manufacturer: nullableString,
    produced_in: nullableString,
    customer_service_number: nullableString,
  },
  required: ["barcode"],
};

/** The slice of the Gemini client the extractor uses. */
export interface ContentGenerator {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

export function createGeminiGenerator(apiKey: string | undefined): ContentGenerator {
  if (!apiKey) {
    throw new ConfigError("Gemini API key required. Set GEMINI_API_KEY or send the X-Gemini-Key header.");
  }
  return new GoogleGenAI({ apiKey }).models;
}

/**
 * Every `.jpg` in `imageDir` as an inline image part, in file-name order.
 * Unreadable images are logged and skipped.
 */
export async function readImages(imageDir: string, logger: Logger = silentLogger): Promise<Part[]> {
  let files: string[];
  try {
    files = (await readdir(imageDir)).filter((f) => f.toLowerCase().endsWith(".jpg")).sort();
  } catch (err) {
    logger.error(`Error accessing image directory ${imageDir}: ${describeError(err)}`);
    return [];
  }

  const parts: Part[] = [];
  for (const file of files) {
    const imagePath = path.join(imageDir, file);
    try {
      const data = await readFile(imagePath);
      parts.push({ inlineData: { mimeType: "image/jpeg", data: data.toString("base64") } });
      logger.info(`Successfully read image: ${imagePath}`);
    } catch (err) {
      logger.error(`Error reading image ${imagePath}: ${describeError(err)}`);
    }
  }
  return parts;
}

/** Content of the product text file, or "" when it is missing or unreadable. */
export async function readTextFile(textFilePath: string, logger: Logger = silentLogger): Promise<string> {
  try {
    const content = await readFile(textFilePath, "utf-8");
    logger.info(`Successfully read text file: ${textFilePath}`);
    return content;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      logger.warn(`Text file not found: ${textFilePath}. Returning empty string.`);
    } else {
      logger.error(`Error reading text file ${textFilePath}: ${describeError(err)}`);
    }
    return "";
  }
}

/**
 * File name for an extracted record: `<barcode>.json` when the container
 * weight is unknown, `<barcode>_<containers>_<weight>.json` otherwise.
 */
export function responseFileName(product: TunaProduct): string {
  const weight = product.weight_per_container_grams;
  if (weight == null) return `${product.barcode}.json`;
  return `${product.barcode}_${product.num_containers ?? 1}_${weight}.json`;
}

/** Parse and validate the model's JSON answer. */
export function parseExtraction(text: string | undefined): TunaProduct {
  if (!text) throw new ExtractionError("No response candidates found");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ExtractionError("Response is not valid JSON", { cause: err });
  }
  const parsed = TunaProductSchema.safeParse(raw);
  if (!parsed.success) {
    const missingBarcode = parsed.error.issues.some((issue) => issue.path[0] === "barcode");
    throw new ExtractionError(
      missingBarcode
        ? "Response missing required 'barcode' field"
        : `Response does not match the product schema: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}

export interface ExtractRequest {
  imageDir: string;
  textFile: string;
  userPrompt?: string;
  systemPrompt?: string;
}

export interface ExtractResult {
  product: TunaProduct;
  /** Where the record was written; null when writing failed. */
  savedTo: string | null;
}

export class GeminiExtractor {
  private readonly generator: ContentGenerator;
  private readonly model: string;
  private readonly logger: Logger;

  constructor(options: { generator: ContentGenerator; model?: string; logger?: Logger }) {
    this.generator = options.generator;
    this.model = options.model ?? DEFAULT_GEMINI_MODEL;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Extract a product record from a barcode directory and save it there.
   * Throws {@link ExtractionError} when the answer has no usable record.
   */
  async extract(request: ExtractRequest): Promise<ExtractResult> {
    const imageParts = await readImages(request.imageDir, this.logger);
    const textContent = await readTextFile(request.textFile, this.logger);
    const fullPrompt = [
      request.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
      request.userPrompt ?? DEFAULT_USER_PROMPT,
      textContent,
    ].join("\n");

    const response = await this.generator.generateContent({
      model: this.model,
      contents: [{ text: fullPrompt }, ...imageParts],
      config: {
        responseMimeType: "application/json",
        responseSchema: TUNA_PRODUCT_RESPONSE_SCHEMA,
      },
    });
    this.logger.info("Prompt sent to Gemini with structured output configuration.");

    const product = parseExtraction(response.text);
    this.logger.info("Successfully parsed structured response");
    this.logger.debug(`Structured response JSON: ${JSON.stringify(product, null, 2)}`);

    const filePath = path.join(request.imageDir, responseFileName(product));
    const saved = await writeJson(product, filePath, this.logger, 4);
    return { product, savedTo: saved ? filePath : null };
  }

  /** Extract from the conventional layout: `<root>/<barcode>/` with `product_info.txt`. */
  async extractBarcode(barcode: string, root = "."): Promise<ExtractResult> {
    const imageDir = path.join(root, barcode);
    this.logger.info(`Processing barcode ${barcode} with structured output`);
    return this.extract({ imageDir, textFile: path.join(imageDir, "product_info.txt") });
  }
}

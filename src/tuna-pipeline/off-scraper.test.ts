import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  buildCompactText,
  formatTable,
  getHighResImageUrl,
  OFF_PRODUCT_PAGE_URL,
  OpenFoodFactsScraper,
  parseOffProductPage,
  shortProductName,
} from "./off-scraper.js";
import { stubHttpClient } from "./test-utils.js";

const PRODUCT_NAME = "Tonno all'olio d'oliva - Marca Test - 3 x 80 g";

const PAGE_HTML = `<html><body>
<div class="alert-box info"><span id="barcode">0000000000000</span></div>
<div id="product"><div><div><div class="card-section"><div><div class="medium-8 small-12 columns">
<h2>${PRODUCT_NAME}</h2>
<p>Barcode: <span id="barcode">8001234567890</span></p>
</div></div></div></div></div></div>
<div id="panel_nutrition_facts_table"><table>
<thead><tr><th>Nutrition facts</th><th>As sold<br>for 100 g / 100 ml</th></tr></thead>
<tbody>
<tr><td><span>Energy</span></td><td>1 000 kj<br>(239 kcal)</td></tr>
<tr><td>Proteins</td><td>25 g</td></tr>
</tbody>
</table></div>
<div id="image_box_front"><img src="https://images.example.org/products/800/front_it.5.400.jpg"></div>
</body></html>`;

describe("getHighResImageUrl", () => {
  it("rewrites the size suffix to full", () => {
    expect(getHighResImageUrl("https://images.example.org/products/800/front_it.12.400.jpg")).toBe(
      "https://images.example.org/products/800/front_it.12.full.jpg",
    );
  });

  it("leaves other URLs alone", () => {
    expect(getHighResImageUrl("https://images.example.org/front.jpg")).toBe("https://images.example.org/front.jpg");
    expect(getHighResImageUrl("")).toBe("");
  });
});

describe("formatTable", () => {
  it("pads columns to their widest cell", () => {
    const table = formatTable(
      ["Nutrient", "Per 100 g"],
      [
        ["Energy", "120 kcal"],
        ["Proteins", "25 g"],
      ],
    );
    expect(table.split("\n")).toEqual([
      "Nutrient | Per 100 g",
      `${"-".repeat(8)}-+-${"-".repeat(9)}`,
      "Energy   | 120 kcal ",
      "Proteins | 25 g     ",
    ]);
  });

  it("reports an empty table", () => {
    expect(formatTable([], [])).toBe("No table data found.");
    expect(formatTable(["a"], [])).toBe("No table data found.");
  });
});

describe("parseOffProductPage", () => {
  it("reads name, barcode, table and image sources", () => {
    const page = parseOffProductPage(PAGE_HTML);
    expect(page.productName).toBe(PRODUCT_NAME);
    expect(page.barcode).toBe("8001234567890");
    expect(page.headers).toEqual(["Nutrition facts", "As sold for 100 g / 100 ml"]);
    expect(page.rows).toEqual([
      ["Energy", "1 000 kj (239 kcal)"],
      ["Proteins", "25 g"],
    ]);
    expect(page.frontImageUrl).toBe("https://images.example.org/products/800/front_it.5.400.jpg");
    expect(page.nutritionImageUrl).toBe("");
  });

  it("uses placeholders when the page lacks name and barcode", () => {
    const page = parseOffProductPage("<html><body></body></html>");
    expect(page.productName).toBe("Product Name Not Found");
    expect(page.barcode).toBe("Barcode Not Found");
    expect(page.headers).toEqual([]);
  });
});

describe("shortProductName", () => {
  it("keeps the first part, underscores spaces and drops apostrophes", () => {
    expect(shortProductName(PRODUCT_NAME)).toBe("Tonno_allolio_doliva");
    expect(shortProductName("A very long product name without dashes")).toBe("A_very_long_product_");
  });
});

describe("buildCompactText", () => {
  it("collapses blank lines", () => {
    const page = parseOffProductPage(PAGE_HTML);
    expect(buildCompactText(page, "TABLE")).toBe(
      `Product Name: ${PRODUCT_NAME}\nBarcode: 8001234567890\nNutrition Facts:\nTABLE\n`,
    );
    expect(buildCompactText(page, "TABLE", "dir/x_ingredients.jpg")).toBe(
      `Product Name: ${PRODUCT_NAME}\nBarcode: 8001234567890\nNutrition Facts:\nTABLE\nIngredients Image: dir/x_ingredients.jpg\n`,
    );
  });
});

describe("OpenFoodFactsScraper", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "tuna-off-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("saves the photos and product_info.txt under the barcode", async () => {
    const calls: string[] = [];
    const http = stubHttpClient(
      {
        [`${OFF_PRODUCT_PAGE_URL}/8001234567890`]: { data: PAGE_HTML },
        "https://images.example.org/products/800/front_it.5.full.jpg": {
          data: Buffer.from("front-photo"),
          contentType: "image/jpeg",
        },
      },
      { calls },
    );

    const result = await new OpenFoodFactsScraper({ http }).scrapeProduct("8001234567890", dir);
    const productDir = path.join(dir, "8001234567890");
    const frontPath = path.join(productDir, "Tonno_allolio_doliva_front.jpg");

    expect(result.directory).toBe(productDir);
    expect(result.images).toEqual({ front: frontPath });
    expect(await readFile(frontPath, "utf-8")).toBe("front-photo");
    expect(await readFile(result.textFile, "utf-8")).toBe(result.compactText);
    expect(result.compactText.startsWith(`Product Name: ${PRODUCT_NAME}\nBarcode: 8001234567890\nNutrition Facts:\n`)).toBe(
      true,
    );
    expect(calls).toEqual([
      `${OFF_PRODUCT_PAGE_URL}/8001234567890`,
      "https://images.example.org/products/800/front_it.5.full.jpg",
    ]);
  });
});

import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runMatchPipeline } from "./index.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "tuna-pipeline-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const catalog = [
  { product_url: "https://www.carrefour.it/spesa-online/tonno/8004030105096.html", name: "Tuna", price: 2.5 },
  { product_url: "https://www.carrefour.it/spesa-online/tonno/8001111111111.html", name: "Unused", price: 1 },
];

const info = {
  barcode: "8004030105096",
  num_containers: 2,
  drained_weight_per_container_grams: 52,
  nutritional_information: [{ type: "drained", protein_grams: 25, per_grams: 100 }],
};

describe("runMatchPipeline", () => {
  it("loads both files, matches and writes the result", async () => {
    const productInfoPath = path.join(dir, "products_info.json");
    const catalogPath = path.join(dir, "products.json");
    const outputPath = path.join(dir, "out", "matched_products.json");
    await writeFile(productInfoPath, JSON.stringify([info, { ...info, barcode: "8009999999999" }]), "utf-8");
    await writeFile(catalogPath, JSON.stringify(catalog), "utf-8");

    const result = await runMatchPipeline({ productInfoPath, catalogPath, outputPath });

    expect(result.written).toBe(true);
    expect(result.outputPath).toBe(outputPath);
    expect(result.matched).toHaveLength(1);
    expect(result.matched[0]?.protein_per_euro).toBe(10.4);
    expect(JSON.parse(await readFile(outputPath, "utf-8"))).toEqual(result.matched);
  });

  it("reads product info from a directory of extractor output", async () => {
    const infoDir = path.join(dir, "off");
    await mkdir(path.join(infoDir, "8004030105096"), { recursive: true });
    await writeFile(path.join(infoDir, "8004030105096", "8004030105096_2_80.json"), JSON.stringify(info), "utf-8");
    const catalogPath = path.join(dir, "products.json");
    await writeFile(catalogPath, JSON.stringify(catalog), "utf-8");

    const result = await runMatchPipeline({
      productInfoPath: infoDir,
      catalogPath,
      outputPath: path.join(dir, "matched.json"),
    });
    expect(result.matched.map((r) => r.total_protein_grams)).toEqual([26]);
  });

  it("writes an empty array when an input is missing", async () => {
    const outputPath = path.join(dir, "matched.json");
    const result = await runMatchPipeline({
      productInfoPath: path.join(dir, "missing.json"),
      catalogPath: path.join(dir, "missing-too.json"),
      outputPath,
    });
    expect(result.matched).toEqual([]);
    expect(result.written).toBe(true);
    expect(await readFile(outputPath, "utf-8")).toBe("[]");
  });
});

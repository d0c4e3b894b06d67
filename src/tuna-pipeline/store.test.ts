import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CatalogRecordSchema } from "./schemas.js";
import { loadJsonCollection, loadProductInfoDirectory, writeJson, writeText } from "./store.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "tuna-store-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("writeJson", () => {
  it("creates parent directories and writes indented JSON", async () => {
    const target = path.join(dir, "nested", "deeper", "out.json");
    const ok = await writeJson([{ barcode: "1", price: 2.5 }], target);
    expect(ok).toBe(true);
    expect(await readFile(target, "utf-8")).toBe(JSON.stringify([{ barcode: "1", price: 2.5 }], null, 2));
  });

  it("honours the indent and replaces an existing file", async () => {
    const target = path.join(dir, "out.json");
    await writeFile(target, "old", "utf-8");
    expect(await writeJson({ a: 1 }, target, undefined, 4)).toBe(true);
    expect(await readFile(target, "utf-8")).toBe('{\n    "a": 1\n}');
  });

  it("returns false instead of throwing when the path cannot be written", async () => {
    const blocker = path.join(dir, "blocker");
    await writeFile(blocker, "a file, not a directory", "utf-8");
    await expect(writeJson([], path.join(blocker, "out.json"))).resolves.toBe(false);
  });
});

describe("writeText", () => {
  it("creates the directory", async () => {
    const target = path.join(dir, "a", "product_info.txt");
    await writeText(target, "hello");
    expect(await readFile(target, "utf-8")).toBe("hello");
  });
});

describe("loadJsonCollection", () => {
  it("returns an empty collection for a missing file", async () => {
    await expect(loadJsonCollection(path.join(dir, "missing.json"), CatalogRecordSchema)).resolves.toEqual([]);
  });

  it("returns an empty collection for broken JSON or a non-array", async () => {
    const broken = path.join(dir, "broken.json");
    await writeFile(broken, "[{", "utf-8");
    await expect(loadJsonCollection(broken, CatalogRecordSchema)).resolves.toEqual([]);

    const object = path.join(dir, "object.json");
    await writeFile(object, '{"name":"Tuna"}', "utf-8");
    await expect(loadJsonCollection(object, CatalogRecordSchema)).resolves.toEqual([]);
  });

  it("skips elements failing the schema", async () => {
    const file = path.join(dir, "products.json");
    await writeFile(
      file,
      JSON.stringify([
        { product_url: "https://example.com/1.html", name: "Bad", price: -1 },
        { product_url: "https://example.com/2.html", name: "Good", price: 2 },
        "not a record",
      ]),
      "utf-8",
    );
    await expect(loadJsonCollection(file, CatalogRecordSchema)).resolves.toEqual([
      { product_url: "https://example.com/2.html", name: "Good", price: 2 },
    ]);
  });
});

describe("loadProductInfoDirectory", () => {
  it("collects extractor output from per-barcode directories in name order", async () => {
    await mkdir(path.join(dir, "8002"), { recursive: true });
    await mkdir(path.join(dir, "8001"), { recursive: true });
    await writeFile(path.join(dir, "8002", "8002.json"), JSON.stringify({ barcode: "8002" }), "utf-8");
    await writeFile(
      path.join(dir, "8001", "8001_2_80.json"),
      JSON.stringify({ barcode: "8001", num_containers: 2, weight_per_container_grams: 80 }),
      "utf-8",
    );
    await writeFile(path.join(dir, "8001", "nutrition.json"), JSON.stringify({ Proteine: {} }), "utf-8");
    await writeFile(path.join(dir, "8001", "product_info.txt"), "Barcode: 8001", "utf-8");
    await writeFile(path.join(dir, "notes.json"), "[]", "utf-8");

    const records = await loadProductInfoDirectory(dir);
    expect(records.map((r) => r.barcode)).toEqual(["8001", "8002"]);
    expect(records[0]?.weight_per_container_grams).toBe(80);
  });

  it("skips files without a barcode or with broken JSON", async () => {
    await mkdir(path.join(dir, "8003"), { recursive: true });
    await writeFile(path.join(dir, "8003", "8003.json"), JSON.stringify({ product_name: "No code" }), "utf-8");
    await writeFile(path.join(dir, "8003", "8003_1_80.json"), "{", "utf-8");
    await expect(loadProductInfoDirectory(dir)).resolves.toEqual([]);
  });

  it("returns an empty collection for a missing root", async () => {
    await expect(loadProductInfoDirectory(path.join(dir, "nope"))).resolves.toEqual([]);
  });
});

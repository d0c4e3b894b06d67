import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  CARREFOUR_BASE_URL,
  CarrefourScraper,
  cleanPrice,
  DEFAULT_LISTING_URL,
  listingBaseUrl,
  parseListingHtml,
  robotsTxtUrl,
} from "./carrefour-scraper.js";
import type { Logger } from "./logger.js";
import { stubHttpClient } from "./test-utils.js";

function recordingLogger(warnings: string[]): Logger {
  const logger: Logger = {
    scope: "test",
    level: "debug",
    debug: () => undefined,
    info: () => undefined,
    warn: (message) => {
      warnings.push(message);
    },
    error: () => undefined,
    child: () => logger,
  };
  return logger;
}

const TILES_HTML = `<html><body>
<div class="product-item">
  <a class="product-link" href="/spesa-online/tonno/tonno-all-olio/8001234567890.html">
    Tonno   all'olio
    3 x 80 g
  </a>
  <span class="value">€ 4,99</span>
  <span class="value discounted">€ 3,99</span>
  <img class="tile-image" src="/images/tonno.jpg">
</div>
<div class="product-item">
  <div class="product-name">Tonno al naturale</div>
  <img class="tile-image" data-src="https://cdn.example.com/naturale.jpg">
</div>
</body></html>`;

const JSON_LD_HTML = `<html><head>
<script type="application/ld+json">{ broken</script>
<script type="application/ld+json">${JSON.stringify({
  "@type": "ItemList",
  itemListElement: [
    {
      item: {
        "@type": "Product",
        name: "Tonno  leggero",
        url: "/spesa-online/tonno/8009876543210.html",
        offers: { price: "2,49" },
        image: ["https://cdn.example.com/leggero.jpg", "https://cdn.example.com/other.jpg"],
      },
    },
    { item: { "@type": "Offer" } },
  ],
})}</script>
</head><body></body></html>`;

describe("cleanPrice", () => {
  it("parses displayed prices", () => {
    expect(cleanPrice("€ 3,49")).toBe(3.49);
    expect(cleanPrice("2.10")).toBe(2.1);
    expect(cleanPrice(" $5 ")).toBe(5);
  });

  it("returns null for text that is not a price", () => {
    expect(cleanPrice("n/d")).toBeNull();
    expect(cleanPrice("")).toBeNull();
  });
});

describe("listingBaseUrl", () => {
  it("keeps the part before /spesa-online", () => {
    expect(listingBaseUrl(DEFAULT_LISTING_URL)).toBe("https://www.carrefour.it");
    expect(listingBaseUrl("https://shop.example.com/list")).toBe("https://shop.example.com/list");
  });
});

describe("parseListingHtml", () => {
  const options = { sourceUrl: DEFAULT_LISTING_URL, baseUrl: CARREFOUR_BASE_URL };

  it("reads name, discounted price, image and absolute link from tiles", () => {
    const [first, second] = parseListingHtml(TILES_HTML, options);
    expect(first).toEqual({
      name: "Tonno all'olio 3 x 80 g",
      price: 3.99,
      image_url: "https://www.carrefour.it/images/tonno.jpg",
      product_url: "https://www.carrefour.it/spesa-online/tonno/tonno-all-olio/8001234567890.html",
      source_url: DEFAULT_LISTING_URL,
    });
    expect(second).toEqual({
      name: "Tonno al naturale",
      price: null,
      image_url: "https://cdn.example.com/naturale.jpg",
      product_url: null,
      source_url: DEFAULT_LISTING_URL,
    });
  });

  it("falls back to JSON-LD products when there are no tiles", () => {
    expect(parseListingHtml(JSON_LD_HTML, options)).toEqual([
      {
        name: "Tonno leggero",
        price: 2.49,
        image_url: "https://cdn.example.com/leggero.jpg",
        product_url: "https://www.carrefour.it/spesa-online/tonno/8009876543210.html",
        source_url: DEFAULT_LISTING_URL,
      },
    ]);
  });

  it("returns nothing for a page without products", () => {
    expect(parseListingHtml("<html><body><p>Nessun prodotto</p></body></html>", options)).toEqual([]);
  });
});

describe("CarrefourScraper", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "tuna-carrefour-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("parses a saved listing file against the site root", async () => {
    const htmlFile = path.join(dir, "listing.html");
    await writeFile(htmlFile, TILES_HTML, "utf-8");
    const scraper = new CarrefourScraper({ http: stubHttpClient({}) });

    const products = await scraper.scrapeListing({ htmlFile });
    expect(products).toHaveLength(2);
    expect(products.every((p) => p.source_url === "Local file")).toBe(true);
    expect(products[0]?.product_url).toBe(
      "https://www.carrefour.it/spesa-online/tonno/tonno-all-olio/8001234567890.html",
    );
  });

  it("fetches a live listing and resolves links against its host", async () => {
    const listingUrl = "https://shop.example.com/spesa-online/tonno/";
    const calls: string[] = [];
    const http = stubHttpClient({ [listingUrl]: { data: TILES_HTML } }, { calls });
    const products = await new CarrefourScraper({ http }).scrapeListing({ url: listingUrl });

    expect(calls).toEqual(["https://shop.example.com/robots.txt", listingUrl]);
    expect(products[0]?.product_url).toBe(
      "https://shop.example.com/spesa-online/tonno/tonno-all-olio/8001234567890.html",
    );
    expect(products[0]?.source_url).toBe(listingUrl);
  });

  it("warns when robots.txt disallows the listing path and scrapes anyway", async () => {
    const listingUrl = "https://shop.example.com/spesa-online/tonno/";
    const warnings: string[] = [];
    const http = stubHttpClient({
      "https://shop.example.com/robots.txt": {
        data: "User-agent: *\nDisallow: /spesa-online/tonno/\n",
        contentType: "text/plain",
      },
      [listingUrl]: { data: TILES_HTML },
    });
    const products = await new CarrefourScraper({ http, logger: recordingLogger(warnings) }).scrapeListing({
      url: listingUrl,
    });

    expect(products).toHaveLength(2);
    expect(warnings).toEqual([
      `Scraping ${listingUrl} may not be allowed according to robots.txt`,
      "Proceeding with caution as robots.txt may disallow scraping this URL",
    ]);
  });

  it("scrapes when robots.txt cannot be fetched", async () => {
    const listingUrl = "https://shop.example.com/spesa-online/tonno/";
    const warnings: string[] = [];
    const scraper = new CarrefourScraper({
      http: stubHttpClient({ [listingUrl]: { data: TILES_HTML } }),
      logger: recordingLogger(warnings),
    });

    await expect(scraper.checkRobotsTxt(listingUrl)).resolves.toBe(true);
    const products = await scraper.scrapeListing({ url: listingUrl });
    expect(products).toHaveLength(2);
    expect(warnings).toHaveLength(2);
    expect(warnings.every((w) => w.startsWith("Could not check robots.txt: "))).toBe(true);
  });

  it("allows paths robots.txt does not mention", async () => {
    const http = stubHttpClient({
      "https://shop.example.com/robots.txt": { data: "User-agent: *\nDisallow: /checkout/\n", contentType: "text/plain" },
    });
    await expect(new CarrefourScraper({ http }).checkRobotsTxt("https://shop.example.com/spesa-online/tonno/")).resolves.toBe(
      true,
    );
    expect(robotsTxtUrl("https://www.carrefour.it/spesa-online/tonno/?page=2")).toBe("https://www.carrefour.it/robots.txt");
  });

  it("saves listing images named after the product", async () => {
    const imageUrl = "https://cdn.example.com/naturale.jpg";
    const http = stubHttpClient({ [imageUrl]: { data: Buffer.from("jpeg-bytes"), contentType: "image/jpeg" } });
    const scraper = new CarrefourScraper({ http });
    const products = [
      { name: "Tonno al naturale", price: 1.5, image_url: imageUrl, product_url: null, source_url: "Local file" },
      { name: "Senza immagine", price: 1, image_url: null, product_url: null, source_url: "Local file" },
    ];

    const saved = await scraper.saveListingImages(products, dir);
    const expectedPath = path.join(dir, "Tonno al naturale.jpg");
    expect(saved[0]?.local_image_path).toBe(expectedPath);
    expect(saved[1]).toEqual(products[1]);
    expect(await readFile(expectedPath, "utf-8")).toBe("jpeg-bytes");
  });

  it("leaves the record unchanged when an image download fails", async () => {
    const scraper = new CarrefourScraper({ http: stubHttpClient({}) });
    const product = {
      name: "Rotto",
      price: 1,
      image_url: "https://cdn.example.com/missing.jpg",
      product_url: null,
      source_url: "Local file",
    };
    await expect(scraper.saveListingImages([product], dir)).resolves.toEqual([product]);
  });
});

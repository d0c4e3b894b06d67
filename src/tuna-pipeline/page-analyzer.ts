/**
 * Listing page analyzer.
 *
 * Helps find the right selectors for a new listing layout: counts tags and
 * classes, guesses the product container, samples a few containers and
 * ranks candidate selectors for title, price, unit price, image and link.
 */

import * as cheerio from "cheerio";
import type { Cheerio } from "cheerio";
import type { Element } from "domhandler";

export interface CommonElements {
  tags: Record<string, number>;
  classes: Record<string, number>;
  potential_containers: Record<string, number>;
}

export interface ContainerSample {
  title?: { text: string; tag: string; classes: string[] };
  price?: { text: string; tag: string; classes: string[] };
  image?: { src: string; tag: string; classes: string[] };
  link?: { href: string; tag: string; classes: string[] };
}

export const SELECTOR_KINDS = ["title", "price", "image", "price_per_unit", "link"] as const;
export type SelectorKind = (typeof SELECTOR_KINDS)[number];

export interface PageAnalysis {
  common_elements: CommonElements;
  container_class: string | null;
  container_count: number;
  sample_containers: ContainerSample[];
  suggested_selectors: Partial<Record<SelectorKind, string[]>>;
  json_ld_count: number;
}

const PRODUCT_KEYWORDS = ["product", "item", "card", "tile", "article"];
const TITLE_KEYWORDS = ["title", "name", "product"];
const UNIT_KEYWORDS = ["unit", "kg", "per"];

/** Candidate containers, tried in order: [tag, class substring]. */
const CONTAINER_CANDIDATES: ReadonlyArray<readonly [string, string | null]> = [
  ["div", "product-item"],
  ["div", "product-card"],
  ["div", "product-tile"],
  ["div", "item"],
  ["article", null],
];

function classList(el: Element): string[] {
  return (el.attribs.class ?? "").split(/\s+/).filter(Boolean);
}

/** True when one of the element's classes satisfies `test`. */
function classMatches(el: Element, test: (cls: string) => boolean): boolean {
  return classList(el).some((cls) => test(cls.toLowerCase()));
}

const containsAny = (keywords: readonly string[]) => (cls: string) => keywords.some((k) => cls.includes(k));

/** Entries of `counts` sorted by count (desc), ties in first-seen order. */
function mostCommon(counts: Map<string, number>, limit?: number): Array<[string, number]> {
  const sorted = [...counts.entries()].sort((a, b) => b[1] - a[1]);
  return limit === undefined ? sorted : sorted.slice(0, limit);
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

export function findCommonElements($: cheerio.CheerioAPI): CommonElements {
  const tagCounts = new Map<string, number>();
  const classCounts = new Map<string, number>();
  $<Element, string>("*").each((_i, el) => {
    increment(tagCounts, el.tagName);
    for (const cls of classList(el)) increment(classCounts, cls);
  });

  const potential = mostCommon(classCounts).filter(
    ([cls, count]) => count > 1 && containsAny(PRODUCT_KEYWORDS)(cls.toLowerCase()),
  );

  return {
    tags: Object.fromEntries(mostCommon(tagCounts, 10)),
    classes: Object.fromEntries(mostCommon(classCounts, 15)),
    potential_containers: Object.fromEntries(potential),
  };
}

/** First descendant of `root` among `tags` (any tag when empty) whose classes pass `test`. */
function findFirst(
  root: Cheerio<Element>,
  tags: readonly string[],
  test?: (cls: string) => boolean,
): Element | undefined {
  const selector = tags.length ? tags.join(",") : "*";
  return root
    .find(selector)
    .toArray()
    .find((el) => (test ? classMatches(el, test) : true));
}

/**
 * Locate product containers, either by an explicit class or by walking the
 * candidate list until one yields elements.
 */
export function findProductContainers(
  $: cheerio.CheerioAPI,
  containerClass?: string,
): { containers: Element[]; containerClass: string | null } {
  if (containerClass) {
    const containers = $<Element, string>("*")
      .toArray()
      .filter((el) => classList(el).includes(containerClass));
    return { containers, containerClass };
  }

  for (const [tag, cls] of CONTAINER_CANDIDATES) {
    const containers = $<Element, string>(tag)
      .toArray()
      .filter((el) => (cls ? classMatches(el, (c) => c.includes(cls.toLowerCase())) : true));
    if (containers.length) return { containers, containerClass: cls ?? tag };
  }
  return { containers: [], containerClass: null };
}

function describe($: cheerio.CheerioAPI, el: Element) {
  return { tag: el.tagName, classes: classList(el), text: $(el).text().trim() };
}

export function sampleContainer($: cheerio.CheerioAPI, container: Element): ContainerSample {
  const root = $(container);
  const title =
    findFirst(root, ["h1", "h2", "h3", "h4", "a"], containsAny(TITLE_KEYWORDS)) ??
    findFirst(root, ["a"], (c) => c.includes("link"));
  const price = findFirst(root, [], (c) => c.includes("price"));
  const image = root.find("img").first().get(0);
  const link = root.find("a[href]").first().get(0);

  const sample: ContainerSample = {};
  if (title) {
    const d = describe($, title);
    sample.title = { text: d.text.slice(0, 50), tag: d.tag, classes: d.classes };
  }
  if (price) sample.price = describe($, price);
  if (image) {
    sample.image = {
      src: (image.attribs.src ?? image.attribs["data-src"] ?? "No src").slice(0, 50),
      tag: image.tagName,
      classes: classList(image),
    };
  }
  if (link) sample.link = { href: (link.attribs.href ?? "").slice(0, 50), tag: link.tagName, classes: classList(link) };
  return sample;
}

function selectorOf(el: Element): string {
  return `${el.tagName}.${classList(el).join(" ")}`;
}

/**
 * Rank selectors over the first ten containers; each kind keeps its three
 * most frequent candidates.
 */
export function suggestSelectors(
  $: cheerio.CheerioAPI,
  containers: readonly Element[],
): Partial<Record<SelectorKind, string[]>> {
  const found: Record<SelectorKind, Map<string, number>> = {
    title: new Map(),
    price: new Map(),
    image: new Map(),
    price_per_unit: new Map(),
    link: new Map(),
  };

  const record = (kind: SelectorKind, candidates: Array<Element | undefined>): void => {
    for (const el of candidates) {
      if (el && $(el).text().trim()) increment(found[kind], selectorOf(el));
    }
  };

  for (const container of containers.slice(0, 10)) {
    const root = $(container);

    record("title", [
      findFirst(root, ["h1", "h2", "h3", "h4"], containsAny(TITLE_KEYWORDS)),
      findFirst(root, ["a"], (c) => c.includes("product")),
      findFirst(root, ["a"], (c) => c.includes("link")),
      findFirst(root, ["div"], (c) => c.includes("name")),
    ]);

    record("price", [
      findFirst(root, [], (c) => c.includes("price") && !containsAny(UNIT_KEYWORDS)(c)),
      findFirst(root, ["span"], (c) => c.includes("price")),
      findFirst(root, ["div"], (c) => c.includes("price")),
    ]);

    record("price_per_unit", [
      findFirst(root, [], containsAny(UNIT_KEYWORDS)),
      findFirst(root, ["span"], (c) => c.includes("unit")),
      findFirst(root, ["div"], (c) => c.includes("unit")),
    ]);

    const image = root.find("img").first().get(0);
    if (image) increment(found.image, selectorOf(image));

    const link = root.find("a[href]").first().get(0);
    if (link) increment(found.link, selectorOf(link));
  }

  const suggested: Partial<Record<SelectorKind, string[]>> = {};
  for (const kind of SELECTOR_KINDS) {
    if (found[kind].size) suggested[kind] = mostCommon(found[kind], 3).map(([selector]) => selector);
  }
  return suggested;
}

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/** Number of JSON-LD blocks that parse as JSON. */
export function countJsonLd($: cheerio.CheerioAPI): number {
  return $('script[type="application/ld+json"]')
    .toArray()
    .filter((script) => isJson($(script).text())).length;
}

export function analyzePage(html: string, options: { containerClass?: string } = {}): PageAnalysis {
  const $ = cheerio.load(html);
  const { containers, containerClass } = findProductContainers($, options.containerClass);
  return {
    common_elements: findCommonElements($),
    container_class: containerClass,
    container_count: containers.length,
    sample_containers: containers.slice(0, 3).map((c) => sampleContainer($, c)),
    suggested_selectors: suggestSelectors($, containers),
    json_ld_count: countJsonLd($),
  };
}

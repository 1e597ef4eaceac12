import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { AnyNode } from "domhandler";
import { ExtractionError } from "../domain/errors.js";
import type { AnnouncementCandidate } from "../types/monitor.js";
import { logger } from "../utils/logger.js";

interface ExtractionStrategy {
  name: string;
  blocks($: CheerioAPI): Array<Cheerio<AnyNode>>;
}

const TICKER_SELECTOR = "div.tg-ticker.owl-carousel";

function wrapAll<T extends AnyNode>($: CheerioAPI, selection: Cheerio<T>): Array<Cheerio<AnyNode>> {
  return selection.toArray().map((element: AnyNode) => $(element));
}

function isCloned(block: Cheerio<AnyNode>): boolean {
  return block.hasClass("cloned") || block.parents(".cloned").length > 0;
}

/**
 * Ordered from the most page-specific layout (a news ticker carousel) to a
 * whole-page scan. The first strategy that yields anything wins.
 */
const STRATEGIES: ExtractionStrategy[] = [
  {
    name: "ticker_items",
    blocks: ($) =>
      wrapAll($, $(TICKER_SELECTOR).first().find(".owl-item, .item")).filter((block) => !isCloned(block)),
  },
  {
    name: "ticker_children",
    blocks: ($) => wrapAll($, $(TICKER_SELECTOR).first().children()).filter((block) => !isCloned(block)),
  },
  {
    name: "carousel_items",
    blocks: ($) =>
      wrapAll($, $("div.owl-carousel").find("div.owl-item, div.item")).filter((block) => !isCloned(block)),
  },
  {
    name: "list_items",
    blocks: ($) => wrapAll($, $("li")),
  },
  {
    name: "links",
    blocks: ($) => wrapAll($, $("a")),
  },
];

export function normalizeWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}

function isPdfHref(href: string): boolean {
  const pathPart = href.split(/[?#]/)[0] ?? "";
  return pathPart.trim().toLowerCase().endsWith(".pdf");
}

function toAbsoluteUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

function findPdfUrl($: CheerioAPI, block: Cheerio<AnyNode>, baseUrl: string): string | null {
  const links = block.is("a") ? [block, ...wrapAll($, block.find("a"))] : wrapAll($, block.find("a"));
  for (const link of links) {
    const href = link.attr("href")?.trim();
    if (!href || !isPdfHref(href)) continue;
    const absolute = toAbsoluteUrl(href, baseUrl);
    if (absolute) return absolute;
  }
  return null;
}

function* generateCandidates(html: string, baseUrl: string): Generator<AnnouncementCandidate, void, undefined> {
  let $: CheerioAPI;
  try {
    $ = cheerio.load(html);
  } catch (error) {
    throw new ExtractionError(`Could not parse page content: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }

  const seen = new Set<string>();
  for (const strategy of STRATEGIES) {
    let blocks: Array<Cheerio<AnyNode>>;
    try {
      blocks = strategy.blocks($);
    } catch (error) {
      throw new ExtractionError(`Strategy ${strategy.name} failed: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }

    let produced = 0;
    for (const block of blocks) {
      const text = normalizeWhitespace(block.text());
      if (!text) continue;
      const pdfUrl = findPdfUrl($, block, baseUrl);
      produced += 1;

      const key = `${text.toLowerCase()}|${pdfUrl ?? ""}`;
      if (seen.has(key)) continue;
      seen.add(key);
      yield { text, pdf_url: pdfUrl };
    }

    if (produced > 0) {
      logger.debug("extract_strategy_selected", { strategy: strategy.name, blocks: produced });
      return;
    }
  }
}

/**
 * Candidate announcements of a page, in document order. Parsing is deferred
 * until the first iteration and every iteration starts from the beginning.
 */
export function extractCandidates(html: string, baseUrl: string): Iterable<AnnouncementCandidate> {
  return {
    [Symbol.iterator]: () => generateCandidates(html, baseUrl),
  };
}

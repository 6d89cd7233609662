/**
 * Wikipedia article source
 *
 * Fetches an article's Parsoid HTML and splits it into prose paragraphs
 * (inline citation markers kept as "[n]" text) and the reference list.
 *
 * @module wiki-article
 */

import * as cheerio from "cheerio";
import type { AnyNode, Cheerio } from "cheerio";
import type { ArticleContent, Reference } from "./analyzer/types";
import { DEFAULT_FETCH_TIMEOUT_MS, joinText, RetrievalError } from "./retrieval";

export const DEFAULT_WIKI_BASE_URL = "https://en.wikipedia.org";

const USER_AGENT = "citecheck/0.1 (citation bias analysis)";

/** Containers that never hold article prose */
const NON_PROSE_SELECTORS = [
  "table",
  "figure",
  "aside",
  "div.hatnote",
  "div.navbox",
  "div.sidebar",
  "table.infobox",
  "table.metadata",
];

export interface ArticleSource {
  getTextAndRefs(title: string): Promise<ArticleContent>;
}

function firstExternalLink($: cheerio.CheerioAPI, scope: Cheerio<AnyNode>): string | null {
  for (const a of scope.find("a[href^='http']").toArray()) {
    const href = $(a).attr("href");
    if (href && !href.includes("wikipedia.org")) return href;
  }
  return null;
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/**
 * Parse article HTML into paragraphs and references
 */
export function parseArticleHtml(html: string): ArticleContent {
  const $ = cheerio.load(html);
  const mainEl = $("main").first();
  const main: Cheerio<AnyNode> = mainEl.length > 0 ? mainEl : $.root();

  main.find(NON_PROSE_SELECTORS.join(", ")).remove();

  main.find("sup.reference").each((_, sup) => {
    $(sup).replaceWith(escapeHtml(joinText($, $(sup), "")));
  });

  const paragraphs: string[] = [];
  const addParagraph = (_: number, p: AnyNode): void => {
    const t = joinText($, $(p), " ");
    if (t) paragraphs.push(t);
  };

  const sections = main.find("section[data-mw-section-id]");
  if (sections.length > 0) {
    sections.each((_, section) => {
      $(section).children("p").each(addParagraph);
    });
  } else {
    main.find(".mw-parser-output > p").each(addParagraph);
  }

  const refs: Reference[] = [];
  main.find("ol.references > li").each((_, li) => {
    const item = $(li);
    const id = item.attr("id");
    if (!id || !id.startsWith("cite_note-")) return;

    const key = item.attr("data-mw-footnote-number");
    if (!key) return;

    const body = item.find("span.reference-text").first();
    const text = joinText($, body.length > 0 ? body : item, " ");

    const cite = item.find("cite").first();
    const url = (cite.length > 0 ? firstExternalLink($, cite) : null) ?? firstExternalLink($, item);

    refs.push({ key, text, url, kind: /^\d+$/.test(key) ? "reference" : "note" });
  });

  return { paragraphs, refs };
}

/**
 * Article source backed by the Wikipedia REST API.
 * Fetch failures raise `RetrievalError`; the caller treats them as fatal.
 */
export function createWikipediaSource(
  options: { baseUrl?: string; timeoutMs?: number } = {},
): ArticleSource {
  const { baseUrl = DEFAULT_WIKI_BASE_URL, timeoutMs = DEFAULT_FETCH_TIMEOUT_MS } = options;

  return {
    async getTextAndRefs(title) {
      const url = `${baseUrl.replace(/\/+$/, "")}/api/rest_v1/page/html/${encodeURIComponent(title)}`;

      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);
      let html: string;
      try {
        const response = await fetch(url, {
          signal: controller.signal,
          headers: { "User-Agent": USER_AGENT },
        });
        if (!response.ok) {
          throw new RetrievalError(url, `Failed to fetch article "${title}": HTTP ${response.status}`, {
            status: response.status,
          });
        }
        html = await response.text();
      } catch (err) {
        if (err instanceof RetrievalError) throw err;
        const reason = err instanceof Error ? err.message : String(err);
        throw new RetrievalError(url, `Failed to fetch article "${title}": ${reason}`, { cause: err });
      } finally {
        clearTimeout(timeout);
      }

      return parseArticleHtml(html);
    },
  };
}

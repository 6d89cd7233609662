/**
 * citecheck URL Retrieval Module
 *
 * Fetches a cited source and extracts its prose as a list of text blocks,
 * then packs those blocks into chunks small enough for one model call.
 *
 * @module retrieval
 */

import * as cheerio from "cheerio";
import type { AnyNode, Cheerio, CheerioAPI } from "cheerio";
import { debugLog } from "./analyzer/debug";

export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;
export const DEFAULT_CHUNK_MAX_CHARS = 8_000;

const MIN_BLOCK_CHARS = 50;
const MIN_BLOCKS_BEFORE_FALLBACK = 3;

const USER_AGENT = "Mozilla/5.0 (compatible; citecheck/0.1; +citation verification)";

export class RetrievalError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "RetrievalError";
    this.url = url;
    this.status = options?.status ?? null;
  }
}

/**
 * Fetches and chunks source content. Verification only sees this interface,
 * so tests hand it an in-memory fake.
 */
export interface SourceRetriever {
  scrape(url: string): Promise<string[]>;
  chunk(paragraphs: readonly string[], maxChars?: number): string[];
}

// ============================================================================
// HTML EXTRACTION
// ============================================================================

/**
 * Text of every descendant text node, each trimmed, empties dropped,
 * joined with `separator`
 */
export function joinText($: CheerioAPI, selection: Cheerio<AnyNode>, separator: string): string {
  const parts: string[] = [];
  const walk = (nodes: Cheerio<AnyNode>): void => {
    nodes.contents().each((_, node) => {
      const child = $(node);
      if (node.nodeType === 3) {
        const t = child.text().trim();
        if (t) parts.push(t);
      } else if (node.nodeType === 1) {
        walk(child);
      }
    });
  };
  walk(selection);
  return parts.join(separator);
}

/**
 * Extract prose blocks from an HTML page
 */
export function extractParagraphsFromHtml(html: string): string[] {
  const $ = cheerio.load(html);

  $("script, style, nav, header, footer, aside").remove();

  let main: Cheerio<AnyNode> = $.root();
  for (const selector of ["main", "article", "div.content"]) {
    const el = $(selector).first();
    if (el.length > 0) {
      main = el;
      break;
    }
  }

  let paragraphs: string[] = [];
  main.find("p, div, section").each((_, el) => {
    const text = joinText($, $(el), " ");
    if (text.length > MIN_BLOCK_CHARS) paragraphs.push(text);
  });

  // Sparse markup: fall back to line-by-line text of the whole content area
  if (paragraphs.length < MIN_BLOCKS_BEFORE_FALLBACK) {
    paragraphs = joinText($, main, "\n")
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > MIN_BLOCK_CHARS);
  }

  return paragraphs;
}

// ============================================================================
// FETCHING
// ============================================================================

/**
 * Fetch a URL and extract its prose blocks.
 * Throws `RetrievalError` on HTTP errors, timeouts and parse failures.
 */
export async function scrapeUrlContent(
  url: string,
  options: { timeoutMs?: number } = {},
): Promise<string[]> {
  const { timeoutMs = DEFAULT_FETCH_TIMEOUT_MS } = options;

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  let html: string;
  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        "User-Agent": USER_AGENT,
        "Accept": "text/html,application/xhtml+xml,*/*",
      },
    });

    if (!response.ok) {
      throw new RetrievalError(url, `Failed to fetch URL ${url}: HTTP ${response.status}`, {
        status: response.status,
      });
    }

    html = await response.text();
  } catch (err) {
    if (err instanceof RetrievalError) throw err;
    const reason = controller.signal.aborted
      ? `timed out after ${timeoutMs}ms`
      : err instanceof Error ? err.message : String(err);
    throw new RetrievalError(url, `Failed to fetch URL ${url}: ${reason}`, { cause: err });
  } finally {
    clearTimeout(timeout);
  }

  let paragraphs: string[];
  try {
    paragraphs = extractParagraphsFromHtml(html);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RetrievalError(url, `Failed to parse content from ${url}: ${reason}`, { cause: err });
  }

  debugLog(`[Retrieval] ${url}: ${html.length} chars of HTML, ${paragraphs.length} text block(s)`);
  return paragraphs;
}

// ============================================================================
// CHUNKING
// ============================================================================

/**
 * Pack text blocks greedily into chunks of at most `maxChars`.
 * Blocks are joined with a blank line; a block longer than `maxChars` is
 * split on word boundaries into chunks of its own.
 */
export function chunkTextForLlm(paragraphs: readonly string[], maxChars = DEFAULT_CHUNK_MAX_CHARS): string[] {
  const chunks: string[] = [];
  let current: string[] = [];
  let currentLength = 0;

  const flush = (): void => {
    if (current.length > 0) {
      chunks.push(current.join("\n\n"));
      current = [];
      currentLength = 0;
    }
  };

  for (const paragraph of paragraphs) {
    if (currentLength + paragraph.length > maxChars) flush();

    if (paragraph.length > maxChars) {
      let words: string[] = [];
      let wordsLength = 0;
      for (const word of paragraph.split(/\s+/).filter(Boolean)) {
        const wordLength = word.length + 1;
        if (wordsLength + wordLength > maxChars && words.length > 0) {
          chunks.push(words.join(" "));
          words = [];
          wordsLength = 0;
        }
        words.push(word);
        wordsLength += wordLength;
      }
      if (words.length > 0) chunks.push(words.join(" "));
      continue;
    }

    current.push(paragraph);
    currentLength += paragraph.length + 2;
  }

  flush();
  return chunks;
}

export function createWebRetriever(options: { timeoutMs?: number } = {}): SourceRetriever {
  return {
    scrape: (url) => scrapeUrlContent(url, options),
    chunk: (paragraphs, maxChars) => chunkTextForLlm(paragraphs, maxChars),
  };
}

/**
 * Wikipedia article parsing tests
 *
 * @module wiki-article.test
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { RetrievalError } from "@/lib/retrieval";
import { createWikipediaSource, parseArticleHtml } from "@/lib/wiki-article";

const ARTICLE_HTML = `<html><body>
<section data-mw-section-id="0">
<div class="hatnote">For the railway station, see Example Station.</div>
<p>The <b>Example Bridge</b> opened in 1932.<sup class="reference"><a href="#cite_note-1">[1]</a></sup> It carried rail traffic.<sup class="reference"><a href="#cite_note-a">[a]</a></sup></p>
<table class="infobox"><tr><td><p>Infobox text</p></td></tr></table>
<p> </p>
</section>
<section data-mw-section-id="1">
<h2>History</h2>
<p>Construction began in 1929.<sup class="reference"><a href="#cite_note-2">[2]</a></sup></p>
</section>
<section data-mw-section-id="2">
<h2>References</h2>
<div class="mw-references-wrap"><ol class="references">
<li id="cite_note-1" data-mw-footnote-number="1"><span class="mw-cite-backlink"><a href="#cite_ref-1">^</a></span> <span class="reference-text"><cite class="citation web"><a rel="mw:ExtLink" href="https://news.example.com/bridge">Bridge opens</a> Example News, 1932.</cite></span></li>
<li id="cite_note-a" data-mw-footnote-number="a"><span class="reference-text">Locals called it the iron span.</span></li>
<li id="cite_note-2" data-mw-footnote-number="2"><span class="reference-text">Smith, J. <a href="https://en.wikipedia.org/wiki/Bridges">Bridges</a> <a href="https://archive.example.org/bridges">Archive copy</a></span></li>
<li id="other-3" data-mw-footnote-number="3">Not a footnote</li>
<li id="cite_note-4"><span class="reference-text">No footnote number</span></li>
</ol></div>
</section>
</body></html>`;

describe("parseArticleHtml", () => {
  it("extracts section paragraphs with their citation markers", () => {
    expect(parseArticleHtml(ARTICLE_HTML).paragraphs).toEqual([
      "The Example Bridge opened in 1932. [1] It carried rail traffic. [a]",
      "Construction began in 1929. [2]",
    ]);
  });

  it("extracts numbered references and lettered notes", () => {
    expect(parseArticleHtml(ARTICLE_HTML).refs).toEqual([
      {
        key: "1",
        text: "Bridge opens Example News, 1932.",
        url: "https://news.example.com/bridge",
        kind: "reference",
      },
      { key: "a", text: "Locals called it the iron span.", url: null, kind: "note" },
      {
        key: "2",
        text: "Smith, J. Bridges Archive copy",
        url: "https://archive.example.org/bridges",
        kind: "reference",
      },
    ]);
  });

  it("falls back to top-level parser output paragraphs", () => {
    const html = `<div class="mw-parser-output"><p>First para.</p><div><p>Nested.</p></div><p>Second para.</p></div>`;
    expect(parseArticleHtml(html)).toEqual({ paragraphs: ["First para.", "Second para."], refs: [] });
  });

  it("keeps marker text that looks like markup as text", () => {
    const html = `<section data-mw-section-id="0"><p>Claim.<sup class="reference">[&lt;b&gt;]</sup></p></section>`;
    expect(parseArticleHtml(html).paragraphs).toEqual(["Claim. [<b>]"]);
  });
});

describe("createWikipediaSource", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("fetches the article HTML from the REST API", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(ARTICLE_HTML, { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const content = await createWikipediaSource({ baseUrl: "https://wiki.example.org/" }).getTextAndRefs(
      "Example_Bridge",
    );

    expect(fetchMock.mock.calls[0][0]).toBe("https://wiki.example.org/api/rest_v1/page/html/Example_Bridge");
    expect(content.paragraphs).toHaveLength(2);
    expect(content.refs.map((r) => r.key)).toEqual(["1", "a", "2"]);
  });

  it("rejects when the article cannot be fetched", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("not found", { status: 404 })));

    const result = createWikipediaSource().getTextAndRefs("No_Such_Article");

    await expect(result).rejects.toBeInstanceOf(RetrievalError);
    await expect(result).rejects.toMatchObject({
      message: 'Failed to fetch article "No_Such_Article": HTTP 404',
      status: 404,
    });
  });
});

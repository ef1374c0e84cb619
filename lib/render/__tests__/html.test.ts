import { describe, it, expect, beforeAll, afterAll } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DomUtils, parseDocument } from "htmlparser2";
import { RenderError } from "../../errors.js";
import { Hidden } from "../../numbering/numbering.js";
import { prepareChapters } from "../chapter.js";
import { HtmlRenderer } from "../html.js";
import { chapter, makeBook } from "./fixtures.js";
import type { Book } from "../../book.js";

function renderHtml(book: Book): string {
  return new HtmlRenderer().render(book, prepareChapters(book)).content;
}

describe("HtmlRenderer", () => {
  let tmpDir: string;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "html-test-"));
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("renders each chapter as a section with its header", () => {
    const html = renderHtml(
      makeBook([chapter("# Rain\n\nHello, world."), chapter("Text[^n].\n\n[^n]: A note.")])
    );
    expect(html).toContain(
      '<section class="chapter" id="chapter-1">\n<h1 class="chapter-title">1. Rain</h1>\n<p>Hello, world.</p>\n</section>\n'
    );
    expect(html).toContain(
      '<section class="chapter" id="chapter-2">\n<h1 class="chapter-title">2.</h1>\n' +
        '<p>Text<a href="#c2-note-1" id="c2-ref-1" class="note-ref"><sup>1</sup></a>.</p>\n' +
        '<div class="notes">\n<div class="note" id="c2-note-1">\n' +
        '<p class="note-number"><a href="#c2-ref-1">1</a></p>\n<p>A note.</p>\n</div>\n</div>\n</section>\n'
    );
  });

  it("renders a footnote defined inside a block quote", () => {
    const html = renderHtml(makeBook([chapter("# T\n\n> Quote[^a]\n>\n> [^a]: the note")]));
    expect(html).toContain('Quote<a href="#c1-note-1" id="c1-ref-1" class="note-ref"><sup>1</sup></a>');
    expect(html).toContain(
      '<div class="note" id="c1-note-1">\n<p class="note-number"><a href="#c1-ref-1">1</a></p>\n<p>the note</p>\n</div>'
    );
  });

  it("escapes the metadata", () => {
    const html = renderHtml(makeBook([chapter("x")], { title: `A <b> & "c"`, author: "Me & You" }));
    expect(html).toContain("<title>A &lt;b&gt; &amp; &quot;c&quot;</title>");
    expect(html).toContain('<meta name="author" content="Me &amp; You" />');
    expect(html).not.toContain('name="description"');
  });

  it("lists only shown chapters in the table of contents", () => {
    const html = renderHtml(makeBook([chapter("# One"), chapter("# Secret", Hidden), chapter("# Two")]));
    expect(html).toContain(
      '<ul>\n<li><a href="#chapter-1">1. One</a></li>\n<li><a href="#chapter-3">2. Two</a></li>\n</ul>'
    );
    const doc = parseDocument(html);
    expect(DomUtils.getElementsByTagName("section", doc)).toHaveLength(3);
    expect(DomUtils.getElementsByTagName("h1", doc).map((h) => DomUtils.textContent(h))).toEqual([
      "Untitled",
      "1. One",
      "2. Two",
    ]);
  });

  it("inlines the configured stylesheet", () => {
    fs.writeFileSync(path.join(tmpDir, "custom.css"), "p { margin: 0; }");
    const html = renderHtml(makeBook([chapter("x")], { htmlCss: "custom.css" }, tmpDir));
    expect(html).toContain("<style>\np { margin: 0; }\n</style>");
  });

  it("uses a custom page template", () => {
    fs.writeFileSync(path.join(tmpDir, "page.html"), "<h1>{{ title }}</h1>\n{{ content }}");
    const html = renderHtml(makeBook([chapter("x")], { htmlTemplate: "page.html", title: "T" }, tmpDir));
    expect(html).toBe('<h1>T</h1>\n<section class="chapter" id="chapter-1">\n<h1 class="chapter-title">1.</h1>\n<p>x</p>\n</section>\n');
  });

  it("fails on an unknown template variable", () => {
    fs.writeFileSync(path.join(tmpDir, "broken.html"), "{{ nonsense }}");
    const book = makeBook([chapter("x")], { htmlTemplate: "broken.html" }, tmpDir);
    expect(() => renderHtml(book)).toThrow(RenderError);
    expect(() => renderHtml(book)).toThrow(/^Could not expand the HTML template: /);
  });

  it("reports each chapter as it starts", () => {
    const book = makeBook([chapter("a"), chapter("b")]);
    const seen: Array<[number, number]> = [];
    new HtmlRenderer().render(book, prepareChapters(book), {
      onChapter: (index, total) => seen.push([index, total]),
    });
    expect(seen).toEqual([
      [0, 2],
      [1, 2],
    ]);
  });
});

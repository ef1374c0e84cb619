import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { prepareChapters } from "../../render/chapter.js";
import type { CommandRunner } from "../../render/pdf.js";
import { chapter, makeBook } from "../../render/__tests__/fixtures.js";
import { renderBook, renderFormat, requestedJobs } from "../render-runner.js";
import type { Progress, ProgressEvent } from "../types.js";

function collect(): { progress: Progress; events: ProgressEvent[] } {
  const events: ProgressEvent[] = [];
  return { progress: { emit: (event) => events.push(event) }, events };
}

describe("requestedJobs", () => {
  const book = makeBook([], { outputs: { odt: "b.odt", html: "b.html", epub: "b.epub" } }, "/books");

  it("lists configured outputs in format order", () => {
    expect(requestedJobs(book).map((j) => j.format)).toEqual(["epub", "html", "odt"]);
    expect(requestedJobs(book)[0].path).toBe(path.resolve("/books/b.epub"));
  });

  it("filters by the requested formats", () => {
    expect(requestedJobs(book, ["odt", "tex"]).map((j) => j.format)).toEqual(["odt"]);
  });
});

describe("renderFormat", () => {
  it("returns text for text formats and zip bytes for containers", () => {
    const book = makeBook([chapter("Hello.")]);
    const chapters = prepareChapters(book);
    expect(renderFormat(book, "html", chapters)).toContain("<p>Hello.</p>");
    const epub = renderFormat(book, "epub", chapters);
    expect(typeof epub).not.toBe("string");
    if (typeof epub === "string") return;
    expect(epub.subarray(0, 2).toString("ascii")).toBe("PK");
  });
});

describe("renderBook", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "runner-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes every configured output", async () => {
    const book = makeBook(
      [chapter("# Rain\n\nHello.")],
      { outputs: { html: "out/book.html", tex: "out/book.tex", odt: "out/book.odt" } },
      tmpDir
    );
    const report = await renderBook(book);

    expect(report.succeeded).toBe(true);
    expect(report.outcomes.map((o) => [o.format, o.ok])).toEqual([
      ["html", true],
      ["tex", true],
      ["odt", true],
    ]);
    expect(fs.readFileSync(path.join(tmpDir, "out/book.html"), "utf-8")).toContain("<p>Hello.</p>");
    expect(fs.readFileSync(path.join(tmpDir, "out/book.tex"), "utf-8")).toContain("\\chapter*{1. Rain}");
    expect(fs.readdirSync(path.join(tmpDir, "out")).sort()).toEqual(["book.html", "book.odt", "book.tex"]);
  });

  it("keeps rendering other formats when one fails", async () => {
    const book = makeBook(
      [chapter("Hello.")],
      { cover: "missing.png", outputs: { epub: "book.epub", html: "book.html" } },
      tmpDir
    );
    const { progress, events } = collect();
    const report = await renderBook(book, { progress, concurrency: 1 });

    expect(report.succeeded).toBe(false);
    const [epub, html] = report.outcomes;
    expect(epub.ok).toBe(false);
    if (!epub.ok) {
      expect(epub.error.message).toBe(`Could not read resource ${path.join(tmpDir, "missing.png")}`);
    }
    expect(html.ok).toBe(true);
    expect(fs.readdirSync(tmpDir)).toEqual(["book.html"]);
    expect(events.map((e) => e.type)).toEqual([
      "render-start",
      "render-progress",
      "render-error",
      "render-start",
      "render-progress",
      "render-complete",
    ]);
    expect(events[1]).toEqual({
      type: "render-progress",
      format: "epub",
      message: "Rendering chapter",
      chapter: 1,
      totalChapters: 1,
    });
  });

  it("only renders the requested formats", async () => {
    const book = makeBook([chapter("x")], { outputs: { html: "book.html", tex: "book.tex" } }, tmpDir);
    const report = await renderBook(book, { formats: ["tex"] });
    expect(report.outcomes.map((o) => o.format)).toEqual(["tex"]);
    expect(fs.readdirSync(tmpDir)).toEqual(["book.tex"]);
  });

  it("renders PDF through the command runner", async () => {
    const run: CommandRunner = (_command, _args, cwd) => {
      fs.writeFileSync(path.join(cwd, "book.pdf"), "%PDF-1.5");
      return { status: 0, output: "" };
    };
    const book = makeBook([chapter("x")], { outputs: { pdf: "book.pdf" }, tempDir: "scratch" }, tmpDir);
    const report = await renderBook(book, { runCommand: run });
    expect(report.succeeded).toBe(true);
    expect(fs.readFileSync(path.join(tmpDir, "book.pdf"), "utf-8")).toBe("%PDF-1.5");
  });

  it("renders every format from the same prepared chapters", async () => {
    const book = makeBook(
      [chapter("Text[^n].\n\n[^n]: Note.")],
      { outputs: { html: "a.html", tex: "a.tex", odt: "a.odt", epub: "a.epub" } },
      tmpDir
    );
    const report = await renderBook(book);
    expect(report.outcomes.map((o) => o.ok)).toEqual([true, true, true, true]);
  });

  it("warns when no output is configured", async () => {
    const { progress, events } = collect();
    const report = await renderBook(makeBook([chapter("x")]), { progress });
    expect(report).toEqual({ outcomes: [], succeeded: true });
    expect(events).toEqual([
      {
        type: "warning",
        message:
          "Generated no file because no output file was specified. " +
          "Add output-epub, output-html, output-tex, output-pdf or output-odt to the book file.",
      },
    ]);
  });
});

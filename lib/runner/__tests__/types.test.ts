import { describe, it, expect, vi, afterEach } from "vitest";
import { createCallbackProgress, createConsoleProgress, formatName } from "../types.js";

describe("createCallbackProgress", () => {
  it("formats one line per event", () => {
    const lines: string[] = [];
    const progress = createCallbackProgress((line) => lines.push(line));
    progress.emit({ type: "render-start", format: "html", path: "/b.html" });
    progress.emit({ type: "render-progress", format: "html", message: "Rendering chapter", chapter: 2, totalChapters: 5 });
    progress.emit({ type: "render-progress", format: "html", message: "Packing" });
    progress.emit({ type: "render-complete", format: "html", path: "/b.html" });
    progress.emit({ type: "render-error", format: "tex", error: "boom" });
    progress.emit({ type: "warning", message: "careful" });
    expect(lines).toEqual([
      "Starting HTML",
      "Rendering chapter (2/5)",
      "Packing",
      "Completed HTML",
      "Error: boom",
      "Warning: careful",
    ]);
  });
});

describe("createConsoleProgress", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints completions, errors and warnings", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const progress = createConsoleProgress();

    progress.emit({ type: "render-start", format: "epub", path: "/b.epub" });
    progress.emit({ type: "render-progress", format: "epub", message: "Rendering chapter", chapter: 1, totalChapters: 1 });
    progress.emit({ type: "render-complete", format: "epub", path: "/b.epub" });
    progress.emit({ type: "render-error", format: "pdf", error: "no latex" });
    progress.emit({ type: "warning", message: "nothing" });

    expect(log.mock.calls).toEqual([["Successfully generated EPUB: /b.epub"]]);
    expect(error.mock.calls).toEqual([["Error generating PDF: no latex"]]);
    expect(warn.mock.calls).toEqual([["Warning: nothing"]]);
  });

  it("prints per-chapter progress when verbose", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const progress = createConsoleProgress({ verbose: true });

    progress.emit({ type: "render-start", format: "odt", path: "/b.odt" });
    progress.emit({ type: "render-progress", format: "odt", message: "Rendering chapter", chapter: 1, totalChapters: 3 });

    expect(log.mock.calls).toEqual([["Attempting to generate ODT..."], ["ODT: Rendering chapter (1/3)"]]);
  });
});

describe("formatName", () => {
  it("names formats for display", () => {
    expect(formatName("tex")).toBe("LaTeX");
    expect(formatName("pdf")).toBe("PDF");
  });
});

/**
 * The Book aggregate: metadata options plus an ordered list of parsed
 * chapters. Built once by `loadBook`, then handed read-only to every
 * renderer.
 */

import fs from "node:fs";
import path from "node:path";
import { loadBookConfig, type BookConfig, type BookOptions } from "./config.js";
import { FileNotFoundError } from "./errors.js";
import { escapeFor, type EscapeFormat } from "./escape.js";
import { selectCleaner } from "./cleaner/cleaner.js";
import { parseFile } from "./parser/parser.js";
import { builtinTemplate } from "./templates.js";
import type { ChapterNumber } from "./numbering/numbering.js";
import type { Tokens } from "./token/token.js";

export interface Chapter {
  readonly number: ChapterNumber;
  readonly tokens: Tokens;
  /** Absolute path of the manuscript file, when the chapter came from one. */
  readonly source?: string;
}

export interface Book extends Readonly<BookOptions> {
  /** Directory against which relative paths are resolved. */
  readonly root: string;
  readonly chapters: readonly Chapter[];
}

export type TemplateName = "epub_css" | "epub_template" | "html_css" | "html_template";

/**
 * Assemble a book from options and already parsed chapters. Relative
 * paths in the options are resolved against `root`.
 */
export function createBook(
  options: BookOptions,
  chapters: readonly Chapter[],
  root = process.cwd()
): Book {
  const resolve = (p: string | undefined) => (p === undefined ? undefined : path.resolve(root, p));
  const outputs: BookOptions["outputs"] = {};
  for (const [format, file] of Object.entries(options.outputs)) {
    if (isOutputKey(format) && file !== undefined) outputs[format] = path.resolve(root, file);
  }

  return {
    ...options,
    root: path.resolve(root),
    cover: resolve(options.cover),
    tempDir: path.resolve(root, options.tempDir),
    epubCss: resolve(options.epubCss),
    epubTemplate: resolve(options.epubTemplate),
    htmlTemplate: resolve(options.htmlTemplate),
    htmlCss: resolve(options.htmlCss),
    outputs,
    chapters,
  };
}

function isOutputKey(key: string): key is keyof BookOptions["outputs"] {
  return key === "epub" || key === "html" || key === "tex" || key === "pdf" || key === "odt";
}

/** Parse every chapter a configuration lists, in order. */
export function bookFromConfig(config: BookConfig): Book {
  const cleaner = selectCleaner(config.options);
  const chapters = config.chapters.map((entry): Chapter => {
    const source = path.resolve(config.root, entry.file);
    return { number: entry.number, tokens: parseFile(source, cleaner), source };
  });
  return createBook(config.options, chapters, config.root);
}

export function loadBook(configPath: string): Book {
  return bookFromConfig(loadBookConfig(configPath));
}

/**
 * The CSS or template text a renderer should use: the book's override when
 * one is configured, the bundled default otherwise. A configured override
 * that does not exist is an error rather than a silent fallback.
 */
export function getTemplate(book: Book, name: TemplateName): string {
  const override = overridePath(book, name);
  if (override === undefined) return builtinTemplate(defaultTemplate(book, name));
  try {
    return fs.readFileSync(override, "utf-8");
  } catch (err) {
    throw new FileNotFoundError(override, { cause: err });
  }
}

function overridePath(book: Book, name: TemplateName): string | undefined {
  switch (name) {
    case "epub_css":
      return book.epubCss;
    case "epub_template":
      return book.epubTemplate;
    case "html_css":
      return book.htmlCss;
    case "html_template":
      return book.htmlTemplate;
  }
}

function defaultTemplate(book: Book, name: TemplateName): string {
  switch (name) {
    case "epub_css":
      return "epub/stylesheet.css";
    case "epub_template":
      return book.epubVersion === 3 ? "epub3/chapter.xhtml.liquid" : "epub/chapter.xhtml.liquid";
    case "html_css":
      return "html/style.css";
    case "html_template":
      return "html/book.html.liquid";
  }
}

export type MetadataVariables = {
  author: string;
  title: string;
  lang: string;
  description: string;
  subject: string;
};

/** Book metadata escaped for the target format, ready for a template. */
export function metadataVariables(book: Book, format: EscapeFormat): MetadataVariables {
  const escape = escapeFor(format);
  return {
    author: escape(book.author),
    title: escape(book.title),
    lang: escape(book.lang),
    description: escape(book.description ?? ""),
    subject: escape(book.subject ?? ""),
  };
}

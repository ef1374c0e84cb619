/**
 * Book configuration loading.
 *
 * Two spellings of the same configuration are accepted:
 *
 *   - the line format (`*.book` or anything that is not YAML):
 *       author: Jane Doe
 *       output-epub: book.epub
 *       + chapter_1.md        numbered chapter
 *       - preface.md          unnumbered chapter
 *       ! interlude.md        chapter whose title is hidden
 *       5. chapter_5.md       chapter numbered 5, later chapters continue at 6
 *
 *   - YAML (`*.yaml` / `*.yml`) with the same options as keys and a
 *     `chapters` list of `{ file, number }`.
 *
 * Paths stay relative here; `loadBook` resolves them against `root`.
 */

import fs from "node:fs";
import path from "node:path";
import { TextDecoder } from "node:util";
import { load as loadYaml } from "js-yaml";
import { z } from "zod/v4";
import { ConfigError, FileNotFoundError, type OutputFormat } from "./errors.js";
import {
  Default,
  Hidden,
  Unnumbered,
  specified,
  DEFAULT_NUMBERING_TEMPLATE,
  type ChapterNumber,
} from "./numbering/numbering.js";

const optionsShape = {
  author: z.string().optional(),
  title: z.string().optional(),
  lang: z.string().min(1).optional(),
  description: z.string().optional(),
  subject: z.string().optional(),
  cover: z.string().optional(),
  numbering: z.boolean().optional(),
  autoclean: z.boolean().optional(),
  verbose: z.boolean().optional(),
  nb_char: z
    .string()
    .refine((s) => Array.from(s).length === 1, "nb_char must be a single character")
    .optional(),
  numbering_template: z.string().optional(),
  temp_dir: z.string().optional(),
  output_epub: z.string().optional(),
  output_html: z.string().optional(),
  output_tex: z.string().optional(),
  output_pdf: z.string().optional(),
  output_odt: z.string().optional(),
  tex_command: z.string().min(1).optional(),
  epub_css: z.string().optional(),
  epub_template: z.string().optional(),
  epub_version: z.union([z.literal(2), z.literal(3)]).optional(),
  html_template: z.string().optional(),
  html_css: z.string().optional(),
};

const optionsSchema = z.strictObject(optionsShape);

/** Chapter numbers are 32-bit signed integers. */
const MAX_CHAPTER_NUMBER = 2_147_483_647;

const yamlChapterSchema = z.object({
  file: z.string().min(1),
  number: z
    .union([z.enum(["default", "unnumbered", "hidden"]), z.int32()])
    .default("default"),
});

const yamlConfigSchema = z.strictObject({
  ...optionsShape,
  chapters: z.array(yamlChapterSchema).default([]),
});

type RawOptions = z.infer<typeof optionsSchema>;
type OptionName = keyof RawOptions;

export interface BookOptions {
  lang: string;
  author: string;
  title: string;
  description?: string;
  subject?: string;
  cover?: string;
  numbering: boolean;
  autoclean: boolean;
  nbChar: string;
  numberingTemplate: string;
  verbose: boolean;
  tempDir: string;
  texCommand: string;
  epubCss?: string;
  epubTemplate?: string;
  epubVersion: 2 | 3;
  htmlTemplate?: string;
  htmlCss?: string;
  outputs: Partial<Record<OutputFormat, string>>;
}

export const DEFAULT_OPTIONS: BookOptions = {
  lang: "en",
  author: "Anonymous",
  title: "Untitled",
  numbering: true,
  autoclean: true,
  nbChar: " ",
  numberingTemplate: DEFAULT_NUMBERING_TEMPLATE,
  verbose: false,
  tempDir: ".",
  texCommand: "pdflatex",
  epubVersion: 2,
  outputs: {},
};

export interface ChapterEntry {
  number: ChapterNumber;
  file: string;
}

export interface BookConfig {
  /** Directory that relative paths in the configuration are resolved against. */
  root: string;
  options: BookOptions;
  chapters: ChapterEntry[];
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

export function loadBookConfig(configPath: string): BookConfig {
  const resolved = path.resolve(configPath);
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(resolved);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new FileNotFoundError(resolved, { cause: err });
    }
    throw new ConfigError("could not read book file", { line: resolved, cause: err });
  }

  let source: string;
  try {
    source = utf8.decode(bytes);
  } catch (err) {
    throw new ConfigError("file contains invalid UTF-8, could not parse it", {
      line: resolved,
      cause: err,
    });
  }

  const root = path.dirname(resolved);
  const ext = path.extname(resolved).toLowerCase();
  if (ext === ".yaml" || ext === ".yml") return parseYamlConfig(source, root);
  return parseBookConfig(source, root);
}

// ---------------------------------------------------------------------------
// Line format
// ---------------------------------------------------------------------------

const BOOLEAN_OPTIONS = new Set<OptionName>(["numbering", "autoclean", "verbose"]);

export function parseBookConfig(source: string, root = "."): BookConfig {
  const raw: Record<string, unknown> = {};
  const chapters: ChapterEntry[] = [];

  for (const rawLine of source.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#")) continue;

    if (line.startsWith("-")) {
      chapters.push({ number: Unnumbered, file: chapterFile(line.slice(1), line) });
    } else if (line.startsWith("+")) {
      chapters.push({ number: Default, file: chapterFile(line.slice(1), line) });
    } else if (line.startsWith("!")) {
      chapters.push({ number: Hidden, file: chapterFile(line.slice(1), line) });
    } else if (/^\d/.test(line)) {
      const match = /^([^.:+]*)[.:+](.*)$/.exec(line);
      if (!match) {
        throw new ConfigError("ill-formatted line specifying chapter number", { line });
      }
      const number = Number(match[1]);
      if (!/^\d+$/.test(match[1]) || number > MAX_CHAPTER_NUMBER) {
        throw new ConfigError("error parsing integer", { line });
      }
      chapters.push({
        number: specified(number),
        file: chapterFile(match[2], line),
      });
    } else {
      const colon = line.indexOf(":");
      if (colon === -1) {
        throw new ConfigError("option setting must be of the form option: value", { line });
      }
      const name = line.slice(0, colon).trim().replace(/-/g, "_");
      const value = line.slice(colon + 1).trim();
      if (!isOptionName(name)) {
        throw new ConfigError("unrecognized option", { line });
      }
      raw[name] = coerceOption(name, value, line);
    }
  }

  const parsed = optionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(describeIssues(parsed.error));
  }
  return { root: path.resolve(root), options: toBookOptions(parsed.data), chapters };
}

function isOptionName(name: string): name is OptionName {
  return Object.prototype.hasOwnProperty.call(optionsShape, name);
}

function coerceOption(name: OptionName, value: string, line: string): unknown {
  if (BOOLEAN_OPTIONS.has(name)) {
    if (value === "true") return true;
    if (value === "false") return false;
    throw new ConfigError("could not parse bool", { line });
  }
  switch (name) {
    case "nb_char":
      return quotedChar(value, line);
    case "epub_version":
      if (value === "2") return 2;
      if (value === "3") return 3;
      throw new ConfigError("epub_version must either be 2 or 3", { line });
    default:
      return value;
  }
}

/** `'~'` → `~`. The quotes let the value be a space. */
function quotedChar(value: string, line: string): string {
  const parts = value.split("'");
  if (parts.length !== 3 || Array.from(parts[1]).length !== 1) {
    throw new ConfigError("could not parse char", { line });
  }
  return parts[1];
}

function chapterFile(rest: string, line: string): string {
  const words = rest.trim().split(/\s+/).filter((w) => w !== "");
  if (words.length > 1) {
    throw new ConfigError("chapter filenames must not contain whitespace", { line });
  }
  if (words.length === 0) {
    throw new ConfigError("no chapter name specified", { line });
  }
  return words[0];
}

// ---------------------------------------------------------------------------
// YAML format
// ---------------------------------------------------------------------------

export function parseYamlConfig(source: string, root = "."): BookConfig {
  let doc: unknown;
  try {
    doc = loadYaml(source);
  } catch (err) {
    throw new ConfigError("could not parse YAML book file", { cause: err });
  }
  const normalized = normalizeKeys(doc ?? {});
  const parsed = yamlConfigSchema.safeParse(normalized);
  if (!parsed.success) {
    throw new ConfigError(describeIssues(parsed.error));
  }

  const { chapters, ...options } = parsed.data;
  return {
    root: path.resolve(root),
    options: toBookOptions(options),
    chapters: chapters.map((c) => ({ file: c.file, number: yamlNumber(c.number) })),
  };
}

function normalizeKeys(doc: unknown): unknown {
  if (doc === null || typeof doc !== "object" || Array.isArray(doc)) return doc;
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(doc)) {
    out[key.replace(/-/g, "_")] = value;
  }
  return out;
}

function yamlNumber(value: "default" | "unnumbered" | "hidden" | number): ChapterNumber {
  switch (value) {
    case "default":
      return Default;
    case "unnumbered":
      return Unnumbered;
    case "hidden":
      return Hidden;
    default:
      return specified(value);
  }
}

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

function toBookOptions(raw: RawOptions): BookOptions {
  const outputs: Partial<Record<OutputFormat, string>> = {};
  if (raw.output_epub) outputs.epub = raw.output_epub;
  if (raw.output_html) outputs.html = raw.output_html;
  if (raw.output_tex) outputs.tex = raw.output_tex;
  if (raw.output_pdf) outputs.pdf = raw.output_pdf;
  if (raw.output_odt) outputs.odt = raw.output_odt;

  return {
    lang: raw.lang ?? DEFAULT_OPTIONS.lang,
    author: raw.author ?? DEFAULT_OPTIONS.author,
    title: raw.title ?? DEFAULT_OPTIONS.title,
    description: raw.description,
    subject: raw.subject,
    cover: raw.cover,
    numbering: raw.numbering ?? DEFAULT_OPTIONS.numbering,
    autoclean: raw.autoclean ?? DEFAULT_OPTIONS.autoclean,
    nbChar: raw.nb_char ?? DEFAULT_OPTIONS.nbChar,
    numberingTemplate: raw.numbering_template ?? DEFAULT_OPTIONS.numberingTemplate,
    verbose: raw.verbose ?? DEFAULT_OPTIONS.verbose,
    tempDir: raw.temp_dir ?? DEFAULT_OPTIONS.tempDir,
    texCommand: raw.tex_command ?? DEFAULT_OPTIONS.texCommand,
    epubCss: raw.epub_css,
    epubTemplate: raw.epub_template,
    epubVersion: raw.epub_version ?? DEFAULT_OPTIONS.epubVersion,
    htmlTemplate: raw.html_template,
    htmlCss: raw.html_css,
    outputs,
  };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

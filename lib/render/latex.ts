import { z } from "zod/v4";
import { metadataVariables, type Book } from "../book.js";
import { escapeTex, escapeTexUrl } from "../escape.js";
import { builtinTemplate, expandTemplate } from "../templates.js";
import {
  isBlock,
  plainText,
  type Alignment,
  type BlockToken,
  type InlineToken,
  type Token,
  type Tokens,
} from "../token/token.js";
import { isRemote, resolveLocal } from "./assets.js";
import { renderChapter, type ChapterParts, type ResolvedChapter } from "./chapter.js";
import type { RenderContext, Renderer, TextArtifact } from "./types.js";

const babelTableSchema = z.record(z.string(), z.string());
let babelTable: Record<string, string> | undefined;

/** Babel option for a language code; `fr-CA` falls back to `fr`, unknown to english. */
export function babelLanguage(lang: string): string {
  babelTable ??= babelTableSchema.parse(JSON.parse(builtinTemplate("latex/babel.json")));
  const code = lang.toLowerCase();
  return babelTable[code] ?? babelTable[code.split(/[-_]/)[0]] ?? "english";
}

const ENUM_COUNTERS = ["enumi", "enumii", "enumiii", "enumiv"];

class LatexWriter implements ChapterParts {
  private listDepth = 0;
  private readonly activeNotes = new Set<string>();

  constructor(
    private readonly chapter: ResolvedChapter,
    private readonly root: string
  ) {}

  header(text: string): string {
    const title = escapeTex(text);
    return `\\chapter*{${title}}\n\\addcontentsline{toc}{chapter}{${title}}\n\n`;
  }

  body(tokens: Tokens): string {
    return this.tokens(tokens);
  }

  private tokens(tokens: Tokens): string {
    let out = "";
    for (const token of tokens) {
      out += isBlock(token) ? this.block(token) : this.inline(token);
    }
    return out;
  }

  private children(token: Extract<Token, { children: Tokens }>): string {
    return this.tokens(token.children);
  }

  private block(token: BlockToken): string {
    switch (token.kind) {
      case "paragraph":
        return `${this.children(token)}\n\n`;
      case "heading":
        return `\\${sectionCommand(token.level)}*{${this.children(token)}}\n\n`;
      case "list":
        return this.list(token.ordered, token.start, token.children);
      case "item":
        return `\\item ${this.children(token).trim()}\n`;
      case "blockQuote":
        return `\\begin{quote}\n${this.children(token)}\\end{quote}\n\n`;
      case "codeBlock":
        return codeBlock(plainText(token.children));
      case "rule":
        return "\\begin{center}\n\\rule{0.5\\linewidth}{0.4pt}\n\\end{center}\n\n";
      case "table":
        return this.table(token.align, token.children);
      case "footnoteDefinition":
        return "";
      case "tableRow":
      case "tableCell":
        return this.children(token);
    }
  }

  private list(ordered: boolean, start: number, items: Tokens): string {
    const env = ordered ? "enumerate" : "itemize";
    let out = `\\begin{${env}}\n`;
    if (ordered) {
      const counter = ENUM_COUNTERS[Math.min(this.listDepth, ENUM_COUNTERS.length - 1)];
      this.listDepth += 1;
      if (start !== 1) out += `\\setcounter{${counter}}{${start - 1}}\n`;
      out += this.tokens(items);
      this.listDepth -= 1;
    } else {
      out += this.tokens(items);
    }
    return `${out}\\end{${env}}\n\n`;
  }

  private table(align: readonly Alignment[], rows: Tokens): string {
    const columns = Math.max(
      align.length,
      ...rows.map((row) => (row.kind === "tableRow" ? row.children.length : 0))
    );
    const colFormat = Array.from({ length: columns }, (_, i) => columnSpec(align[i] ?? null)).join("|");
    let out = `\\begin{center}\n\\begin{tabular}{|${colFormat}|}\n\\hline\n`;
    for (const row of rows) {
      if (row.kind !== "tableRow") continue;
      const cells = row.children.map((cell) => {
        const content = cell.kind === "tableCell" ? this.children(cell).trim() : "";
        return row.header ? `\\textbf{${content}}` : content;
      });
      out += `${cells.join(" & ")} \\\\\n\\hline\n`;
    }
    return `${out}\\end{tabular}\n\\end{center}\n\n`;
  }

  private inline(token: InlineToken): string {
    switch (token.kind) {
      case "text":
        return escapeTex(token.text);
      case "emphasis":
        return `\\emph{${this.children(token)}}`;
      case "strong":
        return `\\textbf{${this.children(token)}}`;
      case "strikethrough":
        return `\\sout{${this.children(token)}}`;
      case "code":
        return `\\texttt{${escapeTex(plainText(token.children))}}`;
      case "link":
        if (token.url.startsWith("#")) return this.children(token);
        return `\\href{${escapeTexUrl(token.url)}}{${this.children(token)}}`;
      case "image": {
        if (isRemote(token.url)) return escapeTex(plainText(token.children));
        return `\\includegraphics[width=\\linewidth]{${resolveLocal(this.root, token.url)}}`;
      }
      case "hardBreak":
        return "\\\\\n";
      case "footnoteReference":
        return this.footnote(token.id);
    }
  }

  private footnote(id: string): string {
    const note = this.chapter.notes.get(id);
    // missing notes are reported once the chapter is done; self-references are dropped
    if (note === undefined || this.activeNotes.has(id)) return "";
    this.activeNotes.add(id);
    const content = this.tokens(note).trim();
    this.activeNotes.delete(id);
    return `\\footnote{${content}}`;
  }
}

function sectionCommand(level: number): string {
  if (level <= 2) return "section";
  if (level === 3) return "subsection";
  if (level === 4) return "subsubsection";
  return "paragraph";
}

const VERBATIM_END = "\\end{verbatim}";

/**
 * Code goes in a verbatim environment, unless it contains the line that
 * would close it; then each line is escaped and set in a typewriter font.
 */
function codeBlock(code: string): string {
  if (!code.includes(VERBATIM_END)) {
    return `\\begin{verbatim}\n${code.endsWith("\n") ? code : `${code}\n`}${VERBATIM_END}\n\n`;
  }
  const lines = code
    .replace(/\n$/, "")
    .split("\n")
    .map((line) => (line === "" ? "\\mbox{}" : escapeTex(line).replace(/ /g, "~")));
  return `\\begin{flushleft}\n\\ttfamily\n${lines.join("\\\\\n")}\n\\end{flushleft}\n\n`;
}

function columnSpec(align: Alignment): string {
  switch (align) {
    case "center":
      return "c";
    case "right":
      return "r";
    default:
      return "l";
  }
}

/** LaTeX source for the whole book. */
export class LatexRenderer implements Renderer<TextArtifact> {
  readonly format = "tex";

  render(book: Book, chapters: readonly ResolvedChapter[], context: RenderContext = {}): TextArtifact {
    const content = chapters
      .map((chapter) => {
        context.onChapter?.(chapter.index, chapters.length);
        const writer = new LatexWriter(chapter, book.root);
        const rendered = renderChapter(chapter, this.format, writer);
        return chapter.header === null ? `\\clearpage\n${rendered}` : rendered;
      })
      .join("");

    return {
      kind: "text",
      content: expandTemplate(
        builtinTemplate("latex/book.tex.liquid"),
        { ...metadataVariables(book, "tex"), babel: babelLanguage(book.lang), content },
        { what: "the LaTeX template", format: this.format }
      ),
    };
  }
}

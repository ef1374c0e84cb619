/**
 * Token → (X)HTML body markup, shared by the HTML and EPUB renderers.
 *
 * Output is well-formed XML (void elements self-closed) so the same
 * markup serves an HTML page and an EPUB content document.
 */

import { escapeHtml } from "../escape.js";
import {
  isBlock,
  plainText,
  type Alignment,
  type BlockToken,
  type InlineToken,
  type Token,
  type Tokens,
} from "../token/token.js";
import type { ChapterParts, ResolvedChapter } from "./chapter.js";

export interface XhtmlOptions {
  /** Prefix for footnote anchors, unique per chapter within a document. */
  anchorPrefix: string;
  /** Maps an image URL to the `src` to emit. Defaults to the URL itself. */
  imageSource?: (url: string) => string;
}

export class XhtmlWriter implements ChapterParts {
  private readonly noteNumbers = new Map<string, number>();
  private readonly noteOrder: string[] = [];

  constructor(
    private readonly chapter: ResolvedChapter,
    private readonly options: XhtmlOptions
  ) {}

  header(text: string): string {
    return `<h1 class="chapter-title">${escapeHtml(text)}</h1>\n`;
  }

  /** Chapter body followed by its footnotes. */
  body(tokens: Tokens): string {
    const content = this.tokens(tokens);
    return content + this.notes();
  }

  private notes(): string {
    if (this.noteOrder.length === 0) return "";
    const { anchorPrefix: p } = this.options;
    const parts: string[] = [];
    // notes may reference further notes, which extend noteOrder
    for (let i = 0; i < this.noteOrder.length; i++) {
      const id = this.noteOrder[i];
      const n = i + 1;
      const content = this.tokens(this.chapter.notes.get(id) ?? []);
      parts.push(
        `<div class="note" id="${p}note-${n}">\n` +
          `<p class="note-number"><a href="#${p}ref-${n}">${n}</a></p>\n` +
          `${content}</div>\n`
      );
    }
    return `<div class="notes">\n${parts.join("")}</div>\n`;
  }

  tokens(tokens: Tokens): string {
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
        return `<p>${this.children(token)}</p>\n`;
      case "heading": {
        const level = Math.min(Math.max(token.level, 1), 6);
        return `<h${level}>${this.children(token)}</h${level}>\n`;
      }
      case "list": {
        if (!token.ordered) return `<ul>\n${this.children(token)}</ul>\n`;
        const start = token.start !== 1 ? ` start="${token.start}"` : "";
        return `<ol${start}>\n${this.children(token)}</ol>\n`;
      }
      case "item":
        return `<li>${this.children(token)}</li>\n`;
      case "blockQuote":
        return `<blockquote>\n${this.children(token)}</blockquote>\n`;
      case "codeBlock": {
        const cls = token.language ? ` class="language-${escapeHtml(token.language)}"` : "";
        return `<pre><code${cls}>${escapeHtml(plainText(token.children))}</code></pre>\n`;
      }
      case "rule":
        return "<hr />\n";
      case "table":
        return this.table(token.align, token.children);
      case "footnoteDefinition":
        // collected into the chapter's notes when the chapter was prepared
        return "";
      case "tableRow":
      case "tableCell":
        return this.children(token);
    }
  }

  private table(align: readonly Alignment[], rows: Tokens): string {
    const head: string[] = [];
    const body: string[] = [];
    for (const row of rows) {
      if (row.kind !== "tableRow") continue;
      const tag = row.header ? "th" : "td";
      const cells = row.children.map((cell, i) => {
        const a = align[i] ?? null;
        const style = a ? ` style="text-align: ${a}"` : "";
        const content = cell.kind === "tableCell" ? this.children(cell) : "";
        return `<${tag}${style}>${content}</${tag}>`;
      });
      (row.header ? head : body).push(`<tr>${cells.join("")}</tr>\n`);
    }
    let out = "<table>\n";
    if (head.length > 0) out += `<thead>\n${head.join("")}</thead>\n`;
    if (body.length > 0) out += `<tbody>\n${body.join("")}</tbody>\n`;
    return out + "</table>\n";
  }

  private inline(token: InlineToken): string {
    switch (token.kind) {
      case "text":
        return escapeHtml(token.text);
      case "emphasis":
        return `<em>${this.children(token)}</em>`;
      case "strong":
        return `<strong>${this.children(token)}</strong>`;
      case "strikethrough":
        return `<del>${this.children(token)}</del>`;
      case "code":
        return `<code>${escapeHtml(plainText(token.children))}</code>`;
      case "link": {
        const title = token.title ? ` title="${escapeHtml(token.title)}"` : "";
        return `<a href="${escapeHtml(token.url)}"${title}>${this.children(token)}</a>`;
      }
      case "image": {
        const src = this.options.imageSource ? this.options.imageSource(token.url) : token.url;
        const title = token.title ? ` title="${escapeHtml(token.title)}"` : "";
        return `<img src="${escapeHtml(src)}" alt="${escapeHtml(plainText(token.children))}"${title} />`;
      }
      case "hardBreak":
        return "<br />\n";
      case "footnoteReference":
        return this.noteReference(token.id);
    }
  }

  private noteReference(id: string): string {
    const { anchorPrefix: p } = this.options;
    const seen = this.noteNumbers.get(id);
    if (seen !== undefined) {
      // only the first reference is the back-link target
      return `<a href="#${p}note-${seen}" class="note-ref"><sup>${seen}</sup></a>`;
    }
    this.noteOrder.push(id);
    const n = this.noteOrder.length;
    this.noteNumbers.set(id, n);
    return `<a href="#${p}note-${n}" id="${p}ref-${n}" class="note-ref"><sup>${n}</sup></a>`;
  }
}

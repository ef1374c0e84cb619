/**
 * OpenDocument Text renderer.
 *
 * Content goes to content.xml using the paragraph and text styles that
 * styles.xml defines; local images are stored under Pictures/.
 */

import { metadataVariables, type Book } from "../book.js";
import { RenderError, errorMessage, type OutputFormat } from "../errors.js";
import { escapeHtml } from "../escape.js";
import { frameSize, getPngSize, type ImageSize } from "../images/image-size.js";
import { builtinTemplate, expandTemplate } from "../templates.js";
import {
  isBlock,
  plainText,
  type BlockToken,
  type InlineToken,
  type Token,
  type Tokens,
} from "../token/token.js";
import { AssetCollector, isRemote } from "./assets.js";
import { renderChapter, type ChapterParts, type ResolvedChapter } from "./chapter.js";
import { mimetypeEntry, textEntry } from "./container.js";
import type { ContainerArtifact, RenderContext, Renderer } from "./types.js";

export const ODT_MEDIA_TYPE = "application/vnd.oasis.opendocument.text";

/** Width of the text column images are scaled to fit. */
const COLUMN_WIDTH_CM = 16;

/** Counters that must stay unique across the whole document. */
interface DocumentCounters {
  notes: number;
  tables: number;
  frames: number;
}

/** Spaces and tabs survive ODF whitespace collapsing only as elements. */
export function preserveSpaces(escaped: string): string {
  return escaped
    .replace(/\t/g, "<text:tab/>")
    .replace(/ ( +)/g, (_, rest: string) => ` <text:s text:c="${rest.length}"/>`)
    .replace(/^ /, "<text:s/>");
}

class OdtWriter implements ChapterParts {
  private readonly paragraphStyles: string[] = ["Text_20_body"];
  private readonly activeNotes = new Set<string>();

  constructor(
    private readonly chapter: ResolvedChapter,
    private readonly images: AssetCollector,
    private readonly counters: DocumentCounters
  ) {}

  header(text: string): string {
    return `<text:h text:style-name="Heading_20_1" text:outline-level="1">${escapeHtml(text)}</text:h>\n`;
  }

  body(tokens: Tokens): string {
    const content = this.tokens(tokens);
    return this.chapter.header === null
      ? `<text:p text:style-name="Chapter_20_Break"/>\n${content}`
      : content;
  }

  private get paragraphStyle(): string {
    return this.paragraphStyles[this.paragraphStyles.length - 1];
  }

  private withStyle(style: string, render: () => string): string {
    this.paragraphStyles.push(style);
    try {
      return render();
    } finally {
      this.paragraphStyles.pop();
    }
  }

  /** Blocks as-is; runs of inline tokens wrapped in a paragraph. */
  private tokens(tokens: Tokens): string {
    let out = "";
    let run = "";
    for (const token of tokens) {
      if (isBlock(token)) {
        if (run !== "") {
          out += this.paragraph(run);
          run = "";
        }
        out += this.block(token);
      } else {
        run += this.inline(token);
      }
    }
    if (run !== "") out += this.paragraph(run);
    return out;
  }

  private inlines(tokens: Tokens): string {
    let out = "";
    for (const token of tokens) {
      out += isBlock(token) ? this.tokens([token]) : this.inline(token);
    }
    return out;
  }

  private children(token: Extract<Token, { children: Tokens }>): string {
    return this.inlines(token.children);
  }

  private paragraph(content: string): string {
    return `<text:p text:style-name="${this.paragraphStyle}">${content}</text:p>\n`;
  }

  private block(token: BlockToken): string {
    switch (token.kind) {
      case "paragraph":
        return this.paragraph(this.children(token));
      case "heading": {
        const level = Math.min(Math.max(token.level + 1, 2), 6);
        return `<text:h text:style-name="Heading_20_${level}" text:outline-level="${level}">${this.children(token)}</text:h>\n`;
      }
      case "list": {
        const style = token.ordered ? "Numbering_20_123" : "List_20_1";
        const items = token.children.map((item, i) => {
          const start = token.ordered && i === 0 && token.start !== 1 ? ` text:start-value="${token.start}"` : "";
          const content = item.kind === "item" ? this.withStyle("List_20_Contents", () => this.tokens(item.children)) : "";
          return `<text:list-item${start}>\n${content}</text:list-item>\n`;
        });
        return `<text:list text:style-name="${style}">\n${items.join("")}</text:list>\n`;
      }
      case "item":
        return `<text:list-item>\n${this.tokens(token.children)}</text:list-item>\n`;
      case "blockQuote":
        return this.withStyle("Quotations", () => this.tokens(token.children));
      case "codeBlock": {
        const code = plainText(token.children).replace(/\n$/, "");
        return code
          .split("\n")
          .map((line) => `<text:p text:style-name="Preformatted_20_Text">${preserveSpaces(escapeHtml(line))}</text:p>\n`)
          .join("");
      }
      case "rule":
        return `<text:p text:style-name="Horizontal_20_Line"/>\n`;
      case "table":
        return this.table(token.children);
      case "footnoteDefinition":
        return "";
      case "tableRow":
      case "tableCell":
        return this.tokens(token.children);
    }
  }

  private table(rows: Tokens): string {
    this.counters.tables += 1;
    const columns = Math.max(0, ...rows.map((row) => (row.kind === "tableRow" ? row.children.length : 0)));
    const header: string[] = [];
    const body: string[] = [];
    for (const row of rows) {
      if (row.kind !== "tableRow") continue;
      const style = row.header ? "Table_20_Heading" : "Table_20_Contents";
      const cells = row.children.map(
        (cell) =>
          `<table:table-cell office:value-type="string"><text:p text:style-name="${style}">${
            cell.kind === "tableCell" ? this.children(cell) : ""
          }</text:p></table:table-cell>`
      );
      (row.header ? header : body).push(`<table:table-row>${cells.join("")}</table:table-row>\n`);
    }
    let out = `<table:table table:name="Table${this.counters.tables}">\n`;
    out += `<table:table-column table:number-columns-repeated="${columns}"/>\n`;
    if (header.length > 0) out += `<table:table-header-rows>\n${header.join("")}</table:table-header-rows>\n`;
    return `${out}${body.join("")}</table:table>\n`;
  }

  private inline(token: InlineToken): string {
    switch (token.kind) {
      case "text":
        return escapeHtml(token.text);
      case "emphasis":
        return `<text:span text:style-name="Emphasis">${this.children(token)}</text:span>`;
      case "strong":
        return `<text:span text:style-name="Strong_20_Emphasis">${this.children(token)}</text:span>`;
      case "strikethrough":
        return `<text:span text:style-name="Strikethrough">${this.children(token)}</text:span>`;
      case "code":
        return `<text:span text:style-name="Source_20_Text">${preserveSpaces(escapeHtml(plainText(token.children)))}</text:span>`;
      case "link":
        return `<text:a xlink:type="simple" xlink:href="${escapeHtml(token.url)}">${this.children(token)}</text:a>`;
      case "image":
        return this.image(token.url, plainText(token.children));
      case "hardBreak":
        return "<text:line-break/>";
      case "footnoteReference":
        return this.footnote(token.id);
    }
  }

  private image(url: string, alt: string): string {
    if (isRemote(url)) return escapeHtml(alt);
    const asset = this.images.add(url, this.chapter.index);
    const size = frameSize(asset.mediaType === "image/png" ? this.pngSize(url, asset.data) : null, COLUMN_WIDTH_CM);
    this.counters.frames += 1;
    return (
      `<draw:frame draw:name="Image${this.counters.frames}" text:anchor-type="as-char" ` +
      `svg:width="${size.width}cm" svg:height="${size.height}cm" draw:z-index="0">` +
      `<draw:image xlink:href="${asset.path}" xlink:type="simple" xlink:show="embed" xlink:actuate="onLoad"/>` +
      `<svg:title>${escapeHtml(alt)}</svg:title>` +
      `</draw:frame>`
    );
  }

  private pngSize(url: string, data: Buffer): ImageSize | null {
    try {
      return getPngSize(data);
    } catch (err) {
      throw new RenderError(`Could not read the PNG image ${url}: ${errorMessage(err)}`, {
        format: "odt",
        chapter: this.chapter.index,
        cause: err,
      });
    }
  }

  private footnote(id: string): string {
    const note = this.chapter.notes.get(id);
    // missing notes are reported once the chapter is done; self-references are dropped
    if (note === undefined || this.activeNotes.has(id)) return "";
    this.activeNotes.add(id);
    this.counters.notes += 1;
    const n = this.counters.notes;
    const content = this.withStyle("Footnote", () => this.tokens(note));
    this.activeNotes.delete(id);
    return (
      `<text:note text:id="ftn${n}" text:note-class="footnote">` +
      `<text:note-citation>${n}</text:note-citation>` +
      `<text:note-body>${content}</text:note-body>` +
      `</text:note>`
    );
  }
}

export class OdtRenderer implements Renderer<ContainerArtifact> {
  readonly format = "odt";

  render(book: Book, chapters: readonly ResolvedChapter[], context: RenderContext = {}): ContainerArtifact {
    const images = new AssetCollector(book.root, "Pictures", this.format);
    const counters: DocumentCounters = { notes: 0, tables: 0, frames: 0 };
    const meta = metadataVariables(book, "html");
    const what = (name: string): { what: string; format: OutputFormat } => ({ what: `the ODT ${name}`, format: this.format });

    const content = chapters
      .map((chapter) => {
        context.onChapter?.(chapter.index, chapters.length);
        return renderChapter(chapter, this.format, new OdtWriter(chapter, images, counters));
      })
      .join("");

    const pictures = images.assets().map((asset) => ({ path: asset.path, media_type: asset.mediaType }));

    return {
      kind: "container",
      entries: [
        mimetypeEntry(ODT_MEDIA_TYPE),
        textEntry(
          "META-INF/manifest.xml",
          expandTemplate(builtinTemplate("odt/manifest.xml.liquid"), { images: pictures }, what("manifest"))
        ),
        textEntry(
          "content.xml",
          expandTemplate(builtinTemplate("odt/content.xml.liquid"), { ...meta, content }, what("content"))
        ),
        textEntry("styles.xml", builtinTemplate("odt/styles.xml")),
        textEntry(
          "meta.xml",
          expandTemplate(builtinTemplate("odt/meta.xml.liquid"), meta, what("metadata"))
        ),
        ...images.entries(),
      ],
    };
  }
}

import { getTemplate, metadataVariables, type Book } from "../book.js";
import { escapeHtml } from "../escape.js";
import { expandTemplate } from "../templates.js";
import { renderChapter, tocLabel, type ResolvedChapter } from "./chapter.js";
import type { RenderContext, Renderer, TextArtifact } from "./types.js";
import { XhtmlWriter } from "./xhtml.js";

/** One standalone HTML page with the stylesheet inlined. */
export class HtmlRenderer implements Renderer<TextArtifact> {
  readonly format = "html";

  render(book: Book, chapters: readonly ResolvedChapter[], context: RenderContext = {}): TextArtifact {
    const sections = chapters.map((chapter) => {
      context.onChapter?.(chapter.index, chapters.length);
      const n = chapter.index + 1;
      const writer = new XhtmlWriter(chapter, { anchorPrefix: `c${n}-` });
      const content = renderChapter(chapter, this.format, writer);
      return `<section class="chapter" id="chapter-${n}">\n${content}</section>\n`;
    });

    const content = expandTemplate(
      getTemplate(book, "html_template"),
      {
        ...metadataVariables(book, "html"),
        style: getTemplate(book, "html_css"),
        toc: tableOfContents(chapters),
        content: sections.join(""),
      },
      { what: "the HTML template", format: this.format }
    );
    return { kind: "text", content };
  }
}

function tableOfContents(chapters: readonly ResolvedChapter[]): string {
  const items = chapters
    .filter((chapter) => chapter.display.showTitle)
    .map(
      (chapter) =>
        `<li><a href="#chapter-${chapter.index + 1}">${escapeHtml(tocLabel(chapter))}</a></li>\n`
    );
  return `<ul>\n${items.join("")}</ul>`;
}

/**
 * EPUB 2 / EPUB 3 renderer.
 *
 * Entry order: mimetype (stored), META-INF/container.xml, OEBPS/content.opf,
 * OEBPS/toc.ncx, OEBPS/nav.xhtml (EPUB 3), OEBPS/stylesheet.css, the cover
 * page and image when a cover is set, one OEBPS/chapter_NNN.xhtml per
 * chapter, then every local image under OEBPS/images/.
 */

import { createHash } from "node:crypto";
import path from "node:path";
import { getTemplate, metadataVariables, type Book } from "../book.js";
import type { OutputFormat } from "../errors.js";
import { escapeHtml } from "../escape.js";
import { builtinTemplate, expandTemplate } from "../templates.js";
import { AssetCollector, isRemote, mediaType, readAsset } from "./assets.js";
import { renderChapter, tocLabel, type ResolvedChapter } from "./chapter.js";
import { mimetypeEntry, textEntry } from "./container.js";
import type { ContainerArtifact, ContainerEntry, RenderContext, Renderer } from "./types.js";
import { XhtmlWriter } from "./xhtml.js";

export const EPUB_MEDIA_TYPE = "application/epub+zip";

export function chapterFileName(index: number): string {
  return `chapter_${String(index + 1).padStart(3, "0")}.xhtml`;
}

/** Stable `urn:uuid:` for a book, derived from its title, author and language. */
export function bookIdentifier(book: Book): string {
  const hex = createHash("sha1")
    .update(`${book.title}\u0000${book.author}\u0000${book.lang}`)
    .digest("hex");
  return `urn:uuid:${hex.slice(0, 8)}-${hex.slice(8, 12)}-5${hex.slice(13, 16)}-a${hex.slice(17, 20)}-${hex.slice(20, 32)}`;
}

export interface EpubRendererOptions {
  /** Clock for `dcterms:modified` (EPUB 3). */
  now?: () => Date;
}

export class EpubRenderer implements Renderer<ContainerArtifact> {
  readonly format = "epub";

  constructor(private readonly options: EpubRendererOptions = {}) {}

  render(book: Book, chapters: readonly ResolvedChapter[], context: RenderContext = {}): ContainerArtifact {
    const v3 = book.epubVersion === 3;
    const dir = v3 ? "epub3" : "epub";
    const what = (name: string): { what: string; format: OutputFormat } => ({ what: `the EPUB ${name}`, format: this.format });
    const meta = metadataVariables(book, "html");
    const identifier = bookIdentifier(book);
    const images = new AssetCollector(book.root, "images", this.format);

    // Stylesheet and chapter template first: a missing override fails early.
    const stylesheet = getTemplate(book, "epub_css");
    const chapterTemplate = getTemplate(book, "epub_template");

    const chapterEntries: ContainerEntry[] = chapters.map((chapter) => {
      context.onChapter?.(chapter.index, chapters.length);
      const writer = new XhtmlWriter(chapter, {
        anchorPrefix: `c${chapter.index + 1}-`,
        imageSource: (url) => (isRemote(url) ? url : images.add(url, chapter.index).path),
      });
      const content = renderChapter(chapter, this.format, writer);
      const xhtml = expandTemplate(
        chapterTemplate,
        { ...meta, chapter_title: escapeHtml(tocLabel(chapter)), content },
        { ...what("chapter template"), chapter: chapter.index }
      );
      return textEntry(`OEBPS/${chapterFileName(chapter.index)}`, xhtml);
    });

    const cover = book.cover === undefined ? null : this.cover(book.cover);

    const chapterItems = chapters.map((chapter) => ({
      id: `chapter_${String(chapter.index + 1).padStart(3, "0")}`,
      href: chapterFileName(chapter.index),
    }));
    const toc = chapters
      .filter((chapter) => chapter.display.showTitle)
      .map((chapter) => ({ label: escapeHtml(tocLabel(chapter)), href: chapterFileName(chapter.index) }));
    const imageItems = images.assets().map((asset) => ({
      id: asset.id,
      href: asset.path,
      media_type: asset.mediaType,
    }));

    const variables = {
      ...meta,
      identifier,
      modified: formatModified(this.options.now ? this.options.now() : new Date()),
      cover: cover && { id: "cover-image", href: cover.href, media_type: cover.mediaType },
      chapters: chapterItems,
      images: imageItems,
      toc,
    };

    const entries: ContainerEntry[] = [
      mimetypeEntry(EPUB_MEDIA_TYPE),
      textEntry("META-INF/container.xml", builtinTemplate("epub/container.xml")),
      textEntry(
        "OEBPS/content.opf",
        expandTemplate(builtinTemplate(`${dir}/content.opf.liquid`), variables, what("package document"))
      ),
      textEntry(
        "OEBPS/toc.ncx",
        expandTemplate(builtinTemplate("epub/toc.ncx.liquid"), variables, what("NCX table of contents"))
      ),
    ];
    if (v3) {
      entries.push(
        textEntry(
          "OEBPS/nav.xhtml",
          expandTemplate(builtinTemplate("epub3/nav.xhtml.liquid"), variables, what("navigation document"))
        )
      );
    }
    entries.push(textEntry("OEBPS/stylesheet.css", stylesheet));
    if (cover) {
      entries.push(
        textEntry(
          "OEBPS/cover.xhtml",
          expandTemplate(
            builtinTemplate(`${dir}/cover.xhtml.liquid`),
            { ...meta, cover_href: cover.href },
            what("cover page")
          )
        ),
        { path: `OEBPS/${cover.href}`, data: cover.data }
      );
    }
    entries.push(...chapterEntries, ...images.entries("OEBPS/"));
    return { kind: "container", entries };
  }

  private cover(file: string): { href: string; mediaType: string; data: Buffer } {
    return {
      href: `images/cover${path.extname(file).toLowerCase()}`,
      mediaType: mediaType(file),
      data: readAsset(file, this.format),
    };
  }
}

/** `2024-05-01T12:00:00Z`, the form `dcterms:modified` requires. */
export function formatModified(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

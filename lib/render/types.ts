/**
 * Renderer contracts.
 *
 * A renderer turns a book plus its resolved chapters into an artifact.
 * Text formats (HTML, LaTeX) produce one string; container formats (EPUB,
 * ODT) produce an ordered list of archive entries that `packContainer`
 * zips. Renderers never touch the output path: writing is the runner's job.
 */

import type { Book } from "../book.js";
import type { OutputFormat } from "../errors.js";
import type { ResolvedChapter } from "./chapter.js";

export interface TextArtifact {
  kind: "text";
  content: string;
}

export interface ContainerEntry {
  /** Path inside the archive, `/`-separated. */
  path: string;
  data: Buffer;
  /** Store without compression (EPUB/ODT `mimetype`). */
  stored?: boolean;
}

export interface ContainerArtifact {
  kind: "container";
  entries: ContainerEntry[];
}

export type Artifact = TextArtifact | ContainerArtifact;

export interface RenderContext {
  /** Called as each chapter starts rendering. */
  onChapter?(index: number, total: number): void;
}

export interface Renderer<A extends Artifact = Artifact> {
  readonly format: OutputFormat;
  render(book: Book, chapters: readonly ResolvedChapter[], context?: RenderContext): A;
}

/**
 * Render Runner
 *
 * Renders every requested output format of a book:
 * 1. Chapters are prepared once and shared by every format
 * 2. Each format runs as its own stream; a failure is caught and reported
 *    for that format only
 * 3. Artifacts are written atomically to their configured paths
 */

import {
  Observable,
  catchError,
  defer,
  from,
  lastValueFrom,
  map,
  mergeMap,
  of,
  shareReplay,
  toArray,
} from "rxjs";
import type { Book } from "../book.js";
import { BookError, RenderError, errorMessage, type OutputFormat } from "../errors.js";
import { prepareChapters, type ResolvedChapter } from "../render/chapter.js";
import { packContainer } from "../render/container.js";
import { EpubRenderer } from "../render/epub.js";
import { HtmlRenderer } from "../render/html.js";
import { LatexRenderer } from "../render/latex.js";
import { OdtRenderer } from "../render/odt.js";
import { renderPdf, type CommandRunner } from "../render/pdf.js";
import type { RenderContext } from "../render/types.js";
import { writeFileAtomic } from "./output.js";
import { nullProgress, type Progress } from "./types.js";

/** Order in which formats are attempted and reported. */
export const OUTPUT_FORMATS: readonly OutputFormat[] = ["epub", "html", "tex", "pdf", "odt"];

export interface RenderJob {
  format: OutputFormat;
  path: string;
}

export type RenderOutcome =
  | { format: OutputFormat; path: string; ok: true }
  | { format: OutputFormat; path: string; ok: false; error: BookError };

export interface RenderReport {
  outcomes: RenderOutcome[];
  /** False when any requested format failed. */
  succeeded: boolean;
}

export interface RenderOptions {
  progress?: Progress;
  /** Restrict the run to these formats; others configured are skipped. */
  formats?: readonly OutputFormat[];
  /** Runs the LaTeX command for PDF output. */
  runCommand?: CommandRunner;
  /** Formats rendered at once. */
  concurrency?: number;
}

/** Configured outputs, in `OUTPUT_FORMATS` order, filtered by `formats`. */
export function requestedJobs(book: Book, formats?: readonly OutputFormat[]): RenderJob[] {
  const jobs: RenderJob[] = [];
  for (const format of OUTPUT_FORMATS) {
    const path = book.outputs[format];
    if (path === undefined) continue;
    if (formats && !formats.includes(format)) continue;
    jobs.push({ format, path });
  }
  return jobs;
}

/** Render one format to bytes (or text) without writing anything. */
export function renderFormat(
  book: Book,
  format: OutputFormat,
  chapters: readonly ResolvedChapter[],
  options: { runCommand?: CommandRunner; context?: RenderContext } = {}
): string | Buffer {
  switch (format) {
    case "html":
      return new HtmlRenderer().render(book, chapters, options.context).content;
    case "tex":
      return new LatexRenderer().render(book, chapters, options.context).content;
    case "epub":
      return packContainer(new EpubRenderer().render(book, chapters, options.context).entries);
    case "odt":
      return packContainer(new OdtRenderer().render(book, chapters, options.context).entries);
    case "pdf":
      return renderPdf(book, chapters, { run: options.runCommand, context: options.context });
  }
}

/**
 * Render every requested format. Never rejects because of a single
 * format: each failure is reported in the returned outcomes.
 */
export async function renderBook(book: Book, options: RenderOptions = {}): Promise<RenderReport> {
  const progress = options.progress ?? nullProgress;
  const jobs = requestedJobs(book, options.formats);

  if (jobs.length === 0) {
    progress.emit({
      type: "warning",
      message:
        "Generated no file because no output file was specified. " +
        "Add output-epub, output-html, output-tex, output-pdf or output-odt to the book file.",
    });
    return { outcomes: [], succeeded: true };
  }

  const chapters$ = defer(() => of(prepareChapters(book))).pipe(
    shareReplay({ bufferSize: 1, refCount: false })
  );

  const outcomes = await lastValueFrom(
    from(jobs).pipe(
      mergeMap((job) => runJob(book, job, chapters$, progress, options), options.concurrency ?? 2),
      toArray()
    )
  );

  // streams finish in any order; report in configuration order
  const order = (o: RenderOutcome) => OUTPUT_FORMATS.indexOf(o.format);
  outcomes.sort((a, b) => order(a) - order(b));
  return { outcomes, succeeded: outcomes.every((o) => o.ok) };
}

function runJob(
  book: Book,
  job: RenderJob,
  chapters$: Observable<ResolvedChapter[]>,
  progress: Progress,
  options: RenderOptions
): Observable<RenderOutcome> {
  const context: RenderContext = {
    onChapter: (index, total) =>
      progress.emit({
        type: "render-progress",
        format: job.format,
        message: "Rendering chapter",
        chapter: index + 1,
        totalChapters: total,
      }),
  };

  return defer(() => {
    progress.emit({ type: "render-start", format: job.format, path: job.path });
    return chapters$;
  }).pipe(
    map((chapters) => renderFormat(book, job.format, chapters, { runCommand: options.runCommand, context })),
    map((data): RenderOutcome => {
      writeFileAtomic(job.path, data);
      progress.emit({ type: "render-complete", format: job.format, path: job.path });
      return { format: job.format, path: job.path, ok: true };
    }),
    catchError((err: unknown) => {
      const error = asBookError(err, job.format);
      progress.emit({ type: "render-error", format: job.format, error: error.message });
      return of<RenderOutcome>({ format: job.format, path: job.path, ok: false, error });
    })
  );
}

function asBookError(err: unknown, format: OutputFormat): BookError {
  if (err instanceof BookError) return err;
  return new RenderError(`Error rendering ${format}: ${errorMessage(err)}`, { format, cause: err });
}

/**
 * Chapter preparation shared by every renderer.
 *
 * `prepareChapters` does the format-independent work once per book:
 * numbering, title extraction, header expansion and footnote collection.
 * Renderers then walk each chapter through `ChapterState`.
 */

import type { Book } from "../book.js";
import { RenderError, type OutputFormat } from "../errors.js";
import {
  chapterHeader,
  resolveNumbering,
  type ChapterDisplay,
  type ChapterNumber,
} from "../numbering/numbering.js";
import { hasChildren, plainText, walkTokens, type Token, type Tokens } from "../token/token.js";

export interface ResolvedChapter {
  /** Zero-based position in the book. */
  readonly index: number;
  readonly number: ChapterNumber;
  readonly display: ChapterDisplay;
  /** Plain text of the chapter's first top-level `#` heading, or "". */
  readonly title: string;
  /** Unescaped header line, or null when nothing is shown. */
  readonly header: string | null;
  /** Chapter content without its title heading and footnote definitions. */
  readonly body: Tokens;
  readonly notes: ReadonlyMap<string, Tokens>;
  readonly source?: string;
}

export function prepareChapters(book: Book): ResolvedChapter[] {
  const displays = resolveNumbering(
    book.chapters.map((c) => c.number),
    book.numbering
  );

  return book.chapters.map((chapter, index): ResolvedChapter => {
    const display = displays[index];
    const { title, rest } = extractTitle(chapter.tokens);
    const notes = new Map<string, Tokens>();
    const body = collectNotes(rest, notes);

    let header: string | null = null;
    if (display.showTitle) {
      if (display.displayNumber !== null) {
        header = chapterHeader(book.numberingTemplate, display.displayNumber, title, {
          chapter: index,
        }).trim();
      } else if (title !== "") {
        header = title;
      }
    }

    return {
      index,
      number: chapter.number,
      display,
      title,
      header,
      body,
      notes,
      source: chapter.source,
    };
  });
}

function extractTitle(tokens: Tokens): { title: string; rest: Tokens } {
  const at = tokens.findIndex((t) => t.kind === "heading" && t.level === 1);
  if (at === -1) return { title: "", rest: tokens };
  return {
    title: plainText([tokens[at]]).trim(),
    rest: [...tokens.slice(0, at), ...tokens.slice(at + 1)],
  };
}

/**
 * Move every footnote definition, at any depth, into `notes` and return the
 * tokens without them. The first definition of an id wins.
 */
function collectNotes(tokens: Tokens, notes: Map<string, Tokens>): Token[] {
  const kept: Token[] = [];
  for (const token of tokens) {
    if (token.kind === "footnoteDefinition") {
      const first = !notes.has(token.id);
      // reserve the id so a definition nested inside this one cannot take it
      if (first) notes.set(token.id, []);
      const children = collectNotes(token.children, notes);
      if (first) notes.set(token.id, children);
    } else if (hasChildren(token)) {
      kept.push({ ...token, children: collectNotes(token.children, notes) });
    } else {
      kept.push(token);
    }
  }
  return kept;
}

/** Label for tables of contents: the header, else the title, else a fallback. */
export function tocLabel(chapter: ResolvedChapter): string {
  if (chapter.header !== null) return chapter.header;
  if (chapter.title !== "") return chapter.title;
  return `Chapter ${chapter.index + 1}`;
}

// ---------------------------------------------------------------------------
// Per-chapter state machine
// ---------------------------------------------------------------------------

export type ChapterPhase = "not-started" | "rendering-header" | "rendering-body" | "done";

const TRANSITIONS: Record<ChapterPhase, readonly ChapterPhase[]> = {
  "not-started": ["rendering-header", "rendering-body"],
  "rendering-header": ["rendering-body"],
  "rendering-body": ["done"],
  done: [],
};

export class ChapterState {
  private current: ChapterPhase = "not-started";

  constructor(
    private readonly format: OutputFormat,
    private readonly chapter: number
  ) {}

  get phase(): ChapterPhase {
    return this.current;
  }

  advance(next: ChapterPhase): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new RenderError(`Invalid chapter state transition: ${this.current} → ${next}`, {
        format: this.format,
        chapter: this.chapter,
      });
    }
    this.current = next;
  }
}

/** Footnote ids referenced in the chapter (notes included) with no definition. */
export function unresolvedFootnotes(chapter: ResolvedChapter): string[] {
  const missing = new Set<string>();
  const check = (token: Token) => {
    if (token.kind === "footnoteReference" && !chapter.notes.has(token.id)) {
      missing.add(token.id);
    }
  };
  walkTokens(chapter.body, check);
  for (const note of chapter.notes.values()) walkTokens(note, check);
  return [...missing];
}

export interface ChapterParts {
  /** Render the already-unescaped header line. */
  header(text: string): string;
  body(tokens: Tokens): string;
}

/**
 * Walk one chapter through header and body. The header phase is skipped
 * when the chapter shows no header; reaching `done` requires every
 * footnote reference to be resolved.
 */
export function renderChapter(
  chapter: ResolvedChapter,
  format: OutputFormat,
  parts: ChapterParts
): string {
  const state = new ChapterState(format, chapter.index);
  let out = "";

  if (chapter.header !== null) {
    state.advance("rendering-header");
    out += parts.header(chapter.header);
  }

  state.advance("rendering-body");
  out += parts.body(chapter.body);

  const missing = unresolvedFootnotes(chapter);
  if (missing.length > 0) {
    throw new RenderError(`Footnote reference without definition: ${missing.join(", ")}`, {
      format,
      chapter: chapter.index,
    });
  }
  state.advance("done");
  return out;
}

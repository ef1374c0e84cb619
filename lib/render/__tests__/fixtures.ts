import os from "node:os";
import { createBook, type Book, type Chapter } from "../../book.js";
import { DEFAULT_OPTIONS, type BookOptions } from "../../config.js";
import { Default, type ChapterNumber } from "../../numbering/numbering.js";
import { parse } from "../../parser/parser.js";

export function chapter(markup: string, number: ChapterNumber = Default): Chapter {
  return { number, tokens: parse(markup) };
}

export function makeBook(
  chapters: readonly Chapter[],
  options: Partial<BookOptions> = {},
  root = os.tmpdir()
): Book {
  return createBook({ ...DEFAULT_OPTIONS, ...options }, chapters, root);
}

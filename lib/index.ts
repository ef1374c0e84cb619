export { loadBook, bookFromConfig, createBook, getTemplate, metadataVariables } from "./book.js";
export type { Book, Chapter, TemplateName } from "./book.js";
export { loadBookConfig, parseBookConfig, parseYamlConfig, DEFAULT_OPTIONS } from "./config.js";
export type { BookConfig, BookOptions, ChapterEntry } from "./config.js";
export {
  BookError,
  ConfigError,
  FileNotFoundError,
  ParseError,
  RenderError,
  type OutputFormat,
} from "./errors.js";
export { clean, selectCleaner, noCleaner, type Cleaner } from "./cleaner/cleaner.js";
export { parse, parseFile } from "./parser/parser.js";
export {
  Default,
  Hidden,
  Unnumbered,
  specified,
  resolveNumbering,
  chapterHeader,
  type ChapterNumber,
  type ChapterDisplay,
} from "./numbering/numbering.js";
export type { Token, Tokens } from "./token/token.js";
export { prepareChapters, type ResolvedChapter } from "./render/chapter.js";
export { HtmlRenderer } from "./render/html.js";
export { EpubRenderer } from "./render/epub.js";
export { LatexRenderer } from "./render/latex.js";
export { OdtRenderer } from "./render/odt.js";
export { renderPdf, type CommandRunner } from "./render/pdf.js";
export { packContainer } from "./render/container.js";
export type { Artifact, ContainerArtifact, TextArtifact, Renderer } from "./render/types.js";
export { renderBook, renderFormat, type RenderReport, type RenderOutcome } from "./runner/render-runner.js";
export { createConsoleProgress, createCallbackProgress, nullProgress, type Progress } from "./runner/types.js";

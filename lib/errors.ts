/**
 * Error taxonomy shared by the loader, the parser and the renderers.
 *
 * Every failure carries enough context (file, format, chapter) for the
 * caller to say which part of the book is at fault.
 */

export type OutputFormat = "epub" | "html" | "tex" | "pdf" | "odt";

export class BookError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A chapter, override resource or configuration file does not exist. */
export class FileNotFoundError extends BookError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`File not found: ${path}`, options);
    this.path = path;
  }
}

/** Unreadable or badly encoded chapter source. */
export class ParseError extends BookError {
  readonly file?: string;

  constructor(message: string, options?: { file?: string; cause?: unknown }) {
    super(options?.file ? `${message} (${options.file})` : message, options);
    this.file = options?.file;
  }
}

export class RenderError extends BookError {
  readonly format?: OutputFormat;
  /** Zero-based index of the chapter being rendered, when known. */
  readonly chapter?: number;

  constructor(
    message: string,
    options?: { format?: OutputFormat; chapter?: number; cause?: unknown }
  ) {
    super(message, options);
    this.format = options?.format;
    this.chapter = options?.chapter;
  }
}

export class ConfigError extends BookError {
  readonly line?: string;

  constructor(message: string, options?: { line?: string; cause?: unknown }) {
    super(options?.line !== undefined ? `${message}: ${options.line}` : message, options);
    this.line = options?.line;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

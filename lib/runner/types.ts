/**
 * Runner layer types.
 *
 * The runner reports what it does through a Progress emitter so the same
 * run can log to the console, feed a test, or stay silent.
 */

import type { OutputFormat } from "../errors.js";

export type ProgressEvent =
  | { type: "render-start"; format: OutputFormat; path: string }
  | { type: "render-progress"; format: OutputFormat; message: string; chapter?: number; totalChapters?: number }
  | { type: "render-complete"; format: OutputFormat; path: string }
  | { type: "render-error"; format: OutputFormat; error: string }
  | { type: "warning"; message: string };

/**
 * Progress emitter interface.
 *
 * Implementations can log to console, collect events, etc.
 */
export interface Progress {
  emit(event: ProgressEvent): void;
}

/**
 * No-op progress emitter for when progress tracking isn't needed.
 */
export const nullProgress: Progress = {
  emit: () => {},
};

/**
 * Console-based progress emitter for CLI usage. Per-chapter lines are
 * only printed when `verbose` is set.
 */
export function createConsoleProgress(options: { verbose?: boolean } = {}): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "render-start":
          if (options.verbose) console.log(`Attempting to generate ${formatName(event.format)}...`);
          break;
        case "render-progress":
          if (!options.verbose) break;
          if (event.chapter !== undefined && event.totalChapters !== undefined) {
            console.log(`${formatName(event.format)}: ${event.message} (${event.chapter}/${event.totalChapters})`);
          } else {
            console.log(`${formatName(event.format)}: ${event.message}`);
          }
          break;
        case "render-complete":
          console.log(`Successfully generated ${formatName(event.format)}: ${event.path}`);
          break;
        case "render-error":
          console.error(`Error generating ${formatName(event.format)}: ${event.error}`);
          break;
        case "warning":
          console.warn(`Warning: ${event.message}`);
          break;
      }
    },
  };
}

/**
 * Callback-based progress emitter: one human-readable line per event.
 */
export function createCallbackProgress(callback: (message: string) => void): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "render-start":
          callback(`Starting ${formatName(event.format)}`);
          break;
        case "render-progress":
          if (event.chapter !== undefined && event.totalChapters !== undefined) {
            callback(`${event.message} (${event.chapter}/${event.totalChapters})`);
          } else {
            callback(event.message);
          }
          break;
        case "render-complete":
          callback(`Completed ${formatName(event.format)}`);
          break;
        case "render-error":
          callback(`Error: ${event.error}`);
          break;
        case "warning":
          callback(`Warning: ${event.message}`);
          break;
      }
    },
  };
}

export function formatName(format: OutputFormat): string {
  switch (format) {
    case "epub":
      return "EPUB";
    case "html":
      return "HTML";
    case "tex":
      return "LaTeX";
    case "pdf":
      return "PDF";
    case "odt":
      return "ODT";
  }
}

import { spawnSync } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import type { Book } from "../book.js";
import { RenderError } from "../errors.js";
import type { ResolvedChapter } from "./chapter.js";
import { LatexRenderer } from "./latex.js";
import type { RenderContext } from "./types.js";

export interface CommandResult {
  status: number | null;
  output: string;
  error?: Error;
}

/** Runs `command args...` in `cwd`. Swapped out in tests. */
export type CommandRunner = (command: string, args: string[], cwd: string) => CommandResult;

export const spawnCommand: CommandRunner = (command, args, cwd) => {
  const res = spawnSync(command, args, { cwd, encoding: "utf8" });
  return {
    status: res.status,
    output: `${res.stdout ?? ""}${res.stderr ?? ""}`,
    error: res.error,
  };
};

const PASSES = 2;

/**
 * Compile the book's LaTeX source to PDF in a scratch directory under the
 * book's temp dir. The command runs twice so the table of contents is
 * filled in. The scratch directory is removed whatever the outcome.
 */
export function renderPdf(
  book: Book,
  chapters: readonly ResolvedChapter[],
  options: { run?: CommandRunner; context?: RenderContext } = {}
): Buffer {
  const run = options.run ?? spawnCommand;
  const source = new LatexRenderer().render(book, chapters, options.context).content;

  const [command, ...extraArgs] = book.texCommand.trim().split(/\s+/);
  const args = [...extraArgs, "-interaction=nonstopmode", "-halt-on-error", "book.tex"];

  fs.mkdirSync(book.tempDir, { recursive: true });
  const workDir = fs.mkdtempSync(path.join(book.tempDir, "quillpress-"));
  try {
    fs.writeFileSync(path.join(workDir, "book.tex"), source, "utf-8");

    let output = "";
    for (let pass = 1; pass <= PASSES; pass++) {
      const result = run(command, args, workDir);
      output = result.output;
      if (result.error) {
        throw new RenderError(`Could not run ${command}: ${result.error.message}`, {
          format: "pdf",
          cause: result.error,
        });
      }
      if (result.status !== 0) {
        throw new RenderError(
          `${command} exited with status ${result.status ?? "unknown"} (pass ${pass}):\n${result.output}`,
          { format: "pdf" }
        );
      }
    }

    const pdfPath = path.join(workDir, "book.pdf");
    if (!fs.existsSync(pdfPath)) {
      throw new RenderError(`${command} produced no PDF:\n${output}`, { format: "pdf" });
    }
    return fs.readFileSync(pdfPath);
  } finally {
    fs.rmSync(workDir, { recursive: true, force: true });
  }
}

import type { OutputFormat } from "../errors.js";
import { OUTPUT_FORMATS } from "../runner/render-runner.js";

export const USAGE = `Usage: quillpress <book-file> [options]

Renders the outputs configured in <book-file> (line format, or YAML when
the file ends in .yaml/.yml).

Options:
  --format <fmt>    Only render this format (epub, html, tex, pdf, odt);
                    repeat to render several
  --verbose, -v     Print per-chapter progress
  --help, -h        Show this help`;

export interface ParsedFlags {
  positional: string[];
  formats?: OutputFormat[];
  verbose: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function parseFlags(args: string[]): ParsedFlags {
  const positional: string[] = [];
  let formats: OutputFormat[] | undefined;
  let verbose = false;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--format") {
      const value = args[++i];
      if (value === undefined) throw new UsageError("--format needs a value");
      if (!isOutputFormat(value)) {
        throw new UsageError(`Unknown format "${value}" (expected one of ${OUTPUT_FORMATS.join(", ")})`);
      }
      formats = [...(formats ?? []), value];
    } else if (arg === "--verbose" || arg === "-v") {
      verbose = true;
    } else if (arg === "--help" || arg === "-h") {
      help = true;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  return { positional, formats, verbose, help };
}

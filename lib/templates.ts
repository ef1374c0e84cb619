import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Liquid } from "liquidjs";
import { RenderError, type OutputFormat } from "./errors.js";

const HERE = path.dirname(fileURLToPath(import.meta.url));

// lib/ in the source tree, dist/lib/ once built
const TEMPLATES_DIR = [path.resolve(HERE, "../templates"), path.resolve(HERE, "../../templates")].find(
  (dir) => fs.existsSync(dir)
) ?? path.resolve(HERE, "../templates");

/**
 * Variables are substituted as given: callers escape them for the target
 * format first. An unknown placeholder is an error rather than an empty
 * string.
 */
const engine = new Liquid({
  root: [TEMPLATES_DIR],
  strictVariables: true,
  lenientIf: true,
});

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const builtins = new Map<string, string>();

/** Read one of the bundled templates, e.g. `epub/stylesheet.css`. */
export function builtinTemplate(name: string): string {
  let source = builtins.get(name);
  if (source === undefined) {
    source = fs.readFileSync(path.join(TEMPLATES_DIR, name), "utf-8");
    builtins.set(name, source);
  }
  return source;
}

export function expandTemplate(
  source: string,
  variables: Record<string, unknown>,
  context: { what: string; format?: OutputFormat; chapter?: number }
): string {
  let result: string;
  try {
    result = engine.parseAndRenderSync(source, variables);
  } catch (err) {
    throw new RenderError(
      `Could not expand ${context.what}: ${err instanceof Error ? err.message : String(err)}`,
      { format: context.format, chapter: context.chapter, cause: err }
    );
  }
  if (LONE_SURROGATE.test(result)) {
    throw new RenderError(`Expanding ${context.what} produced text that is not valid UTF-8`, {
      format: context.format,
      chapter: context.chapter,
    });
  }
  return result;
}

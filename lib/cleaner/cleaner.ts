/**
 * Typographic cleaning of text runs.
 *
 * The variant is picked once per book from its language and autoclean
 * option, then applied by the parser to every text leaf it emits.
 */

export type Cleaner =
  | { readonly kind: "none" }
  | { readonly kind: "whitespace" }
  | { readonly kind: "french"; readonly nbChar: string };

export const noCleaner: Cleaner = { kind: "none" };

export function selectCleaner(options: {
  autoclean: boolean;
  lang: string;
  nbChar: string;
}): Cleaner {
  if (!options.autoclean) return noCleaner;
  if (options.lang.toLowerCase().startsWith("fr")) {
    return { kind: "french", nbChar: options.nbChar };
  }
  return { kind: "whitespace" };
}

export function clean(cleaner: Cleaner, text: string, isFirstRunInLine: boolean): string {
  switch (cleaner.kind) {
    case "none":
      return text;
    case "whitespace":
      return collapseWhitespace(text);
    case "french":
      return cleanFrench(collapseWhitespace(text), cleaner.nbChar, isFirstRunInLine);
  }
}

export function collapseWhitespace(text: string): string {
  return text.replace(/[ \t\r\n]+/g, " ");
}

const SPACED_BEFORE = new Set(["?", "!", ";", ":", "»"]);
const DIALOGUE_DASHES = new Set(["—", "–"]);

function cleanFrench(text: string, nbChar: string, isFirstRunInLine: boolean): string {
  const isSpacing = (c: string | undefined): boolean =>
    c === " " || c === "\u00a0" || c === "\u202f" || c === nbChar;

  const chars = Array.from(text);
  const out: string[] = [];
  for (let i = 0; i < chars.length; i++) {
    const current = chars[i];
    const prev = out.length > 0 ? out[out.length - 1] : undefined;

    if (isSpacing(current)) {
      // a whole run of spacing characters is replaced or kept as one unit
      let end = i + 1;
      while (end < chars.length && isSpacing(chars[end])) end++;
      const next = chars[end];
      const dialogue =
        isFirstRunInLine && out.length === 1 && prev !== undefined && DIALOGUE_DASHES.has(prev);
      if ((next !== undefined && SPACED_BEFORE.has(next)) || prev === "«" || dialogue) {
        out.push(nbChar);
      } else {
        out.push(...chars.slice(i, end));
      }
      i = end - 1;
      continue;
    }

    if (prev !== undefined && !isSpacing(prev) && (prev === "«" || current === "»")) {
      out.push(nbChar);
    }
    out.push(current);
  }
  return out.join("");
}

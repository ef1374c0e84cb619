const HTML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

/** Entity escaping for HTML and XML text nodes and attribute values. */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (c) => HTML_ENTITIES[c]);
}

const TEX_ESCAPES: Record<string, string> = {
  "\\": "\\textbackslash{}",
  "{": "\\{",
  "}": "\\}",
  "%": "\\%",
  _: "\\_",
  "&": "\\&",
  "#": "\\#",
  $: "\\$",
  "~": "\\textasciitilde{}",
  "^": "\\textasciicircum{}",
};

/**
 * Escape LaTeX special characters in a single pass, so the braces that
 * `\textbackslash{}` introduces are never escaped again.
 */
export function escapeTex(text: string): string {
  return text.replace(/[\\{}%_&#$~^]/g, (c) => TEX_ESCAPES[c]);
}

/** Escaping for the URL argument of `\href` and `\url`. */
export function escapeTexUrl(url: string): string {
  return url.replace(/[%#]/g, (c) => `\\${c}`);
}

export type EscapeFormat = "html" | "tex";

export function escapeFor(format: EscapeFormat): (text: string) => string {
  switch (format) {
    case "html":
      return escapeHtml;
    case "tex":
      return escapeTex;
  }
}

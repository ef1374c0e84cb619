/**
 * Format-neutral document tree for one chapter.
 *
 * The parser builds it once; renderers only read it. Children are owned by
 * their parent and never shared between two nodes.
 */

export type Tokens = readonly Token[];

export type Alignment = "left" | "right" | "center" | null;

// Inline variants
export interface TextToken {
  readonly kind: "text";
  readonly text: string;
}
export interface EmphasisToken {
  readonly kind: "emphasis";
  readonly children: Tokens;
}
export interface StrongToken {
  readonly kind: "strong";
  readonly children: Tokens;
}
export interface StrikethroughToken {
  readonly kind: "strikethrough";
  readonly children: Tokens;
}
export interface CodeToken {
  readonly kind: "code";
  readonly children: Tokens;
}
export interface LinkToken {
  readonly kind: "link";
  readonly url: string;
  readonly title: string;
  readonly children: Tokens;
}
/** `children` hold the alternative text. */
export interface ImageToken {
  readonly kind: "image";
  readonly url: string;
  readonly title: string;
  readonly children: Tokens;
}
export interface HardBreakToken {
  readonly kind: "hardBreak";
}
export interface FootnoteReferenceToken {
  readonly kind: "footnoteReference";
  readonly id: string;
}

// Block variants
export interface ParagraphToken {
  readonly kind: "paragraph";
  readonly children: Tokens;
}
export interface HeadingToken {
  readonly kind: "heading";
  readonly level: number;
  readonly children: Tokens;
}
export interface ListToken {
  readonly kind: "list";
  readonly ordered: boolean;
  readonly start: number;
  readonly children: Tokens;
}
export interface ItemToken {
  readonly kind: "item";
  readonly children: Tokens;
}
export interface BlockQuoteToken {
  readonly kind: "blockQuote";
  readonly children: Tokens;
}
export interface CodeBlockToken {
  readonly kind: "codeBlock";
  readonly language: string;
  readonly children: Tokens;
}
export interface RuleToken {
  readonly kind: "rule";
}
export interface FootnoteDefinitionToken {
  readonly kind: "footnoteDefinition";
  readonly id: string;
  readonly children: Tokens;
}
export interface TableToken {
  readonly kind: "table";
  readonly align: readonly Alignment[];
  readonly children: Tokens;
}
export interface TableRowToken {
  readonly kind: "tableRow";
  readonly header: boolean;
  readonly children: Tokens;
}
export interface TableCellToken {
  readonly kind: "tableCell";
  readonly children: Tokens;
}

export type InlineToken =
  | TextToken
  | EmphasisToken
  | StrongToken
  | StrikethroughToken
  | CodeToken
  | LinkToken
  | ImageToken
  | HardBreakToken
  | FootnoteReferenceToken;

export type BlockToken =
  | ParagraphToken
  | HeadingToken
  | ListToken
  | ItemToken
  | BlockQuoteToken
  | CodeBlockToken
  | RuleToken
  | FootnoteDefinitionToken
  | TableToken
  | TableRowToken
  | TableCellToken;

export type Token = InlineToken | BlockToken;

const BLOCK_KINDS: ReadonlySet<Token["kind"]> = new Set<Token["kind"]>([
  "paragraph",
  "heading",
  "list",
  "item",
  "blockQuote",
  "codeBlock",
  "rule",
  "footnoteDefinition",
  "table",
  "tableRow",
  "tableCell",
]);

export function isBlock(token: Token): token is BlockToken {
  return BLOCK_KINDS.has(token.kind);
}

export function hasChildren(token: Token): token is Extract<Token, { children: Tokens }> {
  return "children" in token;
}

/** Structural equality: same variants, same fields, same children. */
export function tokensEqual(a: Tokens, b: Tokens): boolean {
  if (a.length !== b.length) return false;
  return a.every((token, i) => tokenEqual(token, b[i]));
}

export function tokenEqual(a: Token, b: Token): boolean {
  if (a.kind !== b.kind) return false;
  const left: Record<string, unknown> = { ...a };
  const right: Record<string, unknown> = { ...b };
  const keys = new Set([...Object.keys(left), ...Object.keys(right)]);
  for (const key of keys) {
    if (key === "children") continue;
    const l = left[key];
    const r = right[key];
    if (Array.isArray(l) && Array.isArray(r)) {
      if (l.length !== r.length || l.some((v, i) => v !== r[i])) return false;
    } else if (l !== r) {
      return false;
    }
  }
  if (hasChildren(a) && hasChildren(b)) return tokensEqual(a.children, b.children);
  return true;
}

/** Text content of a token sequence, without any markup. */
export function plainText(tokens: Tokens): string {
  let out = "";
  for (const token of tokens) {
    switch (token.kind) {
      case "text":
        out += token.text;
        break;
      case "hardBreak":
        out += " ";
        break;
      case "footnoteReference":
      case "footnoteDefinition":
      case "rule":
        break;
      default:
        out += plainText(token.children);
    }
  }
  return out;
}

/** Depth-first visit of every token, parents before children. */
export function walkTokens(tokens: Tokens, visit: (token: Token) => void): void {
  for (const token of tokens) {
    visit(token);
    if (hasChildren(token)) walkTokens(token.children, visit);
  }
}

export function text(value: string): TextToken {
  return { kind: "text", text: value };
}

/**
 * Markdown → Token conversion.
 *
 * remark (with GFM for footnotes, tables and strikethrough) does the
 * scanning; this module turns its syntax tree into Tokens in source order.
 * Text leaves go through the cleaner as they are emitted, so the cleaner
 * sees the same run boundaries as the tree.
 */

import fs from "node:fs";
import { TextDecoder } from "node:util";
import { remark } from "remark";
import remarkGfm from "remark-gfm";
import type { Definition, ListItem, PhrasingContent, Root, RootContent, Table } from "mdast";
import { clean, noCleaner, type Cleaner } from "../cleaner/cleaner.js";
import { FileNotFoundError, ParseError, errorMessage } from "../errors.js";
import { text, type Alignment, type Token } from "../token/token.js";

const processor = remark().use(remarkGfm);
const utf8 = new TextDecoder("utf-8", { fatal: true });

export function parse(markup: string, cleaner: Cleaner = noCleaner): Token[] {
  const tree = processor.parse(markup);
  return new TokenBuilder(cleaner, collectDefinitions(tree)).blocks(tree.children);
}

export function parseFile(file: string, cleaner: Cleaner = noCleaner): Token[] {
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(file);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new FileNotFoundError(file, { cause: err });
    }
    throw new ParseError(`Could not read chapter: ${errorMessage(err)}`, { file, cause: err });
  }

  let markup: string;
  try {
    markup = utf8.decode(bytes);
  } catch (err) {
    throw new ParseError("Chapter is not valid UTF-8", { file, cause: err });
  }

  try {
    return parse(markup, cleaner);
  } catch (err) {
    throw new ParseError(`Could not parse chapter: ${errorMessage(err)}`, { file, cause: err });
  }
}

function collectDefinitions(tree: Root): Map<string, Definition> {
  const definitions = new Map<string, Definition>();
  const visit = (nodes: readonly RootContent[]) => {
    for (const node of nodes) {
      if (node.type === "definition") {
        if (!definitions.has(node.identifier)) definitions.set(node.identifier, node);
      } else if ("children" in node) {
        visit(node.children);
      }
    }
  };
  visit(tree.children);
  return definitions;
}

class TokenBuilder {
  /** Whether the next text leaf starts a line (block start or after a break). */
  private lineStart = true;

  constructor(
    private readonly cleaner: Cleaner,
    private readonly definitions: Map<string, Definition>
  ) {}

  blocks(nodes: readonly RootContent[]): Token[] {
    const tokens: Token[] = [];
    for (const node of nodes) {
      if (node.type === "html") {
        this.lineStart = true;
        tokens.push({ kind: "paragraph", children: [this.emitText(node.value)] });
      } else {
        tokens.push(...this.node(node));
      }
    }
    return tokens;
  }

  private inline(nodes: readonly PhrasingContent[]): Token[] {
    return nodes.flatMap((node) => this.node(node));
  }

  private node(node: RootContent): Token[] {
    switch (node.type) {
      case "paragraph":
        this.lineStart = true;
        return [{ kind: "paragraph", children: this.inline(node.children) }];
      case "heading":
        this.lineStart = true;
        return [{ kind: "heading", level: node.depth, children: this.inline(node.children) }];
      case "thematicBreak":
        return [{ kind: "rule" }];
      case "blockquote":
        return [{ kind: "blockQuote", children: this.blocks(node.children) }];
      case "list": {
        const tight = !node.spread && node.children.every((item) => !item.spread);
        return [
          {
            kind: "list",
            ordered: node.ordered === true,
            start: node.start ?? 1,
            children: node.children.map((item) => this.item(item, tight)),
          },
        ];
      }
      case "listItem":
        return [this.item(node, !node.spread)];
      case "code":
        return [{ kind: "codeBlock", language: node.lang ?? "", children: [text(node.value)] }];
      case "footnoteDefinition":
        return [{ kind: "footnoteDefinition", id: node.identifier, children: this.blocks(node.children) }];
      case "table":
        return [this.table(node)];
      case "definition":
      case "yaml":
      case "tableRow":
      case "tableCell":
        return [];

      case "text":
        return [this.emitText(node.value)];
      case "html":
        return [this.emitText(node.value)];
      case "emphasis":
        return [{ kind: "emphasis", children: this.inline(node.children) }];
      case "strong":
        return [{ kind: "strong", children: this.inline(node.children) }];
      case "delete":
        return [{ kind: "strikethrough", children: this.inline(node.children) }];
      case "inlineCode":
        this.lineStart = false;
        return [{ kind: "code", children: [text(node.value)] }];
      case "break":
        this.lineStart = true;
        return [{ kind: "hardBreak" }];
      case "link":
        return [{ kind: "link", url: node.url, title: node.title ?? "", children: this.inline(node.children) }];
      case "linkReference": {
        const definition = this.definitions.get(node.identifier);
        const children = this.inline(node.children);
        if (!definition) return children;
        return [{ kind: "link", url: definition.url, title: definition.title ?? "", children }];
      }
      case "image":
        return [{ kind: "image", url: node.url, title: node.title ?? "", children: this.alt(node.alt) }];
      case "imageReference": {
        const definition = this.definitions.get(node.identifier);
        const alt = this.alt(node.alt);
        if (!definition) return alt;
        return [{ kind: "image", url: definition.url, title: definition.title ?? "", children: alt }];
      }
      case "footnoteReference":
        return [{ kind: "footnoteReference", id: node.identifier }];
      default:
        return [];
    }
  }

  private item(node: ListItem, tight: boolean): Token {
    const children: Token[] = [];
    for (const child of node.children) {
      if (tight && child.type === "paragraph") {
        this.lineStart = true;
        children.push(...this.inline(child.children));
      } else {
        children.push(...this.blocks([child]));
      }
    }
    return { kind: "item", children };
  }

  private table(node: Table): Token {
    const align: Alignment[] = (node.align ?? []).map((a) => a ?? null);
    return {
      kind: "table",
      align,
      children: node.children.map((row, index): Token => ({
        kind: "tableRow",
        header: index === 0,
        children: row.children.map((cell): Token => {
          this.lineStart = true;
          return { kind: "tableCell", children: this.inline(cell.children) };
        }),
      })),
    };
  }

  private alt(value: string | null | undefined): Token[] {
    return value ? [this.emitText(value)] : [];
  }

  private emitText(value: string): Token {
    const cleaned = clean(this.cleaner, value, this.lineStart);
    this.lineStart = false;
    return text(cleaned);
  }
}

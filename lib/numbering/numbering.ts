import { expandTemplate } from "../templates.js";
import type { OutputFormat } from "../errors.js";

/** How a chapter's title is displayed. Fixed when the chapter is added. */
export type ChapterNumber =
  | { readonly kind: "hidden" }
  | { readonly kind: "unnumbered" }
  | { readonly kind: "default" }
  | { readonly kind: "specified"; readonly value: number };

export const Hidden: ChapterNumber = { kind: "hidden" };
export const Unnumbered: ChapterNumber = { kind: "unnumbered" };
export const Default: ChapterNumber = { kind: "default" };
export function specified(value: number): ChapterNumber {
  return { kind: "specified", value };
}

export interface ChapterDisplay {
  readonly displayNumber: number | null;
  readonly showTitle: boolean;
}

export const DEFAULT_NUMBERING_TEMPLATE = "{{number}}. {{title}}";

/**
 * Resolve display state for each chapter, in order.
 *
 * The counter starts at 0; `default` increments it, `specified(n)` resets it
 * to n, and `hidden`/`unnumbered` leave it alone. With numbering disabled,
 * every chapter that is not hidden is shown without a number.
 */
export function resolveNumbering(
  numbers: readonly ChapterNumber[],
  numberingEnabled = true
): ChapterDisplay[] {
  let counter = 0;
  return numbers.map((number): ChapterDisplay => {
    switch (number.kind) {
      case "hidden":
        return { displayNumber: null, showTitle: false };
      case "unnumbered":
        return { displayNumber: null, showTitle: true };
      case "default":
        counter += 1;
        break;
      case "specified":
        counter = number.value;
        break;
    }
    return { displayNumber: numberingEnabled ? counter : null, showTitle: true };
  });
}

/** Expand the numbering template, e.g. `"{{number}}. {{title}}"` → `"3. Rain"`. */
export function chapterHeader(
  template: string,
  number: number,
  title: string,
  context: { format?: OutputFormat; chapter?: number } = {}
): string {
  return expandTemplate(
    template,
    { number: String(number), title },
    { what: "the numbering template", ...context }
  );
}

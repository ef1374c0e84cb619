import { describe, it, expect } from "vitest";
import { clean, collapseWhitespace, noCleaner, selectCleaner, type Cleaner } from "../cleaner.js";

const french: Cleaner = { kind: "french", nbChar: "~" };
const whitespace: Cleaner = { kind: "whitespace" };

describe("selectCleaner", () => {
  it("returns the no-op cleaner when autoclean is off", () => {
    expect(selectCleaner({ autoclean: false, lang: "fr", nbChar: "~" })).toEqual(noCleaner);
  });

  it("picks the French rules for French languages", () => {
    expect(selectCleaner({ autoclean: true, lang: "fr", nbChar: "~" })).toEqual(french);
    expect(selectCleaner({ autoclean: true, lang: "FR-ca", nbChar: "~" })).toEqual(french);
  });

  it("collapses whitespace for other languages", () => {
    expect(selectCleaner({ autoclean: true, lang: "en", nbChar: "~" })).toEqual(whitespace);
  });
});

describe("collapseWhitespace", () => {
  it("turns runs of spaces, tabs and newlines into one space", () => {
    expect(collapseWhitespace("a  \n\tb   c")).toBe("a b c");
  });

  it("keeps non-breaking spaces", () => {
    expect(collapseWhitespace("a\u00a0\u00a0b")).toBe("a\u00a0\u00a0b");
  });
});

describe("clean", () => {
  it("leaves text alone with the no-op cleaner", () => {
    expect(clean(noCleaner, "a   b", true)).toBe("a   b");
  });

  it("replaces the space before high punctuation", () => {
    expect(clean(french, "Bonjour !", false)).toBe("Bonjour~!");
    expect(clean(french, "Vraiment ?", false)).toBe("Vraiment~?");
    expect(clean(french, "Note : ceci", false)).toBe("Note~: ceci");
  });

  it("spaces the inside of guillemets", () => {
    expect(clean(french, "Il dit «bonjour»", false)).toBe("Il dit «~bonjour~»");
    expect(clean(french, "« a »", false)).toBe("«~a~»");
  });

  it("protects the space after a dialogue dash only at the start of a line", () => {
    expect(clean(french, "— Bonjour", true)).toBe("—~Bonjour");
    expect(clean(french, "— Bonjour", false)).toBe("— Bonjour");
  });

  it("collapses whitespace before applying the French rules", () => {
    expect(clean(french, "Quoi   \n?", false)).toBe("Quoi~?");
  });

  it("replaces a mixed run of spacing characters with a single character", () => {
    const plain: Cleaner = { kind: "french", nbChar: " " };
    expect(clean(plain, "Non ! \u00a0?", false)).toBe("Non ! ?");
    expect(clean(plain, "x \u202f»", false)).toBe("x »");
    expect(clean(french, "a «\u00a0 :", false)).toBe("a «~:");
  });

  it("keeps a run of spacing characters that no rule applies to", () => {
    expect(clean(french, "a\u00a0\u202fb", false)).toBe("a\u00a0\u202fb");
  });

  it("is idempotent", () => {
    const samples = [
      "Bonjour !",
      "Il dit «bonjour» et « au revoir » ; puis : rien ?",
      "— Dialogue : oui !",
      "plain   text\twith  spaces",
      "«»",
      "",
      "Non ! \u00a0?",
      "x \u202f»",
      "a «\u00a0 :",
      "« \u00a0\u202f mot \u202f\u00a0»",
      "—\u00a0 \u202fDialogue",
      "a\u00a0\u202fb ~ ; ~~!",
      "«\u202f»",
    ];
    for (const cleaner of [noCleaner, whitespace, french, { kind: "french", nbChar: " " } as const]) {
      for (const first of [true, false]) {
        for (const sample of samples) {
          const once = clean(cleaner, sample, first);
          expect(clean(cleaner, once, first)).toBe(once);
        }
      }
    }
  });
});

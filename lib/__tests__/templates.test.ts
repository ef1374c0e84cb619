import { describe, it, expect } from "vitest";
import { RenderError } from "../errors.js";
import { builtinTemplate, expandTemplate } from "../templates.js";

describe("builtinTemplate", () => {
  it("reads bundled templates", () => {
    expect(builtinTemplate("epub/container.xml")).toContain('full-path="OEBPS/content.opf"');
  });

  it("fails for an unknown template", () => {
    expect(() => builtinTemplate("nope/missing.liquid")).toThrow();
  });
});

describe("expandTemplate", () => {
  it("substitutes variables without escaping them", () => {
    expect(expandTemplate("<b>{{ a }}</b>", { a: "<i>&</i>" }, { what: "a test template" })).toBe(
      "<b><i>&</i></b>"
    );
  });

  it("supports loops and conditionals", () => {
    const source = "{% for x in xs %}{{ x }}{% if forloop.last %}.{% else %}, {% endif %}{% endfor %}";
    expect(expandTemplate(source, { xs: ["a", "b", "c"] }, { what: "a list" })).toBe("a, b, c.");
  });

  it("rejects unknown variables", () => {
    expect(() => expandTemplate("{{ nope }}", {}, { what: "a test template", format: "html" })).toThrow(
      /^Could not expand a test template: /
    );
  });

  it("rejects output that is not valid UTF-8", () => {
    const expand = () => expandTemplate("{{ s }}", { s: "\uD800x" }, { what: "a test template", chapter: 2 });
    expect(expand).toThrow(RenderError);
    expect(expand).toThrow("Expanding a test template produced text that is not valid UTF-8");
  });
});

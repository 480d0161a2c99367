import { describe, it, expect } from "vitest";
import {
  REFERENCE_RULES,
  applyRule,
  rewriteReferences,
} from "./reference-rules";

function mappingOf(...pairs: Array<[string, string]>): Map<string, string> {
  return new Map(pairs);
}

function rule(name: string) {
  const found = REFERENCE_RULES.find((r) => r.name === name);
  if (!found) throw new Error(`No rule named ${name}`);
  return found;
}

describe("REFERENCE_RULES", () => {
  it("applies in quoted, css-url, markdown order", () => {
    expect(REFERENCE_RULES.map((r) => r.name)).toEqual([
      "quoted",
      "css-url",
      "markdown",
    ]);
  });
});

describe("rewriteReferences", () => {
  // ==========================================================================
  // Quoted attributes
  // ==========================================================================
  describe("quoted form", () => {
    it("keeps the path prefix and quotes", () => {
      const result = rewriteReferences(
        '<img src="/assets/img/photo.jpg" alt="">',
        mappingOf(["photo.jpg", "photo.webp"]),
      );
      expect(result).toEqual({
        content: '<img src="/assets/img/photo.webp" alt="">',
        replacements: 1,
      });
    });

    it("handles single quotes", () => {
      const result = rewriteReferences(
        "const hero = 'images/hero.png';",
        mappingOf(["hero.png", "hero.webp"]),
      );
      expect(result.content).toBe("const hero = 'images/hero.webp';");
      expect(result.replacements).toBe(1);
    });

    it("matches case-insensitively", () => {
      const result = rewriteReferences(
        '<img src="img/Photo.JPG">',
        mappingOf(["photo.jpg", "photo.webp"]),
      );
      expect(result.content).toBe('<img src="img/photo.webp">');
    });

    it("counts every occurrence", () => {
      const result = rewriteReferences(
        '<img src="a.png"><img src="icons/a.png">',
        mappingOf(["a.png", "a.webp"]),
      );
      expect(result).toEqual({
        content: '<img src="a.webp"><img src="icons/a.webp">',
        replacements: 2,
      });
    });

    it("leaves unquoted prose alone", () => {
      const text = "See photo.jpg for details";
      const result = rewriteReferences(
        text,
        mappingOf(["photo.jpg", "photo.webp"]),
      );
      expect(result).toEqual({ content: text, replacements: 0 });
    });
  });

  // ==========================================================================
  // CSS url()
  // ==========================================================================
  describe("css url form", () => {
    it("rewrites a quoted url()", () => {
      const result = rewriteReferences(
        "background: url('old.png');",
        mappingOf(["old.png", "old.webp"]),
      );
      expect(result.content).toBe("background: url('old.webp');");
    });

    it("rewrites an unquoted url() with prefix and spacing", () => {
      const result = rewriteReferences(
        ".hero { background-image: url( ../img/bg.jpeg ); }",
        mappingOf(["bg.jpeg", "bg.webp"]),
      );
      expect(result).toEqual({
        content: ".hero { background-image: url( ../img/bg.webp ); }",
        replacements: 1,
      });
    });

    it("only touches the url rule when quotes are absent", () => {
      const { content, replacements } = applyRule(
        rule("css-url"),
        "a{background:URL(img/x.png)}",
        "x.png",
        "x.webp",
      );
      expect(content).toBe("a{background:URL(img/x.webp)}");
      expect(replacements).toBe(1);
    });
  });

  // ==========================================================================
  // Markdown images
  // ==========================================================================
  describe("markdown form", () => {
    it("keeps alt text and prefix", () => {
      const result = rewriteReferences(
        "![Logo](images/logo.png)",
        mappingOf(["logo.png", "logo.webp"]),
      );
      expect(result).toEqual({
        content: "![Logo](images/logo.webp)",
        replacements: 1,
      });
    });

    it("ignores plain markdown links", () => {
      const text = "[download](files/logo.png)";
      const result = rewriteReferences(
        text,
        mappingOf(["logo.png", "logo.webp"]),
      );
      expect(result).toEqual({ content: text, replacements: 0 });
    });
  });

  // ==========================================================================
  // Whole mapping
  // ==========================================================================
  describe("multiple entries", () => {
    it("sums replacements across rules and entries", () => {
      const input = [
        '<img src="img/a.jpg">',
        ".x { background: url(img/b.png); }",
        "![b](img/b.png)",
      ].join("\n");

      const result = rewriteReferences(
        input,
        mappingOf(["a.jpg", "a.webp"], ["b.png", "b.webp"]),
      );

      expect(result.content).toBe(
        [
          '<img src="img/a.webp">',
          ".x { background: url(img/b.webp); }",
          "![b](img/b.webp)",
        ].join("\n"),
      );
      expect(result.replacements).toBe(3);
    });

    it("is idempotent once references point at the new names", () => {
      const mapping = mappingOf(["photo.jpg", "photo.webp"]);
      const first = rewriteReferences('<img src="photo.jpg">', mapping);
      const second = rewriteReferences(first.content, mapping);

      expect(second).toEqual({ content: first.content, replacements: 0 });
    });

    it("treats regex characters in filenames literally", () => {
      const result = rewriteReferences(
        '<img src="a+b (1).png"><img src="aab (1)xpng">',
        mappingOf(["a+b (1).png", "a+b (1).webp"]),
      );
      expect(result.content).toBe(
        '<img src="a+b (1).webp"><img src="aab (1)xpng">',
      );
      expect(result.replacements).toBe(1);
    });

    it("inserts new names containing $ verbatim", () => {
      const result = rewriteReferences(
        '<img src="price.png">',
        mappingOf(["price.png", "$1price.webp"]),
      );
      expect(result.content).toBe('<img src="$1price.webp">');
    });
  });
});

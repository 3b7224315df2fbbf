import { describe, expect, it } from "vitest";
import { MalformedContentError } from "../src/lib/errors.ts";
import {
  applyRating,
  buildTableOfContents,
  ContentProcessor,
  foldLegacyRating,
  parseMetaBlock,
  readNumber,
  splitRaw,
} from "../src/lib/processor.ts";

describe("splitRaw", () => {
  it("splits on the first blank line", () => {
    expect(splitRaw("title: A\n\nBody\n\nMore")).toEqual({ metaRaw: "title: A", body: "Body\n\nMore" });
  });

  it("normalizes CRLF line endings", () => {
    expect(splitRaw("title: A\r\n\r\nBody\r\nMore")).toEqual({ metaRaw: "title: A", body: "Body\nMore" });
  });

  it("treats a leading blank line as an empty header", () => {
    expect(splitRaw("\nJust text")).toEqual({ metaRaw: "", body: "Just text" });
  });

  it("rejects content without a separator", () => {
    expect(() => splitRaw("title: A\nBody")).toThrow(MalformedContentError);
  });
});

describe("parseMetaBlock", () => {
  it("lowercases keys and keeps header order", () => {
    const meta = parseMetaBlock("Title: Hello\ntags: a, b\nnotes: first\n    second");
    expect([...meta.keys()]).toEqual(["title", "tags", "notes"]);
    expect(meta.get("title")).toBe("Hello");
    expect(meta.get("notes")).toBe("first\nsecond");
  });

  it("joins repeated keys with a newline", () => {
    expect(parseMetaBlock("author: one\nauthor: two").get("author")).toBe("one\ntwo");
  });

  it("rejects lines that are neither entries nor continuations", () => {
    expect(() => parseMetaBlock("not a header line")).toThrow("Unparseable metadata line: not a header line");
  });
});

describe("ratings", () => {
  it("reads missing or garbage numbers as zero", () => {
    expect(readNumber(undefined)).toBe(0);
    expect(readNumber("abc")).toBe(0);
    expect(readNumber(" 2.5 ")).toBe(2.5);
  });

  it("keeps a running average", () => {
    const meta = new Map<string, string>();
    applyRating(meta, 4);
    applyRating(meta, 5);
    expect(meta.get("total")).toBe("9");
    expect(meta.get("timesrated")).toBe("2");
    expect(meta.get("rating")).toBe("4.5");
  });

  it("legacy fold treats the stored rating as a new score", () => {
    const meta = new Map([
      ["rating", "3"],
      ["total", "6"],
      ["timesrated", "2"],
    ]);
    foldLegacyRating(meta);
    expect(Object.fromEntries(meta)).toEqual({ rating: "3", total: "9", timesrated: "3" });
  });

  it("legacy fold only rewrites keys that already exist", () => {
    const meta = new Map([["rating", "5"]]);
    foldLegacyRating(meta);
    expect(Object.fromEntries(meta)).toEqual({ rating: "5" });
  });
});

describe("buildTableOfContents", () => {
  it("prepends contents and anchors every level-1 heading", () => {
    const html = "<h1>Intro</h1>\n<p>Text</p>\n<h1>Second Part</h1>";
    expect(buildTableOfContents(html)).toBe(
      '<nav class="toc"><h3>Contents</h3><ul>' +
        '<li><a href="#Intro">Intro</a></li><li><a href="#Second_Part">Second Part</a></li></ul></nav>' +
        '<a name="Intro"></a><h1>Intro</h1>\n<p>Text</p>\n<a name="Second_Part"></a><h1>Second Part</h1>',
    );
  });

  it("leaves HTML without level-1 headings unchanged", () => {
    expect(buildTableOfContents("<h2>Sub</h2><p>x</p>")).toBe("<h2>Sub</h2><p>x</p>");
  });
});

describe("ContentProcessor", () => {
  const source = "title: Hello\ntags: x\n\n# Intro\n\nSee [[Other Page]].";

  it("returns body and metadata", () => {
    const result = new ContentProcessor().process(source);
    expect(result.body).toBe("# Intro\n\nSee [[Other Page]].");
    expect(Object.fromEntries(result.meta)).toEqual({ title: "Hello", tags: "x" });
  });

  it("renders without the header, resolves links and adds contents", () => {
    const { html } = new ContentProcessor().process(source);
    expect(html.startsWith('<nav class="toc"><h3>Contents</h3><ul><li><a href="#Intro">Intro</a></li></ul></nav>')).toBe(
      true,
    );
    expect(html).toContain('<a name="Intro"></a><h1>Intro</h1>');
    expect(html).toContain('<a href="/other_page">Other Page</a>');
    expect(html).not.toContain("title: Hello");
  });

  it("leaves wiki links inside inline code untouched", () => {
    const { html } = new ContentProcessor().process("\nUse `[[Foo]]` here and [[Foo]].");
    expect(html).toBe('<p>Use <code>[[Foo]]</code> here and <a href="/foo">Foo</a>.</p>\n');
  });

  it("links targets that contain escaped characters", () => {
    const { html } = new ContentProcessor().process("\nSee [[Q&A]].");
    expect(html).toBe('<p>See <a href="/q&amp;a">Q&amp;A</a>.</p>\n');
  });

  it("highlights fenced code blocks", () => {
    const { html } = new ContentProcessor().process("title: x\n\n```js\nconst a = 1;\n```");
    expect(html).toContain('<code class="hljs language-js">');
    expect(html).toContain('<span class="hljs-keyword">const</span>');
  });

  it("reads whitespace-only continuation lines as empty value lines", () => {
    expect(parseMetaBlock("summary: first\n    \n    second").get("summary")).toBe("first\n\nsecond");
  });

  it("runs preprocessors before parsing", () => {
    const processor = new ContentProcessor({ preprocessors: [(text) => text.replace("Hello", "Howdy")] });
    expect(processor.process(source).meta.get("title")).toBe("Howdy");
  });

  it("strips scripts when sanitizing", () => {
    const { html } = new ContentProcessor().process("\n<script>alert(1)</script>\n\nok");
    expect(html).not.toContain("<script>");
  });

  it("does not touch ratings unless the legacy fold is enabled", () => {
    const rated = "rating: 4\ntotal: 4\ntimesrated: 1\n\nBody";
    expect(new ContentProcessor().process(rated).meta.get("total")).toBe("4");
    expect(new ContentProcessor({ legacyRatingFold: true }).process(rated).meta.get("total")).toBe("8");
  });
});

import { describe, it, expect } from "vitest";
import { HtmlNormalizer } from "../src/HtmlNormalizer.js";
import { blockHtml, countWords, extractContentBlocks } from "../src/filters/content-blocks.js";

const blocksOf = (html: string) => extractContentBlocks(new HtmlNormalizer().normalize(html).content);

describe("extractContentBlocks", () => {
  it("splits content into leaf blocks and text-bearing containers in document order", () => {
    const blocks = blocksOf(
      "<article><h1>Title</h1><h2>Sub</h2><p>First para</p>" +
        '<div>Loose <a href="/x">link</a> text</div><div><p>Nested</p></div><h2>Tail</h2></article>'
    );

    expect(blocks.map((block) => block.tagName)).toEqual(["p", "div", "p", "h2"]);
    expect(blocks.map((block) => block.index)).toEqual([0, 1, 2, 3]);
    expect(blocks.map((block) => block.text)).toEqual([
      "Title Sub First para",
      "Loose link text",
      "Nested",
      "Tail",
    ]);
  });

  it("groups a heading run with the block that follows it", () => {
    const [block] = blocksOf("<article><h1>Title</h1><h2>Sub</h2><p>First para</p></article>");
    expect(block.nodes.map((node) => node.toString())).toEqual(["<h1>Title</h1>", "<h2>Sub</h2>", "<p>First para</p>"]);
    expect(block.wordCount).toBe(4);
  });

  it("measures text and link lengths", () => {
    const [block] = blocksOf('<main><div>Loose <a href="/x">link</a> text</div></main>');
    expect(block.textLength).toBe(15);
    expect(block.linkTextLength).toBe(4);
    expect(block.wordCount).toBe(3);
  });

  it("collects class names and ids up to the content root", () => {
    const [block] = blocksOf(
      '<main class="page"><div class="Sidebar-Widget" id="rail"><p class="note">Some words</p></div></main>'
    );
    expect(block.classIdContext).toBe("note sidebar-widget rail");
  });

  it("splits a container that mixes stray text with block children", () => {
    const blocks = blocksOf(
      "<main>Intro words <em>here</em><p>First para</p>Between<ul class=\"menu\"><li>Home</li></ul></main>"
    );

    expect(blocks.map((block) => block.tagName)).toEqual(["main", "p", "main", "ul"]);
    expect(blocks.map((block) => block.text)).toEqual(["Intro words here", "First para", "Between", "Home"]);
    expect(blocks[3].classIdContext).toBe("menu");
    expect(blockHtml(blocks[0])).toBe("Intro words <em>here</em>");
  });

  it("does not group a heading with a block in another container", () => {
    const blocks = blocksOf(
      '<main><div class="sidebar"><h3>Popular posts</h3></div><p>A genuine paragraph of prose.</p></main>'
    );

    expect(blocks.map((block) => block.text)).toEqual(["Popular posts", "A genuine paragraph of prose."]);
    expect(blocks.map((block) => block.classIdContext)).toEqual(["sidebar", ""]);
    expect(blocks.map((block) => block.tagName)).toEqual(["h3", "p"]);
  });

  it("joins a heading run with its block on separate lines", () => {
    const [block] = blocksOf("<article><h1>Title</h1><p>Body</p></article>");
    expect(blockHtml(block)).toBe("<h1>Title</h1>\n<p>Body</p>");
  });

  it("skips elements without text", () => {
    expect(blocksOf("<main><div><p>   </p><ul></ul></div></main>")).toEqual([]);
    expect(blocksOf("")).toEqual([]);
  });
});

describe("countWords", () => {
  it("counts whitespace-delimited tokens", () => {
    expect(countWords("  one two\n\tthree  ")).toBe(3);
    expect(countWords("")).toBe(0);
  });
});

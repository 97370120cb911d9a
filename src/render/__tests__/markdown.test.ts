import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { renderMarkdown, renderToc, rewriteLink, slugify, type RenderOptions } from "../markdown";

let baseDir: string;
let options: RenderOptions;

describe("rewriteLink", () => {
  const linkOptions: RenderOptions = {
    baseDir: "/content",
    contentExtensions: [".md"],
    outputExtension: ".html",
  };

  it("points content links at their output file", () => {
    expect(rewriteLink("intro.md", linkOptions)).toBe("intro.html");
    expect(rewriteLink("../notes/intro.md#setup", linkOptions)).toBe("../notes/intro.html#setup");
    expect(rewriteLink("post.MD?ref=home", linkOptions)).toBe("post.html?ref=home");
  });

  it("leaves everything else alone", () => {
    expect(rewriteLink("https://example.com/readme.md", linkOptions)).toBe(
      "https://example.com/readme.md"
    );
    expect(rewriteLink("//example.com/a.md", linkOptions)).toBe("//example.com/a.md");
    expect(rewriteLink("mailto:someone@example.com", linkOptions)).toBe("mailto:someone@example.com");
    expect(rewriteLink("#top", linkOptions)).toBe("#top");
    expect(rewriteLink("diagram.png", linkOptions)).toBe("diagram.png");
  });
});

describe("slugify", () => {
  it("makes anchor ids from heading text", () => {
    expect(slugify("Getting Started")).toBe("getting-started");
    expect(slugify("What's new in v2?")).toBe("whats-new-in-v2");
  });
});

describe("renderMarkdown", () => {
  beforeAll(async () => {
    baseDir = await mkdtemp(join(tmpdir(), "mdsite-render-"));
    await writeFile(join(baseDir, "dot.png"), Buffer.from([1, 2, 3]));
    options = { baseDir, contentExtensions: [".md"], outputExtension: ".html" };
  });

  afterAll(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it("anchors headings with unique ids", async () => {
    const { html, headings } = await renderMarkdown("## Intro\n\n### Details\n\n## Intro\n", options);

    expect(headings).toEqual([
      { depth: 2, text: "Intro", id: "intro" },
      { depth: 3, text: "Details", id: "details" },
      { depth: 2, text: "Intro", id: "intro-1" },
    ]);
    expect(html).toContain('<h2 id="intro"><a class="anchor" href="#intro">Intro</a></h2>');
    expect(html).toContain('<h2 id="intro-1"><a class="anchor" href="#intro-1">Intro</a></h2>');
  });

  it("renders h1 without an anchor", async () => {
    const { html, headings } = await renderMarkdown("# Title\n", options);

    expect(html).toBe("<h1>Title</h1>\n");
    expect(headings).toEqual([]);
  });

  it("rewrites links to other content files", async () => {
    const { html } = await renderMarkdown("[next](next.md \"Next post\") and [site](https://example.com)\n", options);

    expect(html).toBe(
      '<p><a href="next.html" title="Next post">next</a> and <a href="https://example.com">site</a></p>\n'
    );
  });

  it("embeds local images", async () => {
    const { html } = await renderMarkdown("![a dot](dot.png)\n", options);

    expect(html).toBe('<p><img src="data:image/png;base64,AQID" alt="a dot"></p>\n');
  });

  it("leaves missing images pointing at their path", async () => {
    const { html } = await renderMarkdown("![gone](missing.png)\n", options);

    expect(html).toBe('<p><img src="missing.png" alt="gone"></p>\n');
  });

  it("highlights fenced code", async () => {
    const { html } = await renderMarkdown("```typescript\nconst x = 1;\n```\n", options);

    expect(html).toContain('<pre class="shiki');
    expect(html).not.toContain("__CODE_BLOCK_");
  });

  it("falls back to plain text for unknown languages", async () => {
    const { html } = await renderMarkdown("```nosuchlang\na < b\n```\n", options);

    expect(html).toContain('<pre class="shiki');
    expect(html).not.toContain("a < b");
  });
});

describe("renderToc", () => {
  it("lists h2 and h3 headings", () => {
    expect(
      renderToc([
        { depth: 2, text: "Intro", id: "intro" },
        { depth: 3, text: "Details", id: "details" },
        { depth: 4, text: "Deep", id: "deep" },
      ])
    ).toBe(
      '<nav class="toc"><ul><li class="toc-h2"><a href="#intro">Intro</a></li>' +
        '<li class="toc-h3"><a href="#details">Details</a></li></ul></nav>'
    );
  });

  it("renders nothing without headings", () => {
    expect(renderToc([])).toBe("");
  });
});

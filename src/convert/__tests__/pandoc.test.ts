import { existsSync } from "node:fs";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FrontmatterError } from "../../errors";
import { PandocConverter, pandocArgs } from "../pandoc";
import type { ConversionJob, SharedInputs } from "../types";

const noShared: SharedInputs = {
  templatePath: null,
  template: null,
  metadata: {},
  metadataFile: null,
};

function job(overrides: Partial<ConversionJob> = {}): ConversionJob {
  return {
    source: "/site/content/posts/a.md",
    relativePath: "posts/a.md",
    destination: "/site/build/posts/a.html.tmp",
    shared: noShared,
    signal: new AbortController().signal,
    ...overrides,
  };
}

describe("pandocArgs", () => {
  it("builds a standalone self-contained page", () => {
    expect(pandocArgs(job(), { toc: false, pageTitle: "First Post" })).toEqual([
      "/site/content/posts/a.md",
      "--from", "markdown",
      "--to", "html5",
      "--standalone",
      "--embed-resources",
      "--resource-path", "/site/content/posts",
      "--metadata", "pagetitle=First Post",
      "--output", "/site/build/posts/a.html.tmp",
    ]);
  });

  it("passes the template, metadata file and toc when set", () => {
    const shared: SharedInputs = {
      templatePath: "/site/template.html",
      template: "$body$",
      metadata: { author: "Test Author" },
      metadataFile: "/site/metadata.json",
    };

    expect(pandocArgs(job({ shared }), { toc: true, pageTitle: "A" }).slice(13)).toEqual([
      "--template", "/site/template.html",
      "--metadata-file", "/site/metadata.json",
      "--toc",
    ]);
  });
});

describe("PandocConverter", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "mdsite-pandoc-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reports a missing executable", async () => {
    const source = join(dir, "a.md");
    await writeFile(source, "# A\n");
    const converter = new PandocConverter({ pandocPath: join(dir, "no-such-pandoc") });

    await expect(
      converter.convert(job({ source, relativePath: "a.md", destination: join(dir, "a.html") }))
    ).rejects.toThrow(`pandoc executable not found: ${join(dir, "no-such-pandoc")}`);
    expect(existsSync(join(dir, "a.html"))).toBe(false);
  });

  it("checks frontmatter before running pandoc", async () => {
    const source = join(dir, "bad.md");
    await writeFile(source, "---\ntitle: [oops\n---\n");
    const converter = new PandocConverter({ pandocPath: join(dir, "no-such-pandoc") });

    await expect(
      converter.convert(job({ source, relativePath: "bad.md", destination: join(dir, "bad.html") }))
    ).rejects.toBeInstanceOf(FrontmatterError);
  });
});

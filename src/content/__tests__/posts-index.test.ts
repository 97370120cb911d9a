import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, FrontmatterError } from "../../errors";
import {
  collectIndexEntries,
  generateIndex,
  parsePostDate,
  renderEntry,
  renderIndex,
  sortEntries,
  type IndexOptions,
} from "../posts-index";

let contentDir: string;
let options: IndexOptions;

async function writePost(name: string, frontmatter: string[] | null, body = "Text\n") {
  const raw = frontmatter ? ["---", ...frontmatter, "---", body].join("\n") : body;
  await writeFile(join(contentDir, "posts", name), raw);
}

describe("posts index", () => {
  beforeEach(async () => {
    contentDir = await mkdtemp(join(tmpdir(), "mdsite-index-"));
    await mkdir(join(contentDir, "posts", "drafts"), { recursive: true });
    options = {
      contentDir,
      postsDir: "posts",
      indexFile: "index.md",
      indexTitle: "Posts",
      extensions: [".md"],
      outputExtension: ".html",
    };
  });

  afterEach(async () => {
    await rm(contentDir, { recursive: true, force: true });
  });

  it("lists posts newest first", async () => {
    await writePost("a.md", ["title: Alpha", "date: 2023-01-01"]);
    await writePost("b.md", ["title: Beta", "subtitle: Second", "date: 2024-06-15", "word_count: 1,200"]);
    await writePost("c.md", ["title: Gamma", "date: 2022-03-03"]);

    const entries = await collectIndexEntries(options);

    expect(entries.map((entry) => entry.title)).toEqual(["Beta", "Alpha", "Gamma"]);
    expect(entries[0]).toEqual({
      title: "Beta",
      subtitle: "Second",
      date: "2024-06-15",
      wordCount: "1,200",
      path: "posts/b.html",
    });
  });

  it("keeps discovery order for equal dates and puts undated posts last", async () => {
    await writePost("d1.md", ["title: D1", "date: 2024-01-01"]);
    await writePost("d2.md", ["title: D2", "date: 2024-01-01"]);
    await writePost("e.md", ["title: Undated"]);
    await writePost("f.md", ["title: Newest", "date: 2025-01-01"]);

    const entries = await collectIndexEntries(options);

    expect(entries.map((entry) => entry.title)).toEqual(["Newest", "D1", "D2", "Undated"]);
  });

  it("tolerates posts without frontmatter", async () => {
    await writePost("no-front-matter.md", null);

    const entries = await collectIndexEntries(options);

    expect(entries).toEqual([
      {
        title: "No Front Matter",
        subtitle: undefined,
        date: undefined,
        wordCount: undefined,
        path: "posts/no-front-matter.html",
      },
    ]);
  });

  it("only reads posts directly inside the posts directory", async () => {
    await writePost("top.md", ["title: Top"]);
    await writeFile(join(contentDir, "posts", "drafts", "wip.md"), "---\ntitle: WIP\n---\n");

    const entries = await collectIndexEntries(options);
    expect(entries.map((entry) => entry.title)).toEqual(["Top"]);
  });

  it("links relative to the index file", async () => {
    await writePost("a.md", ["title: Alpha"]);

    const entries = await collectIndexEntries({ ...options, indexFile: "blog/index.md" });
    expect(entries[0].path).toBe("../posts/a.html");
  });

  it("writes an empty listing when there is no posts directory yet", async () => {
    await rm(join(contentDir, "posts"), { recursive: true });

    const { file, entries } = await generateIndex(options);

    expect(entries).toEqual([]);
    expect(await readFile(file, "utf-8")).toBe(
      '---\ntitle: "Posts"\ngenerate_toc: false\n---\n\n_No posts yet._\n'
    );
  });

  it("still requires the content root", async () => {
    const missing = join(contentDir, "nowhere");

    await expect(generateIndex({ ...options, contentDir: missing })).rejects.toThrow(
      new ConfigError(`Content root does not exist: ${missing}`)
    );
  });

  it("fails on a date it cannot sort and writes nothing", async () => {
    await writePost("good.md", ["title: Good", "date: 2024-01-01"]);
    await writePost("bad.md", ["title: Bad", "date: last tuesday"]);

    await expect(generateIndex(options)).rejects.toThrow(
      new FrontmatterError("posts/bad.md", '"date" is not an ISO date (YYYY-MM-DD): "last tuesday"')
    );
    expect(existsSync(join(contentDir, "index.md"))).toBe(false);
  });

  it("fails on malformed frontmatter", async () => {
    await writeFile(join(contentDir, "posts", "broken.md"), "---\ntitle: [oops\n---\n");

    await expect(generateIndex(options)).rejects.toBeInstanceOf(FrontmatterError);
  });

  it("writes the listing page", async () => {
    await writePost("a.md", ["title: Alpha", "date: 2023-01-01"]);
    await writePost("b.md", ["title: Beta", "subtitle: Second", "date: 2024-06-15", "word_count: 1,200"]);

    const { file, entries } = await generateIndex(options);

    expect(file).toBe(join(contentDir, "index.md"));
    expect(entries).toHaveLength(2);
    expect(await readFile(file, "utf-8")).toBe(
      [
        "---",
        'title: "Posts"',
        "generate_toc: false",
        "---",
        "",
        "- 2024-06-15 · [Beta](posts/b.html) · Second · 1,200 words",
        "- 2023-01-01 · [Alpha](posts/a.html)",
        "",
      ].join("\n")
    );
  });
});

describe("parsePostDate", () => {
  it("accepts dates and datetimes", () => {
    expect(parsePostDate("2024-06-15", "a.md")).toBe(Date.UTC(2024, 5, 15));
    expect(parsePostDate("2024-06-15T12:30:00Z", "a.md")).toBe(Date.UTC(2024, 5, 15, 12, 30));
  });

  it("rejects impossible calendar dates", () => {
    expect(() => parsePostDate("2023-02-30", "a.md")).toThrow(
      'a.md: "date" is not a calendar date: "2023-02-30"'
    );
  });

  it("rejects other formats", () => {
    expect(() => parsePostDate("15/06/2024", "a.md")).toThrow(FrontmatterError);
    expect(() => parsePostDate("June 15, 2024", "a.md")).toThrow(FrontmatterError);
  });
});

describe("rendering", () => {
  it("leaves out absent fields", () => {
    expect(renderEntry({ title: "Only Title", path: "posts/only.html" })).toBe(
      "- [Only Title](posts/only.html)"
    );
  });

  it("escapes link text and encodes the path", () => {
    expect(renderEntry({ title: "Arrays [part 1]", path: "posts/my post.html" })).toBe(
      "- [Arrays \\[part 1\\]](posts/my%20post.html)"
    );
  });

  it("says so when there are no posts", () => {
    expect(renderIndex([], "Writing")).toBe(
      '---\ntitle: "Writing"\ngenerate_toc: false\n---\n\n_No posts yet._\n'
    );
  });

  it("sorts entries without dates after dated ones", () => {
    const sorted = sortEntries([
      { entry: { title: "u", path: "u.html" }, timestamp: null },
      { entry: { title: "old", path: "old.html" }, timestamp: 1 },
      { entry: { title: "new", path: "new.html" }, timestamp: 2 },
    ]);
    expect(sorted.map((entry) => entry.title)).toEqual(["new", "old", "u"]);
  });
});

import { existsSync } from "node:fs";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, parse } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../../errors";
import { assertSafeOutputDir, cleanOutputDir, isWithin } from "../clean";

let project: string;
let guard: { contentDir: string; cwd: string };

describe("cleanOutputDir", () => {
  beforeEach(async () => {
    project = await mkdtemp(join(tmpdir(), "mdsite-clean-"));
    await mkdir(join(project, "content"), { recursive: true });
    await mkdir(join(project, "build", "posts"), { recursive: true });
    await writeFile(join(project, "content", "a.md"), "# A");
    await writeFile(join(project, "build", "posts", "a.html"), "<p>A</p>");
    guard = { contentDir: join(project, "content"), cwd: project };
  });

  afterEach(async () => {
    await rm(project, { recursive: true, force: true });
  });

  it("removes the output tree and leaves the content alone", async () => {
    expect(await cleanOutputDir(join(project, "build"), guard)).toBe(true);

    expect(existsSync(join(project, "build"))).toBe(false);
    expect(existsSync(join(project, "content", "a.md"))).toBe(true);
  });

  it("does nothing when the output directory is missing", async () => {
    await rm(join(project, "build"), { recursive: true });

    expect(await cleanOutputDir(join(project, "build"), guard)).toBe(false);
  });

  it("refuses the content root", async () => {
    await expect(cleanOutputDir(join(project, "content"), guard)).rejects.toBeInstanceOf(ConfigError);
    expect(existsSync(join(project, "content", "a.md"))).toBe(true);
  });

  it("refuses a directory inside the content root", async () => {
    await mkdir(join(project, "content", "posts"), { recursive: true });
    await writeFile(join(project, "content", "posts", "hello.md"), "# Hello");
    const target = join(project, "content", "posts");

    await expect(cleanOutputDir(target, guard)).rejects.toThrow(
      `Output directory lies inside the content root: ${target}`
    );
    expect(existsSync(join(project, "content", "posts", "hello.md"))).toBe(true);
  });

  it("refuses a directory holding the content root", () => {
    expect(() =>
      assertSafeOutputDir(project, { contentDir: guard.contentDir, cwd: tmpdir() })
    ).toThrow(`Output directory contains the content root: ${project}`);
  });

  it("refuses a directory holding the working directory", () => {
    expect(() => assertSafeOutputDir(project, guard)).toThrow(
      `Output directory contains the working directory: ${project}`
    );
  });

  it("refuses the filesystem root", () => {
    const root = parse(project).root;
    expect(() => assertSafeOutputDir(root, guard)).toThrow(ConfigError);
  });
});

describe("isWithin", () => {
  it("compares whole path segments", () => {
    expect(isWithin("/site/build", "/site/build")).toBe(true);
    expect(isWithin("/site/build", "/site/build/posts/a.html")).toBe(true);
    expect(isWithin("/site/build", "/site/build-old")).toBe(false);
    expect(isWithin("/site/build", "/site")).toBe(false);
  });
});

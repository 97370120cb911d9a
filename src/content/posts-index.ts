import { existsSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { basename, extname, join, posix } from "node:path";
import { ConfigError, FrontmatterError } from "../errors";
import { discoverContentFiles, humanize, swapExtension } from "./filesystem";
import { parseContent } from "./frontmatter";
import type { IndexEntry } from "./types";

export interface IndexOptions {
  contentDir: string;
  /** Subsection of the content root holding the posts */
  postsDir: string;
  /** Listing page to write, relative to the content root */
  indexFile: string;
  /** Title of the listing page */
  indexTitle: string;
  extensions: string[];
  outputExtension: string;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Parse a post date into a sortable timestamp. Anything but an ISO date
 * is an error: a wrong sort order is worse than no index.
 */
export function parsePostDate(value: string, file: string): number {
  const match = ISO_DATE.exec(value.trim());
  const timestamp = match ? Date.parse(value.trim()) : NaN;

  if (!match || Number.isNaN(timestamp)) {
    throw new FrontmatterError(file, `"date" is not an ISO date (YYYY-MM-DD): "${value}"`);
  }

  // Date.parse rolls 2023-02-30 over into March; reject it instead
  const [, year, month, day] = match;
  const calendar = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (calendar.getUTCMonth() !== Number(month) - 1 || calendar.getUTCDate() !== Number(day)) {
    throw new FrontmatterError(file, `"date" is not a calendar date: "${value}"`);
  }

  return timestamp;
}

interface DatedEntry {
  entry: IndexEntry;
  timestamp: number | null;
}

/**
 * Newest first. Equal dates keep discovery order; undated posts go last.
 */
export function sortEntries(entries: DatedEntry[]): IndexEntry[] {
  return [...entries]
    .sort((a, b) => {
      if (a.timestamp === null || b.timestamp === null) {
        if (a.timestamp === b.timestamp) return 0;
        return a.timestamp === null ? 1 : -1;
      }
      return b.timestamp - a.timestamp;
    })
    .map(({ entry }) => entry);
}

function escapeLinkText(text: string): string {
  return text.replace(/([\\[\]])/g, "\\$1");
}

/**
 * Render one listing line, leaving out absent fields
 */
export function renderEntry(entry: IndexEntry): string {
  const parts: string[] = [];
  if (entry.date) parts.push(entry.date);
  parts.push(`[${escapeLinkText(entry.title)}](${encodeURI(entry.path)})`);
  if (entry.subtitle) parts.push(entry.subtitle);
  if (entry.wordCount) parts.push(`${entry.wordCount} words`);
  return `- ${parts.join(" · ")}`;
}

/**
 * Render the listing page, front-matter included
 */
export function renderIndex(entries: IndexEntry[], title: string): string {
  const body = entries.length > 0
    ? entries.map(renderEntry).join("\n")
    : "_No posts yet._";

  return [
    "---",
    `title: ${JSON.stringify(title)}`,
    "generate_toc: false",
    "---",
    "",
    body,
    "",
  ].join("\n");
}

/**
 * Read the front-matter of every post one level inside the posts directory.
 * A blog without a posts directory yet has no posts.
 */
export async function collectIndexEntries(options: IndexOptions): Promise<IndexEntry[]> {
  if (!existsSync(options.contentDir)) {
    throw new ConfigError(`Content root does not exist: ${options.contentDir}`);
  }

  const postsRoot = join(options.contentDir, options.postsDir);
  const files = existsSync(postsRoot)
    ? await discoverContentFiles(postsRoot, { maxDepth: 1, extensions: options.extensions })
    : [];

  const postsDir = options.postsDir.replace(/\\/g, "/").replace(/\/+$/, "");
  const indexDir = posix.dirname(options.indexFile.replace(/\\/g, "/"));

  const dated: DatedEntry[] = [];
  for (const file of files) {
    const relativePath = `${postsDir}/${file}`;
    const raw = await readFile(join(postsRoot, file), "utf-8");
    const { frontmatter } = parseContent(raw, relativePath);

    const date = frontmatter?.date;
    const timestamp = date !== undefined ? parsePostDate(date, relativePath) : null;

    const output = swapExtension(relativePath, options.outputExtension);

    dated.push({
      entry: {
        title: frontmatter?.title || humanize(basename(file, extname(file))),
        subtitle: frontmatter?.subtitle,
        date,
        wordCount: frontmatter?.word_count,
        path: posix.relative(indexDir, output),
      },
      timestamp,
    });
  }

  return sortEntries(dated);
}

/**
 * Regenerate the listing page from the posts' front-matter
 */
export async function generateIndex(
  options: IndexOptions
): Promise<{ file: string; entries: IndexEntry[] }> {
  const entries = await collectIndexEntries(options);
  const file = join(options.contentDir, options.indexFile);

  await writeFile(file, renderIndex(entries, options.indexTitle), "utf-8");

  return { file, entries };
}

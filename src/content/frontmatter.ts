import matter from "gray-matter";
import { basename, extname } from "node:path";
import { FrontmatterError, describeError } from "../errors";
import { humanize } from "./filesystem";
import type { ContentFile, Frontmatter, Metadata, MetadataValue } from "./types";

const BLOCK_START = /^---\r?\n/;
const BLOCK = /^---\r?\n(?:[\s\S]*?\r?\n)?---[ \t]*(?:\r?\n|$)/;

const TRUE_VALUES = new Set(["true", "yes", "1"]);
const FALSE_VALUES = new Set(["false", "no", "0"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * YAML turns bare dates into Date objects; bring them back to the
 * string the author wrote
 */
function formatDate(value: Date, file: string, key: string): string {
  if (Number.isNaN(value.getTime())) {
    throw new FrontmatterError(file, `"${key}" is not a valid date`);
  }
  const iso = value.toISOString();
  return iso.endsWith("T00:00:00.000Z") ? iso.slice(0, 10) : iso;
}

function toScalar(value: unknown, file: string, key: string): MetadataValue | undefined {
  if (value === null || value === undefined) return undefined;
  if (value instanceof Date) return formatDate(value, file, key);
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return undefined;
}

function toText(value: unknown, file: string, key: string): string | undefined {
  const scalar = toScalar(value, file, key);
  if (scalar === undefined && value !== null && value !== undefined) {
    throw new FrontmatterError(file, `"${key}" must be a single value`);
  }
  return scalar === undefined ? undefined : String(scalar);
}

function toFlag(value: unknown, file: string): boolean | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === "boolean") return value;

  const normalized = String(value).toLowerCase().trim();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;

  throw new FrontmatterError(file, `"generate_toc" must be true or false, got ${JSON.stringify(value)}`);
}

/**
 * Normalize a parsed YAML mapping into the recognized keys plus extras.
 * Extra keys holding lists or mappings are dropped.
 */
function normalize(data: Record<string, unknown>, file: string): Frontmatter {
  const { title, subtitle, date, word_count, generate_toc, ...rest } = data;

  const extra: Metadata = {};
  for (const [key, value] of Object.entries(rest)) {
    const scalar = toScalar(value, file, key);
    if (scalar !== undefined) {
      extra[key] = scalar;
    }
  }

  return {
    title: toText(title, file, "title"),
    subtitle: toText(subtitle, file, "subtitle"),
    date: toText(date, file, "date"),
    word_count: toText(word_count, file, "word_count"),
    generate_toc: toFlag(generate_toc, file),
    extra,
  };
}

/**
 * Split a content file into frontmatter and body.
 *
 * A file without a leading `---` line has no frontmatter. A block that is
 * present but unterminated, invalid YAML, or not a mapping throws a
 * FrontmatterError.
 */
export function parseContent(raw: string, relativePath: string): ContentFile {
  if (!BLOCK_START.test(raw)) {
    return { relativePath, raw, frontmatter: null, body: raw };
  }

  if (!BLOCK.test(raw)) {
    throw new FrontmatterError(relativePath, "front-matter block is not terminated by a --- line");
  }

  let parsed: matter.GrayMatterFile<string>;
  try {
    // Passing options bypasses gray-matter's module-level cache
    parsed = matter(raw, {});
  } catch (error) {
    throw new FrontmatterError(
      relativePath,
      `invalid front-matter: ${describeError(error)}`,
      { cause: error }
    );
  }

  const data: unknown = parsed.data ?? {};
  if (!isRecord(data)) {
    throw new FrontmatterError(relativePath, "front-matter must be a list of key: value lines");
  }

  return {
    relativePath,
    raw,
    frontmatter: normalize(data, relativePath),
    body: parsed.content,
  };
}

/**
 * Merge global metadata defaults with a file's frontmatter, frontmatter
 * winning key by key. Files with no title anywhere get one from their name.
 */
export function resolveMetadata(defaults: Metadata, content: ContentFile): Metadata {
  const metadata: Metadata = { ...defaults };
  const frontmatter = content.frontmatter;

  if (frontmatter) {
    Object.assign(metadata, frontmatter.extra);
    const { extra: _extra, ...recognized } = frontmatter;
    for (const [key, value] of Object.entries(recognized)) {
      if (value !== undefined) {
        metadata[key] = value;
      }
    }
  }

  if (metadata.title === undefined || metadata.title === "") {
    const name = basename(content.relativePath, extname(content.relativePath));
    metadata.title = humanize(name);
  }

  return metadata;
}

import { readdir, stat } from "node:fs/promises";
import { extname, join, resolve } from "node:path";
import { ConfigError, describeError } from "../errors";

export interface DiscoveryOptions {
  /** Deepest level to descend to; files directly in the root are level 1 */
  maxDepth: number;
  /** Recognized content extensions, including the dot (".md") */
  extensions: string[];
}

/**
 * Known acronyms that contain vowels (consonant-only ones are auto-detected)
 */
const VOWEL_ACRONYMS = new Set([
  "ai", "api", "ui", "ux", "url", "io", "os", "aws", "ide",
  "yaml", "toml", "html", "css", "json", "xml", "sql", "graphql",
  "http", "https", "ip", "dns", "iot", "pdf", "svg", "csv", "md",
]);

/**
 * Check if a word should be fully capitalized as an acronym
 * - Known vowel-containing acronyms from explicit list
 * - 2-3 letter words with no vowels (likely acronyms: ml, db, vm, cdn, etc.)
 */
function isAcronym(word: string): boolean {
  const lower = word.toLowerCase();

  if (VOWEL_ACRONYMS.has(lower)) return true;

  if (lower.length >= 2 && lower.length <= 3 && !/[aeiouy]/.test(lower)) {
    return true;
  }

  return false;
}

/**
 * Humanize a filename into a display name
 * e.g., "on-category-theory" -> "On Category Theory"
 * e.g., "ml-notes" -> "ML Notes"
 */
export function humanize(filename: string): string {
  return filename
    .replace(/[-_]/g, " ")
    .replace(/\b\w/g, (c) => c.toUpperCase())
    .replace(/\b\w+\b/g, (word) =>
      isAcronym(word) ? word.toUpperCase() : word
    );
}

/**
 * Replace the extension of a path, e.g. ("notes/a.md", ".html") -> "notes/a.html"
 */
export function swapExtension(filePath: string, extension: string): string {
  const current = extname(filePath);
  const stem = current ? filePath.slice(0, -current.length) : filePath;
  return stem + extension;
}

/**
 * Where the output file for a content file lands, mirroring its relative path
 */
export function outputPathFor(
  relativePath: string,
  outDir: string,
  outputExtension: string
): string {
  return join(outDir, swapExtension(relativePath, outputExtension));
}

/**
 * Collect every content file under `rootPath`, up to `maxDepth` levels down.
 *
 * Returns forward-slash paths relative to the root, sorted. Hidden entries
 * and symlinks are skipped; symlinked directories are never followed.
 */
export async function discoverContentFiles(
  rootPath: string,
  options: DiscoveryOptions
): Promise<string[]> {
  const root = resolve(rootPath);

  let stats;
  try {
    stats = await stat(root);
  } catch (error) {
    throw new ConfigError(
      `Content root does not exist or cannot be read: ${root} (${describeError(error)})`,
      { cause: error }
    );
  }
  if (!stats.isDirectory()) {
    throw new ConfigError(`Content root is not a directory: ${root}`);
  }

  const extensions = new Set(options.extensions.map((ext) => ext.toLowerCase()));
  const files: string[] = [];
  await scanDirectory(root, "", 1, options.maxDepth, extensions, files);

  return files.sort();
}

async function scanDirectory(
  dirPath: string,
  relativePath: string,
  depth: number,
  maxDepth: number,
  extensions: Set<string>,
  out: string[]
): Promise<void> {
  const entries = await readdir(dirPath, { withFileTypes: true });

  for (const entry of entries) {
    // Skip hidden files and directories
    if (entry.name.startsWith(".")) continue;

    const entryRelativePath = relativePath
      ? `${relativePath}/${entry.name}`
      : entry.name;

    // Dirents for symlinks report neither isDirectory() nor isFile()
    if (entry.isDirectory()) {
      if (depth < maxDepth) {
        await scanDirectory(
          join(dirPath, entry.name),
          entryRelativePath,
          depth + 1,
          maxDepth,
          extensions,
          out
        );
      }
    } else if (entry.isFile() && extensions.has(extname(entry.name).toLowerCase())) {
      out.push(entryRelativePath);
    }
  }
}

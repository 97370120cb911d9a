/** A scalar front-matter or global metadata value */
export type MetadataValue = string | number | boolean;

/** Metadata handed to a converter: global defaults merged with front-matter */
export type Metadata = Record<string, MetadataValue>;

export interface Frontmatter {
  title?: string;
  subtitle?: string;
  /** Sortable date string, YAML dates normalized to YYYY-MM-DD */
  date?: string;
  /** Free-text display string, e.g. "1,200" */
  word_count?: string;
  generate_toc?: boolean;
  /** Keys outside the recognized set, carried through to the converter */
  extra: Metadata;
}

export interface ContentFile {
  /** Path relative to the content root, with forward slashes */
  relativePath: string;
  /** Raw file content */
  raw: string;
  /** Parsed frontmatter, null when the file has no block */
  frontmatter: Frontmatter | null;
  /** Markdown body without frontmatter */
  body: string;
}

/**
 * One line of the generated posts listing
 */
export interface IndexEntry {
  title: string;
  subtitle?: string;
  date?: string;
  wordCount?: string;
  /** Link to the post's output file, relative to the index page */
  path: string;
}

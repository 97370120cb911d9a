import { existsSync, readFileSync } from "node:fs";
import { extname, resolve } from "node:path";
import { Marked, type Tokens } from "marked";
import { swapExtension } from "../content/filesystem";
import { escapeHtml, highlightCode } from "./highlight";

export interface RenderOptions {
  /** Directory of the file being rendered, for resolving relative images */
  baseDir: string;
  /** Extensions of content files, whose links are rewritten */
  contentExtensions: string[];
  /** Extension that content links are rewritten to */
  outputExtension: string;
}

export interface Heading {
  depth: number;
  text: string;
  id: string;
}

export interface RenderedMarkdown {
  html: string;
  headings: Heading[];
}

interface PendingCodeBlock {
  placeholder: string;
  code: string;
  lang: string;
}

const IMAGE_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".svg": "image/svg+xml",
  ".webp": "image/webp",
  ".avif": "image/avif",
};

function isExternal(href: string): boolean {
  return /^[a-z][a-z0-9+.-]*:/i.test(href) || href.startsWith("//");
}

/**
 * Point relative links at content files to the file they are built into.
 * e.g., "../notes/intro.md#setup" -> "../notes/intro.html#setup"
 */
export function rewriteLink(href: string, options: RenderOptions): string {
  if (isExternal(href) || href.startsWith("#")) {
    return href;
  }

  const match = /^([^?#]*)(.*)$/.exec(href);
  const path = match?.[1] ?? href;
  const suffix = match?.[2] ?? "";

  const extensions = options.contentExtensions.map((ext) => ext.toLowerCase());
  if (!extensions.includes(extname(path).toLowerCase())) {
    return href;
  }

  return swapExtension(path, options.outputExtension) + suffix;
}

/**
 * Inline a local image as a data URI so the page needs no sibling files.
 * Images that cannot be found are left pointing at their original path.
 */
function embedImage(href: string, baseDir: string): string {
  if (isExternal(href)) {
    return href;
  }

  const mime = IMAGE_TYPES[extname(href).toLowerCase()];
  if (!mime) {
    return href;
  }

  let imagePath: string;
  try {
    imagePath = resolve(baseDir, decodeURI(href));
  } catch {
    // Malformed percent-encoding
    return href;
  }
  if (!existsSync(imagePath)) {
    return href;
  }

  return `data:${mime};base64,${readFileSync(imagePath).toString("base64")}`;
}

/**
 * Generate a slug from heading text for anchor links
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\w\s-]/g, "")
    .trim()
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-");
}

/**
 * Create a configured Marked instance along with the state its renderer fills in
 */
export function createMarkdownRenderer(options: RenderOptions) {
  const marked = new Marked();

  // Code blocks are highlighted asynchronously after parsing
  const codeBlocks: PendingCodeBlock[] = [];
  const headings: Heading[] = [];
  const usedIds = new Map<string, number>();
  let blockCounter = 0;

  const uniqueId = (text: string): string => {
    const base = slugify(text) || "section";
    const seen = usedIds.get(base) ?? 0;
    usedIds.set(base, seen + 1);
    return seen === 0 ? base : `${base}-${seen}`;
  };

  marked.use({
    renderer: {
      code({ text, lang }: Tokens.Code): string {
        const placeholder = `__CODE_BLOCK_${blockCounter++}__`;
        codeBlocks.push({ placeholder, code: text, lang: lang || "text" });
        return placeholder;
      },

      link({ href, title, tokens }: Tokens.Link): string {
        const resolvedHref = rewriteLink(href, options);
        const text = this.parser.parseInline(tokens);
        const titleAttr = title ? ` title="${escapeHtml(title)}"` : "";
        return `<a href="${escapeHtml(resolvedHref)}"${titleAttr}>${text}</a>`;
      },

      image({ href, title, text }: Tokens.Image): string {
        const src = embedImage(href, options.baseDir);
        const titleAttr = title ? ` title="${escapeHtml(title)}"` : "";
        return `<img src="${escapeHtml(src)}" alt="${escapeHtml(text)}"${titleAttr}>`;
      },

      // The page title comes from metadata, so h1 gets no anchor
      heading({ tokens, depth, text }: Tokens.Heading): string {
        const html = this.parser.parseInline(tokens);

        if (depth === 1) {
          return `<h1>${html}</h1>\n`;
        }

        const id = uniqueId(text);
        headings.push({ depth, text: html, id });
        return `<h${depth} id="${id}"><a class="anchor" href="#${id}">${html}</a></h${depth}>\n`;
      },
    },
  });

  return { marked, codeBlocks, headings };
}

/**
 * Render markdown to HTML, collecting headings for a table of contents
 */
export async function renderMarkdown(
  markdown: string,
  options: RenderOptions
): Promise<RenderedMarkdown> {
  const { marked, codeBlocks, headings } = createMarkdownRenderer(options);
  let html = await marked.parse(markdown);

  for (const block of codeBlocks) {
    const highlighted = await highlightCode(block.code, block.lang);
    html = html.replace(block.placeholder, () => highlighted);
  }

  return { html, headings };
}

/**
 * Render h2/h3 headings as a nested-by-class list of anchor links
 */
export function renderToc(headings: Heading[]): string {
  const items = headings
    .filter((heading) => heading.depth === 2 || heading.depth === 3)
    .map(
      (heading) =>
        `<li class="toc-h${heading.depth}"><a href="#${heading.id}">${heading.text}</a></li>`
    );

  if (items.length === 0) return "";

  return `<nav class="toc"><ul>${items.join("")}</ul></nav>`;
}

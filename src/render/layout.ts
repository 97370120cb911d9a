import type { Metadata } from "../content/types";
import { escapeHtml } from "./highlight";

export interface LayoutOptions {
  /** Resolved metadata for the page (title is always present) */
  metadata: Metadata;
  /** Rendered markdown body */
  content: string;
  /** Rendered table of contents, empty when disabled */
  toc: string;
  styles: string;
}

/**
 * Styles inlined into every page rendered with the built-in layout
 */
export const DEFAULT_STYLES = `
    * { box-sizing: border-box; margin: 0; padding: 0; }
    body { font-family: Georgia, "Times New Roman", serif; line-height: 1.6; color: #1f2937; background: #fff; }
    main { padding: 2rem 1rem; }
    article { max-width: 65ch; margin: 0 auto; }
    header { margin-bottom: 2rem; }
    .title { font-size: 2.25em; line-height: 1.2; }
    .subtitle { font-size: 1.25em; color: #4b5563; font-style: italic; }
    .byline { margin-top: 0.5em; font-size: 0.9em; color: #6b7280; }
    .toc { border-left: 3px solid #e5e7eb; padding-left: 1rem; margin-bottom: 2rem; }
    .toc ul { list-style: none; padding-left: 0; }
    .toc .toc-h3 { padding-left: 1rem; }
    pre { padding: 1rem; border-radius: 0.5rem; overflow-x: auto; margin-bottom: 1em; }
    code { font-family: ui-monospace, monospace; font-size: 0.9em; }
    a { color: #2563eb; }
    a.anchor { color: inherit; text-decoration: none; }
    h1, h2, h3, h4, h5, h6 { margin-top: 1.5em; margin-bottom: 0.5em; font-weight: 600; }
    h2 { font-size: 1.5em; }
    h3 { font-size: 1.25em; }
    p { margin-bottom: 1em; }
    ul, ol { margin-bottom: 1em; padding-left: 1.5em; }
    blockquote { border-left: 3px solid #d1d5db; padding-left: 1rem; color: #4b5563; }
    img { max-width: 100%; }
    table { border-collapse: collapse; margin-bottom: 1em; }
    th, td { border: 1px solid #e5e7eb; padding: 0.5rem; }
    @media (prefers-color-scheme: dark) {
      body { color: #e5e7eb; background: #111827; }
      .subtitle, .byline, blockquote { color: #9ca3af; }
      .shiki, .shiki span { color: var(--shiki-dark) !important; background-color: var(--shiki-dark-bg) !important; }
    }
  `;

function text(metadata: Metadata, key: string): string {
  const value = metadata[key];
  return value === undefined ? "" : escapeHtml(String(value));
}

/**
 * Render the full HTML page
 */
export function renderLayout(options: LayoutOptions): string {
  const { metadata, content, toc, styles } = options;
  const title = text(metadata, "title");
  const subtitle = text(metadata, "subtitle");
  const lang = text(metadata, "lang") || "en";

  const bylineParts: string[] = [];
  if (metadata.date !== undefined) bylineParts.push(text(metadata, "date"));
  if (metadata.word_count !== undefined) bylineParts.push(`${text(metadata, "word_count")} words`);

  return `<!DOCTYPE html>
<html lang="${lang}">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${title}</title>
  <style>${styles}</style>
</head>
<body>
  <main>
    <article>
      <header>
        <h1 class="title">${title}</h1>
        ${subtitle ? `<p class="subtitle">${subtitle}</p>` : ""}
        ${bylineParts.length > 0 ? `<p class="byline">${bylineParts.join(" · ")}</p>` : ""}
      </header>
      ${toc}
      ${content}
    </article>
  </main>
</body>
</html>
`;
}

/**
 * Render a 404 page
 */
export function render404(styles: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Not Found</title>
  <style>${styles}</style>
</head>
<body>
  <main>
    <article>
      <h1>404</h1>
      <p>Page not found</p>
      <a href="/">Go back home</a>
    </article>
  </main>
</body>
</html>
`;
}

import { createHighlighter, type Highlighter } from "shiki";

/**
 * Languages loaded up front, by their shiki ids
 */
export const LANGUAGES = [
  "typescript",
  "tsx",
  "javascript",
  "jsx",
  "json",
  "shellscript",
  "markdown",
  "html",
  "css",
  "yaml",
  "toml",
  "python",
  "haskell",
  "rust",
  "go",
  "c",
  "cpp",
  "latex",
  "sql",
  "diff",
] as const;

/** Fence names authors use for the languages above */
const ALIASES: Record<string, string> = {
  ts: "typescript",
  js: "javascript",
  sh: "shellscript",
  bash: "shellscript",
  zsh: "shellscript",
  shell: "shellscript",
  md: "markdown",
  yml: "yaml",
  py: "python",
  hs: "haskell",
  rs: "rust",
  golang: "go",
  "c++": "cpp",
  tex: "latex",
};

let highlighterPromise: Promise<Highlighter> | null = null;

/**
 * Get or create the Shiki highlighter instance
 */
export async function getHighlighter(): Promise<Highlighter> {
  if (!highlighterPromise) {
    highlighterPromise = createHighlighter({
      themes: ["github-dark", "github-light"],
      langs: [...LANGUAGES],
    });
  }

  return highlighterPromise;
}

/**
 * Map a code fence's info string to a loaded language id, or "text"
 * e.g., "ts" -> "typescript", "Bash" -> "shellscript", "brainfuck" -> "text"
 */
export function resolveLanguage(lang: string, loaded: readonly string[]): string {
  // Info strings may carry attributes after the language: "ts title=app.ts"
  const name = (lang.trim().split(/\s+/)[0] ?? "").toLowerCase();
  const id = ALIASES[name] ?? name;
  return loaded.includes(id) ? id : "text";
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * Highlight code using Shiki, falling back to plain text for unknown languages
 */
export async function highlightCode(
  code: string,
  lang: string
): Promise<string> {
  const highlighter = await getHighlighter();
  const language = resolveLanguage(lang, highlighter.getLoadedLanguages());

  try {
    return highlighter.codeToHtml(code, {
      lang: language,
      themes: {
        light: "github-light",
        dark: "github-dark",
      },
    });
  } catch {
    // If highlighting fails, return escaped code
    return `<pre><code class="language-${language}">${escapeHtml(code)}</code></pre>`;
  }
}

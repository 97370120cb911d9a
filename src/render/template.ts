import type { Metadata } from "../content/types";
import { escapeHtml } from "./highlight";

const PLACEHOLDER = /\$\$|\$([A-Za-z_][\w-]*)\$/g;

export interface TemplateSlots {
  body: string;
  toc: string;
  styles: string;
}

/**
 * Fill `$name$` placeholders in a template file.
 *
 * Metadata values are HTML-escaped, the slots (`$body$`, `$toc$`,
 * `$styles$`) are inserted as-is. Unknown names render empty and `$$`
 * renders a single `$`. Conditionals and loops are not supported.
 */
export function renderTemplate(
  template: string,
  metadata: Metadata,
  slots: TemplateSlots
): string {
  const values = new Map<string, string>();
  for (const [key, value] of Object.entries(metadata)) {
    values.set(key, escapeHtml(String(value)));
  }
  values.set("body", slots.body);
  values.set("toc", slots.toc);
  values.set("styles", slots.styles);

  return template.replace(PLACEHOLDER, (match, name: string | undefined) => {
    if (name === undefined) return "$";
    return values.get(name) ?? "";
  });
}

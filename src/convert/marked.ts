import { readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { parseContent, resolveMetadata } from "../content/frontmatter";
import { DEFAULT_STYLES, renderLayout } from "../render/layout";
import { renderMarkdown, renderToc } from "../render/markdown";
import { renderTemplate } from "../render/template";
import type { ConversionJob, DocumentConverter } from "./types";

export interface MarkedConverterOptions {
  contentExtensions: string[];
  outputExtension: string;
  styles?: string;
}

/**
 * In-process converter: marked for markdown, shiki for code blocks
 */
export class MarkedConverter implements DocumentConverter {
  readonly name = "marked";
  private options: MarkedConverterOptions;
  private styles: string;

  constructor(options: MarkedConverterOptions) {
    this.options = options;
    this.styles = options.styles ?? DEFAULT_STYLES;
  }

  async convert(job: ConversionJob): Promise<void> {
    const raw = await readFile(job.source, "utf-8");
    const content = parseContent(raw, job.relativePath);
    const metadata = resolveMetadata(job.shared.metadata, content);

    const { html, headings } = await renderMarkdown(content.body, {
      baseDir: dirname(job.source),
      contentExtensions: this.options.contentExtensions,
      outputExtension: this.options.outputExtension,
    });
    const toc = metadata.generate_toc === true ? renderToc(headings) : "";

    const page = job.shared.template
      ? renderTemplate(job.shared.template, metadata, { body: html, toc, styles: this.styles })
      : renderLayout({ metadata, content: html, toc, styles: this.styles });

    job.signal.throwIfAborted();
    await writeFile(job.destination, page, { encoding: "utf-8", signal: job.signal });
  }
}

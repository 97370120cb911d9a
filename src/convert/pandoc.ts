import { execFile } from "node:child_process";
import { readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { promisify } from "node:util";
import { parseContent, resolveMetadata } from "../content/frontmatter";
import type { ConversionJob, DocumentConverter } from "./types";

const execFileAsync = promisify(execFile);

export interface PandocConverterOptions {
  /** pandoc executable, looked up on PATH unless absolute */
  pandocPath: string;
}

/**
 * Command-line arguments for one pandoc run
 */
export function pandocArgs(
  job: ConversionJob,
  options: { toc: boolean; pageTitle: string }
): string[] {
  const args = [
    job.source,
    "--from", "markdown",
    "--to", "html5",
    "--standalone",
    "--embed-resources",
    "--resource-path", dirname(job.source),
    "--metadata", `pagetitle=${options.pageTitle}`,
    "--output", job.destination,
  ];

  if (job.shared.templatePath) {
    args.push("--template", job.shared.templatePath);
  }
  if (job.shared.metadataFile) {
    args.push("--metadata-file", job.shared.metadataFile);
  }
  if (options.toc) {
    args.push("--toc");
  }

  return args;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Turn a failed execFile call into a message that says what pandoc said
 */
function describePandocFailure(error: unknown, pandocPath: string): string {
  if (!isRecord(error)) {
    return String(error);
  }

  if (error.code === "ENOENT") {
    return `pandoc executable not found: ${pandocPath}`;
  }
  if (error.name === "AbortError") {
    return "pandoc was aborted";
  }

  const stderr = typeof error.stderr === "string" ? error.stderr.trim() : "";
  const code = typeof error.code === "number" ? ` with code ${error.code}` : "";
  const message = typeof error.message === "string" ? error.message : "pandoc failed";

  return stderr ? `pandoc exited${code}: ${stderr}` : message;
}

/**
 * Converter that shells out to pandoc, which embeds images, styles and
 * scripts into the output itself
 */
export class PandocConverter implements DocumentConverter {
  readonly name = "pandoc";
  private pandocPath: string;

  constructor(options: PandocConverterOptions) {
    this.pandocPath = options.pandocPath;
  }

  async convert(job: ConversionJob): Promise<void> {
    // Read the frontmatter ourselves so a malformed block fails the same way
    // it does with the in-process converter
    const raw = await readFile(job.source, "utf-8");
    const content = parseContent(raw, job.relativePath);
    const metadata = resolveMetadata(job.shared.metadata, content);

    const args = pandocArgs(job, {
      toc: metadata.generate_toc === true,
      pageTitle: String(metadata.title),
    });

    try {
      await execFileAsync(this.pandocPath, args, {
        signal: job.signal,
        maxBuffer: 16 * 1024 * 1024,
      });
    } catch (error) {
      throw new Error(describePandocFailure(error, this.pandocPath), { cause: error });
    }
  }
}

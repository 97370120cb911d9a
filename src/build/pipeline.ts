import { randomBytes } from "node:crypto";
import { mkdir, rename, rm } from "node:fs/promises";
import { dirname, join, relative, resolve } from "node:path";
import { discoverContentFiles, outputPathFor, swapExtension } from "../content/filesystem";
import type { DocumentConverter, SharedInputs } from "../convert/types";
import { ConversionError, FrontmatterError, describeError } from "../errors";
import { consoleLogger, type Logger } from "../logger";
import { cleanOutputDir } from "./clean";
import { runTaskGroup } from "./task-group";

export interface PipelineOptions {
  contentDir: string;
  outDir: string;
  outputExtension: string;
  converter: DocumentConverter;
  shared: SharedInputs;
  /** Maximum simultaneous conversions */
  concurrency: number;
  /** Per-file timeout in milliseconds, null for none */
  timeoutMs: number | null;
  /** Cancels conversions that have not started yet */
  signal?: AbortSignal;
  logger?: Logger;
}

export interface BuildOptions extends PipelineOptions {
  maxDepth: number;
  extensions: string[];
  /** Remove the output directory before building (default true) */
  clean?: boolean;
  /** Working directory, protected from the clean */
  cwd?: string;
}

export interface BuildFailure {
  file: string;
  error: ConversionError;
}

export interface BuildResult {
  /** Every content file found, relative to the content root */
  discovered: string[];
  /** Files converted successfully */
  built: string[];
  failed: BuildFailure[];
}

function toConversionError(file: string, error: unknown): ConversionError {
  if (error instanceof ConversionError) return error;
  const message = error instanceof FrontmatterError ? error.reason : describeError(error);
  return new ConversionError(file, message, { cause: error });
}

/**
 * Convert one file into a temporary sibling of its destination and rename
 * it into place, so a failed conversion never leaves a partial output file
 */
export async function convertFile(
  relativePath: string,
  options: PipelineOptions,
  signal: AbortSignal
): Promise<string> {
  const source = join(options.contentDir, relativePath);
  const destination = outputPathFor(relativePath, options.outDir, options.outputExtension);
  const temporary = `${destination}.${randomBytes(6).toString("hex")}.tmp`;

  try {
    await mkdir(dirname(destination), { recursive: true });
    await options.converter.convert({
      source,
      relativePath,
      destination: temporary,
      shared: options.shared,
      signal,
    });
    await rename(temporary, destination);
  } catch (error) {
    await rm(temporary, { force: true });
    throw toConversionError(relativePath, error);
  }

  return destination;
}

function taskSignal(options: PipelineOptions): AbortSignal {
  const signals: AbortSignal[] = [];
  if (options.signal) signals.push(options.signal);
  if (options.timeoutMs !== null) signals.push(AbortSignal.timeout(options.timeoutMs));
  return signals.length > 0 ? AbortSignal.any(signals) : new AbortController().signal;
}

/**
 * Convert a set of content files in parallel and wait for all of them.
 * Failures are collected, never thrown.
 */
export async function convertFiles(
  relativePaths: readonly string[],
  options: PipelineOptions
): Promise<Omit<BuildResult, "discovered">> {
  const logger = options.logger ?? consoleLogger;
  const outDir = resolve(options.outDir);

  const outcomes = await runTaskGroup(
    relativePaths,
    async (relativePath) => {
      const destination = await convertFile(relativePath, options, taskSignal(options));
      logger.info(`  ${relativePath}  →  ${relative(outDir, destination)}`);
      return relativePath;
    },
    { concurrency: options.concurrency, signal: options.signal }
  );

  const built: string[] = [];
  const failed: BuildFailure[] = [];

  outcomes.forEach((outcome, i) => {
    const file = relativePaths[i];
    if (outcome.ok) {
      built.push(outcome.value);
    } else {
      failed.push({ file, error: toConversionError(file, outcome.error) });
    }
  });

  return { built, failed };
}

/**
 * Group content files that would be built into the same output file,
 * e.g. "notes.md" and "notes.markdown". Only groups of two or more are returned.
 */
export function findOutputCollisions(
  relativePaths: readonly string[],
  outputExtension: string
): string[][] {
  const byOutput = new Map<string, string[]>();
  for (const relativePath of relativePaths) {
    const output = swapExtension(relativePath, outputExtension);
    const group = byOutput.get(output);
    if (group) {
      group.push(relativePath);
    } else {
      byOutput.set(output, [relativePath]);
    }
  }
  return [...byOutput.values()].filter((group) => group.length > 1);
}

function collisionFailures(groups: string[][], outputExtension: string): BuildFailure[] {
  return groups.flatMap((group) =>
    group.map((file) => {
      const others = group.filter((other) => other !== file).join(", ");
      const output = swapExtension(file, outputExtension);
      return {
        file,
        error: new ConversionError(file, `${output} would also be built from ${others}`),
      };
    })
  );
}

/**
 * Discover every content file and convert it into the output tree.
 * Files that share an output path are not converted and fail together.
 */
export async function buildSite(options: BuildOptions): Promise<BuildResult> {
  const logger = options.logger ?? consoleLogger;

  const discovered = await discoverContentFiles(options.contentDir, {
    maxDepth: options.maxDepth,
    extensions: options.extensions,
  });
  logger.info(`Found ${discovered.length} content file(s)`);

  if (options.clean ?? true) {
    await cleanOutputDir(options.outDir, {
      contentDir: options.contentDir,
      cwd: options.cwd ?? process.cwd(),
    });
  }
  await mkdir(options.outDir, { recursive: true });

  const collisions = findOutputCollisions(discovered, options.outputExtension);
  const colliding = new Set(collisions.flat());
  const { built, failed } = await convertFiles(
    discovered.filter((file) => !colliding.has(file)),
    options
  );

  const order = new Map(discovered.map((file, i) => [file, i]));
  const allFailed = [...collisionFailures(collisions, options.outputExtension), ...failed].sort(
    (a, b) => (order.get(a.file) ?? 0) - (order.get(b.file) ?? 0)
  );

  return { discovered, built, failed: allFailed };
}

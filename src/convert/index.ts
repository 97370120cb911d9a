import { readFile } from "node:fs/promises";
import type { SiteConfig } from "../config";
import type { Metadata } from "../content/types";
import { ConfigError, describeError } from "../errors";
import { MarkedConverter } from "./marked";
import { PandocConverter } from "./pandoc";
import type { DocumentConverter, SharedInputs } from "./types";

export type { ConversionJob, DocumentConverter, SharedInputs } from "./types";

export function createConverter(config: SiteConfig): DocumentConverter {
  if (config.converter === "pandoc") {
    return new PandocConverter({ pandocPath: config.pandocPath });
  }
  return new MarkedConverter({
    contentExtensions: config.extensions,
    outputExtension: config.outputExtension,
  });
}

async function readConfiguredFile(path: string, what: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read ${what} ${path}: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Parse a global metadata file: a JSON object of strings, numbers and booleans
 */
export function parseMetadata(text: string, source: string): Metadata {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${source}: ${describeError(error)}`, { cause: error });
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`${source}: metadata must be a JSON object`);
  }

  const metadata: Metadata = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
      throw new ConfigError(`${source}: metadata "${key}" must be a string, number or boolean`);
    }
    metadata[key] = value;
  }
  return metadata;
}

/**
 * Load the template and global metadata once, before any conversion starts
 */
export async function loadSharedInputs(config: SiteConfig): Promise<SharedInputs> {
  const template = config.template
    ? await readConfiguredFile(config.template, "template")
    : null;

  const metadata = config.metadataFile
    ? parseMetadata(await readConfiguredFile(config.metadataFile, "metadata file"), config.metadataFile)
    : {};

  return {
    templatePath: config.template,
    template,
    metadata,
    metadataFile: config.metadataFile,
  };
}

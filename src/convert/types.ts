import type { Metadata } from "../content/types";

/**
 * Read-only inputs shared by every conversion in a build
 */
export interface SharedInputs {
  /** Template file path, null for the built-in layout */
  templatePath: string | null;
  /** Template file contents, loaded once per build */
  template: string | null;
  /** Global metadata defaults */
  metadata: Metadata;
  /** File the metadata was loaded from, if any */
  metadataFile: string | null;
}

export interface ConversionJob {
  /** Absolute path of the content file */
  source: string;
  /** Path relative to the content root, with forward slashes */
  relativePath: string;
  /** Where to write the output. Converters write nowhere else. */
  destination: string;
  shared: SharedInputs;
  /** Aborted on cancellation or timeout */
  signal: AbortSignal;
}

/**
 * Turns one content file into one self-contained output file
 */
export interface DocumentConverter {
  readonly name: string;
  convert(job: ConversionJob): Promise<void>;
}

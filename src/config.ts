import { existsSync, readFileSync } from "node:fs";
import { availableParallelism } from "node:os";
import { dirname, join, resolve } from "node:path";
import { ConfigError } from "./errors";

export const CONFIG_FILENAME = ".mdsite.json";

export type ConverterName = "marked" | "pandoc";

/**
 * Fully resolved settings for one invocation. Paths are absolute.
 */
export interface SiteConfig {
  contentDir: string;
  outDir: string;
  template: string | null;
  metadataFile: string | null;
  maxDepth: number;
  extensions: string[];
  outputExtension: string;
  concurrency: number;
  /** Per-file conversion timeout, null for none */
  timeoutMs: number | null;
  converter: ConverterName;
  pandocPath: string;
  postsDir: string;
  indexFile: string;
  indexTitle: string;
  host: string;
  port: number;
}

/** Settings as written in a config file or given as flags */
export type PartialConfig = Partial<SiteConfig>;

const PATH_KEYS = ["contentDir", "outDir", "template", "metadataFile"] as const;

function defaults(baseDir: string): SiteConfig {
  return {
    contentDir: resolve(baseDir, "content"),
    outDir: resolve(baseDir, "build"),
    template: null,
    metadataFile: null,
    maxDepth: 8,
    extensions: [".md"],
    outputExtension: ".html",
    concurrency: availableParallelism(),
    timeoutMs: null,
    converter: "marked",
    pandocPath: "pandoc",
    postsDir: "posts",
    indexFile: "index.md",
    indexTitle: "Posts",
    host: "127.0.0.1",
    port: 3000,
  };
}

/**
 * Find config file by walking up from a directory
 */
export function findConfig(startDir: string): string | null {
  let current = resolve(startDir);

  while (true) {
    const configPath = join(current, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      return configPath;
    }
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectString(value: unknown, key: string, source: string): string {
  if (typeof value !== "string" || value === "") {
    throw new ConfigError(`${source}: "${key}" must be a non-empty string`);
  }
  return value;
}

function expectPositiveInt(value: unknown, key: string, source: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${source}: "${key}" must be a positive integer`);
  }
  return value;
}

function expectExtension(value: unknown, key: string, source: string): string {
  const ext = expectString(value, key, source);
  if (!/^\.[\w.-]+$/.test(ext)) {
    throw new ConfigError(`${source}: "${key}" must look like ".md", got "${ext}"`);
  }
  return ext;
}

/**
 * Check a parsed config object key by key.
 * Relative paths resolve against `baseDir`.
 */
export function validateConfig(raw: unknown, baseDir: string, source: string): PartialConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source}: config must be a JSON object`);
  }

  const config: PartialConfig = {};

  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case "contentDir":
      case "outDir":
      case "template":
      case "metadataFile":
        config[key] = resolve(baseDir, expectString(value, key, source));
        break;
      case "pandocPath":
      case "postsDir":
      case "indexFile":
      case "indexTitle":
      case "host":
        config[key] = expectString(value, key, source);
        break;
      case "maxDepth":
      case "concurrency":
        config[key] = expectPositiveInt(value, key, source);
        break;
      case "timeoutMs":
        config.timeoutMs = value === null ? null : expectPositiveInt(value, key, source);
        break;
      case "port": {
        const port = expectPositiveInt(value, key, source);
        if (port > 65535) {
          throw new ConfigError(`${source}: "port" must be between 1 and 65535`);
        }
        config.port = port;
        break;
      }
      case "converter":
        if (value !== "marked" && value !== "pandoc") {
          throw new ConfigError(`${source}: "converter" must be "marked" or "pandoc"`);
        }
        config.converter = value;
        break;
      case "extensions":
        if (!Array.isArray(value) || value.length === 0) {
          throw new ConfigError(`${source}: "extensions" must be a non-empty array`);
        }
        config.extensions = value.map((ext) => expectExtension(ext, key, source));
        break;
      case "outputExtension":
        config.outputExtension = expectExtension(value, key, source);
        break;
      default:
        throw new ConfigError(`${source}: unknown config key "${key}"`);
    }
  }

  return config;
}

/**
 * Load and parse config file, resolving relative paths from its location
 */
export function loadConfig(configPath: string): PartialConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file: ${configPath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${configPath}: ${error}`, { cause: error });
  }

  return validateConfig(parsed, dirname(configPath), configPath);
}

export interface ResolveConfigOptions {
  /** Directory to search from and resolve defaults against */
  cwd: string;
  /** Explicit config file, skips the search */
  configPath?: string;
  /** Flag values, applied last. Leave unset flags out rather than undefined. */
  overrides?: PartialConfig;
}

/**
 * Defaults, then the config file, then flags.
 * Returns the config and the file it came from, if any.
 */
export function resolveConfig(options: ResolveConfigOptions): {
  config: SiteConfig;
  configPath: string | null;
} {
  const configPath = options.configPath
    ? resolve(options.cwd, options.configPath)
    : findConfig(options.cwd);

  if (options.configPath && configPath && !existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  const fromFile = configPath ? loadConfig(configPath) : {};
  const base = configPath ? dirname(configPath) : options.cwd;

  const overrides: PartialConfig = { ...options.overrides };
  for (const key of PATH_KEYS) {
    const value = overrides[key];
    if (typeof value === "string") {
      overrides[key] = resolve(options.cwd, value);
    }
  }

  const config: SiteConfig = { ...defaults(base), ...fromFile, ...overrides };

  return { config, configPath };
}

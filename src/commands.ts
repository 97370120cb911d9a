import { existsSync } from "node:fs";
import { relative } from "node:path";
import { parseArgs } from "node:util";
import { cleanOutputDir } from "./build/clean";
import { buildSite, type PipelineOptions } from "./build/pipeline";
import { CONFIG_FILENAME, resolveConfig, type PartialConfig, type SiteConfig } from "./config";
import { generateIndex } from "./content/posts-index";
import { createConverter, loadSharedInputs } from "./convert";
import { ExitCode, MdsiteError, UsageError } from "./errors";
import type { Logger } from "./logger";
import { startPreview } from "./server";

export const HELP = `
mdsite - Build a markdown blog into self-contained HTML pages

USAGE:
  mdsite <command> [options]

COMMANDS:
  build                 Convert every content file into the output directory
  index                 Regenerate the posts listing page from post front-matter
  serve                 Serve the output directory on a local address
  clean                 Remove the output directory
  help                  Show this help message

OPTIONS:
  -c, --config <file>   Path to config file (default: find ${CONFIG_FILENAME})
  -o, --out <dir>       Output directory (default: build)
      --content <dir>   Content root (default: content)
  -j, --concurrency <n> Maximum simultaneous conversions (default: CPU count)
      --timeout <ms>    Per-file conversion timeout (default: none)
      --converter <name> marked (default) or pandoc
  -p, --port <port>     Port for serve (default: 3000)
      --host <host>     Host for serve (default: 127.0.0.1)
  -w, --watch           With serve: rebuild content files as they change
  -h, --help            Show this help message

CONFIG FILE (${CONFIG_FILENAME}):
  {
    "contentDir": "./content",
    "outDir": "./build",
    "template": "./template.html",
    "metadataFile": "./metadata.json",
    "postsDir": "posts",
    "converter": "pandoc"
  }

EXIT CODES:
  0 success, 1 some files failed to convert, 2 usage error,
  3 configuration error, 4 malformed front-matter while indexing

ENVIRONMENT:
  MDSITE_CONFIG         Config file path (alternative to --config)
`;

const COMMANDS = ["build", "index", "serve", "clean", "help"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export interface RunContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  logger: Logger;
}

function parsePositiveInt(flag: string, value: string, max = Number.MAX_SAFE_INTEGER): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > max) {
    throw new UsageError(`Invalid ${flag}: ${value}`);
  }
  return parsed;
}

function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        config: { type: "string", short: "c" },
        out: { type: "string", short: "o" },
        content: { type: "string" },
        concurrency: { type: "string", short: "j" },
        timeout: { type: "string" },
        converter: { type: "string" },
        port: { type: "string", short: "p" },
        host: { type: "string" },
        watch: { type: "boolean", short: "w", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
      allowPositionals: true,
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

type ParsedValues = ReturnType<typeof parseCommandLine>["values"];

/**
 * Turn flags into config overrides, leaving unset flags out
 */
function overridesFrom(values: ParsedValues): PartialConfig {
  const overrides: PartialConfig = {};

  if (values.out !== undefined) overrides.outDir = values.out;
  if (values.content !== undefined) overrides.contentDir = values.content;
  if (values.concurrency !== undefined) {
    overrides.concurrency = parsePositiveInt("--concurrency", values.concurrency);
  }
  if (values.timeout !== undefined) {
    overrides.timeoutMs = parsePositiveInt("--timeout", values.timeout);
  }
  if (values.converter !== undefined) {
    if (values.converter !== "marked" && values.converter !== "pandoc") {
      throw new UsageError(`Invalid --converter: ${values.converter} (expected marked or pandoc)`);
    }
    overrides.converter = values.converter;
  }
  if (values.port !== undefined) overrides.port = parsePositiveInt("--port", values.port, 65535);
  if (values.host !== undefined) overrides.host = values.host;

  return overrides;
}

async function pipelineOptions(config: SiteConfig, logger: Logger): Promise<PipelineOptions> {
  return {
    contentDir: config.contentDir,
    outDir: config.outDir,
    outputExtension: config.outputExtension,
    converter: createConverter(config),
    shared: await loadSharedInputs(config),
    concurrency: config.concurrency,
    timeoutMs: config.timeoutMs,
    logger,
  };
}

async function runBuild(config: SiteConfig, ctx: RunContext): Promise<ExitCode> {
  const { logger } = ctx;
  const options = await pipelineOptions(config, logger);

  const result = await buildSite({
    ...options,
    maxDepth: config.maxDepth,
    extensions: config.extensions,
    cwd: ctx.cwd,
  });

  for (const { file, error } of result.failed) {
    logger.error(`FAILED ${file}: ${error.message}`);
  }

  const outLabel = relative(ctx.cwd, config.outDir) || ".";
  logger.info(`Built ${result.built.length} of ${result.discovered.length} file(s) into ${outLabel}`);

  return result.failed.length > 0 ? ExitCode.BuildFailed : ExitCode.Success;
}

async function runIndex(config: SiteConfig, ctx: RunContext): Promise<ExitCode> {
  const { file, entries } = await generateIndex({
    contentDir: config.contentDir,
    postsDir: config.postsDir,
    indexFile: config.indexFile,
    indexTitle: config.indexTitle,
    extensions: config.extensions,
    outputExtension: config.outputExtension,
  });

  ctx.logger.info(`Indexed ${entries.length} post(s) into ${relative(ctx.cwd, file) || file}`);
  return ExitCode.Success;
}

async function runClean(config: SiteConfig, ctx: RunContext): Promise<ExitCode> {
  const removed = await cleanOutputDir(config.outDir, {
    contentDir: config.contentDir,
    cwd: ctx.cwd,
  });

  const outLabel = relative(ctx.cwd, config.outDir) || config.outDir;
  ctx.logger.info(removed ? `Removed ${outLabel}` : `Nothing to clean: ${outLabel} does not exist`);
  return ExitCode.Success;
}

async function runServe(config: SiteConfig, watch: boolean, ctx: RunContext): Promise<ExitCode> {
  const { logger } = ctx;

  let rebuild: (PipelineOptions & { extensions: string[] }) | undefined;
  if (watch) {
    const buildCode = await runBuild(config, ctx);
    if (buildCode !== ExitCode.Success) {
      logger.warn("Initial build had failures; serving what was built");
    }
    rebuild = { ...(await pipelineOptions(config, logger)), extensions: config.extensions };
  } else if (!existsSync(config.outDir)) {
    logger.warn(`Warning: ${config.outDir} does not exist yet. Run 'mdsite build' first.`);
  }

  logger.info("Starting mdsite...");
  logger.info(`  Serving: ${config.outDir}`);

  await startPreview({
    root: config.outDir,
    host: config.host,
    port: config.port,
    logger,
    rebuild,
  });

  return ExitCode.Success;
}

/**
 * Run one CLI invocation and return its exit code.
 * Errors that carry an exit code are reported here; anything else is thrown.
 */
export async function run(argv: string[], ctx: RunContext): Promise<ExitCode> {
  const { logger } = ctx;

  try {
    const { values, positionals } = parseCommandLine(argv);
    const [commandName, ...rest] = positionals;

    if (values.help || commandName === undefined) {
      logger.info(HELP);
      return ExitCode.Success;
    }

    if (!isCommand(commandName)) {
      logger.error(`Error: Unknown command: ${commandName}\n`);
      logger.error(HELP);
      return ExitCode.Usage;
    }

    if (commandName === "help") {
      logger.info(HELP);
      return ExitCode.Success;
    }

    if (rest.length > 0) {
      throw new UsageError(`Unexpected argument: ${rest[0]}`);
    }

    const { config, configPath } = resolveConfig({
      cwd: ctx.cwd,
      configPath: values.config ?? ctx.env.MDSITE_CONFIG,
      overrides: overridesFrom(values),
    });

    if (configPath) {
      logger.info(`Using config: ${configPath}`);
    }

    switch (commandName) {
      case "build":
        return await runBuild(config, ctx);
      case "index":
        return await runIndex(config, ctx);
      case "clean":
        return await runClean(config, ctx);
      case "serve":
        return await runServe(config, values.watch, ctx);
    }
  } catch (error) {
    if (error instanceof MdsiteError) {
      logger.error(`Error: ${error.message}`);
      return error.exitCode;
    }
    throw error;
  }
}

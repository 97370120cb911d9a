import { serve } from "@hono/node-server";
import { watch, type FSWatcher } from "chokidar";
import { Hono } from "hono";
import { readFile, stat } from "node:fs/promises";
import type { Server } from "node:net";
import { extname, join, relative, resolve } from "node:path";
import { isWithin } from "./build/clean";
import { convertFiles, type PipelineOptions } from "./build/pipeline";
import type { Logger } from "./logger";
import { DEFAULT_STYLES, render404 } from "./render/layout";

const CONTENT_TYPES: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".htm": "text/html; charset=utf-8",
  ".css": "text/css; charset=utf-8",
  ".js": "text/javascript; charset=utf-8",
  ".json": "application/json",
  ".txt": "text/plain; charset=utf-8",
  ".xml": "application/xml",
  ".svg": "image/svg+xml",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".ico": "image/x-icon",
  ".pdf": "application/pdf",
};

export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[extname(filePath).toLowerCase()] ?? "application/octet-stream";
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Map a URL path to a file under root
 * e.g., "/" -> "index.html", "/posts/a" -> "posts/a", "posts/a.html" or "posts/a/index.html"
 *
 * Hidden segments and ".." never resolve.
 */
export async function resolveStaticFile(root: string, urlPath: string): Promise<string | null> {
  let decoded: string;
  try {
    decoded = decodeURIComponent(urlPath);
  } catch {
    return null;
  }

  const segments = decoded.split("/").filter(Boolean);
  if (segments.some((segment) => segment.startsWith(".") || segment.includes("\\"))) {
    return null;
  }

  const base = join(root, ...segments);
  const candidates = segments.length === 0
    ? [join(root, "index.html")]
    : [base, `${base}.html`, join(base, "index.html")];

  for (const candidate of candidates) {
    if (await isFile(candidate)) {
      return candidate;
    }
  }

  return null;
}

export interface ServerOptions {
  /** Directory to serve, normally the build output */
  root: string;
  styles?: string;
}

export function createServer(options: ServerOptions) {
  const root = resolve(options.root);
  const styles = options.styles ?? DEFAULT_STYLES;
  const app = new Hono();

  app.get("*", async (c) => {
    const filePath = await resolveStaticFile(root, c.req.path);

    if (!filePath) {
      return c.html(render404(styles), 404);
    }

    return new Response(await readFile(filePath), {
      status: 200,
      headers: { "Content-Type": contentTypeFor(filePath) },
    });
  });

  return app;
}

export interface PreviewOptions {
  root: string;
  host: string;
  port: number;
  logger: Logger;
  /** When set, content changes are rebuilt through this pipeline */
  rebuild?: PipelineOptions & { extensions: string[] };
}

/**
 * Serve the output directory until SIGINT or SIGTERM, then resolve
 */
export function startPreview(options: PreviewOptions): Promise<void> {
  const { logger } = options;
  const app = createServer({ root: options.root });

  return new Promise((resolvePromise, reject) => {
    let server: Server;
    let watcher: FSWatcher | null = null;

    try {
      server = serve({ fetch: app.fetch, hostname: options.host, port: options.port }, (info) => {
        logger.info(`  URL: http://${options.host}:${info.port}`);
        logger.info("\nPress Ctrl+C to stop\n");
      });
    } catch (error) {
      reject(error);
      return;
    }

    server.on("error", reject);

    if (options.rebuild) {
      watcher = watchContent(options.rebuild, logger);
    }

    // Handle graceful shutdown
    const shutdown = () => {
      logger.info("\nShutting down...");
      process.off("SIGINT", shutdown);
      process.off("SIGTERM", shutdown);
      const closeWatcher = watcher ? watcher.close() : Promise.resolve();
      closeWatcher
        .then(() => server.close(() => resolvePromise()))
        .catch(reject);
    };

    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  });
}

/**
 * Rebuild content files as they are added or changed
 */
export function watchContent(
  pipeline: PipelineOptions & { extensions: string[] },
  logger: Logger
): FSWatcher {
  const contentDir = resolve(pipeline.contentDir);
  const outDir = resolve(pipeline.outDir);
  const extensions = pipeline.extensions.map((ext) => ext.toLowerCase());

  const watcher = watch(contentDir, {
    ignored: (path) => /(^|[\/\\])\../.test(path) || isWithin(outDir, path),
    persistent: true,
    ignoreInitial: true,
  });

  const handleChange = (path: string) => {
    if (!extensions.includes(extname(path).toLowerCase())) return;

    const relativePath = relative(contentDir, path).split("\\").join("/");
    logger.info(`Change detected: ${relativePath}`);

    convertFiles([relativePath], pipeline)
      .then(({ failed }) => {
        for (const { file, error } of failed) {
          logger.error(`FAILED ${file}: ${error.message}`);
        }
      })
      .catch((error: unknown) => {
        logger.error(`Rebuild failed: ${String(error)}`);
      });
  };

  watcher.on("add", handleChange);
  watcher.on("change", handleChange);

  return watcher;
}

import { existsSync } from "node:fs";
import { rm } from "node:fs/promises";
import { isAbsolute, parse, relative, resolve, sep } from "node:path";
import { ConfigError } from "../errors";

export interface CleanGuard {
  /** Content root, which must survive any clean */
  contentDir: string;
  /** Working directory, which must survive any clean */
  cwd: string;
}

/**
 * True when `child` is `parent` or lies somewhere under it
 */
export function isWithin(parent: string, child: string): boolean {
  const rel = relative(resolve(parent), resolve(child));
  return rel === "" || (!isAbsolute(rel) && rel.split(sep)[0] !== "..");
}

/**
 * Refuse output directories whose removal would take anything else with it
 */
export function assertSafeOutputDir(outDir: string, guard: CleanGuard): void {
  const target = resolve(outDir);

  if (target === parse(target).root) {
    throw new ConfigError(`Refusing to use the filesystem root as output directory: ${target}`);
  }
  if (isWithin(target, guard.cwd)) {
    throw new ConfigError(`Output directory contains the working directory: ${target}`);
  }
  if (isWithin(target, guard.contentDir)) {
    throw new ConfigError(`Output directory contains the content root: ${target}`);
  }
  if (isWithin(guard.contentDir, target)) {
    throw new ConfigError(`Output directory lies inside the content root: ${target}`);
  }
}

/**
 * Remove the output directory tree and nothing else.
 * Returns false when there was nothing to remove.
 */
export async function cleanOutputDir(outDir: string, guard: CleanGuard): Promise<boolean> {
  assertSafeOutputDir(outDir, guard);

  const target = resolve(outDir);
  if (!existsSync(target)) {
    return false;
  }

  await rm(target, { recursive: true, force: true });
  return true;
}

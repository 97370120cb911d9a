#!/usr/bin/env tsx

import { run } from "./commands";
import { consoleLogger } from "./logger";

async function main() {
  const code = await run(process.argv.slice(2), {
    cwd: process.cwd(),
    env: process.env,
    logger: consoleLogger,
  });
  process.exit(code);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});

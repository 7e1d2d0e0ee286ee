#!/usr/bin/env node
/**
 * CLI entrypoint: loads `.env`, runs the selected command and sets the exit
 * status. Command logic lives in `./commands`.
 */
import "dotenv/config";

import { runCli } from "./commands";

async function bootstrap(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

bootstrap().catch((error) => {
  console.error("[bootstrap] Unexpected failure:", error);
  process.exitCode = 1;
});

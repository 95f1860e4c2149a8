#!/usr/bin/env node
import { runCommand } from "./commands.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./log.js";

async function main(): Promise<void> {
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  process.exitCode = await runCommand(process.argv.slice(2), {
    env: process.env,
    logger: createLogger(),
    print: (line) => process.stdout.write(`${line}\n`),
    signal: controller.signal
  });
}

main().catch((error: unknown) => {
  process.stderr.write(`[fleetcmd] ${errorMessage(error)}\n`);
  process.exitCode = 1;
});

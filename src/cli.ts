#!/usr/bin/env node
import readline from "node:readline";
import { createLogger } from "./logger.js";
import { runCli } from "./runner/cli.js";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    cwd: process.cwd(),
    logger: createLogger("prisma-flow"),
    input: () => readline.createInterface({ input: process.stdin, crlfDelay: Infinity }),
  });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});

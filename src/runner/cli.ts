import path from "node:path";
import { errorMessage, isConfigError } from "../errors.js";
import type { Logger } from "../logger.js";
import { runMenu } from "./menu.js";
import { runOperation } from "./operations.js";
import type { RunnerOperation } from "./operations.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type CliCommand =
  | { kind: "operation"; operation: RunnerOperation; outDir: string }
  | { kind: "menu"; outDir: string }
  | { kind: "help" };

export function usage(): string {
  return [
    "Usage:",
    "  prisma-flow [--out <dir>]                      run the default configuration",
    "  prisma-flow run [config.json] [--out <dir>]    run a configuration file (default: bundled custom)",
    "  prisma-flow compare [a.json b.json] [--out <dir>]",
    "  prisma-flow all [--out <dir>]                  default + custom reports, comparison and summary",
    "  prisma-flow menu | --interactive               numbered menu read from stdin",
  ].join("\n");
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseArgs(argv: readonly string[], cwd: string): CliCommand {
  const positional: string[] = [];
  let outDir = cwd;
  let interactive = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--out" || arg === "-o") {
      const value = argv[i + 1];
      if (!value) throw new UsageError(`${arg} requires a directory`);
      outDir = path.resolve(cwd, value);
      i++;
    } else if (arg === "--interactive" || arg === "-i") {
      interactive = true;
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [cmd, ...rest] = positional;
  const file = (p: string) => path.resolve(cwd, p);

  if (interactive || cmd === "menu") {
    return { kind: "menu", outDir };
  }
  if (cmd === undefined) {
    return { kind: "operation", operation: { kind: "run-default" }, outDir };
  }
  if (cmd === "run" && rest.length <= 1) {
    const configPath = rest[0] === undefined ? undefined : file(rest[0]);
    return { kind: "operation", operation: { kind: "run-custom", configPath }, outDir };
  }
  if (cmd === "compare" && (rest.length === 0 || rest.length === 2)) {
    const [left, right] = rest;
    return {
      kind: "operation",
      operation: {
        kind: "compare",
        leftPath: left === undefined ? undefined : file(left),
        rightPath: right === undefined ? undefined : file(right),
      },
      outDir,
    };
  }
  if (cmd === "all" && rest.length === 0) {
    return { kind: "operation", operation: { kind: "generate-all" }, outDir };
  }
  throw new UsageError(`Unrecognised arguments: ${positional.join(" ")}`);
}

export interface CliDeps {
  cwd: string;
  logger: Logger;
  /** Lines for the interactive menu */
  input: () => AsyncIterable<string>;
}

/** Runs one CLI invocation and returns the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  let command: CliCommand;
  try {
    command = parseArgs(argv, deps.cwd);
  } catch (error) {
    deps.logger.error(errorMessage(error));
    deps.logger.info(usage());
    return EXIT_USAGE;
  }

  if (command.kind === "help") {
    deps.logger.info(usage());
    return EXIT_OK;
  }

  const ctx = { outDir: command.outDir, logger: deps.logger };
  if (command.kind === "menu") {
    return runMenu(deps.input(), ctx);
  }

  try {
    runOperation(command.operation, ctx);
    return EXIT_OK;
  } catch (error) {
    if (isConfigError(error)) {
      deps.logger.error(error.message);
      return EXIT_FAILURE;
    }
    deps.logger.error(`Failed to write reports: ${errorMessage(error)}`);
    return EXIT_FAILURE;
  }
}

import { errorMessage } from "../errors.js";
import type { RunnerContext, RunnerOperation } from "./operations.js";
import { runOperation } from "./operations.js";

export type MenuChoice = { kind: "operation"; operation: RunnerOperation } | { kind: "exit" };

const MENU: ReadonlyArray<[key: string, label: string, choice: MenuChoice]> = [
  ["1", "Run default configuration", { kind: "operation", operation: { kind: "run-default" } }],
  ["2", "Run custom configuration", { kind: "operation", operation: { kind: "run-custom" } }],
  ["3", "Compare configurations", { kind: "operation", operation: { kind: "compare" } }],
  ["4", "Generate all reports", { kind: "operation", operation: { kind: "generate-all" } }],
  ["5", "Exit", { kind: "exit" }],
];

export const MENU_PROMPT = "Enter your choice (1-5):";

export function menuText(): string {
  return ["Select an option:", ...MENU.map(([key, label]) => `${key}. ${label}`)].join("\n");
}

export function parseMenuChoice(input: string): MenuChoice | null {
  const key = input.trim();
  return MENU.find(([k]) => k === key)?.[2] ?? null;
}

/**
 * Interactive loop over input lines. Ends on "5" or end of input.
 * Returns 1 if any selected operation failed, else 0.
 */
export async function runMenu(
  lines: AsyncIterable<string> | Iterable<string>,
  ctx: RunnerContext
): Promise<number> {
  let failed = false;
  ctx.logger.info(menuText());
  ctx.logger.info(MENU_PROMPT);

  for await (const line of lines) {
    const choice = parseMenuChoice(line);
    if (choice === null) {
      ctx.logger.warn(`Invalid choice "${line.trim()}". Please enter 1-5.`);
    } else if (choice.kind === "exit") {
      break;
    } else {
      try {
        runOperation(choice.operation, ctx);
      } catch (error) {
        failed = true;
        ctx.logger.error(errorMessage(error));
      }
    }
    ctx.logger.info(menuText());
    ctx.logger.info(MENU_PROMPT);
  }

  return failed ? 1 : 0;
}

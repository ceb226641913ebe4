#!/usr/bin/env node

import ansis from "ansis";
import { parseCommand } from "./core/parser";
import { toProcessExitCode } from "./execution/aggregator";
import { Runner } from "./execution/runner";
import { Logger } from "./utils/logger";

function showHelp(): void {
  console.log(`
${ansis.bold("stepwise")} - A task runner for stepwise.yaml task files

${ansis.bold("Usage:")}
  stepwise <task> [flags]
  stepwise --list [pattern]

${ansis.bold("Flags:")}
  -l, --list            List the tasks of the root task file
  -c, --continue        Keep running sequence steps after a failure
  -q, --quiet           Suppress command output
  -b, --buffered        Print each command's output in one block when it ends
  --no-prefix           Disable output prefixes
  --prefix=<str>        Custom prefix
  -h, --help            Show this help

${ansis.bold("Examples:")}
  stepwise build                 Run the build task
  stepwise ci -c                 Run every ci step, even after a failure
  stepwise --list "api:*"        List tasks matching api:*

Set DEBUG=stepwise:* to trace resolution and execution.
  `);
}

async function main(): Promise<void> {
  const parsed = parseCommand(process.argv.slice(2));

  if (parsed.help) {
    showHelp();
    return;
  }

  const runner = new Runner(parsed.config);
  const logger = new Logger(parsed.config);

  // With --list the positional argument narrows the listing
  if (parsed.list || parsed.task === undefined) {
    logger.tasks(runner.listTasks(parsed.task));
    return;
  }

  const outcome = await runner.run(parsed.task);
  logger.summary(outcome);
  process.exitCode = toProcessExitCode(outcome.exitCode);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(ansis.red("Error:"), message);
  process.exit(1);
});

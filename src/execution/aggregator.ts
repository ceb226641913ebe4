import type { CommandResult, ExecutionResult } from "../types";

/** Exit code recorded for a command whose process never started */
export const SPAWN_FAILED_EXIT_CODE = -1;

const MAX_EXIT_CODE = 255;

/**
 * Fail-fast reports the first failing child; continue mode runs everything
 * and reports the last one.
 */
export function reduceSequence(
  children: ExecutionResult[],
  continueOnError = false
): number {
  const failed = children.filter((child) => child.exitCode !== 0);
  const picked = continueOnError ? failed.at(-1) : failed[0];
  return picked?.exitCode ?? 0;
}

/**
 * Zero only when every member succeeded. Otherwise the code of the first
 * failing member in declaration order; the full list stays in the result.
 */
export function reduceParallel(children: ExecutionResult[]): number {
  return children.find((child) => child.exitCode !== 0)?.exitCode ?? 0;
}

export function collectFailures(result: ExecutionResult): CommandResult[] {
  if (result.kind === "command") {
    return result.exitCode === 0 ? [] : [result];
  }
  return result.children.flatMap(collectFailures);
}

export function toProcessExitCode(code: number): number {
  return Number.isInteger(code) && code >= 0 && code <= MAX_EXIT_CODE
    ? code
    : 1;
}

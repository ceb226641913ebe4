import type { z } from "zod";

export type StepwiseErrorCode =
  | "UNKNOWN_TASK"
  | "MISSING_TASK_FILE"
  | "MALFORMED_TASK_FILE"
  | "CYCLIC_DELEGATION"
  | "INVALID_PARALLEL_NESTING"
  | "SPAWN_FAILED";

export class StepwiseError extends Error {
  readonly code: StepwiseErrorCode;

  constructor(code: StepwiseErrorCode, message: string) {
    super(message);
    this.name = "StepwiseError";
    this.code = code;
  }
}

export class UnknownTaskError extends StepwiseError {
  constructor(
    readonly task: string,
    readonly file: string
  ) {
    super("UNKNOWN_TASK", `Task '${task}' not found in ${file}`);
    this.name = "UnknownTaskError";
  }
}

export class MissingTaskFileError extends StepwiseError {
  constructor(readonly dir: string) {
    super("MISSING_TASK_FILE", `No task file found in ${dir}`);
    this.name = "MissingTaskFileError";
  }
}

export class MalformedTaskFileError extends StepwiseError {
  constructor(
    readonly file: string,
    reason: string,
    readonly issues?: z.ZodError
  ) {
    super("MALFORMED_TASK_FILE", `Malformed task file ${file}: ${reason}`);
    this.name = "MalformedTaskFileError";
  }

  getDetails(): string {
    if (!this.issues) return this.message;

    return this.issues.errors
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
  }
}

export class CyclicDelegationError extends StepwiseError {
  constructor(readonly chain: string[]) {
    super(
      "CYCLIC_DELEGATION",
      `Circular task delegation detected: ${chain.join(" -> ")}`
    );
    this.name = "CyclicDelegationError";
  }
}

export class InvalidParallelNestingError extends StepwiseError {
  constructor(readonly label: string) {
    super(
      "INVALID_PARALLEL_NESTING",
      `Parallel group ${label} contains another parallel group`
    );
    this.name = "InvalidParallelNestingError";
  }
}

export class SpawnFailedError extends StepwiseError {
  constructor(
    readonly command: string,
    reason: string
  ) {
    super("SPAWN_FAILED", `Failed to start '${command}': ${reason}`);
    this.name = "SpawnFailedError";
  }
}

export { Runner } from "./execution/runner";
export { Parser, parseCommand } from "./core/parser";
export { TaskMatcher } from "./core/pattern-matcher";
export { TaskRegistry } from "./core/registry";
export { Resolver, type VisitedTask } from "./core/resolver";
export { PlanBuilder, toEnvMap } from "./core/plan-builder";
export {
  parseTaskFile,
  readTaskFile,
  TASK_FILE_NAME,
  type TaskFileReader,
  type TaskFileSource,
} from "./core/task-file";
export { Executor, type ExecutorOptions } from "./execution/executor";
export {
  collectFailures,
  reduceParallel,
  reduceSequence,
  SPAWN_FAILED_EXIT_CODE,
  toProcessExitCode,
} from "./execution/aggregator";
export {
  BufferedSink,
  createOutputSink,
  LineBuffer,
  LineSink,
  type OutputChannel,
  type OutputSink,
} from "./execution/output";
export { execaSpawn, type SpawnFn, type SpawnRequest } from "./execution/spawn";
export {
  CyclicDelegationError,
  InvalidParallelNestingError,
  MalformedTaskFileError,
  MissingTaskFileError,
  SpawnFailedError,
  StepwiseError,
  type StepwiseErrorCode,
  UnknownTaskError,
} from "./errors";
export { Logger, TaskLogger } from "./utils/logger";

export type {
  CommandResult,
  CommandStep,
  Config,
  EnvMap,
  ExecutionPlan,
  ExecutionResult,
  GroupResult,
  OutputMode,
  ParsedCommand,
  PlanStep,
  ResolvedNode,
  RunOptions,
  RunOutcome,
  StepSpec,
  TaskBody,
  TaskDefinition,
  TaskFile,
  TaskSummary,
} from "./types";

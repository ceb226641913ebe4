import type { TaskFileReader } from "./core/task-file";
import type { OutputSink } from "./execution/output";
import type { SpawnFn } from "./execution/spawn";

export type OutputMode = "lines" | "buffered";

export type Config = {
  quiet?: boolean;
  continue?: boolean;
  prefix?: boolean | string;
  output?: OutputMode;
};

export type ParsedCommand = {
  task?: string;
  list: boolean;
  help: boolean;
  config: Config;
};

export type EnvMap = Record<string, string>;

export type StepSpec =
  | { kind: "command"; cmd: string; dir?: string; env?: EnvMap }
  | { kind: "task"; task: string; dir?: string; env?: EnvMap }
  | { kind: "parallel"; parallel: StepSpec[] };

export type TaskBody =
  | { kind: "command"; cmd: string }
  | { kind: "task"; task: string }
  | { kind: "steps"; steps: StepSpec[] };

export type TaskDefinition = {
  name: string;
  description?: string;
  dir?: string;
  env?: EnvMap;
  body: TaskBody;
};

export type TaskFile = {
  /** Absolute directory the file lives in; relative `dir`s resolve against it */
  dir: string;
  path: string;
  tasks: Map<string, TaskDefinition>;
};

export type TaskSummary = {
  name: string;
  description?: string;
};

type NodeScope = {
  label: string;
  cwd: string;
  /** Overlay declared by tasks and steps, without the ambient environment */
  env: EnvMap;
};

export type ResolvedNode =
  | (NodeScope & { kind: "command"; command: string })
  | (NodeScope & { kind: "task"; child: ResolvedNode })
  | (NodeScope & { kind: "sequence"; children: ResolvedNode[] })
  | (NodeScope & { kind: "parallel"; children: ResolvedNode[] });

export type CommandStep = {
  kind: "command";
  id: number;
  label: string;
  command: string;
  cwd: string;
  env: EnvMap;
};

export type PlanStep =
  | CommandStep
  | { kind: "sequence"; label: string; steps: PlanStep[] }
  | { kind: "parallel"; label: string; steps: PlanStep[] };

export type ExecutionPlan = {
  task: string;
  root: PlanStep;
  leafCount: number;
};

export type CommandResult = {
  kind: "command";
  label: string;
  command: string;
  cwd: string;
  exitCode: number;
  error?: string;
};

export type GroupResult = {
  kind: "sequence" | "parallel";
  label: string;
  exitCode: number;
  children: ExecutionResult[];
};

export type ExecutionResult = CommandResult | GroupResult;

export type RunOutcome = {
  task: string;
  exitCode: number;
  result: ExecutionResult;
  failures: CommandResult[];
};

export interface RunOptions extends Config {
  /** Directory to start looking for the project's task file from */
  cwd?: string;
  /** Ambient environment every command starts from; defaults to process.env */
  env?: EnvMap;
  reader?: TaskFileReader;
  spawn?: SpawnFn;
  sink?: OutputSink;
}

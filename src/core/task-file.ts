import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import debug from "debug";
import { isMap, isNode, isScalar, isSeq, parseDocument } from "yaml";
import { z } from "zod";
import { MalformedTaskFileError } from "../errors";
import type {
  EnvMap,
  StepSpec,
  TaskBody,
  TaskDefinition,
  TaskFile,
} from "../types";

const log = debug("stepwise:task-file");

export const TASK_FILE_NAME = "stepwise.yaml";

export type TaskFileSource = {
  path: string;
  content: string;
};

/**
 * Looks for a task file in `dir`. Returns undefined when there is none.
 */
export type TaskFileReader = (dir: string) => TaskFileSource | undefined;

type RawStep = {
  cmd?: string;
  task?: string;
  dir?: string;
  env?: EnvMap;
  parallel?: RawStep[];
};

// Env values reach this schema as written; see keepEnvText
const EnvSchema = z.record(z.string(), z.string());

const RawStepSchema: z.ZodType<RawStep, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      cmd: z.string().optional(),
      task: z.string().optional(),
      dir: z.string().optional(),
      env: EnvSchema.optional(),
      parallel: z.array(RawStepSchema).optional(),
    })
    .strict()
);

const RawTaskSchema = z
  .object({
    description: z.string().optional(),
    dir: z.string().optional(),
    env: EnvSchema.optional(),
    cmd: z.string().optional(),
    task: z.string().optional(),
    steps: z.array(RawStepSchema).optional(),
  })
  .strict();

type RawTask = z.infer<typeof RawTaskSchema>;

const TaskEntrySchema = z.union([z.string(), RawTaskSchema]);

export const readTaskFile: TaskFileReader = (dir) => {
  const path = join(dir, TASK_FILE_NAME);
  if (!existsSync(path)) {
    return undefined;
  }
  return { content: readFileSync(path, "utf-8"), path };
};

/**
 * Parse the text of a task file into an ordered set of task definitions.
 *
 * Accepts the shorthand `name: command` as well as the full mapping form.
 * Any syntax or shape problem is reported as a MalformedTaskFileError.
 */
export function parseTaskFile(content: string, path: string): TaskFile {
  const document = parseDocument(content);
  const [syntaxError] = document.errors;
  if (syntaxError) {
    throw new MalformedTaskFileError(path, syntaxError.message);
  }

  const tasks = new Map<string, TaskDefinition>();
  const { contents } = document;
  // An empty file holds no tasks
  if (contents === null) {
    return { dir: dirname(resolve(path)), path, tasks };
  }
  if (!isMap(contents)) {
    throw new MalformedTaskFileError(
      path,
      "<root>: expected a mapping of task names"
    );
  }

  // Walk the pairs themselves: a plain object would move names like "10" first
  for (const pair of contents.items) {
    const name = scalarText(pair.key);
    if (name === undefined) {
      throw new MalformedTaskFileError(path, "task names must be scalars");
    }

    keepEnvText(pair.value);
    const value: unknown = isNode(pair.value)
      ? pair.value.toJS(document)
      : pair.value;
    const result = TaskEntrySchema.safeParse(value, { path: [name] });
    if (!result.success) {
      const [first] = result.error.errors;
      const reason = first
        ? `${first.path.join(".")}: ${first.message}`
        : `${name}: invalid task`;
      throw new MalformedTaskFileError(path, reason, result.error);
    }
    tasks.set(name, toDefinition(name, result.data, path));
  }

  log(`Parsed ${tasks.size} task(s) from ${path}`);
  return { dir: dirname(resolve(path)), path, tasks };
}

/**
 * The text of a scalar as written in the file, so `1.10` stays `1.10`.
 */
function scalarText(node: unknown): string | undefined {
  if (!isScalar(node)) {
    return undefined;
  }
  if (typeof node.value === "string") {
    return node.value;
  }
  return node.source ?? String(node.value);
}

/**
 * Replace number and boolean env values of a task or step, and of its
 * nested steps, with their source text.
 */
function keepEnvText(node: unknown): void {
  if (!isMap(node)) {
    return;
  }

  const env = node.get("env");
  if (isMap(env)) {
    for (const item of env.items) {
      const { value } = item;
      if (
        isScalar(value) &&
        (typeof value.value === "number" || typeof value.value === "boolean")
      ) {
        value.value = scalarText(value);
      }
    }
  }

  for (const key of ["steps", "parallel"]) {
    const steps = node.get(key);
    if (isSeq(steps)) {
      for (const step of steps.items) {
        keepEnvText(step);
      }
    }
  }
}

function toDefinition(
  name: string,
  raw: string | RawTask,
  path: string
): TaskDefinition {
  if (typeof raw === "string") {
    return { body: { cmd: raw, kind: "command" }, name };
  }

  const definition: TaskDefinition = {
    body: toBody(name, raw, path),
    name,
  };
  if (raw.description !== undefined) definition.description = raw.description;
  if (raw.dir !== undefined) definition.dir = raw.dir;
  if (raw.env !== undefined) definition.env = raw.env;
  return definition;
}

function toBody(name: string, raw: RawTask, path: string): TaskBody {
  const present = (["cmd", "task", "steps"] as const).filter(
    (key) => raw[key] !== undefined
  );
  if (present.length === 1) {
    if (raw.cmd !== undefined) {
      return { cmd: raw.cmd, kind: "command" };
    }
    if (raw.task !== undefined) {
      return { kind: "task", task: raw.task };
    }
    if (raw.steps !== undefined) {
      return {
        kind: "steps",
        steps: raw.steps.map((step, index) =>
          toStep(step, `${name}.steps[${index}]`, path)
        ),
      };
    }
  }
  throw shapeError(path, `task '${name}'`, "cmd, task or steps", present);
}

function toStep(raw: RawStep, where: string, path: string): StepSpec {
  const present = (["cmd", "task", "parallel"] as const).filter(
    (key) => raw[key] !== undefined
  );
  if (present.length !== 1) {
    throw shapeError(path, `step ${where}`, "cmd, task or parallel", present);
  }

  if (raw.parallel !== undefined) {
    if (raw.dir !== undefined || raw.env !== undefined) {
      throw new MalformedTaskFileError(
        path,
        `parallel step ${where} cannot set dir or env`
      );
    }
    return {
      kind: "parallel",
      parallel: raw.parallel.map((member, index) =>
        toStep(member, `${where}.parallel[${index}]`, path)
      ),
    };
  }

  const scope: { dir?: string; env?: EnvMap } = {};
  if (raw.dir !== undefined) scope.dir = raw.dir;
  if (raw.env !== undefined) scope.env = raw.env;

  if (raw.task !== undefined) {
    return { kind: "task", task: raw.task, ...scope };
  }
  if (raw.cmd !== undefined) {
    return { cmd: raw.cmd, kind: "command", ...scope };
  }
  throw shapeError(path, `step ${where}`, "cmd, task or parallel", present);
}

function shapeError(
  path: string,
  subject: string,
  choices: string,
  present: readonly string[]
): MalformedTaskFileError {
  const found = present.length === 0 ? "none" : present.join(", ");
  return new MalformedTaskFileError(
    path,
    `${subject} must define exactly one of ${choices} (found ${found})`
  );
}

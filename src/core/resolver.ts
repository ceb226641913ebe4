import { resolve } from "node:path";
import debug from "debug";
import { CyclicDelegationError } from "../errors";
import type {
  EnvMap,
  ResolvedNode,
  StepSpec,
  TaskDefinition,
  TaskFile,
} from "../types";
import type { TaskRegistry } from "./registry";

const log = debug("stepwise:resolver");

/** A task entered on the current resolution path */
export type VisitedTask = {
  dir: string;
  name: string;
};

type Scope = {
  cwd: string;
  env: EnvMap;
};

function overlay(base: EnvMap, env: EnvMap | undefined): EnvMap {
  return env ? { ...base, ...env } : base;
}

export class Resolver {
  private readonly registry: TaskRegistry;

  constructor(registry: TaskRegistry) {
    this.registry = registry;
  }

  /**
   * Resolve a task into a fully dereferenced node tree.
   *
   * Working directories and environment overlays are computed during the
   * walk. `dir` is always relative to the file that declares it, and a node
   * without `dir` or `env` inherits its caller's.
   *
   * @throws UnknownTaskError, MissingTaskFileError, MalformedTaskFileError
   * @throws CyclicDelegationError when a task is re-entered on its own path
   */
  resolve(
    taskName: string,
    startDir: string = this.registry.rootDir,
    visited: readonly VisitedTask[] = []
  ): ResolvedNode {
    const dir = resolve(startDir);
    return this.resolveTask(taskName, dir, { cwd: dir, env: {} }, visited);
  }

  private resolveTask(
    name: string,
    fileDir: string,
    scope: Scope,
    visited: readonly VisitedTask[]
  ): ResolvedNode {
    const file = this.registry.loadNested(fileDir);
    const definition = this.registry.lookup(name, file.dir);

    const entry: VisitedTask = { dir: file.dir, name };
    const path = [...visited, entry];
    if (visited.some((v) => v.dir === entry.dir && v.name === entry.name)) {
      throw new CyclicDelegationError(
        path.map((v) => this.registry.qualify(v.name, v.dir))
      );
    }

    const label = this.registry.qualify(name, file.dir);
    const cwd =
      definition.dir === undefined ? scope.cwd : resolve(file.dir, definition.dir);
    const env = overlay(scope.env, definition.env);
    log(`Resolving ${label} (cwd: ${cwd})`);

    const child = this.resolveBody(definition, file, { cwd, env }, path, label);
    return { child, cwd, env, kind: "task", label };
  }

  private resolveBody(
    definition: TaskDefinition,
    file: TaskFile,
    scope: Scope,
    visited: readonly VisitedTask[],
    label: string
  ): ResolvedNode {
    const { body } = definition;
    switch (body.kind) {
      case "command":
        return { command: body.cmd, ...scope, kind: "command", label };
      case "task":
        // With `dir` the target lives in the task file of that directory
        return this.resolveTask(
          body.task,
          definition.dir === undefined ? file.dir : scope.cwd,
          scope,
          visited
        );
      case "steps":
        return {
          children: body.steps.map((step, index) =>
            this.resolveStep(step, file, scope, visited, label, [index + 1])
          ),
          ...scope,
          kind: "sequence",
          label,
        };
    }
  }

  private resolveStep(
    step: StepSpec,
    file: TaskFile,
    scope: Scope,
    visited: readonly VisitedTask[],
    taskLabel: string,
    position: number[]
  ): ResolvedNode {
    const label = `${taskLabel}[${position.join(".")}]`;

    switch (step.kind) {
      case "command":
        return {
          command: step.cmd,
          cwd: step.dir === undefined ? scope.cwd : resolve(file.dir, step.dir),
          env: overlay(scope.env, step.env),
          kind: "command",
          label,
        };
      case "task": {
        const env = overlay(scope.env, step.env);
        if (step.dir === undefined) {
          return this.resolveTask(
            step.task,
            file.dir,
            { cwd: scope.cwd, env },
            visited
          );
        }
        const target = resolve(file.dir, step.dir);
        return this.resolveTask(step.task, target, { cwd: target, env }, visited);
      }
      case "parallel":
        return {
          children: step.parallel.map((member, index) =>
            this.resolveStep(member, file, scope, visited, taskLabel, [
              ...position,
              index + 1,
            ])
          ),
          cwd: scope.cwd,
          env: scope.env,
          kind: "parallel",
          label,
        };
    }
  }
}

import debug from "debug";
import { InvalidParallelNestingError } from "../errors";
import type { EnvMap, ExecutionPlan, PlanStep, ResolvedNode } from "../types";

const log = debug("stepwise:plan");

/**
 * Copy the defined entries of a process environment.
 */
export function toEnvMap(source: NodeJS.ProcessEnv): EnvMap {
  const env: EnvMap = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}

export class PlanBuilder {
  private nextId = 0;
  private readonly baseEnv: EnvMap;

  constructor(baseEnv: EnvMap = toEnvMap(process.env)) {
    this.baseEnv = baseEnv;
  }

  /**
   * Turn a resolved tree into the executable plan: task wrappers are dropped,
   * every leaf gets its complete environment, and parallel groups are checked
   * for nesting.
   */
  build(root: ResolvedNode): ExecutionPlan {
    this.nextId = 0;
    const step = this.buildStep(root);
    log(`Plan for ${root.label}: ${this.nextId} command(s)`);
    return { leafCount: this.nextId, root: step, task: root.label };
  }

  private buildStep(node: ResolvedNode): PlanStep {
    switch (node.kind) {
      case "task":
        return this.buildStep(node.child);
      case "command":
        this.nextId++;
        return {
          command: node.command,
          cwd: node.cwd,
          env: { ...this.baseEnv, ...node.env },
          id: this.nextId,
          kind: "command",
          label: node.label,
        };
      case "sequence":
        return {
          kind: "sequence",
          label: node.label,
          steps: node.children.map((child) => this.buildStep(child)),
        };
      case "parallel":
        for (const member of node.children) {
          if (member.kind === "parallel") {
            throw new InvalidParallelNestingError(node.label);
          }
        }
        return {
          kind: "parallel",
          label: node.label,
          steps: node.children.map((child) => this.buildStep(child)),
        };
    }
  }
}

import debug from "debug";
import { SpawnFailedError } from "../errors";
import type {
  CommandResult,
  CommandStep,
  ExecutionPlan,
  ExecutionResult,
  PlanStep,
} from "../types";
import { Logger } from "../utils/logger";
import {
  reduceParallel,
  reduceSequence,
  SPAWN_FAILED_EXIT_CODE,
} from "./aggregator";
import { LineSink, type OutputChannel, type OutputSink } from "./output";
import { execaSpawn, type SpawnFn } from "./spawn";

const log = debug("stepwise:executor");

export type ExecutorOptions = {
  /** Run every sequence step even after one fails */
  continue?: boolean;
  logger?: Logger;
  sink?: OutputSink;
  spawn?: SpawnFn;
};

function leaves(step: PlanStep): CommandStep[] {
  return step.kind === "command" ? [step] : step.steps.flatMap(leaves);
}

export class Executor {
  private readonly continueOnError: boolean;
  private readonly logger: Logger;
  private readonly sink: OutputSink;
  private readonly spawn: SpawnFn;

  constructor(options: ExecutorOptions = {}) {
    this.continueOnError = options.continue ?? false;
    this.logger = options.logger ?? new Logger();
    this.sink = options.sink ?? new LineSink(this.logger);
    this.spawn = options.spawn ?? execaSpawn;
  }

  /**
   * Run a plan to completion. Sequences run in order and stop at the first
   * failure unless `continue` is set; parallel groups always wait for every
   * member. Failing commands are reported in the result, not thrown.
   */
  async execute(plan: ExecutionPlan): Promise<ExecutionResult> {
    log("=== Starting execution ===");
    log(`Task ${plan.task}: ${plan.leafCount} command(s)`);

    // Register every label up front so prefixes line up from the first line
    for (const leaf of leaves(plan.root)) {
      this.logger.registerTask(leaf.label);
    }

    const result = await this.runStep(plan.root);
    log(`Finished ${plan.task} with exit code ${result.exitCode}`);
    return result;
  }

  private runStep(step: PlanStep): Promise<ExecutionResult> {
    switch (step.kind) {
      case "command":
        return this.runCommand(step);
      case "sequence":
        return this.runSequence(step.label, step.steps);
      case "parallel":
        return this.runParallel(step.label, step.steps);
    }
  }

  private async runSequence(
    label: string,
    steps: PlanStep[]
  ): Promise<ExecutionResult> {
    const children: ExecutionResult[] = [];

    for (const step of steps) {
      const result = await this.runStep(step);
      children.push(result);
      if (result.exitCode !== 0 && !this.continueOnError) {
        log(`Stopping ${label} after failure of ${result.label}`);
        break;
      }
    }

    return {
      children,
      exitCode: reduceSequence(children, this.continueOnError),
      kind: "sequence",
      label,
    };
  }

  private async runParallel(
    label: string,
    steps: PlanStep[]
  ): Promise<ExecutionResult> {
    log(
      `Running ${steps.length} steps in parallel:`,
      steps.map((s) => s.label)
    );
    const children = await Promise.all(steps.map((s) => this.runStep(s)));

    return {
      children,
      exitCode: reduceParallel(children),
      kind: "parallel",
      label,
    };
  }

  private async runCommand(step: CommandStep): Promise<CommandResult> {
    this.logger.info(`Running: ${step.label} ($ ${step.command})`);

    const channel = this.sink.open(step.label);
    const outcome = await this.spawnCommand(step, channel);
    const result: CommandResult = {
      command: step.command,
      cwd: step.cwd,
      kind: "command",
      label: step.label,
      ...outcome,
    };

    if (result.exitCode === 0) {
      this.logger.success(`Completed: ${step.label}`);
    } else {
      this.logger.error(
        step.label,
        `Failed: ${result.error ?? `exit code ${result.exitCode}`}`
      );
    }
    return result;
  }

  private async spawnCommand(
    step: CommandStep,
    channel: OutputChannel
  ): Promise<Pick<CommandResult, "exitCode" | "error">> {
    try {
      const exitCode = await this.spawn({
        command: step.command,
        cwd: step.cwd,
        env: step.env,
        output: channel,
      });
      return { exitCode };
    } catch (error) {
      // A command that cannot start fails on its own; siblings keep running
      if (error instanceof SpawnFailedError) {
        return { error: error.message, exitCode: SPAWN_FAILED_EXIT_CODE };
      }
      throw error;
    } finally {
      channel.close();
    }
  }
}

import { PlanBuilder, toEnvMap } from "../core/plan-builder";
import { TaskMatcher } from "../core/pattern-matcher";
import { TaskRegistry } from "../core/registry";
import { Resolver } from "../core/resolver";
import type {
  ExecutionPlan,
  RunOptions,
  RunOutcome,
  TaskSummary,
} from "../types";
import { Logger } from "../utils/logger";
import { collectFailures } from "./aggregator";
import { Executor } from "./executor";
import { createOutputSink } from "./output";

export class Runner {
  private readonly matcher = new TaskMatcher();
  private readonly options: RunOptions;
  private readonly logger: Logger;
  private registry?: TaskRegistry;

  constructor(options: RunOptions = {}) {
    this.options = options;
    this.logger = new Logger(options);
  }

  /**
   * Resolve and validate a task without running anything.
   */
  plan(taskName: string): ExecutionPlan {
    const registry = this.loadRegistry();
    const resolved = new Resolver(registry).resolve(taskName);
    const builder = new PlanBuilder(this.options.env ?? toEnvMap(process.env));
    return builder.build(resolved);
  }

  /**
   * Run a task from the root task file. Resolution errors are thrown before
   * any command starts; failing commands come back in the outcome.
   */
  async run(taskName: string): Promise<RunOutcome> {
    const plan = this.plan(taskName);

    const executor = new Executor({
      continue: this.options.continue ?? false,
      logger: this.logger,
      sink:
        this.options.sink ??
        createOutputSink(this.options.output ?? "lines", this.logger),
      spawn: this.options.spawn,
    });
    const result = await executor.execute(plan);

    return {
      exitCode: result.exitCode,
      failures: collectFailures(result),
      result,
      task: plan.task,
    };
  }

  /**
   * Tasks of the root task file in declaration order, optionally narrowed by
   * a comma-separated glob list such as `api:*,!api:slow`.
   */
  listTasks(pattern?: string): TaskSummary[] {
    const tasks = this.loadRegistry().listTasks();
    return pattern ? this.matcher.filter(tasks, pattern) : tasks;
  }

  private loadRegistry(): TaskRegistry {
    if (!this.registry) {
      this.registry = TaskRegistry.discover(
        this.options.cwd ?? process.cwd(),
        this.options.reader
      );
    }
    return this.registry;
  }
}

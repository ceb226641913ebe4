import ansis from "ansis";
import type { Config, RunOutcome, TaskSummary } from "../types";

type Paint = (text: string) => string;

const palette: readonly Paint[] = [
  ansis.cyan,
  ansis.green,
  ansis.yellow,
  ansis.blue,
  ansis.magenta,
  ansis.red,
  ansis.gray,
  ansis.white,
];

type Stream = "stdout" | "stderr";

/**
 * Console output of a run: command lines behind a coloured `[label] |`
 * column, lifecycle messages, the task list and the final summary.
 */
export class Logger {
  private readonly paints = new Map<string, Paint>();
  private labelWidth = 0;
  private readonly prefix: boolean | string;
  private readonly quiet: boolean;

  constructor(config: Config = {}) {
    this.prefix = config.prefix ?? true;
    this.quiet = config.quiet ?? false;
  }

  /**
   * Reserve a colour for a label and widen the prefix column to fit it.
   */
  registerTask(label: string): void {
    if (this.paints.has(label)) {
      return;
    }
    this.paints.set(label, palette[this.paints.size % palette.length] ?? ansis.white);
    this.labelWidth = Math.max(this.labelWidth, label.length);
  }

  /**
   * Command output. Blank lines are kept; a single trailing newline is not
   * printed as an extra line.
   */
  log(label: string, message: string): void {
    if (this.quiet) {
      return;
    }
    this.print("stdout", label, message);
  }

  error(label: string, message: string): void {
    this.print("stderr", label, message);
  }

  info(message: string): void {
    if (!this.quiet) {
      console.log(`${ansis.blue("ℹ")} ${message}`);
    }
  }

  success(message: string): void {
    if (!this.quiet) {
      console.log(`${ansis.green("✓")} ${message}`);
    }
  }

  warn(message: string): void {
    console.warn(`${ansis.yellow("⚠")} ${message}`);
  }

  /**
   * Print tasks with their descriptions lined up in one column
   */
  tasks(tasks: TaskSummary[]): void {
    console.log(`\n${ansis.bold("Available tasks:")}\n`);
    if (tasks.length === 0) {
      console.log("  No tasks defined");
      console.log("");
      return;
    }

    const width = Math.max(...tasks.map((t) => t.name.length));
    for (const task of tasks) {
      const line =
        task.description === undefined
          ? `  ${ansis.cyan(task.name)}`
          : `  ${ansis.cyan(task.name.padEnd(width))}  ${task.description}`;
      console.log(line);
    }
    console.log("");
  }

  summary(outcome: RunOutcome): void {
    if (outcome.exitCode === 0) {
      this.success(`Finished: ${outcome.task}`);
      return;
    }

    console.error(
      `${ansis.red("✗")} ${outcome.task} failed with exit code ${outcome.exitCode}`
    );
    for (const failure of outcome.failures) {
      const reason = failure.error ?? `exit code ${failure.exitCode}`;
      console.error(`  ${ansis.red("•")} ${failure.label}: ${reason}`);
    }
  }

  createTaskLogger(label: string): TaskLogger {
    this.registerTask(label);
    return new TaskLogger(this, label);
  }

  private print(stream: Stream, label: string, message: string): void {
    const text = message.endsWith("\n") ? message.slice(0, -1) : message;
    const write = stream === "stderr" ? console.error : console.log;
    for (const line of text.split("\n")) {
      const shown = stream === "stderr" && line !== "" ? ansis.red(line) : line;
      write(this.withPrefix(label, shown));
    }
  }

  private withPrefix(label: string, line: string): string {
    if (this.prefix === false) {
      return line;
    }

    const paint = this.paints.get(label) ?? ansis.white;
    const head =
      typeof this.prefix === "string"
        ? paint(this.prefix)
        : `${paint(`[${label}]`.padEnd(this.labelWidth + 2))} ${ansis.gray("|")}`;
    return line === "" ? head : `${head} ${line}`;
  }
}

/**
 * Writes for a single plan step through its parent logger.
 */
export class TaskLogger {
  constructor(
    private readonly parent: Logger,
    private readonly label: string
  ) {}

  log(message: string): void {
    this.parent.log(this.label, message);
  }

  error(message: string): void {
    this.parent.error(this.label, message);
  }
}

import type { OutputMode } from "../types";
import type { Logger } from "../utils/logger";

/**
 * Where one running command writes its output. Chunks arrive as the process
 * produces them; `close` is called once the process has exited.
 */
export type OutputChannel = {
  stdout(chunk: string): void;
  stderr(chunk: string): void;
  close(): void;
};

export interface OutputSink {
  open(label: string): OutputChannel;
}

/**
 * Splits a byte stream into complete lines, holding back the trailing
 * partial line until more data or a flush arrives.
 */
export class LineBuffer {
  private pending = "";

  push(chunk: string): string[] {
    const lines = (this.pending + chunk).split(/\r?\n/);
    this.pending = lines.pop() ?? "";
    return lines;
  }

  flush(): string | undefined {
    const rest = this.pending;
    this.pending = "";
    return rest === "" ? undefined : rest;
  }
}

/**
 * Prints each complete line as soon as it is available, prefixed with the
 * step label. Lines of concurrent steps interleave, bytes never do.
 */
export class LineSink implements OutputSink {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  open(label: string): OutputChannel {
    const taskLogger = this.logger.createTaskLogger(label);
    const out = new LineBuffer();
    const err = new LineBuffer();

    return {
      close: () => {
        const restOut = out.flush();
        if (restOut !== undefined) taskLogger.log(restOut);
        const restErr = err.flush();
        if (restErr !== undefined) taskLogger.error(restErr);
      },
      stderr: (chunk) => {
        for (const line of err.push(chunk)) taskLogger.error(line);
      },
      stdout: (chunk) => {
        for (const line of out.push(chunk)) taskLogger.log(line);
      },
    };
  }
}

type Captured = {
  stream: "stdout" | "stderr";
  text: string;
};

/**
 * Holds everything a step prints and writes it in one go when the step
 * finishes, so each step's output appears as a contiguous block.
 */
export class BufferedSink implements OutputSink {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  open(label: string): OutputChannel {
    const taskLogger = this.logger.createTaskLogger(label);
    const out = new LineBuffer();
    const err = new LineBuffer();
    const captured: Captured[] = [];

    return {
      close: () => {
        const restOut = out.flush();
        if (restOut !== undefined) captured.push({ stream: "stdout", text: restOut });
        const restErr = err.flush();
        if (restErr !== undefined) captured.push({ stream: "stderr", text: restErr });

        for (const line of captured) {
          if (line.stream === "stderr") {
            taskLogger.error(line.text);
          } else {
            taskLogger.log(line.text);
          }
        }
      },
      stderr: (chunk) => {
        for (const text of err.push(chunk)) captured.push({ stream: "stderr", text });
      },
      stdout: (chunk) => {
        for (const text of out.push(chunk)) captured.push({ stream: "stdout", text });
      },
    };
  }
}

export function createOutputSink(mode: OutputMode, logger: Logger): OutputSink {
  return mode === "buffered" ? new BufferedSink(logger) : new LineSink(logger);
}

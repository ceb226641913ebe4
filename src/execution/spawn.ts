import { constants } from "node:os";
import debug from "debug";
import { execa } from "execa";
import { SpawnFailedError } from "../errors";
import type { EnvMap } from "../types";
import type { OutputChannel } from "./output";

const log = debug("stepwise:spawn");

const SIGNAL_EXIT_BASE = 128;

export type SpawnRequest = {
  command: string;
  cwd: string;
  /** The complete environment of the process; nothing else is inherited */
  env: EnvMap;
  output: OutputChannel;
};

/**
 * Runs one command to completion and yields its exit code.
 * Throws SpawnFailedError when the process cannot be started at all.
 */
export type SpawnFn = (request: SpawnRequest) => Promise<number>;

function signalNumber(signal: string): number | undefined {
  const entry = Object.entries(constants.signals).find(
    ([name]) => name === signal
  );
  return entry?.[1];
}

function exitCodeOf(command: string, error: unknown): number {
  if (error instanceof Error) {
    if ("exitCode" in error && typeof error.exitCode === "number") {
      return error.exitCode;
    }
    if ("signal" in error && typeof error.signal === "string") {
      const signal = signalNumber(error.signal);
      if (signal !== undefined) {
        return SIGNAL_EXIT_BASE + signal;
      }
    }
    const reason =
      "shortMessage" in error && typeof error.shortMessage === "string"
        ? error.shortMessage
        : error.message;
    throw new SpawnFailedError(command, reason);
  }
  throw new SpawnFailedError(command, String(error));
}

/**
 * Run a command through the platform shell, like npm does: /bin/sh on
 * Unix, cmd.exe on Windows.
 */
export const execaSpawn: SpawnFn = async ({ command, cwd, env, output }) => {
  log(`$ ${command} (cwd: ${cwd})`);

  // Output is streamed to the channel, so execa keeps no copy of it
  const proc = execa(command, {
    buffer: false,
    cwd,
    env,
    extendEnv: false,
    shell: true,
    stderr: "pipe",
    stdin: "inherit",
    stdout: "pipe",
  });

  // A decoding stream holds back a character split across two chunks
  proc.stdout?.setEncoding("utf8");
  proc.stderr?.setEncoding("utf8");
  proc.stdout?.on("data", (data: string) => {
    output.stdout(data);
  });
  proc.stderr?.on("data", (data: string) => {
    output.stderr(data);
  });

  try {
    await proc;
    return 0;
  } catch (error) {
    const code = exitCodeOf(command, error);
    log(`Exited with ${code}: ${command}`);
    return code;
  }
};

import { mkdtempSync, realpathSync, rmSync } from "node:fs";
import os from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SpawnFailedError } from "../../errors";
import type { OutputChannel } from "../../execution/output";
import { execaSpawn } from "../../execution/spawn";

type Captured = {
  channel: OutputChannel;
  stdout: () => string;
  stderr: () => string;
};

function capture(): Captured {
  const out: string[] = [];
  const err: string[] = [];
  return {
    channel: {
      close: () => undefined,
      stderr: (chunk) => err.push(chunk),
      stdout: (chunk) => out.push(chunk),
    },
    stderr: () => err.join(""),
    stdout: () => out.join(""),
  };
}

describe("execaSpawn", () => {
  let tmpDir: string;
  const env = { PATH: process.env.PATH ?? "/usr/bin:/bin" };

  beforeEach(() => {
    tmpDir = realpathSync(mkdtempSync(join(os.tmpdir(), "stepwise-spawn-")));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(tmpDir, { force: true, recursive: true });
  });

  it("streams stdout and returns zero on success", async () => {
    const out = capture();

    const code = await execaSpawn({
      command: "echo hello",
      cwd: tmpDir,
      env,
      output: out.channel,
    });

    expect(code).toBe(0);
    expect(out.stdout()).toBe("hello\n");
    expect(out.stderr()).toBe("");
  });

  it("decodes a character split across two writes", async () => {
    const out = capture();

    await execaSpawn({
      command: "printf '\\303'; sleep 0.2; printf '\\251\\n'",
      cwd: tmpDir,
      env,
      output: out.channel,
    });

    expect(out.stdout()).toBe("é\n");
  });

  it("streams stderr separately", async () => {
    const out = capture();

    await execaSpawn({
      command: "echo oops 1>&2",
      cwd: tmpDir,
      env,
      output: out.channel,
    });

    expect(out.stderr()).toBe("oops\n");
    expect(out.stdout()).toBe("");
  });

  it("returns the exit code of a failing command", async () => {
    const out = capture();

    const code = await execaSpawn({
      command: "exit 3",
      cwd: tmpDir,
      env,
      output: out.channel,
    });

    expect(code).toBe(3);
  });

  it("runs in the requested directory", async () => {
    const out = capture();

    await execaSpawn({ command: "pwd", cwd: tmpDir, env, output: out.channel });

    expect(out.stdout()).toBe(`${tmpDir}\n`);
  });

  it("passes only the given environment", async () => {
    vi.stubEnv("STEPWISE_AMBIENT", "leaked");
    const out = capture();

    await execaSpawn({
      command: 'echo "[$STEPWISE_AMBIENT][$GREETING]"',
      cwd: tmpDir,
      env: { ...env, GREETING: "hi" },
      output: out.channel,
    });

    expect(out.stdout()).toBe("[][hi]\n");
  });

  it("reports a signal as 128 plus the signal number", async () => {
    const out = capture();

    const code = await execaSpawn({
      command: "kill -TERM $$",
      cwd: tmpDir,
      env,
      output: out.channel,
    });

    expect(code).toBe(128 + os.constants.signals.SIGTERM);
  });

  it("fails with SpawnFailedError when the process cannot start", async () => {
    const out = capture();

    await expect(
      execaSpawn({
        command: "echo never",
        cwd: join(tmpDir, "missing"),
        env,
        output: out.channel,
      })
    ).rejects.toThrow(SpawnFailedError);
  });
});

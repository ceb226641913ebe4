import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  parseTaskFile,
  readTaskFile,
  TASK_FILE_NAME,
} from "../../core/task-file";
import { MalformedTaskFileError } from "../../errors";
import { captureError } from "../test-helpers";

const PATH = "/p/stepwise.yaml";

describe("parseTaskFile", () => {
  describe("shorthand and full forms", () => {
    it("parses a shorthand command", () => {
      const file = parseTaskFile("build: cargo build --release\n", PATH);

      expect(file.dir).toBe("/p");
      expect(file.path).toBe(PATH);
      expect(file.tasks.get("build")).toEqual({
        body: { cmd: "cargo build --release", kind: "command" },
        name: "build",
      });
    });

    it("treats shorthand and a cmd mapping identically", () => {
      const shorthand = parseTaskFile('build: "cargo build"\n', PATH);
      const full = parseTaskFile('build:\n  cmd: "cargo build"\n', PATH);

      expect(shorthand.tasks.get("build")).toEqual(full.tasks.get("build"));
    });

    it("parses description, dir and env", () => {
      const file = parseTaskFile(
        [
          "build:",
          "  description: Build it",
          "  dir: services/api",
          "  env:",
          "    NODE_ENV: production",
          "    DEBUG: false",
          "    PORT: 8080",
          "  cmd: npm run build",
          "",
        ].join("\n"),
        PATH
      );

      expect(file.tasks.get("build")).toEqual({
        body: { cmd: "npm run build", kind: "command" },
        description: "Build it",
        dir: "services/api",
        env: { DEBUG: "false", NODE_ENV: "production", PORT: "8080" },
        name: "build",
      });
    });

    it("parses delegation to a task in another directory", () => {
      const file = parseTaskFile(
        "api:\n  dir: services/api\n  task: build\n",
        PATH
      );

      expect(file.tasks.get("api")).toEqual({
        body: { kind: "task", task: "build" },
        dir: "services/api",
        name: "api",
      });
    });

    it("parses sequential and parallel steps", () => {
      const file = parseTaskFile(
        [
          "deploy:",
          "  steps:",
          "    - cmd: echo start",
          "    - parallel:",
          "        - task: build-api",
          "        - task: build-web",
          "          dir: web",
          "    - task: finish",
          "      env:",
          '        A: "1"',
          "",
        ].join("\n"),
        PATH
      );

      expect(file.tasks.get("deploy")?.body).toEqual({
        kind: "steps",
        steps: [
          { cmd: "echo start", kind: "command" },
          {
            kind: "parallel",
            parallel: [
              { kind: "task", task: "build-api" },
              { dir: "web", kind: "task", task: "build-web" },
            ],
          },
          { env: { A: "1" }, kind: "task", task: "finish" },
        ],
      });
    });

    it("keeps declaration order", () => {
      const file = parseTaskFile(
        "zebra: echo z\nalpha: echo a\nmiddle: echo m\n",
        PATH
      );

      expect(Array.from(file.tasks.keys())).toEqual([
        "zebra",
        "alpha",
        "middle",
      ]);
    });

    it("keeps declaration order for names that look like numbers", () => {
      const file = parseTaskFile('build: a\n10: b\n"2": c\n', PATH);

      expect(Array.from(file.tasks.keys())).toEqual(["build", "10", "2"]);
      expect(file.tasks.get("10")?.body).toEqual({ cmd: "b", kind: "command" });
    });

    it("keeps env values exactly as written", () => {
      const file = parseTaskFile(
        [
          "build:",
          "  env:",
          "    VERSION: 1.10",
          "    MODE: 0x1F",
          "    VERBOSE: true",
          "  steps:",
          "    - cmd: make",
          "      env:",
          "        PORT: 08080",
          "    - parallel:",
          "        - cmd: test",
          "          env:",
          "            RATIO: 1e3",
          "",
        ].join("\n"),
        PATH
      );

      expect(file.tasks.get("build")).toEqual({
        body: {
          kind: "steps",
          steps: [
            { cmd: "make", env: { PORT: "08080" }, kind: "command" },
            {
              kind: "parallel",
              parallel: [{ cmd: "test", env: { RATIO: "1e3" }, kind: "command" }],
            },
          ],
        },
        env: { MODE: "0x1F", VERBOSE: "true", VERSION: "1.10" },
        name: "build",
      });
    });

    it("accepts names containing colons", () => {
      const file = parseTaskFile(
        '"api:build": cargo build\n"web:build": npm run build\n',
        PATH
      );

      expect(file.tasks.get("api:build")?.body).toEqual({
        cmd: "cargo build",
        kind: "command",
      });
      expect(file.tasks.has("web:build")).toBe(true);
    });

    it("treats an empty file as having no tasks", () => {
      expect(parseTaskFile("", PATH).tasks.size).toBe(0);
    });

    it("accepts an empty env mapping", () => {
      const file = parseTaskFile("build:\n  env: {}\n  cmd: make\n", PATH);
      expect(file.tasks.get("build")?.env).toEqual({});
    });
  });

  describe("malformed files", () => {
    it("rejects a task with both cmd and task", () => {
      expect(() =>
        parseTaskFile("build:\n  cmd: a\n  task: b\n", PATH)
      ).toThrow(
        "task 'build' must define exactly one of cmd, task or steps (found cmd, task)"
      );
    });

    it("rejects a task with none of cmd, task or steps", () => {
      expect(() =>
        parseTaskFile("build:\n  description: nothing\n", PATH)
      ).toThrow(
        "task 'build' must define exactly one of cmd, task or steps (found none)"
      );
    });

    it("rejects a step with none of cmd, task or parallel", () => {
      expect(() =>
        parseTaskFile("ci:\n  steps:\n    - dir: x\n", PATH)
      ).toThrow(
        "step ci.steps[0] must define exactly one of cmd, task or parallel (found none)"
      );
    });

    it("rejects dir on a parallel step", () => {
      const content = [
        "ci:",
        "  steps:",
        "    - parallel:",
        "        - cmd: a",
        "      dir: x",
        "",
      ].join("\n");

      expect(() => parseTaskFile(content, PATH)).toThrow(
        "parallel step ci.steps[0] cannot set dir or env"
      );
    });

    it("rejects unknown keys", () => {
      expect(() =>
        parseTaskFile("build:\n  cmd: a\n  shell: bash\n", PATH)
      ).toThrow(MalformedTaskFileError);
    });

    it("rejects YAML syntax errors", () => {
      expect(() => parseTaskFile("build: [unclosed\n", PATH)).toThrow(
        MalformedTaskFileError
      );
    });

    it("rejects duplicate task names", () => {
      expect(() => parseTaskFile("build: a\nbuild: b\n", PATH)).toThrow(
        MalformedTaskFileError
      );
    });

    it("rejects an env value without a value", () => {
      expect(() =>
        parseTaskFile("build:\n  env:\n    A: ~\n  cmd: make\n", PATH)
      ).toThrow(MalformedTaskFileError);
    });

    it("rejects a top level that is not a mapping", () => {
      expect(() => parseTaskFile("- a\n- b\n", PATH)).toThrow(
        MalformedTaskFileError
      );
    });

    it("names the file and the offending task", () => {
      const error = captureError(() => parseTaskFile("build: 42\n", PATH));

      if (!(error instanceof MalformedTaskFileError)) throw error;
      expect(error.code).toBe("MALFORMED_TASK_FILE");
      expect(error.file).toBe(PATH);
      expect(error.message).toBe(
        `Malformed task file ${PATH}: build: Invalid input`
      );
      expect(error.getDetails()).toBe("build: Invalid input");
    });
  });
});

describe("readTaskFile", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(os.tmpdir(), "stepwise-read-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { force: true, recursive: true });
  });

  it("returns undefined when the directory has no task file", () => {
    expect(readTaskFile(tmpDir)).toBeUndefined();
  });

  it("reads the task file of a directory", () => {
    writeFileSync(join(tmpDir, TASK_FILE_NAME), "build: make\n");

    expect(readTaskFile(tmpDir)).toEqual({
      content: "build: make\n",
      path: join(tmpDir, TASK_FILE_NAME),
    });
  });
});

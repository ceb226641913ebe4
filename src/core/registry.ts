import { dirname, relative, resolve, sep } from "node:path";
import debug from "debug";
import { MissingTaskFileError, UnknownTaskError } from "../errors";
import type { TaskDefinition, TaskFile, TaskSummary } from "../types";
import {
  parseTaskFile,
  readTaskFile,
  type TaskFileReader,
  type TaskFileSource,
} from "./task-file";

const log = debug("stepwise:registry");

/**
 * Task definitions for one invocation, keyed by the directory of the file
 * that declares them. The root file is read up front; nested files are read
 * the first time a delegation points at their directory and cached after.
 */
export class TaskRegistry {
  private readonly files = new Map<string, TaskFile>();
  private readonly root: TaskFile;
  private readonly reader: TaskFileReader;

  private constructor(
    rootDir: string,
    reader: TaskFileReader,
    rootSource?: TaskFileSource
  ) {
    this.reader = reader;
    this.root = rootSource
      ? this.store(rootDir, rootSource)
      : this.loadNested(rootDir);
  }

  static load(
    rootDir: string,
    reader: TaskFileReader = readTaskFile
  ): TaskRegistry {
    return new TaskRegistry(resolve(rootDir), reader);
  }

  /**
   * Walk up from `startDir` to the nearest directory holding a task file and
   * load it as the project root.
   */
  static discover(
    startDir: string,
    reader: TaskFileReader = readTaskFile
  ): TaskRegistry {
    let dir = resolve(startDir);
    let source = reader(dir);
    while (source === undefined) {
      const parent = dirname(dir);
      if (parent === dir) {
        throw new MissingTaskFileError(resolve(startDir));
      }
      dir = parent;
      source = reader(dir);
    }
    log(`Project root: ${dir}`);
    return new TaskRegistry(dir, reader, source);
  }

  get rootDir(): string {
    return this.root.dir;
  }

  /**
   * Load (or return the cached) task file located in `dir`.
   */
  loadNested(dir: string): TaskFile {
    const key = resolve(dir);
    const cached = this.files.get(key);
    if (cached) {
      return cached;
    }

    const source = this.reader(key);
    if (!source) {
      throw new MissingTaskFileError(key);
    }
    return this.store(key, source);
  }

  private store(key: string, source: TaskFileSource): TaskFile {
    const file = parseTaskFile(source.content, source.path);
    // Key by the requested directory even if the reader reports another path
    const loaded: TaskFile = { ...file, dir: key };
    this.files.set(key, loaded);
    log(`Loaded ${loaded.tasks.size} task(s) from ${source.path}`);
    return loaded;
  }

  lookup(name: string, fromDir: string): TaskDefinition {
    const file = this.loadNested(fromDir);
    const definition = file.tasks.get(name);
    if (!definition) {
      throw new UnknownTaskError(name, file.path);
    }
    return definition;
  }

  /**
   * Display name of a task: plain for the root file, prefixed with the
   * root-relative directory for nested files.
   */
  qualify(name: string, dir: string): string {
    const rel = relative(this.root.dir, resolve(dir));
    if (!rel) {
      return name;
    }
    return `${rel.split(sep).join("/")}:${name}`;
  }

  listTasks(): TaskSummary[] {
    return Array.from(this.root.tasks.values()).map((task) =>
      task.description === undefined
        ? { name: task.name }
        : { description: task.description, name: task.name }
    );
  }
}

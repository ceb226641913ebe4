import micromatch from "micromatch";
import type { TaskSummary } from "../types";

export class TaskMatcher {
  /**
   * Filters tasks by a comma-separated list of glob patterns.
   * Inclusions and `!` exclusions apply in left-to-right order; a list made
   * only of exclusions starts from every task.
   */
  filter(tasks: TaskSummary[], patternList: string): TaskSummary[] {
    const patterns = this.splitPatterns(patternList);
    if (patterns.length === 0) {
      return tasks;
    }

    const names = tasks.map((t) => t.name);
    const onlyExclusions = patterns.every((p) => p.startsWith("!"));
    let selected = onlyExclusions ? [...names] : [];

    for (const pattern of patterns) {
      if (pattern.startsWith("!")) {
        const toRemove = new Set(micromatch(selected, pattern.slice(1)));
        selected = selected.filter((name) => !toRemove.has(name));
      } else {
        selected = [...selected, ...this.findMatches(pattern, names)];
      }
    }

    const keep = new Set(selected);
    return tasks.filter((t) => keep.has(t.name));
  }

  private findMatches(pattern: string, names: string[]): string[] {
    // Task names are opaque; an exact name wins over glob interpretation
    if (names.includes(pattern)) {
      return [pattern];
    }
    return micromatch(names, pattern);
  }

  private splitPatterns(input: string): string[] {
    return input
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean);
  }
}

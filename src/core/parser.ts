import type { ParsedCommand } from "../types";

export class Parser {
  parse(args: string[]): ParsedCommand {
    const result: ParsedCommand = {
      config: {},
      help: false,
      list: false,
    };

    for (const arg of args) {
      this.processArg(arg, result);
    }

    return result;
  }

  private processArg(arg: string, result: ParsedCommand): void {
    if (arg.startsWith("--")) {
      this.processLongFlag(arg.substring(2), result);
    } else if (arg.startsWith("-") && arg.length > 1) {
      this.processShortFlags(arg.substring(1), result);
    } else if (result.task === undefined) {
      result.task = arg;
    } else {
      console.warn(`Ignoring extra argument: ${arg}`);
    }
  }

  private processLongFlag(flag: string, result: ParsedCommand): void {
    if (flag === "quiet") {
      result.config.quiet = true;
    } else if (flag === "continue") {
      result.config.continue = true;
    } else if (flag === "buffered") {
      result.config.output = "buffered";
    } else if (flag === "list") {
      result.list = true;
    } else if (flag === "help") {
      result.help = true;
    } else if (flag === "no-prefix") {
      result.config.prefix = false;
    } else if (flag.startsWith("prefix=")) {
      const PREFIX_LENGTH = "prefix=".length;
      result.config.prefix = flag.substring(PREFIX_LENGTH);
    } else {
      console.warn(`Unknown flag: --${flag}`);
    }
  }

  private processShortFlags(flags: string, result: ParsedCommand): void {
    for (const flag of flags) {
      if (flag === "q") {
        result.config.quiet = true;
      } else if (flag === "c") {
        result.config.continue = true;
      } else if (flag === "b") {
        result.config.output = "buffered";
      } else if (flag === "l") {
        result.list = true;
      } else if (flag === "h") {
        result.help = true;
      } else {
        console.warn(`Unknown flag: -${flag}`);
      }
    }
  }
}

export function parseCommand(args: string[]): ParsedCommand {
  const parser = new Parser();
  return parser.parse(args);
}

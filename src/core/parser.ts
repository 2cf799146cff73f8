import { UsageError } from "../errors";
import type { ParsedCommand, TargetOptionKey } from "../types";

const OPTION_FLAGS = new Map<string, TargetOptionKey>([
  ["dry", "dry"],
  ["dry-run", "dry"],
  ["ignore-err", "ignoreErr"],
  ["keep-going", "keepGoing"],
  ["shell", "shell"],
  ["silent", "silent"],
]);

const SHORT_OPTION_FLAGS = new Map<string, TargetOptionKey>([
  ["i", "ignoreErr"],
  ["k", "keepGoing"],
  ["n", "dry"],
  ["s", "silent"],
]);

const VALUE_FLAGS = ["file", "parser", "jobs"] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

const SHORT_VALUE_FLAGS = new Map<string, ValueFlag>([
  ["f", "file"],
  ["j", "jobs"],
  ["p", "parser"],
]);

const INTEGER_PATTERN = /^\d+$/;

export class Parser {
  parse(args: string[]): ParsedCommand {
    const result: ParsedCommand = {
      config: {},
      patterns: [],
    };

    // Everything after -- is a target name, even if it looks like a flag
    const separatorIndex = args.indexOf("--");
    const argsToProcess =
      separatorIndex === -1 ? args : args.slice(0, separatorIndex);
    const trailing = separatorIndex === -1 ? [] : args.slice(separatorIndex + 1);

    let index = 0;
    const next = (flag: string): string => {
      const value = argsToProcess[index + 1];
      if (value === undefined) {
        throw new UsageError(`Missing value for ${flag}`);
      }
      index++;
      return value;
    };

    for (; index < argsToProcess.length; index++) {
      const arg = argsToProcess[index];
      if (arg === undefined) {
        continue;
      }

      if (arg.startsWith("--")) {
        this.processLongFlag(arg.substring(2), result, next);
      } else if (arg.startsWith("-") && arg.length > 1) {
        this.processShortFlags(arg.substring(1), result, next);
      } else {
        result.patterns.push(arg);
      }
    }

    result.patterns.push(...trailing);
    return result;
  }

  private processLongFlag(
    flag: string,
    result: ParsedCommand,
    next: (flag: string) => string
  ): void {
    const equalsIndex = flag.indexOf("=");
    const name = equalsIndex === -1 ? flag : flag.slice(0, equalsIndex);
    const inlineValue =
      equalsIndex === -1 ? undefined : flag.slice(equalsIndex + 1);

    const option = OPTION_FLAGS.get(name);
    if (option) {
      this.setOverride(result, option);
      return;
    }

    if (isValueFlag(name)) {
      this.setValue(result, name, inlineValue ?? next(`--${name}`));
      return;
    }

    if (name === "quiet") {
      result.config.quiet = true;
    } else if (name === "list") {
      result.list = true;
    } else if (name === "help") {
      result.help = true;
    } else if (name === "no-prefix") {
      result.config.prefix = false;
    } else if (name === "prefix" && inlineValue !== undefined) {
      result.config.prefix = inlineValue;
    } else {
      console.warn(`Unknown flag: --${flag}`);
    }
  }

  private processShortFlags(
    flags: string,
    result: ParsedCommand,
    next: (flag: string) => string
  ): void {
    for (let i = 0; i < flags.length; i++) {
      const flag = flags.charAt(i);
      const option = SHORT_OPTION_FLAGS.get(flag);
      const valueFlag = SHORT_VALUE_FLAGS.get(flag);

      if (option) {
        this.setOverride(result, option);
      } else if (valueFlag) {
        // -fpath or -f path
        const rest = flags.slice(i + 1);
        this.setValue(result, valueFlag, rest === "" ? next(`-${flag}`) : rest);
        return;
      } else if (flag === "q") {
        result.config.quiet = true;
      } else if (flag === "l") {
        result.list = true;
      } else if (flag === "h") {
        result.help = true;
      } else {
        console.warn(`Unknown flag: -${flag}`);
      }
    }
  }

  private setOverride(result: ParsedCommand, option: TargetOptionKey): void {
    const overrides = { ...result.config.overrides };
    overrides[option] = true;
    result.config.overrides = overrides;
  }

  private setValue(result: ParsedCommand, flag: ValueFlag, value: string): void {
    if (flag === "file") {
      result.file = value;
    } else if (flag === "parser") {
      result.parser = value;
    } else {
      if (!INTEGER_PATTERN.test(value) || Number.parseInt(value, 10) < 1) {
        throw new UsageError(`--jobs expects a positive integer, got: ${value}`);
      }
      result.config.jobs = Number.parseInt(value, 10);
    }
  }
}

function isValueFlag(name: string): name is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === name);
}

export function parseCommand(args: string[]): ParsedCommand {
  const parser = new Parser();
  return parser.parse(args);
}

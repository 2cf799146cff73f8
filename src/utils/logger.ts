import ansis from "ansis";
import type { Config } from "../types";

const colors = [
  ansis.cyan,
  ansis.green,
  ansis.yellow,
  ansis.blue,
  ansis.magenta,
  ansis.red,
  ansis.gray,
  ansis.white,
] as const;

type LoggerConfig = Pick<Config, "quiet" | "prefix">;

export class Logger {
  private readonly colorMap = new Map<string, (typeof colors)[number]>();
  private colorIndex = 0;
  private maxPrefixLength = 0;
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      prefix: config.prefix ?? true,
      quiet: config.quiet ?? false,
    };
  }

  registerTarget(name: string): void {
    if (!this.colorMap.has(name)) {
      const color = colors[this.colorIndex % colors.length];
      if (color) {
        this.colorMap.set(name, color);
      }
      this.colorIndex++;
      this.maxPrefixLength = Math.max(this.maxPrefixLength, name.length);
    }
  }

  log(target: string, message: string): void {
    if (this.config.quiet) {
      return;
    }

    for (const line of message.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      console.log(this.formatLine(target, line));
    }
  }

  error(target: string, message: string): void {
    for (const line of message.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      console.error(this.formatLine(target, ansis.red(line)));
    }
  }

  success(message: string): void {
    if (this.config.quiet) {
      return;
    }
    console.log(`${ansis.green("✓")} ${message}`);
  }

  warn(message: string): void {
    console.warn(`${ansis.yellow("⚠")} ${message}`);
  }

  fail(message: string): void {
    const [first = "", ...rest] = message.split("\n");
    console.error(`${ansis.red("✗")} ${first}`);
    for (const line of rest) {
      console.error(line);
    }
  }

  // Target status lines name the target in its own color

  started(target: string): void {
    if (this.config.quiet) {
      return;
    }
    console.log(`${ansis.blue("ℹ")} Running: ${this.paint(target)}`);
  }

  succeeded(target: string): void {
    this.success(`Completed: ${this.paint(target)}`);
  }

  failed(target: string, reason: string, neededBy: readonly string[] = []): void {
    const needed = neededBy.length > 0 ? ` (needed by ${neededBy.join(", ")})` : "";
    console.error(`${ansis.red("✗")} Failed: ${this.paint(target)}: ${reason}${needed}`);
  }

  ignored(target: string, reason: string): void {
    this.warn(`${this.paint(target)}: ${reason} (ignored)`);
  }

  skipped(target: string, blockedBy: readonly string[]): void {
    this.warn(
      `Skipped: ${this.paint(target)} (dependency did not succeed: ${blockedBy.join(", ")})`
    );
  }

  forced(target: string, blockedBy: readonly string[]): void {
    this.warn(
      `Running ${this.paint(target)} despite failed dependencies: ${blockedBy.join(", ")} (ignored)`
    );
  }

  private paint(target: string): string {
    const color = this.colorMap.get(target) ?? ansis.white;
    return color(target);
  }

  private formatLine(target: string, line: string): string {
    if (this.config.prefix === false) {
      return line;
    }

    const color = this.colorMap.get(target) ?? ansis.white;

    if (typeof this.config.prefix === "string") {
      return `${color(this.config.prefix)} ${line}`;
    }
    // Pad to align the pipe separator across targets
    const prefix = `[${target}]`;
    const paddedPrefix = prefix.padEnd(this.maxPrefixLength + 2);
    return `${color(paddedPrefix)} ${ansis.gray("|")} ${line}`;
  }

  createTargetLogger(name: string): TargetLogger {
    this.registerTarget(name);
    return new TargetLogger(this, name);
  }
}

/**
 * Writes a single target's command output with that target's prefix.
 */
export class TargetLogger {
  private readonly parent: Logger;
  readonly target: string;

  constructor(parent: Logger, target: string) {
    this.parent = parent;
    this.target = target;
  }

  log(message: string): void {
    this.parent.log(this.target, message);
  }

  error(message: string): void {
    this.parent.error(this.target, message);
  }

  wouldRun(command: string): void {
    this.parent.log(this.target, `${ansis.gray("would run:")} ${command}`);
  }
}

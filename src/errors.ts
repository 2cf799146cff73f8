export type TrunErrorCode =
  | "UNKNOWN_TARGET"
  | "CYCLE"
  | "DUPLICATE_TARGET"
  | "INVALID_TARGET"
  | "COMMAND_FAILED"
  | "INVOCATION_FAILED"
  | "CONFIG_PARSE"
  | "CONFIG_NOT_FOUND"
  | "UNKNOWN_PARSER"
  | "USAGE"
  | "UNKNOWN_ERROR";

export class TrunError extends Error {
  readonly code: TrunErrorCode;

  constructor(code: TrunErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TrunError";
    this.code = code;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  static from(cause: unknown): TrunError {
    if (cause instanceof TrunError) {
      return cause;
    }

    return new TrunError(
      "UNKNOWN_ERROR",
      cause instanceof Error ? cause.message : `Unknown error: ${String(cause)}`,
      { cause }
    );
  }
}

export class UnknownTargetError extends TrunError {
  readonly target: string;
  readonly referencedBy: string | undefined;

  constructor(target: string, referencedBy?: string) {
    super(
      "UNKNOWN_TARGET",
      referencedBy === undefined
        ? `Target not found: ${target}`
        : `Target not found: ${target} (dependency of ${referencedBy})`
    );
    this.name = "UnknownTargetError";
    this.target = target;
    this.referencedBy = referencedBy;
  }
}

export class CycleError extends TrunError {
  readonly cycle: readonly string[];

  /**
   * @param cycle - the targets along the cycle, starting and ending with the
   * same name
   */
  constructor(cycle: readonly string[]) {
    super("CYCLE", `Circular dependency detected: ${cycle.join(" -> ")}`);
    this.name = "CycleError";
    this.cycle = cycle;
  }
}

export class DuplicateTargetError extends TrunError {
  readonly target: string;

  constructor(target: string) {
    super("DUPLICATE_TARGET", `Target defined more than once: ${target}`);
    this.name = "DuplicateTargetError";
    this.target = target;
  }
}

export class InvalidTargetError extends TrunError {
  constructor(message: string) {
    super("INVALID_TARGET", message);
    this.name = "InvalidTargetError";
  }
}

export class CommandFailure extends TrunError {
  readonly target: string;
  readonly command: string;
  readonly exitCode: number;
  // The message without the target name
  readonly summary: string;

  constructor(target: string, command: string, exitCode: number, reason?: string) {
    const summary = `command failed (${reason ?? `exit code ${exitCode}`}): ${command}`;
    super("COMMAND_FAILED", `${target}: ${summary}`);
    this.name = "CommandFailure";
    this.summary = summary;
    this.target = target;
    this.command = command;
    this.exitCode = exitCode;
  }
}

export type FailedTarget = {
  name: string;
  failure: CommandFailure;
  chain: readonly string[];
};

export type SkippedTarget = {
  name: string;
  blockedBy: readonly string[];
};

export class InvocationFailed extends TrunError {
  readonly failed: readonly FailedTarget[];
  readonly skipped: readonly SkippedTarget[];
  readonly notRun: readonly string[];

  constructor(
    failed: readonly FailedTarget[],
    skipped: readonly SkippedTarget[],
    notRun: readonly string[]
  ) {
    super("INVOCATION_FAILED", InvocationFailed.describe(failed, skipped, notRun));
    this.name = "InvocationFailed";
    this.failed = failed;
    this.skipped = skipped;
    this.notRun = notRun;
  }

  get failedTargets(): string[] {
    return this.failed.map((f) => f.name);
  }

  get skippedTargets(): string[] {
    return this.skipped.map((s) => s.name);
  }

  private static describe(
    failed: readonly FailedTarget[],
    skipped: readonly SkippedTarget[],
    notRun: readonly string[]
  ): string {
    const lines = [`${failed.length} target(s) failed`];
    for (const { failure, chain } of failed) {
      lines.push(`  failed: ${failure.message}`);
      if (chain.length > 1) {
        lines.push(`    via ${chain.join(" -> ")}`);
      }
    }
    for (const { name, blockedBy } of skipped) {
      lines.push(`  skipped: ${name} (dependency did not succeed: ${blockedBy.join(", ")})`);
    }
    if (notRun.length > 0) {
      lines.push(`  not run: ${notRun.join(", ")}`);
    }
    return lines.join("\n");
  }
}

export class ConfigParseError extends TrunError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super("CONFIG_PARSE", `${source}: ${message}`, options);
    this.name = "ConfigParseError";
    this.source = source;
  }
}

export class ConfigNotFoundError extends TrunError {
  readonly searched: readonly string[];

  constructor(cwd: string, searched: readonly string[]) {
    super(
      "CONFIG_NOT_FOUND",
      `No configuration found in ${cwd} (looked for ${searched.join(", ")})`
    );
    this.name = "ConfigNotFoundError";
    this.searched = searched;
  }
}

export class UnknownParserError extends TrunError {
  constructor(id: string, available: readonly string[]) {
    super(
      "UNKNOWN_PARSER",
      `Unknown configuration format: ${id} (available: ${available.join(", ")})`
    );
    this.name = "UnknownParserError";
  }
}

export class UsageError extends TrunError {
  constructor(message: string) {
    super("USAGE", message);
    this.name = "UsageError";
  }
}

import { delimiter, join } from "node:path";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import debug from "debug";
import { type ExecaChildProcess, type Options, execa, execaCommand } from "execa";
import type { CommandOptions, CommandResult, CommandRunner } from "../types";
import type { Logger } from "../utils/logger";

const log = debug("trun:command");

// Reported when the process could not be started at all
export const LAUNCH_FAILURE_EXIT_CODE = -1;

const SHUTDOWN_GRACE_PERIOD_MS = 1000;

export type ExecaCommandRunnerOptions = {
  cwd?: string;
  env?: Record<string, string>;
};

export class ExecaCommandRunner implements CommandRunner {
  private readonly processes = new Set<ExecaChildProcess>();
  private readonly logger: Logger;
  private readonly options: ExecaCommandRunnerOptions;

  constructor(logger: Logger, options: ExecaCommandRunnerOptions = {}) {
    this.logger = logger;
    this.options = options;
  }

  async execute(command: string, options: CommandOptions): Promise<CommandResult> {
    const targetLogger = this.logger.createTargetLogger(options.target);

    if (options.dry) {
      log(`Dry run for ${options.target}: ${command}`);
      targetLogger.wouldRun(command);
      return { command, exitCode: 0, ok: true };
    }

    if (command.trim() === "") {
      return {
        command,
        exitCode: LAUNCH_FAILURE_EXIT_CODE,
        ok: false,
        reason: "empty command",
      };
    }

    log(`Running ${options.target}: ${command}`, {
      shell: options.shell,
      silent: options.silent,
    });

    const proc = this.spawn(command, options);
    this.processes.add(proc);
    const output = Promise.all([
      forEachLine(proc.stdout, (line) => targetLogger.log(line)),
      forEachLine(proc.stderr, (line) => targetLogger.error(line)),
    ]);

    try {
      await proc;
      await output;
      return { command, exitCode: 0, ok: true };
    } catch (error) {
      const result = toFailure(command, error);
      // A process that never started has no output left to drain
      if (result.exitCode !== LAUNCH_FAILURE_EXIT_CODE) {
        await output;
      }
      log(`Command failed for ${options.target}:`, result);
      return result;
    } finally {
      this.processes.delete(proc);
    }
  }

  /**
   * Terminate every running child process.
   */
  shutdown(): void {
    for (const proc of this.processes) {
      proc.kill("SIGTERM", { forceKillAfterTimeout: SHUTDOWN_GRACE_PERIOD_MS });
    }
  }

  private spawn(command: string, options: CommandOptions): ExecaChildProcess {
    const cwd = this.options.cwd ?? process.cwd();
    const npmBinPath = join(cwd, "node_modules", ".bin");
    const path = [npmBinPath, process.env["PATH"]]
      .filter((entry): entry is string => Boolean(entry))
      .join(delimiter);

    const output = options.silent ? "ignore" : "pipe";
    // Output is streamed line by line, never collected
    const spawnOptions: Options = {
      buffer: false,
      cwd,
      env: {
        ...process.env,
        ...this.options.env,
        PATH: path,
      },
      stderr: output,
      stdin: "inherit",
      stdout: output,
    };

    // With shell the string goes to /bin/sh (cmd.exe on Windows) untouched;
    // without it, execa splits it on spaces into file and arguments
    return options.shell
      ? execa(command, { ...spawnOptions, shell: true })
      : execaCommand(command, spawnOptions);
  }
}

/**
 * Calls `write` for every complete line of `stream`, decoded as UTF-8.
 * Resolves once the stream has ended.
 */
function forEachLine(
  stream: Readable | null,
  write: (line: string) => void
): Promise<void> {
  if (!stream) {
    return Promise.resolve();
  }
  const lines = createInterface({ crlfDelay: Infinity, input: stream });
  lines.on("line", write);
  return new Promise((resolve) => {
    lines.once("close", () => resolve());
  });
}

function toFailure(command: string, error: unknown): CommandResult {
  if (error instanceof Error && "exitCode" in error && typeof error.exitCode === "number") {
    return {
      command,
      exitCode: error.exitCode,
      ok: false,
      reason: `exit code ${error.exitCode}`,
    };
  }

  return {
    command,
    exitCode: LAUNCH_FAILURE_EXIT_CODE,
    ok: false,
    reason: error instanceof Error ? shortMessage(error) : String(error),
  };
}

function shortMessage(error: Error): string {
  if ("shortMessage" in error && typeof error.shortMessage === "string") {
    return error.shortMessage;
  }
  return error.message;
}

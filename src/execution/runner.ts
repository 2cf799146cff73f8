import ansis from "ansis";
import debug from "debug";
import {
  createDefaultParserRegistry,
  type ParserRegistry,
} from "../config/parser-registry";
import { GraphBuilder } from "../core/graph-builder";
import { parseCommand } from "../core/parser";
import { PatternMatcher } from "../core/pattern-matcher";
import { TrunError, UsageError } from "../errors";
import { printHelp } from "../help";
import type {
  CommandRunner,
  LoadedConfig,
  RunOptions,
  TargetRegistry,
} from "../types";
import { Logger } from "../utils/logger";
import { ExecaCommandRunner } from "./command-runner";
import { Executor, type RunSummary } from "./executor";

const log = debug("trun:runner");

export class Runner {
  private readonly matcher = new PatternMatcher();
  private readonly graphBuilder = new GraphBuilder();
  private readonly parsers: ParserRegistry;
  private readonly active = new Set<CommandRunner>();

  constructor(parsers: ParserRegistry = createDefaultParserRegistry()) {
    this.parsers = parsers;
  }

  /**
   * Run CLI arguments against the configuration found from `options.cwd`.
   * Resolves to the process exit code: 0 only when every target succeeded.
   */
  async run(args: string[], options: RunOptions = {}): Promise<number> {
    try {
      const parsed = parseCommand(args);
      if (parsed.help) {
        printHelp();
        return 0;
      }

      const cwd = options.cwd ?? process.cwd();
      const loaded = this.parsers.load({
        cwd,
        file: parsed.file,
        parser: parsed.parser,
      });
      log(`Loaded ${loaded.registry.size} target(s) from ${loaded.source}`);

      if (parsed.list) {
        this.printTargets(loaded);
        return 0;
      }
      if (parsed.patterns.length === 0) {
        throw new UsageError("No targets specified (use --list to see them)");
      }

      // Config file options < CLI flags < programmatic options
      const config: RunOptions = {
        ...parsed.config,
        ...options,
        cwd,
        overrides: {
          ...loaded.options,
          ...parsed.config.overrides,
          ...options.overrides,
        },
      };

      const summary = await this.invoke(loaded.registry, parsed.patterns, config);
      return summary.success ? 0 : 1;
    } catch (error) {
      console.error("Error:", TrunError.from(error).message);
      return 1;
    }
  }

  /**
   * Resolve `patterns` to root targets, build their plan and execute it.
   * Graph errors are thrown before any command runs; command failures are
   * reported in the returned summary.
   */
  async invoke(
    registry: TargetRegistry,
    patterns: readonly string[],
    options: RunOptions = {}
  ): Promise<RunSummary> {
    const logger = new Logger(options);

    // Unknown literal names are rejected by resolvePatterns below
    for (const pattern of patterns) {
      if (
        !pattern.startsWith("!") &&
        this.matcher.isGlobPattern(pattern) &&
        !this.matcher.hasMatches(pattern, registry)
      ) {
        logger.warn(`No targets match: ${pattern}`);
      }
    }
    const roots = this.matcher.resolvePatterns(patterns, registry);
    if (roots.length === 0) {
      throw new UsageError(`No targets match: ${patterns.join(" ")}`);
    }

    const plan = this.graphBuilder.build(registry, roots);
    log("Plan:", plan.order);

    const commandRunner =
      options.commandRunner ??
      new ExecaCommandRunner(logger, { cwd: options.cwd, env: options.env });
    const executor = new Executor({
      jobs: options.jobs,
      logger,
      overrides: options.overrides,
      runner: commandRunner,
    });

    this.active.add(commandRunner);
    try {
      const summary = await executor.execute(plan);
      if (summary.error) {
        logger.fail(summary.error.message);
      } else {
        logger.success(`${plan.size} target(s) succeeded`);
      }
      return summary;
    } finally {
      this.active.delete(commandRunner);
    }
  }

  /**
   * Stop the child processes of every invocation in progress.
   */
  shutdown(): void {
    for (const commandRunner of this.active) {
      commandRunner.shutdown?.();
    }
  }

  private printTargets(loaded: LoadedConfig): void {
    console.log(`Targets in ${loaded.source}:`);
    for (const target of loaded.registry.values()) {
      const deps =
        target.dependencies.length > 0
          ? ansis.gray(` (depends on ${target.dependencies.join(", ")})`)
          : "";
      console.log(`  ${ansis.bold(target.name)}${deps}`);
      for (const command of target.commands) {
        console.log(`    ${ansis.gray("$")} ${command}`);
      }
    }
  }
}

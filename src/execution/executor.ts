import debug from "debug";
import type { ExecutionPlan } from "../core/graph-builder";
import { mergeOptions } from "../core/registry";
import {
  CommandFailure,
  type FailedTarget,
  InvocationFailed,
  type SkippedTarget,
} from "../errors";
import type {
  CommandRunner,
  TargetDefinition,
  TargetOptions,
} from "../types";
import { Logger } from "../utils/logger";
import { RunState, type TargetOutcome } from "./run-state";

const log = debug("trun:executor");

export type RunSummary = {
  success: boolean;
  // In plan order
  outcomes: TargetOutcome[];
  error?: InvocationFailed;
};

export interface ExecutorOptions {
  runner: CommandRunner;
  logger?: Logger;
  overrides?: Partial<TargetOptions>;
  jobs?: number;
}

export class Executor {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly overrides: Partial<TargetOptions>;
  private readonly jobs: number;

  constructor(options: ExecutorOptions) {
    this.runner = options.runner;
    this.logger = options.logger ?? new Logger();
    this.overrides = options.overrides ?? {};
    this.jobs = Math.max(1, options.jobs ?? 1);
  }

  /**
   * Run every target of the plan at most once, dependencies first.
   * Command failures never throw; they are collected into the returned
   * summary's `error`.
   */
  async execute(plan: ExecutionPlan): Promise<RunSummary> {
    log("=== Starting execution ===");
    log("Targets to execute:", plan.order, { jobs: this.jobs });

    for (const name of plan.order) {
      this.logger.registerTarget(name);
    }

    const state = new RunState(plan.order);
    const inFlight = new Map<string, Promise<void>>();
    let aborted = false;

    // Evaluate every pending target whose dependencies all have an outcome:
    // skip it when blocked, otherwise start it while fewer than `jobs` run.
    // After an unsuppressed failure only targets downstream of a failure are
    // still evaluated; independent branches are left unstarted.
    const schedule = (): void => {
      for (const name of plan.order) {
        if (state.status(name) !== "PENDING") {
          continue;
        }

        const dependencies = plan.dependenciesOf(name);
        if (!dependencies.every((dep) => state.isSettled(dep))) {
          log(`Target ${name} waiting for dependencies`);
          continue;
        }

        const target = plan.target(name);
        const options = this.optionsFor(target);
        const blockedBy = dependencies.filter(
          (dep) => state.status(dep) !== "SUCCEEDED"
        );

        if (blockedBy.length > 0 && !options.ignoreErr) {
          log(`Skipping ${name}, blocked by:`, blockedBy);
          state.skip(name, blockedBy);
          this.logger.skipped(name, blockedBy);
          continue;
        }
        if (inFlight.size >= this.jobs || (aborted && blockedBy.length === 0)) {
          continue;
        }
        if (blockedBy.length > 0) {
          this.logger.forced(name, blockedBy);
        }

        state.start(name);
        const running = this.runTarget(plan, target, options, state).then(() => {
          inFlight.delete(name);
          if (state.status(name) === "FAILED" && !options.keepGoing) {
            log(`Target ${name} failed, independent targets will not start`);
            aborted = true;
          }
        });
        inFlight.set(name, running);
      }
    };

    schedule();
    while (inFlight.size > 0) {
      await Promise.race(inFlight.values());
      schedule();
    }

    return this.summarize(plan, state);
  }

  private async runTarget(
    plan: ExecutionPlan,
    target: TargetDefinition,
    options: Readonly<TargetOptions>,
    state: RunState
  ): Promise<void> {
    const { name } = target;
    log(`=== Running target: ${name} ===`, options);
    this.logger.started(name);

    for (const command of target.commands) {
      const result = await this.runner.execute(command, {
        dry: options.dry,
        shell: options.shell,
        silent: options.silent,
        target: name,
      });
      if (result.ok) {
        continue;
      }

      const failure = new CommandFailure(name, command, result.exitCode, result.reason);
      if (options.ignoreErr) {
        state.tolerate(name, failure);
        this.logger.ignored(name, failure.summary);
        continue;
      }

      state.fail(name, failure);
      this.logger.failed(name, failure.summary, plan.dependentsOf(name));
      return;
    }

    state.succeed(name);
    this.logger.succeeded(name);
  }

  private optionsFor(target: TargetDefinition): Readonly<TargetOptions> {
    return mergeOptions(target.options, this.overrides);
  }

  private summarize(plan: ExecutionPlan, state: RunState): RunSummary {
    const outcomes = state.list();

    const failed: FailedTarget[] = state.withStatus("FAILED").flatMap((outcome) => {
      const failure = outcome.failures.at(-1);
      return failure
        ? [{ chain: plan.chainTo(outcome.name), failure, name: outcome.name }]
        : [];
    });
    const skipped: SkippedTarget[] = state
      .withStatus("SKIPPED")
      .map(({ blockedBy, name }) => ({ blockedBy, name }));
    const notRun = state.withStatus("PENDING").map(({ name }) => name);

    log("=== Execution finished ===", {
      failed: failed.map((f) => f.name),
      notRun,
      skipped: skipped.map((s) => s.name),
    });

    if (failed.length === 0) {
      return { outcomes, success: true };
    }
    return {
      error: new InvocationFailed(failed, skipped, notRun),
      outcomes,
      success: false,
    };
  }
}

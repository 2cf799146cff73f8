import type { CommandFailure } from "../errors";
import type { TargetStatus } from "../types";

export type TargetOutcome = {
  name: string;
  status: TargetStatus;
  // Every failing command, including the ones ignore_err tolerated
  failures: CommandFailure[];
  // Dependencies that had not succeeded when the target was evaluated
  blockedBy: string[];
};

const TRANSITIONS: Record<TargetStatus, readonly TargetStatus[]> = {
  FAILED: [],
  PENDING: ["RUNNING", "SKIPPED"],
  RUNNING: ["SUCCEEDED", "FAILED"],
  SKIPPED: [],
  SUCCEEDED: [],
};

/**
 * Per-target outcomes for one invocation. Each target moves through its
 * states once; a finished outcome never changes.
 */
export class RunState {
  private readonly outcomes = new Map<string, TargetOutcome>();

  constructor(names: readonly string[]) {
    for (const name of names) {
      this.outcomes.set(name, {
        blockedBy: [],
        failures: [],
        name,
        status: "PENDING",
      });
    }
  }

  status(name: string): TargetStatus {
    return this.outcome(name).status;
  }

  outcome(name: string): TargetOutcome {
    const outcome = this.outcomes.get(name);
    if (!outcome) {
      throw new Error(`No run state for target: ${name}`);
    }
    return outcome;
  }

  isSettled(name: string): boolean {
    const status = this.status(name);
    return status !== "PENDING" && status !== "RUNNING";
  }

  start(name: string): void {
    this.transition(name, "RUNNING");
  }

  succeed(name: string): void {
    this.transition(name, "SUCCEEDED");
  }

  fail(name: string, failure: CommandFailure): void {
    this.transition(name, "FAILED");
    this.outcome(name).failures.push(failure);
  }

  skip(name: string, blockedBy: readonly string[]): void {
    this.transition(name, "SKIPPED");
    this.outcome(name).blockedBy.push(...blockedBy);
  }

  /**
   * Record a failure that ignore_err tolerated; the target keeps running.
   */
  tolerate(name: string, failure: CommandFailure): void {
    const outcome = this.outcome(name);
    if (outcome.status !== "RUNNING") {
      throw new Error(`Cannot record a failure for ${name} while ${outcome.status}`);
    }
    outcome.failures.push(failure);
  }

  list(): TargetOutcome[] {
    return [...this.outcomes.values()];
  }

  withStatus(status: TargetStatus): TargetOutcome[] {
    return this.list().filter((outcome) => outcome.status === status);
  }

  private transition(name: string, next: TargetStatus): void {
    const outcome = this.outcome(name);
    if (!TRANSITIONS[outcome.status].includes(next)) {
      throw new Error(
        `Invalid transition for ${name}: ${outcome.status} -> ${next}`
      );
    }
    outcome.status = next;
  }
}

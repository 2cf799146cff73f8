import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GraphBuilder } from "../../core/graph-builder";
import { createRegistry } from "../../core/registry";
import { InvocationFailed } from "../../errors";
import { Executor, type RunSummary } from "../../execution/executor";
import type { TargetInput } from "../../types";
import { Logger } from "../../utils/logger";
import {
  type ConsoleSpies,
  FakeCommandRunner,
  plain,
  printed,
  silenceConsole,
} from "../helpers/fake-runner";

function planFor(inputs: TargetInput[], roots: string[]) {
  return new GraphBuilder().build(createRegistry(inputs), roots);
}

function statuses(summary: RunSummary): Record<string, string> {
  return Object.fromEntries(summary.outcomes.map((o) => [o.name, o.status]));
}

const dockerTargets: TargetInput[] = [
  { commands: ["docker build ."], name: "docker-build" },
  {
    commands: ["docker run app"],
    dependencies: ["docker-build"],
    name: "docker-run",
  },
];

describe("Executor", () => {
  let spies: ConsoleSpies;

  beforeEach(() => {
    spies = silenceConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs dependencies first, in declared order", async () => {
    const runner = new FakeCommandRunner();
    const plan = planFor(
      [
        { commands: ["cmdA", "cmdB"], name: "check" },
        { commands: ["cmdC"], name: "format" },
        { dependencies: ["check", "format"], name: "check-and-format" },
      ],
      ["check-and-format"]
    );

    const summary = await new Executor({ runner }).execute(plan);

    expect(runner.spawned).toEqual(["cmdA", "cmdB", "cmdC"]);
    expect(summary.success).toBe(true);
    expect(summary.error).toBeUndefined();
    expect(statuses(summary)).toEqual({
      check: "SUCCEEDED",
      "check-and-format": "SUCCEEDED",
      format: "SUCCEEDED",
    });
  });

  it("passes each target's options to the command runner", async () => {
    const runner = new FakeCommandRunner();
    const plan = planFor(
      [{ commands: ["lint"], name: "lint", options: { shell: true, silent: true } }],
      ["lint"]
    );

    await new Executor({ runner }).execute(plan);

    expect(runner.calls).toEqual([
      {
        command: "lint",
        options: { dry: false, shell: true, silent: true, target: "lint" },
      },
    ]);
  });

  it("skips a target whose dependency failed", async () => {
    const runner = new FakeCommandRunner({ "docker build .": 1 });
    const plan = planFor(dockerTargets, ["docker-run"]);

    const summary = await new Executor({ runner }).execute(plan);

    expect(runner.spawned).toEqual(["docker build ."]);
    expect(summary.success).toBe(false);
    expect(statuses(summary)).toEqual({
      "docker-build": "FAILED",
      "docker-run": "SKIPPED",
    });
    expect(summary.error).toBeInstanceOf(InvocationFailed);
    expect(summary.error?.failedTargets).toEqual(["docker-build"]);
    expect(summary.error?.skippedTargets).toEqual(["docker-run"]);
    expect(summary.error?.message).toBe(
      [
        "1 target(s) failed",
        "  failed: docker-build: command failed (exit code 1): docker build .",
        "    via docker-run -> docker-build",
        "  skipped: docker-run (dependency did not succeed: docker-build)",
      ].join("\n")
    );
    expect(printed(spies.warn).map(plain)).toContain(
      "⚠ Skipped: docker-run (dependency did not succeed: docker-build)"
    );
    expect(printed(spies.error).map(plain)).toContain(
      "✗ Failed: docker-build: command failed (exit code 1): docker build . (needed by docker-run)"
    );
  });

  it("records the failing command on the failed target", async () => {
    const runner = new FakeCommandRunner({ "docker build .": 2 });
    const plan = planFor(dockerTargets, ["docker-run"]);

    const summary = await new Executor({ runner }).execute(plan);

    const [failed] = summary.error?.failed ?? [];
    expect(failed?.name).toBe("docker-build");
    expect(failed?.failure.command).toBe("docker build .");
    expect(failed?.failure.exitCode).toBe(2);
    expect(failed?.chain).toEqual(["docker-run", "docker-build"]);
  });

  it("skips transitively", async () => {
    const runner = new FakeCommandRunner({ a: 1 });
    const plan = planFor(
      [
        { commands: ["a"], name: "a" },
        { commands: ["b"], dependencies: ["a"], name: "b" },
        { commands: ["c"], dependencies: ["b"], name: "c" },
      ],
      ["c"]
    );

    const summary = await new Executor({ runner }).execute(plan);

    expect(runner.spawned).toEqual(["a"]);
    expect(statuses(summary)).toEqual({ a: "FAILED", b: "SKIPPED", c: "SKIPPED" });
    expect(summary.error?.skipped).toEqual([
      { blockedBy: ["a"], name: "b" },
      { blockedBy: ["b"], name: "c" },
    ]);
  });

  it("runs an ignore_err target whose dependency was skipped", async () => {
    const runner = new FakeCommandRunner({ b: 1 });
    const plan = planFor(
      [
        { commands: ["a"], name: "a" },
        { commands: ["b"], dependencies: ["a"], name: "b" },
        { commands: ["c"], dependencies: ["b"], name: "c" },
        {
          commands: ["d"],
          dependencies: ["c"],
          name: "d",
          options: { ignoreErr: true },
        },
      ],
      ["d"]
    );

    const summary = await new Executor({ runner }).execute(plan);

    expect(runner.spawned).toEqual(["a", "b", "d"]);
    expect(statuses(summary)).toEqual({
      a: "SUCCEEDED",
      b: "FAILED",
      c: "SKIPPED",
      d: "SUCCEEDED",
    });
    expect(summary.error?.failedTargets).toEqual(["b"]);
    expect(summary.error?.notRun).toEqual([]);
    expect(printed(spies.warn).map(plain)).toContain(
      "⚠ Running d despite failed dependencies: c (ignored)"
    );
  });

  it("runs an ignore_err dependent despite a failed dependency", async () => {
    const runner = new FakeCommandRunner({ "docker build .": 1 });
    const plan = planFor(
      [
        { commands: ["docker build ."], name: "docker-build" },
        {
          commands: ["docker run app"],
          dependencies: ["docker-build"],
          name: "docker-run",
          options: { ignoreErr: true },
        },
      ],
      ["docker-run"]
    );

    const summary = await new Executor({ runner }).execute(plan);

    expect(runner.spawned).toEqual(["docker build .", "docker run app"]);
    expect(statuses(summary)).toEqual({
      "docker-build": "FAILED",
      "docker-run": "SUCCEEDED",
    });
    expect(summary.success).toBe(false);
    expect(printed(spies.warn).map(plain)).toContain(
      "⚠ Running docker-run despite failed dependencies: docker-build (ignored)"
    );
  });

  describe("command failures within a target", () => {
    const inputs = (options: TargetInput["options"]): TargetInput[] => [
      { commands: ["one", "two", "three"], name: "steps", options },
    ];

    it("stops at the first failing command", async () => {
      const runner = new FakeCommandRunner({ two: 1 });

      const summary = await new Executor({ runner }).execute(
        planFor(inputs({}), ["steps"])
      );

      expect(runner.spawned).toEqual(["one", "two"]);
      expect(statuses(summary)).toEqual({ steps: "FAILED" });
    });

    it("continues past failing commands with ignore_err", async () => {
      const runner = new FakeCommandRunner({ two: 1 });

      const summary = await new Executor({ runner }).execute(
        planFor(inputs({ ignoreErr: true }), ["steps"])
      );

      expect(runner.spawned).toEqual(["one", "two", "three"]);
      expect(summary.success).toBe(true);
      expect(statuses(summary)).toEqual({ steps: "SUCCEEDED" });
      expect(summary.outcomes[0]?.failures.map((f) => f.command)).toEqual(["two"]);
      expect(printed(spies.warn).map(plain)).toEqual([
        "⚠ steps: command failed (exit code 1): two (ignored)",
      ]);
    });
  });

  describe("keep_going", () => {
    const inputs = (options: TargetInput["options"]): TargetInput[] => [
      { commands: ["fail"], name: "bad", options },
      { commands: ["ok"], name: "good" },
      { dependencies: ["bad", "good"], name: "all" },
    ];

    it("leaves independent targets unstarted after a failure", async () => {
      const runner = new FakeCommandRunner({ fail: 1 });

      const summary = await new Executor({ runner }).execute(
        planFor(inputs({}), ["all"])
      );

      expect(runner.spawned).toEqual(["fail"]);
      expect(statuses(summary)).toEqual({
        all: "PENDING",
        bad: "FAILED",
        good: "PENDING",
      });
      expect(summary.error?.notRun).toEqual(["good", "all"]);
      expect(summary.error?.message).toBe(
        [
          "1 target(s) failed",
          "  failed: bad: command failed (exit code 1): fail",
          "    via all -> bad",
          "  not run: good, all",
        ].join("\n")
      );
    });

    it("keeps running independent targets when the failed target sets it", async () => {
      const runner = new FakeCommandRunner({ fail: 1 });

      const summary = await new Executor({ runner }).execute(
        planFor(inputs({ keepGoing: true }), ["all"])
      );

      expect(runner.spawned).toEqual(["fail", "ok"]);
      expect(statuses(summary)).toEqual({
        all: "SKIPPED",
        bad: "FAILED",
        good: "SUCCEEDED",
      });
      expect(summary.error?.notRun).toEqual([]);
    });

    it("applies as an invocation override", async () => {
      const runner = new FakeCommandRunner({ fail: 1 });

      const summary = await new Executor({
        overrides: { keepGoing: true },
        runner,
      }).execute(planFor(inputs({}), ["all"]));

      expect(runner.spawned).toEqual(["fail", "ok"]);
      expect(statuses(summary)["good"]).toBe("SUCCEEDED");
    });
  });

  it("runs a target shared by several dependents once", async () => {
    const runner = new FakeCommandRunner();
    const plan = planFor(
      [
        { commands: ["install"], name: "deps" },
        { commands: ["build api"], dependencies: ["deps"], name: "api" },
        { commands: ["build web"], dependencies: ["deps"], name: "web" },
      ],
      ["api", "web"]
    );

    await new Executor({ runner }).execute(plan);

    expect(runner.spawned).toEqual(["install", "build api", "build web"]);
  });

  it("reports success for a target without commands", async () => {
    const runner = new FakeCommandRunner();

    const summary = await new Executor({ runner }).execute(
      planFor([{ name: "noop" }], ["noop"])
    );

    expect(runner.calls).toEqual([]);
    expect(statuses(summary)).toEqual({ noop: "SUCCEEDED" });
  });

  it("applies dry from the overrides to every command", async () => {
    const runner = new FakeCommandRunner({ "docker build .": 1 });

    const summary = await new Executor({
      overrides: { dry: true },
      runner,
    }).execute(planFor(dockerTargets, ["docker-run"]));

    expect(runner.spawned).toEqual([]);
    expect(runner.calls.map((c) => c.options.dry)).toEqual([true, true]);
    expect(summary.success).toBe(true);
  });

  it("honors dry per target in a mixed plan", async () => {
    const runner = new FakeCommandRunner();
    const plan = planFor(
      [
        { commands: ["python -m build"], name: "build", options: { dry: true } },
        { commands: ["pytest"], dependencies: ["build"], name: "test" },
      ],
      ["test"]
    );

    const summary = await new Executor({ runner }).execute(plan);

    expect(runner.calls.map((c) => [c.command, c.options.dry])).toEqual([
      ["python -m build", true],
      ["pytest", false],
    ]);
    expect(runner.spawned).toEqual(["pytest"]);
    expect(statuses(summary)).toEqual({ build: "SUCCEEDED", test: "SUCCEEDED" });
  });

  describe("jobs", () => {
    const inputs: TargetInput[] = [
      { commands: ["a"], name: "a" },
      { commands: ["b"], name: "b" },
      { commands: ["c"], dependencies: ["a", "b"], name: "c" },
    ];

    it("runs one target at a time by default", async () => {
      const runner = new FakeCommandRunner({}, { a: 20, b: 20 });

      await new Executor({ runner }).execute(planFor(inputs, ["c"]));

      expect(runner.maxRunning).toBe(1);
      expect(runner.spawned).toEqual(["a", "b", "c"]);
    });

    it("runs independent targets concurrently", async () => {
      const runner = new FakeCommandRunner({}, { a: 20, b: 20 });

      const summary = await new Executor({ jobs: 2, runner }).execute(
        planFor(inputs, ["c"])
      );

      expect(runner.maxRunning).toBe(2);
      expect(runner.spawned).toEqual(["a", "b", "c"]);
      expect(summary.success).toBe(true);
    });
  });

  it("announces each target as it starts and completes", async () => {
    const runner = new FakeCommandRunner();

    await new Executor({ runner }).execute(
      planFor([{ commands: ["x"], name: "x" }], ["x"])
    );

    expect(printed(spies.log).map(plain)).toEqual(["ℹ Running: x", "✓ Completed: x"]);
  });

  it("writes status lines through the logger", async () => {
    const runner = new FakeCommandRunner();
    const logger = new Logger({ quiet: true });

    await new Executor({ logger, runner }).execute(
      planFor([{ commands: ["x"], name: "x" }], ["x"])
    );

    expect(spies.log).not.toHaveBeenCalled();
  });
});

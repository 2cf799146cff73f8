import { describe, expect, it } from "vitest";
import {
  CommandFailure,
  InvocationFailed,
  TrunError,
  UnknownTargetError,
} from "../../errors";

describe("TrunError", () => {
  it("keeps its own errors as they are", () => {
    const error = new UnknownTargetError("build");

    expect(TrunError.from(error)).toBe(error);
  });

  it("wraps other errors", () => {
    const cause = new Error("boom");
    const error = TrunError.from(cause);

    expect(error.code).toBe("UNKNOWN_ERROR");
    expect(error.message).toBe("boom");
    expect(error.cause).toBe(cause);
  });

  it("wraps thrown values that are not errors", () => {
    expect(TrunError.from("nope").message).toBe("Unknown error: nope");
  });

  it("supports instanceof for subclasses", () => {
    const error = new UnknownTargetError("build", "deploy");

    expect(error).toBeInstanceOf(TrunError);
    expect(error).toBeInstanceOf(UnknownTargetError);
    expect(error.code).toBe("UNKNOWN_TARGET");
  });
});

describe("CommandFailure", () => {
  it("describes the exit code", () => {
    expect(new CommandFailure("test", "pytest", 2).message).toBe(
      "test: command failed (exit code 2): pytest"
    );
  });

  it("prefers an explicit reason", () => {
    expect(new CommandFailure("test", "pytst", -1, "spawn pytst ENOENT").message).toBe(
      "test: command failed (spawn pytst ENOENT): pytst"
    );
  });
});

describe("InvocationFailed", () => {
  it("summarizes every failed, skipped and unstarted target", () => {
    const error = new InvocationFailed(
      [
        {
          chain: ["release", "test"],
          failure: new CommandFailure("test", "pytest", 1),
          name: "test",
        },
        { chain: ["lint"], failure: new CommandFailure("lint", "ruff", 1), name: "lint" },
      ],
      [{ blockedBy: ["test", "lint"], name: "release" }],
      ["docs"]
    );

    expect(error.message).toBe(
      [
        "2 target(s) failed",
        "  failed: test: command failed (exit code 1): pytest",
        "    via release -> test",
        "  failed: lint: command failed (exit code 1): ruff",
        "  skipped: release (dependency did not succeed: test, lint)",
        "  not run: docs",
      ].join("\n")
    );
    expect(error.failedTargets).toEqual(["test", "lint"]);
    expect(error.skippedTargets).toEqual(["release"]);
  });
});

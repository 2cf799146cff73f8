import { DuplicateTargetError, InvalidTargetError } from "../errors";
import {
  TARGET_OPTION_KEYS,
  type TargetDefinition,
  type TargetInput,
  type TargetOptionKey,
  type TargetOptions,
  type TargetRegistry,
} from "../types";

export const DEFAULT_TARGET_OPTIONS: Readonly<TargetOptions> = Object.freeze({
  dry: false,
  ignoreErr: false,
  keepGoing: false,
  shell: false,
  silent: false,
});

/**
 * Normalize a target into its definition: options default to `false` and
 * dependencies are de-duplicated in declared order.
 */
export function defineTarget(input: TargetInput): TargetDefinition {
  if (input.name.trim() === "") {
    throw new InvalidTargetError("Target name must not be empty");
  }

  for (const dep of input.dependencies ?? []) {
    if (dep.trim() === "") {
      throw new InvalidTargetError(
        `Target ${input.name} has an empty dependency name`
      );
    }
  }

  return Object.freeze({
    commands: Object.freeze([...(input.commands ?? [])]),
    dependencies: Object.freeze([...new Set(input.dependencies ?? [])]),
    name: input.name,
    options: mergeOptions(DEFAULT_TARGET_OPTIONS, input.options),
  });
}

export function createRegistry(inputs: Iterable<TargetInput>): TargetRegistry {
  const registry = new Map<string, TargetDefinition>();
  for (const input of inputs) {
    if (registry.has(input.name)) {
      throw new DuplicateTargetError(input.name);
    }
    registry.set(input.name, defineTarget(input));
  }
  return registry;
}

/**
 * Apply every option that is explicitly set in `overrides` on top of `base`.
 */
export function mergeOptions(
  base: Readonly<TargetOptions>,
  overrides: Partial<TargetOptions> = {}
): Readonly<TargetOptions> {
  const merged: TargetOptions = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (isOptionKey(key) && typeof value === "boolean") {
      merged[key] = value;
    }
  }
  return Object.freeze(merged);
}

function isOptionKey(key: string): key is TargetOptionKey {
  return TARGET_OPTION_KEYS.some((option) => option === key);
}

import { z } from "zod";
import { GraphBuilder } from "../core/graph-builder";
import { createRegistry } from "../core/registry";
import { ConfigParseError, TrunError } from "../errors";
import type { TargetInput, TargetOptions, TargetRegistry } from "../types";

export const OptionsSchema = z
  .object({
    dry: z.boolean().optional(),
    ignore_err: z.boolean().optional(),
    keep_going: z.boolean().optional(),
    shell: z.boolean().optional(),
    silent: z.boolean().optional(),
  })
  .strict();

const CommandListSchema = z.array(z.string().min(1, "command must not be empty"));

export const TargetSchema = z.union([
  // Shorthand: a target is just its list of commands
  CommandListSchema,
  z
    .object({
      commands: CommandListSchema.optional(),
      dependencies: z.array(z.string().min(1)).optional(),
      options: OptionsSchema.optional(),
    })
    .strict(),
]);

export const ConfigSchema = z
  .object({
    options: OptionsSchema.optional(),
    targets: z.record(TargetSchema),
  })
  .strict();

export type RawOptions = z.infer<typeof OptionsSchema>;
export type RawTarget = z.infer<typeof TargetSchema>;
export type RawConfig = z.infer<typeof ConfigSchema>;

export function toTargetOptions(raw: RawOptions = {}): Partial<TargetOptions> {
  const options: Partial<TargetOptions> = {};
  if (raw.silent !== undefined) {
    options.silent = raw.silent;
  }
  if (raw.ignore_err !== undefined) {
    options.ignoreErr = raw.ignore_err;
  }
  if (raw.keep_going !== undefined) {
    options.keepGoing = raw.keep_going;
  }
  if (raw.dry !== undefined) {
    options.dry = raw.dry;
  }
  if (raw.shell !== undefined) {
    options.shell = raw.shell;
  }
  return options;
}

export function toTargetInput(name: string, raw: RawTarget): TargetInput {
  if (Array.isArray(raw)) {
    return { commands: raw, name };
  }
  return {
    commands: raw.commands ?? [],
    dependencies: raw.dependencies ?? [],
    name,
    options: toTargetOptions(raw.options),
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

/**
 * Validate a parsed configuration document and turn it into a registry.
 * Structural problems, including dependency cycles, are reported as
 * ConfigParseError against `source`.
 */
export function buildConfig(
  document: unknown,
  source: string
): { registry: TargetRegistry; options: Partial<TargetOptions> } {
  const parsed = ConfigSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigParseError(source, `invalid configuration: ${formatIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }

  let registry: TargetRegistry;
  try {
    registry = createRegistry(
      Object.entries(parsed.data.targets).map(([name, raw]) => toTargetInput(name, raw))
    );
  } catch (error) {
    throw new ConfigParseError(source, TrunError.from(error).message, { cause: error });
  }

  const cycle = new GraphBuilder().findCycle(registry);
  if (cycle) {
    throw new ConfigParseError(source, `dependency cycle: ${cycle.join(" -> ")}`);
  }

  return { options: toTargetOptions(parsed.data.options), registry };
}

export function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

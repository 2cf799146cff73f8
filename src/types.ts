export const TARGET_OPTION_KEYS = [
  "silent",
  "ignoreErr",
  "keepGoing",
  "dry",
  "shell",
] as const;

export type TargetOptionKey = (typeof TARGET_OPTION_KEYS)[number];

export type TargetOptions = Record<TargetOptionKey, boolean>;

export type TargetDefinition = {
  readonly name: string;
  readonly commands: readonly string[];
  readonly dependencies: readonly string[];
  readonly options: Readonly<TargetOptions>;
};

export type TargetInput = {
  name: string;
  commands?: readonly string[];
  dependencies?: readonly string[];
  options?: Partial<TargetOptions>;
};

export type TargetRegistry = ReadonlyMap<string, TargetDefinition>;

export type TargetStatus =
  | "PENDING"
  | "RUNNING"
  | "SUCCEEDED"
  | "FAILED"
  | "SKIPPED";

export type CommandOptions = {
  target: string;
  silent: boolean;
  dry: boolean;
  shell: boolean;
};

export type CommandResult = {
  command: string;
  exitCode: number;
  ok: boolean;
  reason?: string;
};

export interface CommandRunner {
  execute(command: string, options: CommandOptions): Promise<CommandResult>;
  shutdown?(): void;
}

export type Config = {
  quiet?: boolean;
  prefix?: boolean | string;
  jobs?: number;
  // Invocation-level options, applied on top of every target's own options
  overrides?: Partial<TargetOptions>;
};

export interface RunOptions extends Config {
  cwd?: string;
  env?: Record<string, string>;
  commandRunner?: CommandRunner;
}

export type ParsedCommand = {
  patterns: string[];
  config: Config;
  file?: string;
  parser?: string;
  list?: boolean;
  help?: boolean;
};

export type ParseOutcome =
  | {
      recognized: true;
      registry: TargetRegistry;
      options: Partial<TargetOptions>;
    }
  | { recognized: false; reason: string };

/**
 * A configuration format. `parse` either recognizes the content and returns
 * the registry it describes, or reports that the content is not its format so
 * the next parser can be tried.
 */
export interface ConfigParser {
  readonly id: string;
  readonly fileNames: readonly string[];
  parse(content: string, source: string): ParseOutcome;
}

export type LoadedConfig = {
  registry: TargetRegistry;
  options: Partial<TargetOptions>;
  source: string;
  parser: string;
};

export type LoadRequest = {
  cwd: string;
  file?: string;
  parser?: string;
};

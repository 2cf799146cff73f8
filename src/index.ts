export { Runner } from './execution/runner';
export { Executor } from './execution/executor';
export { ExecaCommandRunner, LAUNCH_FAILURE_EXIT_CODE } from './execution/command-runner';
export { RunState } from './execution/run-state';
export { GraphBuilder, ExecutionPlan } from './core/graph-builder';
export { Parser, parseCommand } from './core/parser';
export { PatternMatcher } from './core/pattern-matcher';
export {
  DEFAULT_TARGET_OPTIONS,
  createRegistry,
  defineTarget,
  mergeOptions,
} from './core/registry';
export {
  ParserRegistry,
  createDefaultParserRegistry,
} from './config/parser-registry';
export { PyprojectParser, TrunTomlParser } from './config/toml-parser';
export { PackageJsonParser } from './config/package-json-parser';
export { ConfigSchema, buildConfig } from './config/schema';
export { Logger, TargetLogger } from './utils/logger';
export { TARGET_OPTION_KEYS } from './types';
export {
  CommandFailure,
  ConfigNotFoundError,
  ConfigParseError,
  CycleError,
  DuplicateTargetError,
  InvalidTargetError,
  InvocationFailed,
  TrunError,
  UnknownParserError,
  UnknownTargetError,
  UsageError,
} from './errors';

export type { RunSummary, ExecutorOptions } from './execution/executor';
export type { TargetOutcome } from './execution/run-state';
export type { ExecaCommandRunnerOptions } from './execution/command-runner';
export type { FailedTarget, SkippedTarget, TrunErrorCode } from './errors';
export type {
  CommandOptions,
  CommandResult,
  CommandRunner,
  Config,
  ConfigParser,
  LoadRequest,
  LoadedConfig,
  ParseOutcome,
  ParsedCommand,
  RunOptions,
  TargetDefinition,
  TargetInput,
  TargetOptionKey,
  TargetOptions,
  TargetRegistry,
  TargetStatus,
} from './types';

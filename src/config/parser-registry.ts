import { existsSync, readFileSync } from "node:fs";
import { basename, extname, resolve } from "node:path";
import debug from "debug";
import {
  ConfigNotFoundError,
  ConfigParseError,
  UnknownParserError,
} from "../errors";
import type {
  ConfigParser,
  LoadRequest,
  LoadedConfig,
  ParseOutcome,
} from "../types";
import { PackageJsonParser } from "./package-json-parser";
import { PyprojectParser, TrunTomlParser } from "./toml-parser";

const log = debug("trun:config");

/**
 * Configuration parsers by id, kept in priority order. Guessing tries them in
 * that order and the first one to recognize a file wins.
 */
export class ParserRegistry {
  private readonly parsers = new Map<string, ConfigParser>();

  register(parser: ConfigParser): this {
    this.parsers.set(parser.id, parser);
    return this;
  }

  get(id: string): ConfigParser {
    const parser = this.parsers.get(id);
    if (!parser) {
      throw new UnknownParserError(id, this.ids());
    }
    return parser;
  }

  ids(): string[] {
    return [...this.parsers.keys()];
  }

  load(request: LoadRequest): LoadedConfig {
    const { cwd, file, parser } = request;

    if (file !== undefined) {
      const path = resolve(cwd, file);
      if (!existsSync(path)) {
        throw new ConfigNotFoundError(cwd, [file]);
      }
      const candidates =
        parser !== undefined ? [this.get(parser)] : this.candidatesFor(path);
      return this.loadFile(path, candidates);
    }

    const candidates = parser !== undefined ? [this.get(parser)] : [...this.parsers.values()];
    return this.guess(cwd, candidates);
  }

  /**
   * Look for each candidate's files in `cwd`, in priority order.
   */
  guess(cwd: string, candidates: readonly ConfigParser[] = [...this.parsers.values()]): LoadedConfig {
    const searched: string[] = [];

    for (const candidate of candidates) {
      for (const fileName of candidate.fileNames) {
        searched.push(fileName);
        const path = resolve(cwd, fileName);
        if (!existsSync(path)) {
          continue;
        }

        const outcome = candidate.parse(readFileSync(path, "utf-8"), path);
        if (outcome.recognized) {
          log(`Using ${path} (${candidate.id})`);
          return {
            options: outcome.options,
            parser: candidate.id,
            registry: outcome.registry,
            source: path,
          };
        }
        log(`${candidate.id} did not recognize ${path}: ${outcome.reason}`);
      }
    }

    throw new ConfigNotFoundError(cwd, [...new Set(searched)]);
  }

  /**
   * Parsers that own this file name; otherwise the ones reading the same
   * extension; otherwise all of them.
   */
  private candidatesFor(path: string): ConfigParser[] {
    const name = basename(path);
    const all = [...this.parsers.values()];

    const byName = all.filter((parser) => parser.fileNames.includes(name));
    if (byName.length > 0) {
      return byName;
    }

    const extension = extname(name);
    const byExtension = all.filter((parser) =>
      parser.fileNames.some((fileName) => extname(fileName) === extension)
    );
    return byExtension.length > 0 ? byExtension : all;
  }

  private loadFile(path: string, candidates: readonly ConfigParser[]): LoadedConfig {
    const content = readFileSync(path, "utf-8");
    const reasons: string[] = [];
    let firstError: ConfigParseError | undefined;

    for (const candidate of candidates) {
      let outcome: ParseOutcome;
      try {
        outcome = candidate.parse(content, path);
      } catch (error) {
        // With a single candidate the file is definitely in its format
        if (candidates.length === 1 || !(error instanceof ConfigParseError)) {
          throw error;
        }
        log(`${candidate.id} failed on ${path}: ${error.message}`);
        if (!firstError) {
          firstError = error;
        }
        continue;
      }

      if (outcome.recognized) {
        log(`Using ${path} (${candidate.id})`);
        return {
          options: outcome.options,
          parser: candidate.id,
          registry: outcome.registry,
          source: path,
        };
      }
      reasons.push(`${candidate.id}: ${outcome.reason}`);
    }

    if (firstError) {
      throw firstError;
    }
    throw new ConfigParseError(path, `not a recognized configuration (${reasons.join("; ")})`);
  }
}

export function createDefaultParserRegistry(): ParserRegistry {
  return new ParserRegistry()
    .register(new TrunTomlParser())
    .register(new PyprojectParser())
    .register(new PackageJsonParser());
}

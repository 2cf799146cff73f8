import * as TOML from "smol-toml";
import { ConfigParseError } from "../errors";
import type { ConfigParser, ParseOutcome } from "../types";
import { buildConfig, isTable } from "./schema";

function parseToml(content: string, source: string): Record<string, unknown> {
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigParseError(source, `invalid TOML: ${message}`, { cause: error });
  }
}

/**
 * `trun.toml`: the whole file is the configuration, with a `[targets]` table
 * and an optional `[options]` table.
 */
export class TrunTomlParser implements ConfigParser {
  readonly id = "trun";
  readonly fileNames = ["trun.toml"] as const;

  parse(content: string, source: string): ParseOutcome {
    const document = parseToml(content, source);
    return { recognized: true, ...buildConfig(document, source) };
  }
}

/**
 * `pyproject.toml`: only recognized when it has a `[tool.<toolName>]` table.
 */
export class PyprojectParser implements ConfigParser {
  readonly id = "pyproject";
  readonly fileNames = ["pyproject.toml"] as const;
  private readonly toolName: string;

  constructor(toolName = "trun") {
    this.toolName = toolName;
  }

  parse(content: string, source: string): ParseOutcome {
    const document = parseToml(content, source);
    const tool = document["tool"];
    const section = isTable(tool) ? tool[this.toolName] : undefined;

    if (section === undefined) {
      return { reason: `no [tool.${this.toolName}] table`, recognized: false };
    }
    if (!isTable(section)) {
      throw new ConfigParseError(source, `[tool.${this.toolName}] must be a table`);
    }
    return { recognized: true, ...buildConfig(section, source) };
  }
}

import { ConfigParseError } from "../errors";
import type { ConfigParser, ParseOutcome } from "../types";
import { buildConfig, isTable } from "./schema";

/**
 * `package.json`: recognized when it has a top-level `"<key>"` object.
 */
export class PackageJsonParser implements ConfigParser {
  readonly id = "package-json";
  readonly fileNames = ["package.json"] as const;
  private readonly key: string;

  constructor(key = "trun") {
    this.key = key;
  }

  parse(content: string, source: string): ParseOutcome {
    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigParseError(source, `invalid JSON: ${message}`, { cause: error });
    }

    const section = isTable(document) ? document[this.key] : undefined;
    if (section === undefined) {
      return { reason: `no "${this.key}" key`, recognized: false };
    }
    if (!isTable(section)) {
      throw new ConfigParseError(source, `"${this.key}" must be an object`);
    }
    return { recognized: true, ...buildConfig(section, source) };
  }
}

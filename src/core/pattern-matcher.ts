import micromatch from "micromatch";
import { UnknownTargetError } from "../errors";
import type { TargetRegistry } from "../types";

const GLOB_CHARS = /[*?[{]/;

export class PatternMatcher {
  /**
   * Resolves patterns to actual target names
   * Handles inclusions and exclusions in left-to-right order
   */
  resolvePatterns(patterns: readonly string[], registry: TargetRegistry): string[] {
    const targetNames = [...registry.keys()];
    let result: string[] = [];

    for (const pattern of patterns) {
      if (pattern.startsWith("!")) {
        result = this.processExclusion(pattern.slice(1), result);
      } else {
        result = [...result, ...this.findMatches(pattern, targetNames)];
      }
    }

    // Remove duplicates while preserving order
    return [...new Set(result)];
  }

  private processExclusion(excludePattern: string, result: string[]): string[] {
    if (this.isGlobPattern(excludePattern)) {
      const toRemove = new Set(micromatch(result, excludePattern));
      return result.filter((name) => !toRemove.has(name));
    }
    return result.filter((name) => name !== excludePattern);
  }

  private findMatches(pattern: string, targetNames: string[]): string[] {
    if (targetNames.includes(pattern)) {
      return [pattern];
    }

    if (this.isGlobPattern(pattern)) {
      return micromatch(targetNames, pattern);
    }

    throw new UnknownTargetError(pattern);
  }

  isGlobPattern(pattern: string): boolean {
    return GLOB_CHARS.test(pattern);
  }

  /**
   * Check if a pattern matches any targets
   */
  hasMatches(pattern: string, registry: TargetRegistry): boolean {
    const cleanPattern = pattern.startsWith("!") ? pattern.slice(1) : pattern;
    return (
      registry.has(cleanPattern) ||
      micromatch([...registry.keys()], cleanPattern).length > 0
    );
  }
}

import { ConfigurationError } from "./errors.js";
import type { CharacterPolicy, LoadReport } from "./PrefixTrie.js";
import { PrefixTrie } from "./PrefixTrie.js";

export type MatcherStrategy = "trie";

export const matcherStrategies: readonly MatcherStrategy[] = ["trie"];

export type Matcher = {
  readonly strategy: MatcherStrategy;

  /**
   * Register the prefixes this matcher will search for. Called exactly once, before any lookup.
   */
  load(prefixes: Iterable<string>): LoadReport;

  /**
   * Returns the longest registered prefix that the input starts with, or null if there isn't one.
   * Must be safe to call concurrently once `load` has returned.
   **/
  findLongestMatch(input: string): string | null;
};

export interface MatcherOptions {
  characters?: CharacterPolicy;
}

export const isMatcherStrategy = (value: string): value is MatcherStrategy => matcherStrategies.some((strategy) => strategy === value);

/** Parse a strategy name as it appears in configuration text */
export const parseMatcherStrategy = (value: unknown): MatcherStrategy => {
  const normalized = typeof value == "string" ? value.trim().toLowerCase() : "";
  if (!isMatcherStrategy(normalized)) {
    throw new ConfigurationError(`Invalid matching strategy: ${String(value)}, expected one of ${matcherStrategies.join(", ")}`);
  }
  return normalized;
};

export const createMatcher = (strategy: MatcherStrategy, options: MatcherOptions = {}): Matcher => {
  switch (strategy) {
    case "trie":
      return new PrefixTrie(options);
    default: {
      const unknown: never = strategy;
      throw new ConfigurationError(`Invalid matching strategy: ${String(unknown)}`);
    }
  }
};

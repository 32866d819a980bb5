export * from "./BatchExecutor.js";
export * from "./errors.js";
export * from "./Matcher.js";
export * from "./MatcherConfig.js";
export * from "./PrefixLoader.js";
export * from "./PrefixMatchService.js";
export * from "./PrefixTrie.js";
export { Repl, formatMatch, formatResultsTable, NO_MATCH } from "./Repl.js";
export { run, matchOnce, samplePrefixes } from "./run.js";

import findRoot from "find-root";
import fs from "fs-extra";
import _ from "lodash";
import path from "path";
import { defaultConcurrency } from "./BatchExecutor.js";
import { ConfigurationError } from "./errors.js";
import type { MatcherStrategy } from "./Matcher.js";
import { parseMatcherStrategy } from "./Matcher.js";
import type { CharacterPolicy } from "./PrefixTrie.js";
import { characterPolicies } from "./PrefixTrie.js";
import { errorMessage, log } from "./utils.js";

export const configFileName = "prefix-match.json";

export interface MatcherConfig {
  root: string;
  /** absolute path of the plain text prefix list, or undefined to use the built in sample prefixes */
  prefixFile?: string;
  strategy: MatcherStrategy;
  characters: CharacterPolicy;
  concurrency: number;
  gracePeriodMs: number;
  forceCancelPeriodMs: number;
}

/** Values given on the command line. They win over the config file, which wins over the defaults. */
export type MatcherConfigOverrides = {
  configFile?: string;
  prefixFile?: string;
  strategy?: string;
  characters?: string;
  concurrency?: number;
  gracePeriodMs?: number;
  forceCancelPeriodMs?: number;
};

const isRecord = (value: unknown): value is Record<string, unknown> => _.isPlainObject(value);

/** The closest directory above the working directory with a package.json, or the working directory itself */
export const defaultConfigRoot = (cwd = process.cwd()) => {
  try {
    return findRoot(cwd);
  } catch (error) {
    log.debug(`No package root found above ${cwd}, using it as the config root`, errorMessage(error));
    return cwd;
  }
};

export const parseCharacterPolicy = (value: unknown): CharacterPolicy => {
  const policy = characterPolicies.find((policy) => policy === value);
  if (!policy) {
    throw new ConfigurationError(`Invalid character policy: ${String(value)}, expected one of ${characterPolicies.join(", ")}`);
  }
  return policy;
};

const positiveInteger = (key: string, value: unknown) => {
  if (typeof value != "number" || !Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`Invalid ${key}: ${String(value)}, expected an integer from 1 and up`);
  }
  return value;
};

const milliseconds = (key: string, value: unknown) => {
  if (typeof value != "number" || !Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`Invalid ${key}: ${String(value)}, expected zero or more milliseconds`);
  }
  return value;
};

const readConfigFile = async (location: string): Promise<Record<string, unknown>> => {
  let contents: unknown;
  try {
    contents = await fs.readJson(location);
  } catch (error) {
    throw new ConfigurationError(`Failed to load config from ${location}: ${errorMessage(error)}`, { cause: error });
  }
  if (!isRecord(contents)) {
    throw new ConfigurationError(`Config file ${location} must contain a JSON object`);
  }
  log.debug(`Loaded config from ${location}`);
  return contents;
};

/**
 * Load and validate configuration for a matcher.
 * Reads `prefix-match.json` from `root` if it exists, or the explicitly given `configFile`, which must exist.
 */
export const loadMatcherConfig = async (root: string, overrides: MatcherConfigOverrides = {}): Promise<MatcherConfig> => {
  const location = overrides.configFile ? path.resolve(overrides.configFile) : path.join(root, configFileName);

  let fromFile: Record<string, unknown> = {};
  if (await fs.pathExists(location)) {
    fromFile = await readConfigFile(location);
  } else if (overrides.configFile) {
    throw new ConfigurationError(`Config file ${location} does not exist`);
  } else {
    log.debug(`Not loading config from ${location}`);
  }

  // a prefix file given on the command line is relative to the working directory, one in the config file is relative to the config file
  let prefixFile: string | undefined;
  if (overrides.prefixFile) {
    prefixFile = path.resolve(overrides.prefixFile);
  } else if (fromFile.prefixFile !== undefined) {
    if (typeof fromFile.prefixFile != "string" || fromFile.prefixFile.length == 0) {
      throw new ConfigurationError(`Invalid prefixFile in ${location}, expected a file path`);
    }
    prefixFile = path.resolve(path.dirname(location), fromFile.prefixFile);
  }

  const merged: Record<string, unknown> = _.defaults({}, _.omitBy(_.omit(overrides, "configFile", "prefixFile"), _.isUndefined), fromFile, {
    strategy: "trie",
    characters: "alphanumeric",
    gracePeriodMs: 5000,
    forceCancelPeriodMs: 5000,
  });

  return {
    root,
    prefixFile,
    strategy: parseMatcherStrategy(merged.strategy),
    characters: parseCharacterPolicy(merged.characters),
    concurrency: merged.concurrency === undefined ? defaultConcurrency() : positiveInteger("concurrency", merged.concurrency),
    gracePeriodMs: milliseconds("gracePeriodMs", merged.gracePeriodMs),
    forceCancelPeriodMs: milliseconds("forceCancelPeriodMs", merged.forceCancelPeriodMs),
  };
};

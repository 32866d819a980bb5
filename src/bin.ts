#!/usr/bin/env node

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { matcherStrategies } from "./Matcher.js";
import { characterPolicies } from "./PrefixTrie.js";
import { run } from "./run.js";
import { errorMessage, log } from "./utils.js";

const args = yargs(hideBin(process.argv))
  .scriptName("prefix-match")
  .usage("$0 [inputs..]\n\nFind the longest registered prefix of each input. Reads commands from stdin when no inputs are given.")
  .option("config", {
    alias: "c",
    type: "string",
    description: "Path to a prefix-match.json config file",
  })
  .option("prefixes", {
    alias: "p",
    type: "string",
    description: "Plain text file with one prefix per line",
  })
  .option("strategy", {
    alias: "s",
    type: "string",
    choices: matcherStrategies,
    description: "Matching strategy",
  })
  .option("characters", {
    type: "string",
    choices: characterPolicies,
    description: "Which characters prefixes and inputs may be matched on",
  })
  .option("concurrency", {
    alias: "j",
    type: "number",
    description: "Number of lookups a batch runs at once",
  })
  .strictOptions()
  .parseSync();

run({
  inputs: args._.map(String),
  overrides: {
    configFile: args.config,
    prefixFile: args.prefixes,
    strategy: args.strategy,
    characters: args.characters,
    concurrency: args.concurrency,
  },
}).catch((error: unknown) => {
  log.error(errorMessage(error));
  process.exitCode = 1;
});

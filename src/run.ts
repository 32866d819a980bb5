import type { MatcherConfigOverrides } from "./MatcherConfig.js";
import { defaultConfigRoot, loadMatcherConfig } from "./MatcherConfig.js";
import { loadPrefixes } from "./PrefixLoader.js";
import { PrefixMatchService } from "./PrefixMatchService.js";
import type { Output } from "./Repl.js";
import { Repl, formatMatch } from "./Repl.js";
import { log } from "./utils.js";

export interface RunOptions {
  /** strings to match and exit. When empty, commands are read from stdin instead. */
  inputs: string[];
  overrides: MatcherConfigOverrides;
}

/** Used when no prefix file is configured */
export const samplePrefixes = ["foo", "tru", "true", "apple", "app", "a", "mobile"];

/** Match the given inputs once and print one `input → match` line for each */
export const matchOnce = async (service: PrefixMatchService, inputs: string[], output: Output) => {
  if (inputs.length == 1) {
    output.write(formatMatch(inputs[0], service.matchSingle(inputs[0])) + "\n");
    return;
  }
  const results = await service.matchBatch(inputs);
  for (const [input, match] of results) {
    output.write(formatMatch(input, match) + "\n");
  }
};

export const run = async (options: RunOptions) => {
  const config = await loadMatcherConfig(defaultConfigRoot(), options.overrides);
  const prefixes = config.prefixFile ? await loadPrefixes(config.prefixFile) : samplePrefixes;
  if (!config.prefixFile) log.debug("No prefix file configured, using the sample prefixes");

  // the matcher is fully built here, before anything can issue a lookup against it
  const service = PrefixMatchService.create(prefixes, config);

  if (options.inputs.length > 0) {
    try {
      await matchOnce(service, options.inputs, process.stdout);
    } finally {
      await service.shutdown();
    }
    return;
  }

  const shutdownAndExit = (signal: string) => {
    log.debug(`process ${process.pid} got ${signal}`);
    void service.shutdown().finally(() => process.exit(0));
  };
  process.on("SIGINT", shutdownAndExit);
  process.on("SIGTERM", shutdownAndExit);

  log.info(`Prefix matcher ready with ${config.strategy} strategy and ${config.concurrency} workers. Type help for commands.`);
  try {
    await new Repl(service, process.stdout).run(process.stdin);
  } finally {
    process.off("SIGINT", shutdownAndExit);
    process.off("SIGTERM", shutdownAndExit);
    await service.shutdown();
  }
};

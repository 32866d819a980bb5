import type { BatchExecutorOptions, ExecutorState, SubmitOptions } from "./BatchExecutor.js";
import { BatchExecutor } from "./BatchExecutor.js";
import { InvalidArgumentError } from "./errors.js";
import type { Matcher, MatcherOptions, MatcherStrategy } from "./Matcher.js";
import { createMatcher } from "./Matcher.js";
import { trace } from "./Telemetry.js";
import { log } from "./utils.js";

export type MatchResults = Map<string, string | null>;

export interface PrefixMatchServiceOptions extends MatcherOptions, BatchExecutorOptions {
  strategy?: MatcherStrategy;
}

/**
 * Answers longest prefix queries for a built matcher, one at a time on the caller or a batch at a time on the executor.
 * Takes its matcher already loaded; nothing may call `load` on it once it's handed over.
 */
export class PrefixMatchService {
  constructor(readonly matcher: Matcher, readonly executor: BatchExecutor) {}

  /** Build a matcher for the given prefixes and an executor to go with it */
  static create(prefixes: Iterable<string>, options: PrefixMatchServiceOptions = {}) {
    const strategy = options.strategy ?? "trie";
    const matcher = createMatcher(strategy, { characters: options.characters });

    log.debug("loading prefixes", { strategy });
    const report = matcher.load(prefixes);
    if (report.rejected.length > 0) {
      log.warn(`ignored ${report.rejected.length} prefixes with characters that can't be matched:`, report.rejected);
    }
    log.debug(`loaded ${report.registered} prefixes`);

    const executor = new BatchExecutor(options);
    return new PrefixMatchService(matcher, executor);
  }

  /** Longest registered prefix of `input`, or null */
  matchSingle(input: string) {
    return this.matcher.findLongestMatch(input);
  }

  /**
   * Match every distinct input concurrently. The result has exactly one entry per distinct input.
   * Rejects with a single `BatchExecutionError` if the batch fails or is cancelled through `signal`.
   */
  async matchBatch(inputs: Iterable<string>, options: SubmitOptions = {}): Promise<MatchResults> {
    // a bare string is iterable too, but matching it character by character is never what the caller meant
    if (typeof inputs == "string" || typeof inputs?.[Symbol.iterator] != "function") {
      throw new InvalidArgumentError(`expected a collection of strings to match, got ${inputs === null ? "null" : typeof inputs}`);
    }
    const distinct = [...new Set(inputs)];
    for (const input of distinct) {
      if (typeof input !== "string") {
        throw new InvalidArgumentError("expected every input in a batch to be a string");
      }
    }
    if (distinct.length == 0) return new Map();

    return await trace("matchBatch", async (span) => {
      span.setAttribute("batch.size", distinct.length);
      const matches = await this.executor.invokeAll(
        distinct.map((input) => () => this.matcher.findLongestMatch(input)),
        options
      );
      return new Map(distinct.map((input, index): [string, string | null] => [input, matches[index]]));
    });
  }

  /** Retire the executor. Single lookups keep working afterwards; batches are refused. */
  async shutdown(options: SubmitOptions = {}): Promise<ExecutorState> {
    log.debug("prefix match service shutting down");
    return await this.executor.shutdown(options);
  }
}

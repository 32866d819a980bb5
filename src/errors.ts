/** Thrown when a lookup is handed something that isn't a string. Distinct from "no match", which is a `null` result. */
export class InvalidArgumentError extends TypeError {
  name = "InvalidArgumentError";
}

/** Unknown strategy, unreadable prefix source or bad config values. Fatal at construction time. */
export class ConfigurationError extends Error {
  name = "ConfigurationError";
}

export class MatcherStateError extends Error {
  name = "MatcherStateError";
}

/** The executor has begun shutting down and won't take new work */
export class ExecutorRejectedError extends Error {
  name = "ExecutorRejectedError";
}

export class CancellationError extends Error {
  name = "CancellationError";
}

/**
 * A whole batch failed. Batches never report partial results, so callers get this one error with the first underlying failure as `cause`.
 * Batches are side-effect free, so retrying the whole batch is always safe.
 */
export class BatchExecutionError extends Error {
  name = "BatchExecutionError";
}

import * as opentelemetry from "@opentelemetry/api";
import type { Span } from "@opentelemetry/api";
import { SpanStatusCode } from "@opentelemetry/api";
import { errorMessage } from "./utils.js";

// Spans are no-ops until the host application registers an OpenTelemetry SDK
export const tracer = opentelemetry.trace.getTracer("prefix-match");

/** Run an async function within a span that is active for its duration, marking the span failed if the function throws */
export function trace<T>(name: string, fn: (span: Span) => Promise<T>): Promise<T> {
  return tracer.startActiveSpan(name, async (span) => {
    try {
      return await fn(span);
    } catch (err) {
      span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(err) });
      throw err;
    } finally {
      span.end();
    }
  });
}

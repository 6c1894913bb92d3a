import {
  INVALID_SPAN_CONTEXT,
  trace,
  type Context,
  type Span,
  type SpanOptions,
  type Tracer,
} from "@opentelemetry/api";

import { createLogger } from "@banking-agent/shared";

import { InstrumentationError } from "./errors";

const log = createLogger({ component: "telemetry-guard" });

/**
 * Start a span, or hand back a non-recording one when the tracer throws.
 * Callers can then use the span without checking.
 */
export function startSpanSafely(tracer: Tracer, name: string, options: SpanOptions, parent: Context): Span {
  try {
    return tracer.startSpan(name, options, parent);
  } catch (err) {
    log.warn({ err: new InstrumentationError(`startSpan ${name}`, err) }, "Span not started");
    return trace.wrapSpanContext(INVALID_SPAN_CONTEXT);
  }
}

/** Run an instrumentation step; a throw is logged and dropped. */
export function bestEffort(step: string, fn: () => void): void {
  try {
    fn();
  } catch (err) {
    log.warn({ err: new InstrumentationError(step, err) }, "Instrumentation step failed");
  }
}

import type { Tracer } from "@opentelemetry/api";
import type { Registry } from "prom-client";

import { createTelemetryMetrics, type TelemetryMetrics } from "./metrics";

/**
 * Everything an instrumented call site needs. Built once at startup and
 * passed down explicitly.
 */
export interface Telemetry {
  tracer: Tracer;
  metrics: TelemetryMetrics;
  /** Attach (truncated) prompt and completion text to LLM spans. */
  captureContent: boolean;
}

export function createTelemetry(options: { tracer: Tracer; registry: Registry; captureContent?: boolean }): Telemetry {
  return {
    tracer: options.tracer,
    metrics: createTelemetryMetrics(options.registry),
    captureContent: options.captureContent ?? false,
  };
}

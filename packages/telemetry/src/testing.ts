import type { Tracer } from "@opentelemetry/api";
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
  type ReadableSpan,
} from "@opentelemetry/sdk-trace-base";
import { Registry } from "prom-client";

import { createTelemetry, type Telemetry } from "./telemetry";

export interface InMemoryTelemetry {
  telemetry: Telemetry;
  exporter: InMemorySpanExporter;
  registry: Registry;
  spans(name?: string): ReadableSpan[];
  /** Current value of a counter or gauge for the given labels, 0 when never touched. */
  metricValue(metricName: string, labels?: Record<string, string>): Promise<number>;
  /** Number of observations a histogram has recorded for the given labels. */
  histogramCount(metricName: string, labels?: Record<string, string>): Promise<number>;
}

interface MetricSample {
  value: number;
  labels: Partial<Record<string, string | number>>;
  metricName?: string;
}

async function readSample(
  registry: Registry,
  metricName: string,
  sampleName: string,
  labels: Record<string, string>,
): Promise<number> {
  const metric = registry.getSingleMetric(metricName);
  if (!metric) return 0;
  const snapshot = await metric.get();
  const values: ReadonlyArray<MetricSample> = snapshot.values;
  const match = values.find(
    (entry) =>
      (entry.metricName ?? metricName) === sampleName &&
      Object.entries(labels).every(([key, value]) => entry.labels[key] === value),
  );
  return match?.value ?? 0;
}

/**
 * Telemetry backed by an in-memory span exporter and a private metrics
 * registry. Used by tests in every package that emits spans or metrics.
 */
export function createInMemoryTelemetry(options: { captureContent?: boolean } = {}): InMemoryTelemetry {
  const exporter = new InMemorySpanExporter();
  const provider = new BasicTracerProvider({ spanProcessors: [new SimpleSpanProcessor(exporter)] });
  const registry = new Registry();
  const telemetry = createTelemetry({
    tracer: provider.getTracer("test"),
    registry,
    captureContent: options.captureContent,
  });

  return {
    telemetry,
    exporter,
    registry,
    spans(name?: string) {
      const finished = exporter.getFinishedSpans();
      return name === undefined ? [...finished] : finished.filter((span) => span.name === name);
    },
    metricValue(metricName: string, labels: Record<string, string> = {}) {
      return readSample(registry, metricName, metricName, labels);
    },
    histogramCount(metricName: string, labels: Record<string, string> = {}) {
      return readSample(registry, metricName, `${metricName}_count`, labels);
    },
  };
}

/** A tracer that throws on every span it is asked to start. */
export function createFailingTracer(message = "tracer unavailable"): Tracer {
  return {
    startSpan: () => {
      throw new Error(message);
    },
    startActiveSpan: () => {
      throw new Error(message);
    },
  };
}

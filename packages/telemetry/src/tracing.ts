import { context, type Tracer } from "@opentelemetry/api";
import { AsyncLocalStorageContextManager } from "@opentelemetry/context-async-hooks";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { Resource } from "@opentelemetry/resources";
import {
  BasicTracerProvider,
  BatchSpanProcessor,
  ConsoleSpanExporter,
  SimpleSpanProcessor,
  type SpanProcessor,
} from "@opentelemetry/sdk-trace-base";

import { createLogger, type TelemetryEnv } from "@banking-agent/shared";

const log = createLogger({ component: "tracing" });

export interface TracingHandle {
  provider: BasicTracerProvider;
  tracer: Tracer;
  /** Flush pending spans and release exporters. */
  shutdown(): Promise<void>;
}

export function otlpTracesUrl(endpoint: string): string {
  return `${endpoint.replace(/\/+$/, "")}/v1/traces`;
}

export function buildSpanProcessors(config: TelemetryEnv): SpanProcessor[] {
  const processors: SpanProcessor[] = [];

  if (config.otlpEndpoint) {
    const exporter = new OTLPTraceExporter({
      url: otlpTracesUrl(config.otlpEndpoint),
      headers: config.otlpAuthorization ? { Authorization: config.otlpAuthorization } : {},
    });
    processors.push(new BatchSpanProcessor(exporter));
  }

  if (config.consoleExporter) {
    processors.push(new SimpleSpanProcessor(new ConsoleSpanExporter()));
  }

  return processors;
}

/**
 * Build the service's tracer provider. Spans go to the OTLP endpoint when one
 * is configured, to stdout when the console exporter is on, and nowhere
 * otherwise. The provider is not registered globally; callers pass the
 * returned tracer around explicitly.
 */
export function initTracing(config: TelemetryEnv): TracingHandle {
  const resource = new Resource({
    "service.name": config.serviceName,
    "service.version": config.serviceVersion,
    "deployment.environment": config.deploymentEnvironment,
  });

  const spanProcessors = buildSpanProcessors(config);
  const provider = new BasicTracerProvider({ resource, spanProcessors });

  // Lets the observation bridge find the active LLM span from inside a client call.
  const contextManager = new AsyncLocalStorageContextManager().enable();
  context.setGlobalContextManager(contextManager);

  log.info(
    {
      serviceName: config.serviceName,
      otlp: config.otlpEndpoint ? otlpTracesUrl(config.otlpEndpoint) : null,
      console: config.consoleExporter,
      processors: spanProcessors.length,
    },
    "Tracing initialized",
  );

  return {
    provider,
    tracer: provider.getTracer(config.serviceName, config.serviceVersion),
    async shutdown() {
      await provider.shutdown();
      context.disable();
    },
  };
}

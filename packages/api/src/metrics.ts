import { Counter, Gauge, Histogram, type Registry } from "prom-client";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { HTTP_DURATION_BUCKETS, MetricLabels, MetricNames } from "@banking-agent/shared";

const HTTP_LABELS = [MetricLabels.METHOD, MetricLabels.ROUTE, MetricLabels.STATUS_CODE] as const;

export interface HttpMetrics {
  httpRequestDuration: Histogram<"method" | "route" | "status_code">;
  httpRequestsTotal: Counter<"method" | "route" | "status_code">;
  httpActiveConnections: Gauge;
}

export function createHttpMetrics(registry: Registry): HttpMetrics {
  return {
    httpRequestDuration: new Histogram({
      name: MetricNames.HTTP_REQUEST_DURATION,
      help: "Duration of HTTP requests in seconds",
      labelNames: HTTP_LABELS,
      buckets: HTTP_DURATION_BUCKETS,
      registers: [registry],
    }),
    httpRequestsTotal: new Counter({
      name: MetricNames.HTTP_REQUESTS_TOTAL,
      help: "Total number of HTTP requests",
      labelNames: HTTP_LABELS,
      registers: [registry],
    }),
    httpActiveConnections: new Gauge({
      name: MetricNames.HTTP_ACTIVE_CONNECTIONS,
      help: "Number of active HTTP connections",
      registers: [registry],
    }),
  };
}

/**
 * Route label for a request: the matched route pattern when there is one,
 * otherwise the path with account numbers and numeric ids collapsed.
 */
export function normalizeRoute(url: string, routePattern?: string): string {
  if (routePattern) return routePattern;
  const path = url.split("?")[0] ?? url;
  return path.replace(/\/ACC[0-9A-Za-z-]+/g, "/:accountNumber").replace(/\/\d+/g, "/:id");
}

/**
 * Register metrics hooks on a Fastify instance.
 */
export function registerMetricsHooks(fastify: FastifyInstance, metrics: HttpMetrics): void {
  const startTimes = new WeakMap<FastifyRequest, bigint>();

  fastify.addHook("onRequest", async (request: FastifyRequest) => {
    metrics.httpActiveConnections.inc();
    startTimes.set(request, process.hrtime.bigint());
  });

  fastify.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    metrics.httpActiveConnections.dec();

    const startTime = startTimes.get(request);
    if (!startTime) return;

    const durationSec = Number(process.hrtime.bigint() - startTime) / 1e9;
    const labels = {
      [MetricLabels.METHOD]: request.method,
      [MetricLabels.ROUTE]: normalizeRoute(request.url, request.routeOptions.url),
      [MetricLabels.STATUS_CODE]: String(reply.statusCode),
    };

    metrics.httpRequestDuration.observe(labels, durationSec);
    metrics.httpRequestsTotal.inc(labels);
  });
}

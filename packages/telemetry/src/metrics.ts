import { Counter, Gauge, Histogram, type Registry } from "prom-client";

import { LLM_DURATION_BUCKETS, MetricLabels, MetricNames } from "@banking-agent/shared";

const CALL_LABELS = [MetricLabels.PROVIDER, MetricLabels.MODEL] as const;
const FEEDBACK_LABELS = [MetricLabels.PROVIDER, MetricLabels.INTENT] as const;

export interface TelemetryMetrics {
  llmRequestsTotal: Counter<"provider" | "model">;
  llmErrorsTotal: Counter<"provider" | "model">;
  llmTokensTotal: Counter<"provider" | "model">;
  llmCostUsdTotal: Counter<"provider" | "model">;
  llmResponseTime: Histogram<"provider" | "model">;
  llmCorrectnessScore: Gauge<"provider" | "intent">;
  llmCorrectnessEvaluationsTotal: Counter<"provider" | "intent">;
  userSatisfactionScore: Gauge<"provider" | "intent">;
  userSatisfactionSubmissionsTotal: Counter<"provider" | "intent">;
  bankingRequestsTotal: Counter<"provider" | "intent" | "status">;
}

/**
 * Register every LLM and agent metric on the given registry. Call once per
 * registry; prom-client rejects duplicate names.
 */
export function createTelemetryMetrics(registry: Registry): TelemetryMetrics {
  return {
    llmRequestsTotal: new Counter({
      name: MetricNames.LLM_REQUESTS_TOTAL,
      help: "Total number of LLM completion calls",
      labelNames: CALL_LABELS,
      registers: [registry],
    }),
    llmErrorsTotal: new Counter({
      name: MetricNames.LLM_ERRORS_TOTAL,
      help: "Total number of failed LLM completion calls",
      labelNames: CALL_LABELS,
      registers: [registry],
    }),
    llmTokensTotal: new Counter({
      name: MetricNames.LLM_TOKENS_TOTAL,
      help: "Estimated prompt plus completion tokens",
      labelNames: CALL_LABELS,
      registers: [registry],
    }),
    llmCostUsdTotal: new Counter({
      name: MetricNames.LLM_COST_USD_TOTAL,
      help: "Estimated LLM spend in USD",
      labelNames: CALL_LABELS,
      registers: [registry],
    }),
    llmResponseTime: new Histogram({
      name: MetricNames.LLM_RESPONSE_TIME,
      help: "LLM completion latency in seconds",
      labelNames: CALL_LABELS,
      buckets: LLM_DURATION_BUCKETS,
      registers: [registry],
    }),
    llmCorrectnessScore: new Gauge({
      name: MetricNames.LLM_CORRECTNESS_SCORE,
      help: "Most recent correctness score in [0, 1]",
      labelNames: FEEDBACK_LABELS,
      registers: [registry],
    }),
    llmCorrectnessEvaluationsTotal: new Counter({
      name: MetricNames.LLM_CORRECTNESS_EVALUATIONS_TOTAL,
      help: "Total number of correctness evaluations",
      labelNames: FEEDBACK_LABELS,
      registers: [registry],
    }),
    userSatisfactionScore: new Gauge({
      name: MetricNames.USER_SATISFACTION_SCORE,
      help: "Most recent raw user satisfaction score",
      labelNames: FEEDBACK_LABELS,
      registers: [registry],
    }),
    userSatisfactionSubmissionsTotal: new Counter({
      name: MetricNames.USER_SATISFACTION_SUBMISSIONS_TOTAL,
      help: "Total number of satisfaction submissions",
      labelNames: FEEDBACK_LABELS,
      registers: [registry],
    }),
    bankingRequestsTotal: new Counter({
      name: MetricNames.BANKING_REQUESTS_TOTAL,
      help: "Total number of agent requests by outcome",
      labelNames: [MetricLabels.PROVIDER, MetricLabels.INTENT, MetricLabels.STATUS] as const,
      registers: [registry],
    }),
  };
}

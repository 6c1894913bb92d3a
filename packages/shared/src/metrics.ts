/**
 * Shared metric names and label keys for Prometheus instrumentation.
 *
 * Label sets are deliberately small: provider, model and intent are the only
 * free dimensions, and callers bound them before they reach a metric.
 */

export const MetricLabels = {
  // HTTP labels
  METHOD: "method",
  ROUTE: "route",
  STATUS_CODE: "status_code",

  // LLM labels
  PROVIDER: "provider",
  MODEL: "model",
  INTENT: "intent",

  // Outcome label
  STATUS: "status",
} as const;

export const MetricNames = {
  // API metrics
  HTTP_REQUEST_DURATION: "http_request_duration_seconds",
  HTTP_REQUESTS_TOTAL: "http_requests_total",
  HTTP_ACTIVE_CONNECTIONS: "http_active_connections",

  // LLM call metrics
  LLM_REQUESTS_TOTAL: "llm_requests_total",
  LLM_ERRORS_TOTAL: "llm_errors_total",
  LLM_TOKENS_TOTAL: "llm_tokens_total",
  LLM_COST_USD_TOTAL: "llm_cost_usd_total",
  LLM_RESPONSE_TIME: "llm_response_time_seconds",

  // Correctness and feedback metrics
  LLM_CORRECTNESS_SCORE: "llm_correctness_score",
  LLM_CORRECTNESS_EVALUATIONS_TOTAL: "llm_correctness_evaluations_total",
  USER_SATISFACTION_SCORE: "user_satisfaction_score",
  USER_SATISFACTION_SUBMISSIONS_TOTAL: "user_satisfaction_submissions_total",

  // Agent metrics
  BANKING_REQUESTS_TOTAL: "banking_requests_total",
} as const;

/** Histogram buckets for HTTP request duration (seconds) */
export const HTTP_DURATION_BUCKETS = [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

/** Histogram buckets for LLM response time (seconds) */
export const LLM_DURATION_BUCKETS = [0.1, 0.5, 1, 2, 5, 10, 20, 30, 60];

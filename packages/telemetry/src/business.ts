import {
  context,
  SpanKind,
  SpanStatusCode,
  trace,
  type AttributeValue,
  type Attributes,
  type Context,
  type Span,
} from "@opentelemetry/api";

import { createLogger } from "@banking-agent/shared";

import { BankingAttributes, compactAttributes, EVENT_TYPE, GenAiAttributes, LlmAttributes, truncate } from "./attributes";
import { InstrumentationError } from "./errors";
import { bestEffort, startSpanSafely } from "./guard";
import { boundedIntentLabel, boundedProviderLabel, normalizeProviderName } from "./providers";
import type { Telemetry } from "./telemetry";

const log = createLogger({ component: "business-telemetry" });

export const BUSINESS_EVENT_SPAN_NAME = "banking.business_event";
export const CORRECTNESS_SPAN_NAME = "llm.correctness_evaluation";

export interface BusinessSpan {
  /** Pass as `parent` to LLM calls so they nest under this span. */
  context: Context;
  span: Span;
}

export interface BusinessSpanOptions<T> {
  parent?: Context;
  /** Returns an error message when a resolved result still counts as a failure. */
  failureOf?: (result: T) => string | null;
}

export type EventAttributes = Record<string, AttributeValue | null | undefined>;

/**
 * Run `fn` inside an INTERNAL span named `name`. The span's status follows
 * the result (or the exception) and the span always ends.
 */
export async function withBusinessSpan<T>(
  telemetry: Telemetry,
  name: string,
  attributes: EventAttributes,
  fn: (scope: BusinessSpan) => Promise<T>,
  options: BusinessSpanOptions<T> = {},
): Promise<T> {
  const parent = options.parent ?? context.active();
  const span = startSpanSafely(
    telemetry.tracer,
    name,
    { kind: SpanKind.INTERNAL, attributes: compactAttributes(attributes) },
    parent,
  );
  const spanContext = trace.setSpan(parent, span);

  try {
    const result = await context.with(spanContext, () => fn({ context: spanContext, span }));
    bestEffort(`${name}.status`, () => {
      const failure = options.failureOf?.(result) ?? null;
      span.setStatus(failure === null ? { code: SpanStatusCode.OK } : { code: SpanStatusCode.ERROR, message: failure });
    });
    return result;
  } catch (error) {
    bestEffort(`${name}.status`, () => {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
    });
    throw error;
  } finally {
    bestEffort(`${name}.end`, () => span.end());
  }
}

/**
 * Emit a business event as its own short INTERNAL span. Attribute keys are
 * prefixed with `event.`.
 */
export function recordBusinessEvent(
  telemetry: Telemetry,
  eventType: string,
  attributes: EventAttributes,
  parent?: Context,
): void {
  try {
    const span = telemetry.tracer.startSpan(
      BUSINESS_EVENT_SPAN_NAME,
      {
        kind: SpanKind.INTERNAL,
        attributes: { [EVENT_TYPE]: eventType, ...compactAttributes(attributes, "event.") },
      },
      parent ?? context.active(),
    );
    span.end();
  } catch (err) {
    log.warn({ err: new InstrumentationError("recordBusinessEvent", err), eventType }, "Business event not recorded");
  }
}

export interface CorrectnessEvaluation {
  provider: string;
  intent: string;
  /** In [0, 1]. */
  score: number;
  feedback?: string;
}

/**
 * Record how correct an answer was judged to be: a span plus the
 * correctness gauge and evaluation counter.
 */
export function recordCorrectness(telemetry: Telemetry, evaluation: CorrectnessEvaluation, parent?: Context): void {
  const labels = {
    provider: boundedProviderLabel(evaluation.provider),
    intent: boundedIntentLabel(evaluation.intent),
  };

  try {
    const attributes: Attributes = {
      [GenAiAttributes.SYSTEM]: normalizeProviderName(evaluation.provider),
      [BankingAttributes.INTENT]: labels.intent,
      [LlmAttributes.CORRECTNESS_SCORE]: evaluation.score,
    };
    if (evaluation.feedback) {
      attributes[LlmAttributes.CORRECTNESS_FEEDBACK] = truncate(evaluation.feedback, 500);
    }
    const span = telemetry.tracer.startSpan(
      CORRECTNESS_SPAN_NAME,
      { kind: SpanKind.INTERNAL, attributes },
      parent ?? context.active(),
    );
    span.end();
  } catch (err) {
    log.warn({ err: new InstrumentationError("recordCorrectness.span", err), ...labels }, "Correctness span not recorded");
  }

  try {
    telemetry.metrics.llmCorrectnessScore.set(labels, evaluation.score);
    telemetry.metrics.llmCorrectnessEvaluationsTotal.inc(labels);
  } catch (err) {
    log.warn({ err: new InstrumentationError("recordCorrectness.metrics", err), ...labels }, "Correctness metrics not recorded");
  }
}

import { context, SpanKind, SpanStatusCode, trace, type Context, type Span } from "@opentelemetry/api";

import { createLogger, type Intent } from "@banking-agent/shared";

import {
  BankingAttributes,
  ERROR_TYPE,
  GenAiAttributes,
  LlmAttributes,
  MAX_CONTENT_CHARS,
  promptHash,
  truncate,
} from "./attributes";
import { InstrumentationError } from "./errors";
import { estimateCost, estimateTokens, totalCost } from "./estimator";
import { startSpanSafely } from "./guard";
import { boundedProviderLabel, normalizeProviderName } from "./providers";
import type { Telemetry } from "./telemetry";

const log = createLogger({ component: "llm-call" });

export const LLM_SPAN_NAME = "gen_ai.chat.completions";

export interface StartCallOptions {
  provider: string;
  model: string;
  /** What the call is for, e.g. `classify_intent`. Recorded as `llm.request.type`. */
  operationType: string;
  /** Context of the enclosing business span, if any. */
  parent?: Context;
}

export interface PromptHints {
  temperature?: number;
  maxTokens?: number;
}

export type FinishOutcome = { status: "success" } | { status: "error"; cause: unknown };

/**
 * Telemetry for one LLM completion. Owned by a single call path: start it,
 * record the prompt, completion and domain context, then finish it exactly
 * once. Every recording step is best-effort; faults are logged.
 */
export class CallContext {
  readonly provider: string;
  readonly model: string;
  readonly operationType: string;
  readonly startTime: number;

  private _promptTokens = 0;
  private _completionTokens = 0;
  private _intent: Intent | undefined;
  private _accountRef: string | undefined;

  private promptRecorded = false;
  private completionRecorded = false;
  private finished = false;

  private readonly span: Span;
  private readonly spanContext: Context;
  private readonly labels: { provider: string; model: string };

  constructor(
    private readonly telemetry: Telemetry,
    options: StartCallOptions,
  ) {
    this.provider = options.provider;
    this.model = options.model;
    this.operationType = options.operationType;
    this.startTime = Date.now();
    this.labels = { provider: boundedProviderLabel(options.provider), model: options.model };

    const parent = options.parent ?? context.active();
    this.span = startSpanSafely(
      telemetry.tracer,
      LLM_SPAN_NAME,
      {
        kind: SpanKind.CLIENT,
        startTime: this.startTime,
        attributes: {
          [GenAiAttributes.SYSTEM]: normalizeProviderName(options.provider),
          [GenAiAttributes.REQUEST_MODEL]: options.model,
          [GenAiAttributes.OPERATION_NAME]: "chat",
          [LlmAttributes.REQUEST_TYPE]: options.operationType,
        },
      },
      parent,
    );
    this.spanContext = trace.setSpan(parent, this.span);
  }

  get promptTokens(): number {
    return this._promptTokens;
  }

  get completionTokens(): number {
    return this._completionTokens;
  }

  get intent(): Intent | undefined {
    return this._intent;
  }

  get accountRef(): string | undefined {
    return this._accountRef;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /** Context carrying this call's span, for anything that should nest under it. */
  get context(): Context {
    return this.spanContext;
  }

  recordPrompt(text: string, hints: PromptHints = {}): void {
    if (this.promptRecorded) {
      log.warn({ operationType: this.operationType }, "Prompt already recorded for this call");
      return;
    }
    this.promptRecorded = true;

    this.guard("recordPrompt", () => {
      this._promptTokens = estimateTokens(text);
      this.span.setAttributes({
        [LlmAttributes.PROMPT_LENGTH]: text.length,
        [LlmAttributes.PROMPT_HASH]: promptHash(text),
        [LlmAttributes.PROMPT_TOKENS]: this._promptTokens,
      });
      if (hints.temperature !== undefined) {
        this.span.setAttribute(GenAiAttributes.REQUEST_TEMPERATURE, hints.temperature);
      }
      if (hints.maxTokens !== undefined) {
        this.span.setAttribute(GenAiAttributes.REQUEST_MAX_TOKENS, hints.maxTokens);
      }
      if (this.telemetry.captureContent) {
        this.span.setAttribute(GenAiAttributes.PROMPT, truncate(text, MAX_CONTENT_CHARS));
      }
    });
  }

  recordCompletion(text: string, finishReason: string, responseModel?: string): void {
    if (this.completionRecorded) {
      log.warn({ operationType: this.operationType }, "Completion already recorded for this call");
      return;
    }
    this.completionRecorded = true;

    this.guard("recordCompletion", () => {
      this._completionTokens = estimateTokens(text);
      const cost = totalCost(estimateCost(this.provider, this._promptTokens, this._completionTokens));

      this.span.setAttributes({
        [LlmAttributes.RESPONSE_LENGTH]: text.length,
        [LlmAttributes.COMPLETION_TOKENS]: this._completionTokens,
        [LlmAttributes.TOTAL_TOKENS]: this.totalTokens(),
        [GenAiAttributes.USAGE_INPUT_TOKENS]: this._promptTokens,
        [GenAiAttributes.USAGE_OUTPUT_TOKENS]: this._completionTokens,
        [GenAiAttributes.RESPONSE_MODEL]: responseModel ?? this.model,
        [GenAiAttributes.RESPONSE_FINISH_REASONS]: [finishReason],
        [LlmAttributes.LATENCY_MS]: Date.now() - this.startTime,
      });
      if (cost > 0) {
        this.span.setAttribute(LlmAttributes.COST_USD, cost);
      }
      if (this.telemetry.captureContent) {
        this.span.setAttribute(GenAiAttributes.COMPLETION, truncate(text, MAX_CONTENT_CHARS));
      }
    });
  }

  recordDomainContext(intent: Intent, accountRef?: string): void {
    this._intent = intent;
    this._accountRef = accountRef;
    this.guard("recordDomainContext", () => {
      this.span.setAttribute(BankingAttributes.INTENT, intent);
      if (accountRef) {
        this.span.setAttribute(BankingAttributes.ACCOUNT, accountRef);
      }
    });
  }

  /**
   * Close the call: count it, time it, mark the span and end it. A second
   * call is ignored with a warning.
   */
  finish(outcome: FinishOutcome): void {
    if (this.finished) {
      log.warn({ operationType: this.operationType, provider: this.provider }, "LLM call already finished");
      return;
    }
    this.finished = true;

    this.guard("finish.metrics", () => {
      const { metrics } = this.telemetry;
      metrics.llmRequestsTotal.inc(this.labels);
      metrics.llmResponseTime.observe(this.labels, (Date.now() - this.startTime) / 1000);

      if (outcome.status === "success") {
        metrics.llmTokensTotal.inc(this.labels, this.totalTokens());
        const cost = totalCost(estimateCost(this.provider, this._promptTokens, this._completionTokens));
        if (cost > 0) metrics.llmCostUsdTotal.inc(this.labels, cost);
      } else {
        metrics.llmErrorsTotal.inc(this.labels);
      }
    });

    this.guard("finish.status", () => {
      if (outcome.status === "success") {
        this.span.setStatus({ code: SpanStatusCode.OK });
        return;
      }
      const error = outcome.cause instanceof Error ? outcome.cause : new Error(String(outcome.cause));
      this.span.recordException(error);
      this.span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
      this.span.setAttribute(ERROR_TYPE, error.name);
    });
    this.guard("finish.end", () => this.span.end());
  }

  private totalTokens(): number {
    return this._promptTokens + this._completionTokens;
  }

  private guard(step: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      log.warn({ err: new InstrumentationError(step, err), provider: this.provider }, "LLM call instrumentation failed");
    }
  }
}

export function startCall(telemetry: Telemetry, options: StartCallOptions): CallContext {
  return new CallContext(telemetry, options);
}

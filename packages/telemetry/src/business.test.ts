import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { describe, expect, it, vi } from "vitest";

import type { ChatClient } from "@banking-agent/llm";

import {
  BUSINESS_EVENT_SPAN_NAME,
  CORRECTNESS_SPAN_NAME,
  recordBusinessEvent,
  recordCorrectness,
  withBusinessSpan,
} from "./business";
import { LLM_SPAN_NAME } from "./call_context";
import { createInMemoryTelemetry, type InMemoryTelemetry } from "./testing";
import { tracedCompletion } from "./traced_completion";

const client: ChatClient = {
  provider: "ollama",
  model: "llama-test",
  complete: async () => ({ text: "ok", finishReason: "stop", model: "llama-test" }),
};

function failSpanStarts(t: InMemoryTelemetry): void {
  vi.spyOn(t.telemetry.tracer, "startSpan").mockImplementation(() => {
    throw new Error("tracer unavailable");
  });
}

describe("withBusinessSpan", () => {
  it("parents LLM calls made inside it", async () => {
    const t = createInMemoryTelemetry();

    const result = await withBusinessSpan(
      t.telemetry,
      "banking.process_request",
      { "banking.provider": "ollama", "banking.account.number": undefined },
      async (scope) => {
        await tracedCompletion(t.telemetry, client, { prompt: "one" }, { operationType: "a", parent: scope.context });
        await tracedCompletion(t.telemetry, client, { prompt: "two" }, { operationType: "b", parent: scope.context });
        return "done";
      },
    );

    expect(result).toBe("done");
    const [business] = t.spans("banking.process_request");
    expect(business?.kind).toBe(SpanKind.INTERNAL);
    expect(business?.status.code).toBe(SpanStatusCode.OK);
    expect(business?.attributes).toEqual({ "banking.provider": "ollama" });

    const children = t.spans(LLM_SPAN_NAME);
    expect(children).toHaveLength(2);
    for (const child of children) {
      expect(child.parentSpanId).toBe(business?.spanContext().spanId);
    }
  });

  it("marks a resolved result as failed when failureOf says so", async () => {
    const t = createInMemoryTelemetry();

    await withBusinessSpan(t.telemetry, "op", {}, async () => ({ status: "ERROR" }), {
      failureOf: (result) => (result.status === "ERROR" ? "request failed" : null),
    });

    expect(t.spans("op")[0]?.status).toEqual({ code: SpanStatusCode.ERROR, message: "request failed" });
  });

  it("records and re-throws exceptions", async () => {
    const t = createInMemoryTelemetry();
    const boom = new Error("boom");

    await expect(
      withBusinessSpan(t.telemetry, "op", {}, async () => {
        throw boom;
      }),
    ).rejects.toBe(boom);

    const span = t.spans("op")[0];
    expect(span?.status).toEqual({ code: SpanStatusCode.ERROR, message: "boom" });
    expect(span?.events.map((event) => event.name)).toEqual(["exception"]);
  });

  it("runs the callback on a non-recording span when the tracer throws", async () => {
    const t = createInMemoryTelemetry();
    failSpanStarts(t);

    const recording = await withBusinessSpan(t.telemetry, "op", {}, async (scope) => scope.span.isRecording());

    expect(recording).toBe(false);
    await expect(
      withBusinessSpan(t.telemetry, "op", {}, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
  });

  it("returns the result when the span cannot be ended", async () => {
    const t = createInMemoryTelemetry();

    const result = await withBusinessSpan(t.telemetry, "op", {}, async (scope) => {
      vi.spyOn(scope.span, "end").mockImplementation(() => {
        throw new Error("exporter unavailable");
      });
      return 42;
    });

    expect(result).toBe(42);
    expect(t.spans("op")).toHaveLength(0);
  });
});

describe("recordBusinessEvent", () => {
  it("emits one span with prefixed attributes", () => {
    const t = createInMemoryTelemetry();

    recordBusinessEvent(t.telemetry, "banking_request_processed", {
      provider: "ollama",
      intent: "CHECK_BALANCE",
      account_number: null,
      success: true,
    });

    const spans = t.spans(BUSINESS_EVENT_SPAN_NAME);
    expect(spans).toHaveLength(1);
    expect(spans[0]?.attributes).toEqual({
      "event.type": "banking_request_processed",
      "event.provider": "ollama",
      "event.intent": "CHECK_BALANCE",
      "event.success": true,
    });
  });

  it("drops the event when the tracer throws", () => {
    const t = createInMemoryTelemetry();
    failSpanStarts(t);

    expect(() => recordBusinessEvent(t.telemetry, "banking_request_processed", { provider: "ollama" })).not.toThrow();
    expect(t.spans()).toHaveLength(0);
  });
});

describe("recordCorrectness", () => {
  it("emits a span and updates the correctness metrics", async () => {
    const t = createInMemoryTelemetry();

    recordCorrectness(t.telemetry, { provider: "gemini", intent: "ACCOUNT_INFO", score: 0.9, feedback: "Great" });
    recordCorrectness(t.telemetry, { provider: "gemini", intent: "ACCOUNT_INFO", score: 0.4 });

    const spans = t.spans(CORRECTNESS_SPAN_NAME);
    expect(spans).toHaveLength(2);
    expect(spans[0]?.attributes).toEqual({
      "gen_ai.system": "google",
      "banking.intent": "ACCOUNT_INFO",
      "llm.correctness.score": 0.9,
      "llm.correctness.feedback": "Great",
    });

    const labels = { provider: "gemini", intent: "ACCOUNT_INFO" };
    expect(await t.metricValue("llm_correctness_score", labels)).toBe(0.4);
    expect(await t.metricValue("llm_correctness_evaluations_total", labels)).toBe(2);
  });

  it("bounds unknown intents", async () => {
    const t = createInMemoryTelemetry();

    recordCorrectness(t.telemetry, { provider: "openai", intent: "order_pizza", score: 1 });

    expect(await t.metricValue("llm_correctness_score", { provider: "openai", intent: "GENERAL_INQUIRY" })).toBe(1);
  });

  it("keeps the metrics when the span cannot be recorded", async () => {
    const t = createInMemoryTelemetry();
    failSpanStarts(t);

    recordCorrectness(t.telemetry, { provider: "openai", intent: "CHECK_BALANCE", score: 0.75 });

    const labels = { provider: "openai", intent: "CHECK_BALANCE" };
    expect(await t.metricValue("llm_correctness_score", labels)).toBe(0.75);
    expect(await t.metricValue("llm_correctness_evaluations_total", labels)).toBe(1);
  });

  it("keeps the span when the metrics throw", () => {
    const t = createInMemoryTelemetry();
    vi.spyOn(t.telemetry.metrics.llmCorrectnessScore, "set").mockImplementation(() => {
      throw new Error("registry unavailable");
    });

    expect(() => recordCorrectness(t.telemetry, { provider: "openai", intent: "CHECK_BALANCE", score: 1 })).not.toThrow();
    expect(t.spans(CORRECTNESS_SPAN_NAME)).toHaveLength(1);
  });
});

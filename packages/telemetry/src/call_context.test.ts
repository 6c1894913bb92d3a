import { SpanKind, SpanStatusCode, trace, context as otelContext } from "@opentelemetry/api";
import { describe, expect, it, vi } from "vitest";

import { ProviderError } from "@banking-agent/llm";

import { LLM_SPAN_NAME, startCall } from "./call_context";
import { createInMemoryTelemetry } from "./testing";

describe("CallContext", () => {
  it("records prompt, completion and domain context on one CLIENT span", async () => {
    const t = createInMemoryTelemetry();
    const call = startCall(t.telemetry, { provider: "openai", model: "gpt-test", operationType: "classify_intent" });

    call.recordPrompt("p".repeat(400), { temperature: 0 });
    call.recordDomainContext("CHECK_BALANCE", "ACC001");
    call.recordCompletion("c".repeat(40), "stop", "gpt-test-2024");
    call.finish({ status: "success" });

    const spans = t.spans(LLM_SPAN_NAME);
    expect(spans).toHaveLength(1);
    const span = spans[0];
    expect(span?.kind).toBe(SpanKind.CLIENT);
    expect(span?.status.code).toBe(SpanStatusCode.OK);
    expect(span?.attributes).toMatchObject({
      "gen_ai.system": "openai",
      "gen_ai.request.model": "gpt-test",
      "gen_ai.operation.name": "chat",
      "gen_ai.request.temperature": 0,
      "gen_ai.response.model": "gpt-test-2024",
      "gen_ai.response.finish_reasons": ["stop"],
      "gen_ai.usage.input_tokens": 100,
      "gen_ai.usage.output_tokens": 10,
      "llm.request.type": "classify_intent",
      "llm.prompt.length": 400,
      "llm.prompt.tokens": 100,
      "llm.response.length": 40,
      "llm.completion.tokens": 10,
      "llm.usage.total_tokens": 110,
      "banking.intent": "CHECK_BALANCE",
      "banking.account": "ACC001",
    });
    expect(span?.attributes["llm.cost.usd"]).toBeCloseTo(0.0036, 10);
    expect(span?.attributes["llm.prompt.hash"]).toMatch(/^[0-9a-f]{16}$/);
    expect(span?.attributes["gen_ai.prompt"]).toBeUndefined();

    expect(call.promptTokens).toBe(100);
    expect(call.completionTokens).toBe(10);
    expect(call.intent).toBe("CHECK_BALANCE");
    expect(call.accountRef).toBe("ACC001");

    const labels = { provider: "openai", model: "gpt-test" };
    expect(await t.metricValue("llm_requests_total", labels)).toBe(1);
    expect(await t.metricValue("llm_tokens_total", labels)).toBe(110);
    expect(await t.metricValue("llm_cost_usd_total", labels)).toBeCloseTo(0.0036, 10);
    expect(await t.metricValue("llm_errors_total", labels)).toBe(0);
    expect(await t.histogramCount("llm_response_time_seconds", labels)).toBe(1);
  });

  it("reports gemini as google on spans but keeps the config key on metrics", async () => {
    const t = createInMemoryTelemetry();
    const call = startCall(t.telemetry, { provider: "gemini", model: "gemini-test", operationType: "generate_response" });
    call.finish({ status: "success" });

    expect(t.spans(LLM_SPAN_NAME)[0]?.attributes["gen_ai.system"]).toBe("google");
    expect(await t.metricValue("llm_requests_total", { provider: "gemini", model: "gemini-test" })).toBe(1);
  });

  it("labels unknown providers as other", async () => {
    const t = createInMemoryTelemetry();
    startCall(t.telemetry, { provider: "Mistral", model: "m-test", operationType: "chat" }).finish({ status: "success" });

    expect(t.spans(LLM_SPAN_NAME)[0]?.attributes["gen_ai.system"]).toBe("mistral");
    expect(await t.metricValue("llm_requests_total", { provider: "other", model: "m-test" })).toBe(1);
  });

  it("skips the cost attribute for self-hosted providers", async () => {
    const t = createInMemoryTelemetry();
    const call = startCall(t.telemetry, { provider: "ollama", model: "llama-test", operationType: "chat" });
    call.recordPrompt("p".repeat(40));
    call.recordCompletion("c".repeat(40), "stop");
    call.finish({ status: "success" });

    const span = t.spans(LLM_SPAN_NAME)[0];
    expect(span?.attributes["llm.cost.usd"]).toBeUndefined();
    expect(span?.attributes["llm.usage.total_tokens"]).toBe(20);
    expect(await t.metricValue("llm_cost_usd_total", { provider: "ollama", model: "llama-test" })).toBe(0);
  });

  it("marks the span and counts an error on failure", async () => {
    const t = createInMemoryTelemetry();
    const call = startCall(t.telemetry, { provider: "openai", model: "gpt-test", operationType: "chat" });
    call.recordPrompt("hello there");
    call.finish({ status: "error", cause: new ProviderError("upstream down", "LLM_PROVIDER_ERROR", "openai") });

    const span = t.spans(LLM_SPAN_NAME)[0];
    expect(span?.status).toEqual({ code: SpanStatusCode.ERROR, message: "upstream down" });
    expect(span?.attributes["error.type"]).toBe("ProviderError");
    expect(span?.events.map((event) => event.name)).toEqual(["exception"]);

    const labels = { provider: "openai", model: "gpt-test" };
    expect(await t.metricValue("llm_requests_total", labels)).toBe(1);
    expect(await t.metricValue("llm_errors_total", labels)).toBe(1);
    expect(await t.metricValue("llm_tokens_total", labels)).toBe(0);
    expect(await t.histogramCount("llm_response_time_seconds", labels)).toBe(1);
  });

  it("accepts non-Error causes", () => {
    const t = createInMemoryTelemetry();
    startCall(t.telemetry, { provider: "openai", model: "gpt-test", operationType: "chat" }).finish({
      status: "error",
      cause: "socket hang up",
    });

    expect(t.spans(LLM_SPAN_NAME)[0]?.status).toEqual({ code: SpanStatusCode.ERROR, message: "socket hang up" });
  });

  it("ignores a second finish", async () => {
    const t = createInMemoryTelemetry();
    const call = startCall(t.telemetry, { provider: "openai", model: "gpt-test", operationType: "chat" });
    call.finish({ status: "success" });
    call.finish({ status: "error", cause: new Error("late") });

    expect(call.isFinished).toBe(true);
    expect(t.spans(LLM_SPAN_NAME)).toHaveLength(1);
    expect(t.spans(LLM_SPAN_NAME)[0]?.status.code).toBe(SpanStatusCode.OK);
    const labels = { provider: "openai", model: "gpt-test" };
    expect(await t.metricValue("llm_requests_total", labels)).toBe(1);
    expect(await t.metricValue("llm_errors_total", labels)).toBe(0);
  });

  it("keeps the first prompt when recorded twice", () => {
    const t = createInMemoryTelemetry();
    const call = startCall(t.telemetry, { provider: "openai", model: "gpt-test", operationType: "chat" });
    call.recordPrompt("p".repeat(8));
    call.recordPrompt("p".repeat(80));
    call.finish({ status: "success" });

    expect(call.promptTokens).toBe(2);
    expect(t.spans(LLM_SPAN_NAME)[0]?.attributes["llm.prompt.length"]).toBe(8);
  });

  it("captures truncated content only when enabled", () => {
    const t = createInMemoryTelemetry({ captureContent: true });
    const call = startCall(t.telemetry, { provider: "openai", model: "gpt-test", operationType: "chat" });
    call.recordPrompt("a".repeat(2500));
    call.recordCompletion("short answer", "stop");
    call.finish({ status: "success" });

    const span = t.spans(LLM_SPAN_NAME)[0];
    expect(span?.attributes["gen_ai.prompt"]).toBe(`${"a".repeat(2000)}...`);
    expect(span?.attributes["gen_ai.completion"]).toBe("short answer");
  });

  it("nests under an explicit parent context", () => {
    const t = createInMemoryTelemetry();
    const parentSpan = t.telemetry.tracer.startSpan("parent");
    const parent = trace.setSpan(otelContext.active(), parentSpan);

    startCall(t.telemetry, { provider: "openai", model: "gpt-test", operationType: "chat", parent }).finish({
      status: "success",
    });
    parentSpan.end();

    const child = t.spans(LLM_SPAN_NAME)[0];
    expect(child?.parentSpanId).toBe(parentSpan.spanContext().spanId);
    expect(child?.spanContext().traceId).toBe(parentSpan.spanContext().traceId);
  });

  it("falls back to a non-recording span when the tracer throws", async () => {
    const t = createInMemoryTelemetry();
    vi.spyOn(t.telemetry.tracer, "startSpan").mockImplementation(() => {
      throw new Error("tracer unavailable");
    });

    const call = startCall(t.telemetry, { provider: "openai", model: "gpt-test", operationType: "chat" });
    call.recordPrompt("hello there");
    call.finish({ status: "success" });

    expect(trace.getSpan(call.context)?.isRecording()).toBe(false);
    expect(call.isFinished).toBe(true);
    expect(await t.metricValue("llm_requests_total", { provider: "openai", model: "gpt-test" })).toBe(1);
  });

  it("still ends the span when recording attributes throws", async () => {
    const t = createInMemoryTelemetry();
    const call = startCall(t.telemetry, { provider: "openai", model: "gpt-test", operationType: "chat" });
    const span = trace.getSpan(call.context);
    if (!span) throw new Error("call has no span");
    vi.spyOn(span, "setAttributes").mockImplementation(() => {
      throw new Error("attributes rejected");
    });

    call.recordPrompt("p".repeat(40));
    call.recordCompletion("done", "stop");
    call.finish({ status: "success" });

    expect(call.promptTokens).toBe(10);
    const [finished] = t.spans(LLM_SPAN_NAME);
    expect(finished?.status.code).toBe(SpanStatusCode.OK);
    expect(await t.metricValue("llm_requests_total", { provider: "openai", model: "gpt-test" })).toBe(1);
  });

  it("still ends the span when the metrics throw", async () => {
    const t = createInMemoryTelemetry();
    vi.spyOn(t.telemetry.metrics.llmRequestsTotal, "inc").mockImplementation(() => {
      throw new Error("registry unavailable");
    });

    startCall(t.telemetry, { provider: "openai", model: "gpt-test", operationType: "chat" }).finish({ status: "success" });

    expect(t.spans(LLM_SPAN_NAME)[0]?.status.code).toBe(SpanStatusCode.OK);
  });
});

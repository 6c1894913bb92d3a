import { context, type Context } from "@opentelemetry/api";

import type { ChatClient, ChatRequest, ChatResult } from "@banking-agent/llm";
import type { Intent } from "@banking-agent/shared";

import { startCall } from "./call_context";
import type { Telemetry } from "./telemetry";

export interface TracedCompletionOptions {
  operationType: string;
  /** Provider name the registry resolved; defaults to the client's own. */
  provider?: string;
  parent?: Context;
  intent?: Intent;
  accountRef?: string;
}

/**
 * One `ChatClient.complete` call wrapped in a CallContext. Provider errors are
 * recorded on the span and re-thrown unchanged.
 */
export async function tracedCompletion(
  telemetry: Telemetry,
  client: ChatClient,
  request: ChatRequest,
  options: TracedCompletionOptions,
): Promise<ChatResult> {
  const call = startCall(telemetry, {
    provider: options.provider ?? client.provider,
    model: client.model,
    operationType: options.operationType,
    parent: options.parent,
  });

  call.recordPrompt(request.prompt, { temperature: request.temperature, maxTokens: request.maxTokens });
  if (options.intent) {
    call.recordDomainContext(options.intent, options.accountRef);
  }

  let result: ChatResult;
  try {
    result = await context.with(call.context, () => client.complete(request));
  } catch (error) {
    call.finish({ status: "error", cause: error });
    throw error;
  }

  call.recordCompletion(result.text, result.finishReason, result.model);
  call.finish({ status: "success" });
  return result;
}

import { context, SpanKind, SpanStatusCode, type Tracer } from "@opentelemetry/api";

import type { ChatObservation, ChatObserver, ChatResult, ObservationScope } from "@banking-agent/llm";

import { ERROR_TYPE, GenAiAttributes } from "./attributes";
import { normalizeProviderName } from "./providers";

/**
 * Turn chat-client lifecycle callbacks into CLIENT spans named
 * `chat <model>`, carrying the token usage the provider itself reported.
 * These sit under whatever span is active when the client is called.
 */
export function createTracingObserver(tracer: Tracer): ChatObserver {
  return {
    onStart(observation: ChatObservation): ObservationScope {
      const span = tracer.startSpan(
        `chat ${observation.model}`,
        {
          kind: SpanKind.CLIENT,
          attributes: {
            [GenAiAttributes.SYSTEM]: normalizeProviderName(observation.provider),
            [GenAiAttributes.OPERATION_NAME]: "chat",
            [GenAiAttributes.REQUEST_MODEL]: observation.model,
            ...(observation.request.temperature !== undefined
              ? { [GenAiAttributes.REQUEST_TEMPERATURE]: observation.request.temperature }
              : {}),
          },
        },
        context.active(),
      );

      return {
        onStop(result: ChatResult) {
          span.setAttributes({
            [GenAiAttributes.RESPONSE_MODEL]: result.model,
            [GenAiAttributes.RESPONSE_FINISH_REASONS]: [result.finishReason],
          });
          if (result.usage) {
            span.setAttributes({
              [GenAiAttributes.USAGE_INPUT_TOKENS]: result.usage.promptTokens,
              [GenAiAttributes.USAGE_OUTPUT_TOKENS]: result.usage.completionTokens,
            });
          }
          span.setStatus({ code: SpanStatusCode.OK });
          span.end();
        },
        onError(error: Error) {
          span.recordException(error);
          span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
          span.setAttribute(ERROR_TYPE, error.name);
          span.end();
        },
      };
    },
  };
}

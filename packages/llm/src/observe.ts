import { createLogger } from "@banking-agent/shared";

import type { ChatObservation, ChatObserver, ChatResult, ObservationScope } from "./types";

const log = createLogger({ component: "llm-observer" });

const NOOP_SCOPE: ObservationScope = {
  onStop() {},
  onError() {},
};

function safeStart(observer: ChatObserver, observation: ChatObservation): ObservationScope {
  try {
    return observer.onStart(observation);
  } catch (err) {
    log.warn({ err, provider: observation.provider }, "Chat observer failed on start");
    return NOOP_SCOPE;
  }
}

/**
 * Run one provider round trip with the observer's lifecycle callbacks around
 * it. Observer faults are logged and never change the call's outcome.
 */
export async function observeCall(
  observer: ChatObserver | undefined,
  observation: ChatObservation,
  call: () => Promise<ChatResult>,
): Promise<ChatResult> {
  if (!observer) return call();

  const scope = safeStart(observer, observation);
  try {
    const result = await call();
    try {
      scope.onStop(result);
    } catch (err) {
      log.warn({ err, provider: observation.provider }, "Chat observer failed on stop");
    }
    return result;
  } catch (error) {
    try {
      scope.onError(error instanceof Error ? error : new Error(String(error)));
    } catch (err) {
      log.warn({ err, provider: observation.provider }, "Chat observer failed on error");
    }
    throw error;
  }
}

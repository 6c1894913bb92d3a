import { describe, expect, it, vi } from "vitest";

import { observeCall } from "./observe";
import type { ChatObservation, ChatObserver, ChatResult } from "./types";

const observation: ChatObservation = { provider: "ollama", model: "llama-test", request: { prompt: "hi" } };
const RESULT: ChatResult = { text: "hello", finishReason: "stop", model: "llama-test" };

function throwing(message: string): () => never {
  return () => {
    throw new Error(message);
  };
}

describe("observeCall", () => {
  it("runs the call without an observer", async () => {
    const call = vi.fn(async () => RESULT);

    expect(await observeCall(undefined, observation, call)).toBe(RESULT);
    expect(call).toHaveBeenCalledTimes(1);
  });

  it("runs the call once when onStart throws", async () => {
    const call = vi.fn(async () => RESULT);
    const observer: ChatObserver = { onStart: throwing("observer broke on start") };

    expect(await observeCall(observer, observation, call)).toBe(RESULT);
    expect(call).toHaveBeenCalledTimes(1);
  });

  it("returns the result when onStop throws", async () => {
    const observer: ChatObserver = { onStart: () => ({ onStop: throwing("observer broke on stop"), onError: vi.fn() }) };

    expect(await observeCall(observer, observation, async () => RESULT)).toBe(RESULT);
  });

  it("rethrows the call's own error when onError throws", async () => {
    const failure = new Error("connection refused");
    const observer: ChatObserver = {
      onStart: () => ({ onStop: vi.fn(), onError: throwing("observer broke on error") }),
    };

    await expect(observeCall(observer, observation, async () => Promise.reject(failure))).rejects.toBe(failure);
  });

  it("hands non-Error rejections to onError as Errors", async () => {
    const onError = vi.fn();
    const observer: ChatObserver = { onStart: () => ({ onStop: vi.fn(), onError }) };

    await expect(observeCall(observer, observation, async () => Promise.reject("socket closed"))).rejects.toBe(
      "socket closed",
    );
    expect(onError).toHaveBeenCalledWith(new Error("socket closed"));
  });
});

/**
 * A tracing or metrics call failed. Logged, never thrown to the caller.
 */
export class InstrumentationError extends Error {
  constructor(
    public readonly step: string,
    cause: unknown,
  ) {
    super(`Instrumentation failed during ${step}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = "InstrumentationError";
  }
}

export * from "./attributes";
export * from "./business";
export * from "./call_context";
export * from "./errors";
export * from "./estimator";
export * from "./guard";
export * from "./metrics";
export * from "./observation_bridge";
export * from "./providers";
export * from "./telemetry";
export * from "./testing";
export * from "./traced_completion";
export * from "./traced_repos";
export * from "./tracing";

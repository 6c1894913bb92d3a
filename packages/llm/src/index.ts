export * from "./anthropic";
export * from "./errors";
export * from "./observe";
export * from "./openai_compat";
export * from "./registry";
export * from "./timeout";
export * from "./types";

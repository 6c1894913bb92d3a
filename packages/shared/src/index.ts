export * from "./logging.js";
export * from "./errors.js";
export * from "./metrics.js";
export * from "./pricing.js";
export * from "./config/load_dotenv.js";
export * from "./config/runtime_env.js";
export * from "./types/agent.js";
export * from "./types/banking.js";
export * from "./types/feedback.js";

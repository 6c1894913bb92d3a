export * from "./account_service";
export * from "./banking_agent";
export * from "./feedback_recorder";
export * from "./money";
export * from "./prompts";
export * from "./transaction_service";

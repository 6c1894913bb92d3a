import { collectDefaultMetrics, Registry } from "prom-client";

import {
  BankingAgent,
  createAccountService,
  createFeedbackRecorder,
  createTransactionService,
} from "@banking-agent/agent";
import { applyMigrations, createDb, seedSampleAccounts } from "@banking-agent/db";
import { createRegistryFromEnv } from "@banking-agent/llm";
import { createLogger, loadDotEnvIfPresent, loadRuntimeEnv } from "@banking-agent/shared";
import { createTelemetry, createTracingObserver, initTracing, traceDb } from "@banking-agent/telemetry";

import { buildServer } from "./server.js";

// Load .env and .env.local files (must happen before reading env vars)
loadDotEnvIfPresent();

const log = createLogger({ component: "api" });

async function main(): Promise<void> {
  const env = loadRuntimeEnv();

  const tracing = initTracing(env.telemetry);
  const registry = new Registry();
  collectDefaultMetrics({ register: registry });
  const telemetry = createTelemetry({
    tracer: tracing.tracer,
    registry,
    captureContent: env.telemetry.captureContent,
  });

  const db = traceDb(telemetry, createDb(env.databaseUrl));
  const applied = await applyMigrations(db);
  if (applied.length > 0) log.info({ applied }, "Migrations applied");
  if (env.appEnv === "local") {
    const seeded = await seedSampleAccounts(db);
    if (seeded > 0) log.info({ seeded }, "Seeded sample accounts");
  }

  const providers = createRegistryFromEnv(process.env, {
    defaultProvider: env.defaultProvider,
    fallbackProvider: env.fallbackProvider,
    timeoutMs: env.llmTimeoutMs,
    observer: env.telemetry.clientSpans ? createTracingObserver(tracing.tracer) : undefined,
  });
  log.info({ providers: providers.providers(), default: providers.defaultName }, "LLM providers registered");

  const accounts = createAccountService(db, { defaultCurrency: env.currency });
  const transactions = createTransactionService(db, {
    maxTransactionAmount: env.maxTransactionAmount,
    telemetry,
  });
  const agent = new BankingAgent({ accounts, transactions, registry: providers, telemetry });

  const server = await buildServer(
    {
      accounts,
      transactions,
      agent,
      providers,
      feedback: createFeedbackRecorder(telemetry),
      registry,
    },
    { logger: true },
  );

  const shutdown = async (signal: string): Promise<void> => {
    log.info({ signal }, "Received signal, shutting down");
    try {
      await server.close();
      await db.close();
      await tracing.shutdown();
      log.info("Shutdown complete");
      process.exit(0);
    } catch (err) {
      log.error({ err }, "Shutdown failed");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  await server.listen({ port: env.port, host: "0.0.0.0" });
  log.info({ port: env.port }, "API server listening");
}

main().catch((err: unknown) => {
  log.fatal({ err }, "API server failed to start");
  process.exit(1);
});

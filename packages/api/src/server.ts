import cors from "@fastify/cors";
import Fastify, { type FastifyError, type FastifyInstance, type FastifyServerOptions } from "fastify";
import type { Registry } from "prom-client";

import type { AccountService, BankingAgent, FeedbackRecorder, TransactionService } from "@banking-agent/agent";
import { isProviderError, type ProviderRegistry } from "@banking-agent/llm";
import { isAppError } from "@banking-agent/shared";

import { errorEnvelope } from "./lib/envelope.js";
import { createHttpMetrics, registerMetricsHooks } from "./metrics.js";
import { accountRoutes } from "./routes/accounts.js";
import { agentRoutes } from "./routes/agent.js";
import { feedbackRoutes } from "./routes/feedback.js";
import { healthRoutes } from "./routes/health.js";
import { transactionRoutes } from "./routes/transactions.js";

export interface ServerDeps {
  accounts: AccountService;
  transactions: TransactionService;
  agent: BankingAgent;
  providers: Pick<ProviderRegistry, "isAvailable" | "availability" | "defaultName">;
  feedback: FeedbackRecorder;
  registry: Registry;
}

/** Options every route plugin receives. */
export type RouteDeps = {
  deps: ServerDeps;
};

export async function buildServer(
  deps: ServerDeps,
  options: { logger?: FastifyServerOptions["logger"] } = {},
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? false,
  });

  await fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  });

  registerMetricsHooks(fastify, createHttpMetrics(deps.registry));

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (isAppError(error)) {
      return reply.code(error.statusCode).send(errorEnvelope(error.code, error.message));
    }
    if (isProviderError(error)) {
      request.log.error({ err: error, provider: error.provider }, "LLM provider failure");
      return reply.code(502).send(errorEnvelope(error.code, error.message));
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send(errorEnvelope(error.code ?? "BAD_REQUEST", error.message));
    }

    request.log.error({ err: error }, "Unhandled error");
    return reply.code(500).send(errorEnvelope("INTERNAL_ERROR", "Internal server error"));
  });

  fastify.setNotFoundHandler((request, reply) => {
    reply.code(404).send(errorEnvelope("NOT_FOUND", `Route ${request.method} ${request.url} not found`));
  });

  await fastify.register(healthRoutes, { prefix: "/api", deps });
  await fastify.register(accountRoutes, { prefix: "/api", deps });
  await fastify.register(transactionRoutes, { prefix: "/api", deps });
  await fastify.register(agentRoutes, { prefix: "/api", deps });
  await fastify.register(feedbackRoutes, { prefix: "/api", deps });

  return fastify;
}

import type { FastifyInstance } from "fastify";

import {
  BankingAgent,
  createAccountService,
  createFeedbackRecorder,
  createTransactionService,
} from "@banking-agent/agent";
import { createInMemoryDb, seedSampleAccounts, type Db } from "@banking-agent/db";
import { ProviderRegistry, type ChatClient, type ChatRequest } from "@banking-agent/llm";
import { createInMemoryTelemetry, traceDb, type InMemoryTelemetry } from "@banking-agent/telemetry";

import { buildServer, type ServerDeps } from "./server.js";

export interface TestApp {
  app: FastifyInstance;
  db: Db;
  telemetry: InMemoryTelemetry;
  deps: ServerDeps;
  /** Prompts the scripted model received, in order. */
  requests: ChatRequest[];
}

/**
 * A chat client that answers from a fixed list of replies. An Error entry is
 * thrown instead of returned.
 */
export function scriptedClient(provider: string, replies: Array<string | Error>, requests: ChatRequest[] = []): ChatClient {
  return {
    provider,
    model: `${provider}-test`,
    async complete(request) {
      requests.push(request);
      const next = replies.shift();
      if (next === undefined) throw new Error("unexpected model call");
      if (next instanceof Error) throw next;
      return { text: next, finishReason: "stop", model: `${provider}-test` };
    },
  };
}

/**
 * Server over a seeded in-memory store, in-memory telemetry and a single
 * scripted `ollama` provider.
 */
export async function buildTestApp(
  options: { replies?: Array<string | Error> } = {},
): Promise<TestApp> {
  const telemetry = createInMemoryTelemetry();
  const db = traceDb(telemetry.telemetry, createInMemoryDb());
  await seedSampleAccounts(db);
  const requests: ChatRequest[] = [];

  const providers = new ProviderRegistry({ defaultProvider: "ollama" });
  providers.register(scriptedClient("ollama", options.replies ?? [], requests));

  const accounts = createAccountService(db, { defaultCurrency: "USD" });
  const transactions = createTransactionService(db, {
    maxTransactionAmount: 10_000,
    telemetry: telemetry.telemetry,
  });
  const deps: ServerDeps = {
    accounts,
    transactions,
    agent: new BankingAgent({ accounts, transactions, registry: providers, telemetry: telemetry.telemetry }),
    providers,
    feedback: createFeedbackRecorder(telemetry.telemetry),
    registry: telemetry.registry,
  };

  const app = await buildServer(deps);
  await app.ready();
  return { app, db, telemetry, deps, requests };
}

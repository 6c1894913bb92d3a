import type { FastifyInstance } from "fastify";

import { getKnownProviders, type BankingRequest } from "@banking-agent/shared";

import { errorEnvelope } from "../lib/envelope.js";
import { optionalString, requireBody, type Fields } from "../lib/params.js";
import type { RouteDeps } from "../server.js";

interface ProviderParams {
  provider: string;
}

function toBankingRequest(body: Fields): BankingRequest {
  const query = body.query;
  return {
    // A blank or missing query is answered by the agent, not rejected here.
    query: typeof query === "string" ? query : "",
    accountRef: optionalString(body, "accountNumber") ?? optionalString(body, "accountRef"),
    context: optionalString(body, "context"),
    operationType: optionalString(body, "operationType"),
  };
}

export async function agentRoutes(fastify: FastifyInstance, { deps }: RouteDeps): Promise<void> {
  const { agent, providers } = deps;

  fastify.post("/agent/query", async (request) => {
    const response = await agent.processRequest(toBankingRequest(requireBody(request.body)));
    return { ok: true, ...response };
  });

  fastify.post<{ Params: ProviderParams }>("/agent/query/:provider", async (request, reply) => {
    const provider = request.params.provider.trim().toLowerCase();
    if (!providers.isAvailable(provider)) {
      return reply
        .code(400)
        .send(
          errorEnvelope(
            "PROVIDER_UNAVAILABLE",
            `LLM provider '${provider}' is not available. Please check your configuration.`,
          ),
        );
    }
    const response = await agent.processRequest(toBankingRequest(requireBody(request.body)), provider);
    return { ok: true, ...response };
  });

  fastify.get("/agent/providers", async () => {
    return {
      ok: true,
      defaultProvider: providers.defaultName,
      providers: providers.availability(getKnownProviders()),
    };
  });

  fastify.get("/agent/health", async () => {
    return { ok: true, status: "UP", service: "Banking AI Agent" };
  });
}

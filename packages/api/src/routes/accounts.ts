import type { FastifyInstance } from "fastify";

import { NotFoundError } from "@banking-agent/shared";

import { requireBody } from "../lib/params.js";
import type { RouteDeps } from "../server.js";

interface AccountParams {
  accountNumber: string;
}

export async function accountRoutes(fastify: FastifyInstance, { deps }: RouteDeps): Promise<void> {
  const { accounts } = deps;

  fastify.get("/accounts", async () => {
    return { ok: true, accounts: await accounts.findAll() };
  });

  fastify.get<{ Params: AccountParams }>("/accounts/:accountNumber", async (request) => {
    const account = await accounts.findByAccountNumber(request.params.accountNumber);
    if (!account) throw new NotFoundError(`Account not found: ${request.params.accountNumber}`);
    return { ok: true, account };
  });

  fastify.post("/accounts", async (request, reply) => {
    const body = requireBody(request.body);
    const account = await accounts.createAccount(body);
    return reply.code(201).send({ ok: true, account });
  });

  fastify.delete<{ Params: AccountParams }>("/accounts/:accountNumber", async (request) => {
    const account = await accounts.closeAccount(request.params.accountNumber);
    return { ok: true, account };
  });

  fastify.get<{ Params: AccountParams }>("/accounts/:accountNumber/balance", async (request) => {
    const balance = await accounts.getBalance(request.params.accountNumber);
    return { ok: true, ...balance };
  });
}

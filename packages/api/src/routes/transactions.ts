import type { FastifyInstance } from "fastify";

import { isRecord, optionalString, requireBody, requireString } from "../lib/params.js";
import type { RouteDeps } from "../server.js";

interface AccountParams {
  accountNumber: string;
}

export async function transactionRoutes(fastify: FastifyInstance, { deps }: RouteDeps): Promise<void> {
  const { transactions } = deps;

  fastify.post("/transactions/deposit", async (request, reply) => {
    const body = requireBody(request.body);
    const transaction = await transactions.deposit({
      accountNumber: requireString(body, "accountNumber"),
      amount: body.amount,
      description: optionalString(body, "description"),
    });
    return reply.code(201).send({ ok: true, transaction });
  });

  fastify.post("/transactions/withdraw", async (request, reply) => {
    const body = requireBody(request.body);
    const transaction = await transactions.withdraw({
      accountNumber: requireString(body, "accountNumber"),
      amount: body.amount,
      description: optionalString(body, "description"),
    });
    return reply.code(201).send({ ok: true, transaction });
  });

  fastify.post("/transactions/transfer", async (request, reply) => {
    const body = requireBody(request.body);
    const transaction = await transactions.transfer({
      fromAccount: requireString(body, "fromAccount"),
      toAccount: requireString(body, "toAccount"),
      amount: body.amount,
      description: optionalString(body, "description"),
    });
    return reply.code(201).send({ ok: true, transaction });
  });

  fastify.get<{ Params: AccountParams }>("/transactions/account/:accountNumber", async (request) => {
    const list = await transactions.getTransactionHistory(request.params.accountNumber);
    return { ok: true, transactions: list };
  });

  fastify.get<{ Params: AccountParams }>("/transactions/account/:accountNumber/range", async (request) => {
    const query = isRecord(request.query) ? request.query : {};
    const list = await transactions.getTransactionsByDateRange(
      request.params.accountNumber,
      requireString(query, "startDate"),
      requireString(query, "endDate"),
    );
    return { ok: true, transactions: list };
  });
}

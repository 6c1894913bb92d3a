import type { FastifyInstance } from "fastify";

import type { RouteDeps } from "../server.js";

export async function healthRoutes(fastify: FastifyInstance, { deps }: RouteDeps): Promise<void> {
  fastify.get("/health", async () => {
    return { ok: true, status: "UP" };
  });

  fastify.get("/metrics", async (_request, reply) => {
    const metrics = await deps.registry.metrics();
    reply.type(deps.registry.contentType).send(metrics);
  });
}

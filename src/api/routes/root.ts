import type { FastifyInstance } from "fastify";

export function registerRootRoutes(app: FastifyInstance): void {
  app.get("/", async (_req, reply) => {
    reply.type("text/plain; charset=utf-8");
    return "ok\n";
  });

  app.get("/healthz", { config: { instrument: false } }, async (_req, reply) => {
    reply.type("text/plain; charset=utf-8");
    return "ok\n";
  });
}

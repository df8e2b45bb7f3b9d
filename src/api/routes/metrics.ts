import type { FastifyInstance } from "fastify";
import type { ExpositionHandler } from "../../metrics/exposition.js";

/**
 * Scrape endpoint. Only reads the registry. A failed exposition answers 503 so
 * the scraper records a missed scrape; it never reaches the error handler.
 */
export function registerMetricsRoutes(
  app: FastifyInstance,
  deps: { exposition: ExpositionHandler; path: string }
): void {
  app.get(deps.path, { config: { instrument: false } }, async (req, reply) => {
    try {
      const { body, contentType } = await deps.exposition.expose();
      reply.header("Content-Type", contentType);
      return body;
    } catch (err) {
      req.log.warn({ err }, "metrics exposition failed");
      reply.status(503).type("text/plain; charset=utf-8");
      return "metrics unavailable\n";
    }
  });
}

import type { FastifyInstance } from "fastify";

export default async function metricsRoutes(fastify: FastifyInstance) {
  fastify.get("/metrics", async (request, reply) => {
    const { config, metrics } = fastify.services;
    const token = request.headers.authorization
      ?.replace(/Bearer\s+/i, "")
      .trim();
    if (config.METRICS_ACCESS_TOKEN && token !== config.METRICS_ACCESS_TOKEN) {
      throw reply.server.httpErrors.unauthorized("Invalid metrics token");
    }
    reply.header("content-type", metrics.contentType);
    return metrics.render();
  });
}

import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import type { ServiceDependencies } from "../services/dependencies";

declare module "fastify" {
  interface FastifyInstance {
    services: ServiceDependencies;
  }
}

async function servicesPlugin(
  fastify: FastifyInstance,
  options: { dependencies: ServiceDependencies }
) {
  fastify.decorate("services", options.dependencies);
}

export default fp(servicesPlugin, {
  name: "services",
});

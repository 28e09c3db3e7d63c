import Fastify from "fastify";
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from "fastify-type-provider-zod";
import sensible from "@fastify/sensible";
import helmet from "@fastify/helmet";
import servicesPlugin from "./plugins/services";
import eventRoutes from "./routes/events";
import metricsRoutes from "./routes/metrics";
import {
  getServiceDependencies,
  type ServiceDependencies,
} from "./services/dependencies";

export async function buildApp(
  dependencies: ServiceDependencies = getServiceDependencies()
) {
  const { config } = dependencies;

  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
      transport:
        config.NODE_ENV === "development"
          ? {
              target: "pino-pretty",
              options: {
                colorize: true,
                translateTime: "SYS:standard",
              },
            }
          : undefined,
    },
    trustProxy: true,
    bodyLimit: config.HTTP_BODY_LIMIT,
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  await app.register(sensible);
  await app.register(helmet, { contentSecurityPolicy: false });
  await app.register(servicesPlugin, { dependencies });
  await app.register(eventRoutes, { prefix: "/events" });
  await app.register(metricsRoutes);

  app.get("/health", async () => ({ status: "ok" }));

  return app;
}

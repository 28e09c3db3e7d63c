import { buildApp } from "./app";
import { loadConfig } from "./config";
import {
  observabilityConfigFromEnv,
  shutdownObservability,
  startObservability,
} from "./observability";

async function main() {
  const config = loadConfig();
  startObservability(
    observabilityConfigFromEnv(config, "media-encoding-service")
  );
  const app = await buildApp();

  const stop = async () => {
    try {
      await app.close();
      await shutdownObservability();
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void stop());
  process.on("SIGTERM", () => void stop());

  try {
    await app.listen({ port: config.HTTP_PORT, host: config.HTTP_HOST });
    app.log.info(
      {
        event: "server_started",
        port: config.HTTP_PORT,
        host: config.HTTP_HOST,
        env: config.NODE_ENV,
      },
      "Media encoding service listening"
    );
  } catch (error) {
    app.log.fatal({ err: error }, "Failed to start media encoding service");
    process.exit(1);
  }
}

void main();

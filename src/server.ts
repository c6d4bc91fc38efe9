import { createApp } from "./app";
import { loadEnv } from "./config/env";

function bootstrap(): void {
  const env = loadEnv();
  const { app, logger } = createApp(env);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, nodeEnv: env.nodeEnv });
    logger.info("DEBUG_MODE", { enabled: env.debugMode });
    logger.info("Upstream API", { url: env.upstreamApiUrl, timeoutMs: env.upstreamTimeoutMs });
  });
}

bootstrap();

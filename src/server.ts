import { serve } from "@hono/node-server";
import { loadConfig, type AppConfig } from "./config/env";
import { createApp } from "./index";
import { errorContext, setLogLevel, structuredLog } from "./utils/structured-logger";

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    structuredLog("CRITICAL", "Startup aborted", errorContext(err));
    process.exit(1);
  }
}

const config = readConfig();

setLogLevel(config.LOG_LEVEL);

const app = createApp(config);

const server = serve({ fetch: app.fetch, port: config.PORT, hostname: config.HOST }, (info) => {
  structuredLog("INFO", "Server listening", {
    host: info.address,
    port: info.port,
    node_env: config.NODE_ENV
  });
});

function shutdown(signal: string) {
  structuredLog("INFO", "Shutting down", { signal });
  server.close((err) => {
    if (err) {
      structuredLog("ERROR", "Shutdown failed", errorContext(err));
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

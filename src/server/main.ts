import "dotenv/config";

import { loadConfig } from "../config";
import { DecisionEngine } from "../core/engine";
import { defaultRules, loadRules } from "../core/rules";
import { SqlitePreferencesStore } from "../store/sqlite";
import { createLogger } from "../util/log";
import { createApp } from "./app";

function main() {
  const config = loadConfig();
  const log = createLogger("api", config.LOG_LEVEL);

  // Bad rules must stop the service here rather than fail every request later.
  const rules = config.RULES_PATH ? loadRules(config.RULES_PATH) : defaultRules();
  const store = new SqlitePreferencesStore(config.DATABASE_PATH);
  const engine = new DecisionEngine(store, {
    rules,
    lookupTimeoutMs: config.LOOKUP_TIMEOUT_MS,
    logger: createLogger("engine", config.LOG_LEVEL),
  });

  const app = createApp({
    store,
    engine,
    corsOrigin: config.CORS_ORIGIN,
    jsonLimit: config.JSON_LIMIT,
    logger: log,
  });

  const server = app.listen(config.PORT, () => {
    log.info(`listening on http://localhost:${config.PORT}`, { database: config.DATABASE_PATH });
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    server.close(() => {
      store.close();
      process.exit(0);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

try {
  main();
} catch (err) {
  console.error(`[api] failed to start: ${(err as Error).message}`);
  process.exit(1);
}

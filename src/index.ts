import * as dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { Database, createDatabase } from "./db";
import { ConfigError } from "./errors";
import { createPgStore } from "./store/pg-store";
import { makeMemoryStore } from "./store/memory-store";
import { BlogStore } from "./store/store";
import { QueryMonitor } from "./utils/performance";

dotenv.config();

async function main() {
  const config = loadConfig();
  const monitor = new QueryMonitor(config.slowQueryMs);

  let db: Database | null = null;
  let store: BlogStore;
  if (config.databaseUrl) {
    db = createDatabase({ connectionString: config.databaseUrl, monitor });
    await db.ensureSchema();
    store = createPgStore(db);
  } else {
    console.warn("DATABASE_URL is not set; using the in-memory store");
    store = makeMemoryStore();
  }

  const app = createApp({
    store,
    secretKey: config.secretKey,
    secureCookies: config.secureCookies,
    bcryptRounds: config.bcryptRounds,
    now: () => new Date(),
  });

  const server = app.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
  });

  const shutdown = () => {
    console.log("Shutting down...");
    server.close(() => {
      if (db) {
        monitor.printSummary("Database queries");
      }
      const closing = db ? db.end() : Promise.resolve();
      closing
        .then(() => process.exit(0))
        .catch((error) => {
          console.error("Error closing database pool:", error);
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error("Failed to start server:", error);
  }
  process.exit(1);
});

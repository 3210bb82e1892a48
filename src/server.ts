import fs from "node:fs";
import path from "node:path";
import { createApp } from "./app";
import { loadEnv, type AppEnv } from "./config/env";
import { getDbFilePath } from "./db/paths";
import { openDb, type Db } from "./db/connection";
import { runMigrations } from "./db/migrate";
import { createLogger, type Logger } from "./lib/logger";
import {
  createMemoryFoodItemRepository,
  createSqliteFoodItemRepository,
  type FoodItemRepository,
} from "./modules/food-items/repository";

function ensureDbDir(dbFilePath: string) {
  const dir = path.dirname(dbFilePath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

function openStore(env: AppEnv, logger: Logger): { foodItems: FoodItemRepository; db: Db | null } {
  if (env.FOOD_STORE === "memory") {
    logger.warn("using in-memory store; data is lost on exit");
    return { foodItems: createMemoryFoodItemRepository(), db: null };
  }

  const dbFilePath = getDbFilePath(env);
  ensureDbDir(dbFilePath);

  const db = openDb(dbFilePath);
  const applied = runMigrations(db);
  logger.info({ db: dbFilePath, applied }, "database ready");

  return { foodItems: createSqliteFoodItemRepository(db), db };
}

async function main() {
  const env = loadEnv();
  const logger = createLogger(env.LOG_LEVEL);

  const { foodItems, db } = openStore(env, logger);
  const app = createApp({ foodItems, logger, envName: env.DB_ENV });

  const server = app.listen(env.PORT, "0.0.0.0", () => {
    logger.info({ port: env.PORT, store: env.FOOD_STORE, nodeEnv: env.NODE_ENV }, "menu-api listening");
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "shutting down");
    server.close(() => {
      db?.close();
      process.exit(0);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  createLogger("fatal").fatal({ err }, "startup failed");
  process.exit(1);
});

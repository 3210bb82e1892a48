import path from "node:path";
import type { AppEnv } from "../config/env";

/** One SQLite file per deployment stage, named after the stage. */
export function getDbFilePath(env: Pick<AppEnv, "DB_ENV" | "DB_DIR">): string {
  return path.resolve(process.cwd(), env.DB_DIR, `${env.DB_ENV}.db`);
}

export function getMigrationsDir(): string {
  return path.resolve(process.cwd(), "migrations");
}

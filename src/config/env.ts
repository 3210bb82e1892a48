import { z } from "zod";
import fs from "node:fs";
import path from "node:path";

function unquote(value: string) {
  const first = value[0];
  if ((first === '"' || first === "'") && value.length > 1 && value.endsWith(first)) {
    return value.slice(1, -1);
  }
  return value;
}

// Real environment always wins over the file.
function loadDotEnvFileIfPresent(filename = ".env") {
  const file = path.resolve(process.cwd(), filename);
  if (!fs.existsSync(file)) return;

  const raw = fs.readFileSync(file, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const eq = trimmed.indexOf("=");
    if (eq <= 0) continue;

    const key = trimmed.slice(0, eq).trim();
    if (process.env[key] === undefined) {
      process.env[key] = unquote(trimmed.slice(eq + 1).trim());
    }
  }
}

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),

  PORT: z.coerce.number().int().min(1).max(65535).default(8787),

  // dev.db / stage.db / smoke.db / prod.db
  DB_ENV: z.enum(["dev", "stage", "smoke", "prod"]).default("dev"),

  // Resolved against the working directory
  DB_DIR: z.string().min(1).default("./db"),

  FOOD_STORE: z.enum(["sqlite", "memory"]).default("sqlite"),

  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type AppEnv = z.infer<typeof EnvSchema>;

export function loadEnv(processEnv: NodeJS.ProcessEnv = process.env): AppEnv {
  if (processEnv === process.env) loadDotEnvFileIfPresent(".env");

  const parsed = EnvSchema.safeParse(processEnv);
  if (!parsed.success) {
    // Fail fast: no hidden fallbacks
    const keys = Object.keys(parsed.error.flatten().fieldErrors).sort();
    throw new Error(`Invalid environment variables: ${keys.join(", ")}`);
  }

  return parsed.data;
}

import { z } from "zod";
import { LOG_LEVELS } from "./util/log";

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  DATABASE_PATH: z.string().min(1).default("playback-filter.db"),
  RULES_PATH: z.string().min(1).optional(),
  LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(1500),
  CORS_ORIGIN: z.string().min(1).default("*"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  JSON_LIMIT: z.string().min(1).default("512kb"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Reads service settings from the environment. Call after `dotenv/config`
 * has been imported. Throws with every offending field listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // empty strings in .env mean "unset"
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== ""));
  const parsed = ConfigSchema.safeParse(cleaned);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`invalid configuration: ${fields.join("; ")}`);
  }
  return parsed.data;
}

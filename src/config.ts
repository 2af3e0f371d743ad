import * as dotenv from "dotenv";
import { z } from "zod";
dotenv.config();

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  DATABASE_URL: z.string().min(1).optional(),
  DATABASE_NAME: z.string().min(1).default("rate_scraper"),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  FETCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(1),
  CRAWL_CONCURRENCY: z.coerce.number().int().min(1).max(50).default(5),
  OUTPUT_DIR: z.string().min(1).default("data/out"),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // empty strings in .env mean "unset"
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  return EnvSchema.parse(cleaned);
}

export const config = loadConfig();

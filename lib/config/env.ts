import { z } from "zod";
import { config } from "dotenv";

// Load .env file for CLI scripts (Next.js handles this automatically for the app)
config();

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  // Database
  DATABASE_URL: z.string().url().default("postgres://localhost:5432/bookbuddy"),
  PGPOOL_MIN: z.coerce.number().int().nonnegative().default(2),
  PGPOOL_MAX: z.coerce.number().int().positive().default(10),

  // Open Library
  OPENLIBRARY_BASE_URL: z.string().url().default("https://openlibrary.org"),
  OPENLIBRARY_COVERS_URL: z.string().url().default("https://covers.openlibrary.org"),
  OPENLIBRARY_USER_AGENT: z.string().min(1).default("BookBuddy/1.0 (personal project)"),
  OPENLIBRARY_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  // Catalog seeding
  SEED_ON_STARTUP: booleanFlag.default("true"),
  SEED_MIN_BOOKS: z.coerce.number().int().nonnegative().default(250),

  // App settings
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DEFAULT_USER_ID: z.string().min(1).default("me"),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

export function getEnv(): Env {
  if (cachedEnv) return cachedEnv;

  const parsed = envSchema.safeParse(process.env);

  if (!parsed.success) {
    console.error("Invalid environment variables:");
    console.error(parsed.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }

  cachedEnv = parsed.data;
  return cachedEnv;
}

/**
 * Drop the parsed environment so the next getEnv() re-reads process.env
 */
export function resetEnvCache(): void {
  cachedEnv = null;
}

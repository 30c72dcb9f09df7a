import { readdir, readFile } from "fs/promises";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import type { PoolClient } from "pg";
import { closePool, getPool } from "@/lib/db/pool";
import { logger } from "@/lib/util/logger";

const migrationsDir = join(dirname(fileURLToPath(import.meta.url)), "migrations");

async function ensureMigrationsTable(client: PoolClient) {
  await client.query(`
    CREATE TABLE IF NOT EXISTS "_migrations" (
      id          SERIAL PRIMARY KEY,
      filename    TEXT UNIQUE NOT NULL,
      applied_at  TIMESTAMP DEFAULT NOW()
    );
  `);
}

async function getAppliedMigrations(client: PoolClient): Promise<Set<string>> {
  const result = await client.query<{ filename: string }>(`SELECT filename FROM "_migrations" ORDER BY filename`);
  return new Set(result.rows.map((row) => row.filename));
}

async function applyMigration(client: PoolClient, filename: string, sql: string) {
  await client.query("BEGIN");
  try {
    await client.query(sql);
    await client.query(`INSERT INTO "_migrations" (filename) VALUES ($1)`, [filename]);
    await client.query("COMMIT");
    logger.info("Applied migration", { filename });
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  }
}

async function main() {
  const files = await readdir(migrationsDir);
  const sqlFiles = files.filter((f) => f.endsWith(".sql")).sort();

  const client = await getPool().connect();

  try {
    await ensureMigrationsTable(client);
    const applied = await getAppliedMigrations(client);

    let appliedCount = 0;
    for (const filename of sqlFiles) {
      if (applied.has(filename)) {
        logger.debug("Skipping applied migration", { filename });
        continue;
      }

      const sql = await readFile(join(migrationsDir, filename), "utf-8");
      await applyMigration(client, filename, sql);
      appliedCount++;
    }

    logger.info("Migration complete", { appliedCount });
  } finally {
    client.release();
    await closePool();
  }
}

main().catch((error) => {
  logger.error("Migration failed", { error: String(error) });
  process.exit(1);
});

/**
 * Next.js startup hook: seed the catalog once per server process
 */

export async function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") return;

  const { getEnv } = await import("@/lib/config/env");
  const { getCuratedShelves } = await import("@/lib/config/catalog");
  const { PgCatalogStore } = await import("@/lib/db/catalog");
  const { ensureSeeded } = await import("@/lib/ingest/seed");
  const { logger } = await import("@/lib/util/logger");

  const env = getEnv();
  if (!env.SEED_ON_STARTUP) {
    logger.info("Startup seeding disabled");
    return;
  }

  try {
    await ensureSeeded(new PgCatalogStore(), getCuratedShelves(), env.SEED_MIN_BOOKS);
  } catch (error) {
    logger.error("Catalog seeding failed", { error: String(error) });
  }
}

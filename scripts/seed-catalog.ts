#!/usr/bin/env tsx
/**
 * Seed the catalog from the curated shelves in lib/config/catalog.yaml.
 *
 * Usage:
 *   npm run seed
 *   npm run seed -- --min 500
 */

import "dotenv/config";

import { parseArgs } from "util";
import { getEnv } from "@/lib/config/env";
import { getCuratedShelves } from "@/lib/config/catalog";
import { PgCatalogStore } from "@/lib/db/catalog";
import { closePool } from "@/lib/db/pool";
import { ensureSeeded } from "@/lib/ingest/seed";
import { logger } from "@/lib/util/logger";

const { values } = parseArgs({
  options: {
    min: { type: "string" },
  },
  allowPositionals: true,
});

async function main() {
  const minimumTotal = values.min ? parseInt(values.min, 10) : getEnv().SEED_MIN_BOOKS;
  if (!Number.isInteger(minimumTotal) || minimumTotal < 0) {
    throw new Error(`--min must be a non-negative integer, got "${values.min}"`);
  }

  try {
    const report = await ensureSeeded(new PgCatalogStore(), getCuratedShelves(), minimumTotal);

    if (report.skipped) {
      logger.info("Catalog already has enough books", { books: report.existing, minimumTotal });
    } else {
      logger.info("Seeding finished", { inserted: report.inserted, alreadyPresent: report.existing });
    }
  } finally {
    await closePool();
  }
}

main().catch((error) => {
  logger.error("Seeding failed", { error: String(error) });
  process.exit(1);
});

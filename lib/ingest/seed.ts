/**
 * Catalog seeding from curated shelves
 *
 * Runs once at startup. When the catalog holds fewer than the minimum number
 * of books, every curated item not yet in the catalog is resolved against
 * Open Library and queued; the queue is committed as one batch at the end.
 */

import type { CuratedShelf } from "@/lib/config/catalog";
import { PLACEHOLDER_COVER } from "@/lib/util/covers";
import { createLogger, createTimer } from "@/lib/util/logger";
import { type Resolver, resolveBestMatch } from "./match";

const log = createLogger({ module: "seed" });

export interface CatalogEntry {
  title: string;
  author: string;
  genre: string;
  year: string;
  coverUrl: string;
  coverRef: string;
  isbn: string;
  editionId: string;
}

/**
 * Persistence boundary for seeding. Lookups and counts include entries
 * queued with insert() that have not been committed yet.
 */
export interface CatalogStore {
  findByTitleAuthor(title: string, author: string): Promise<CatalogEntry | null>;
  count(): Promise<number>;
  insert(entry: CatalogEntry): void;
  /** Persist every queued entry together; resolves to the number written */
  commitBatch(): Promise<number>;
  discardBatch(): void;
}

export interface SeedReport {
  /** True when the catalog already met the minimum and nothing ran */
  skipped: boolean;
  inserted: number;
  existing: number;
}

export async function ensureSeeded(
  store: CatalogStore,
  shelves: readonly CuratedShelf[],
  minimumTotal: number,
  resolve: Resolver = resolveBestMatch
): Promise<SeedReport> {
  const currentCount = await store.count();
  if (currentCount >= minimumTotal) {
    log.debug("Catalog already seeded", { currentCount, minimumTotal });
    return { skipped: true, inserted: 0, existing: currentCount };
  }

  const timer = createTimer("Catalog seeding", log);
  let queued = 0;
  let existing = 0;

  try {
    for (const shelf of shelves) {
      for (const item of shelf.items) {
        const title = item.title.trim();
        const author = item.author.trim();
        const genre = item.genre.trim() || "Other";

        if (!title || !author) continue;

        if (await store.findByTitleAuthor(title, author)) {
          existing++;
          continue;
        }

        const meta = await resolve(title, author);
        store.insert({
          title,
          author,
          genre,
          year: meta?.year.trim() ?? "",
          coverUrl: meta?.coverUrl.trim() || PLACEHOLDER_COVER,
          coverRef: meta?.coverRef.trim() ?? "",
          isbn: meta?.isbn.trim() ?? "",
          editionId: meta?.editionId.trim() ?? "",
        });
        queued++;
      }
      log.debug("Shelf processed", { shelf: shelf.name, queued });
    }
  } catch (error) {
    store.discardBatch();
    throw error;
  }

  const inserted = await store.commitBatch();
  timer.end({ queued, inserted, existing });
  log.info("Catalog seeded", { inserted, existing, minimumTotal });

  return { skipped: false, inserted, existing };
}

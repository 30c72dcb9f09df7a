import type { CatalogEntry, CatalogStore } from "@/lib/ingest/seed";

/**
 * In-process CatalogStore with the same queue-then-commit behaviour as the
 * Postgres store.
 */
export class MemoryCatalogStore implements CatalogStore {
  readonly committed: CatalogEntry[];
  private pending: CatalogEntry[] = [];
  commits = 0;

  constructor(initial: CatalogEntry[] = []) {
    this.committed = [...initial];
  }

  async findByTitleAuthor(title: string, author: string): Promise<CatalogEntry | null> {
    return (
      [...this.committed, ...this.pending].find((entry) => entry.title === title && entry.author === author) ??
      null
    );
  }

  async count(): Promise<number> {
    return this.committed.length + this.pending.length;
  }

  insert(entry: CatalogEntry): void {
    this.pending.push(entry);
  }

  async commitBatch(): Promise<number> {
    const batch = this.pending;
    this.pending = [];
    this.committed.push(...batch);
    this.commits++;
    return batch.length;
  }

  discardBatch(): void {
    this.pending = [];
  }

  get pendingCount(): number {
    return this.pending.length;
  }
}

export function catalogEntry(title: string, author: string, overrides: Partial<CatalogEntry> = {}): CatalogEntry {
  return {
    title,
    author,
    genre: "Other",
    year: "",
    coverUrl: "",
    coverRef: "",
    isbn: "",
    editionId: "",
    ...overrides,
  };
}

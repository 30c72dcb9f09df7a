/**
 * Catalog persistence: the "Book" table
 */

import type { QueryResultRow } from "pg";
import type { CatalogEntry, CatalogStore } from "@/lib/ingest/seed";
import { logger } from "@/lib/util/logger";
import { query, transaction } from "./pool";

export interface BookRow extends QueryResultRow {
  id: number;
  title: string;
  author: string;
  genre: string;
  year: string;
  cover_url: string;
  cover_ref: string;
  isbn: string;
  edition_id: string;
  created_at: Date;
}

export interface StoredBook extends CatalogEntry {
  id: number;
}

const BOOK_COLUMNS = `id, title, author, genre, year, cover_url, cover_ref, isbn, edition_id, created_at`;

export function toStoredBook(row: BookRow): StoredBook {
  return {
    id: row.id,
    title: row.title,
    author: row.author,
    genre: row.genre,
    year: row.year,
    coverUrl: row.cover_url,
    coverRef: row.cover_ref,
    isbn: row.isbn,
    editionId: row.edition_id,
  };
}

export async function findBookByTitleAuthor(title: string, author: string): Promise<StoredBook | null> {
  const { rows } = await query<BookRow>(
    `SELECT ${BOOK_COLUMNS} FROM "Book" WHERE title = $1 AND author = $2 LIMIT 1`,
    [title, author]
  );
  return rows[0] ? toStoredBook(rows[0]) : null;
}

export async function countBooks(): Promise<number> {
  const { rows } = await query<{ count: string }>(`SELECT COUNT(*) AS count FROM "Book"`);
  return parseInt(rows[0]?.count ?? "0", 10);
}

/**
 * All catalog rows in insertion order
 */
export async function listBooks(): Promise<StoredBook[]> {
  const { rows } = await query<BookRow>(`SELECT ${BOOK_COLUMNS} FROM "Book" ORDER BY id`);
  return rows.map(toStoredBook);
}

/**
 * Insert a book; null when (title, author) already exists
 */
export async function insertBook(entry: CatalogEntry): Promise<StoredBook | null> {
  const { rows } = await query<BookRow>(
    `
    INSERT INTO "Book" (title, author, genre, year, cover_url, cover_ref, isbn, edition_id)
    VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
    ON CONFLICT (title, author) DO NOTHING
    RETURNING ${BOOK_COLUMNS}
    `,
    [entry.title, entry.author, entry.genre, entry.year, entry.coverUrl, entry.coverRef, entry.isbn, entry.editionId]
  );
  return rows[0] ? toStoredBook(rows[0]) : null;
}

/**
 * CatalogStore backed by Postgres. Entries queued with insert() are written
 * in a single transaction by commitBatch().
 */
export class PgCatalogStore implements CatalogStore {
  private pending: CatalogEntry[] = [];

  async findByTitleAuthor(title: string, author: string): Promise<CatalogEntry | null> {
    const queued = this.pending.find((entry) => entry.title === title && entry.author === author);
    if (queued) return queued;
    return findBookByTitleAuthor(title, author);
  }

  async count(): Promise<number> {
    return (await countBooks()) + this.pending.length;
  }

  insert(entry: CatalogEntry): void {
    this.pending.push(entry);
  }

  async commitBatch(): Promise<number> {
    const batch = this.pending;
    this.pending = [];
    if (batch.length === 0) return 0;

    const inserted = await transaction(async (client) => {
      let written = 0;
      for (const entry of batch) {
        const result = await client.query(
          `
          INSERT INTO "Book" (title, author, genre, year, cover_url, cover_ref, isbn, edition_id)
          VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
          ON CONFLICT (title, author) DO NOTHING
          `,
          [entry.title, entry.author, entry.genre, entry.year, entry.coverUrl, entry.coverRef, entry.isbn, entry.editionId]
        );
        written += result.rowCount ?? 0;
      }
      return written;
    });

    if (inserted < batch.length) {
      logger.warn("Some catalog entries already existed at commit", {
        queued: batch.length,
        inserted,
      });
    }
    return inserted;
  }

  discardBatch(): void {
    this.pending = [];
  }
}

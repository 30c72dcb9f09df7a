/**
 * Catalog views shown to readers: demo books followed by catalog rows,
 * each with a resolved cover and a rating.
 */

import { type DemoBook, getDemoBooks } from "@/lib/config/catalog";
import { type StoredBook, findBookByTitleAuthor, insertBook, listBooks } from "@/lib/db/catalog";
import { getAverageRatings } from "@/lib/db/sql";
import { type ResolvedMetadata, type Resolver, resolveBestMatch } from "@/lib/ingest/match";
import { buildCoverUrl, coverOrPlaceholder } from "@/lib/util/covers";
import { matchesTitleOrAuthor } from "@/lib/util/text";
import { createLogger } from "@/lib/util/logger";
import { MatchCache } from "./cache";

const log = createLogger({ module: "catalog" });

const SUGGESTION_LIMIT = 8;

export interface BookView {
  title: string;
  author: string;
  genre: string;
  year: string;
  cover: string;
  rating: number;
}

export type DemoLookup = Promise<ResolvedMetadata | null>;

export interface CatalogDeps {
  resolve: Resolver;
  demoCovers: MatchCache<DemoLookup>;
}

/** Demo-book lookups started during this process's lifetime, settled or in flight */
export const demoCoverCache = new MatchCache<DemoLookup>();

const defaultDeps: CatalogDeps = {
  resolve: resolveBestMatch,
  demoCovers: demoCoverCache,
};

/**
 * Cover for a demo book. The lookup is cached before it settles, so
 * concurrent callers share one request; a failed lookup is forgotten.
 */
async function demoCover(book: DemoBook, deps: CatalogDeps): Promise<string> {
  let lookup = deps.demoCovers.get(book.title, book.author);
  if (lookup === undefined) {
    lookup = deps.resolve(book.title, book.author).catch((error: unknown) => {
      deps.demoCovers.delete(book.title, book.author);
      throw error;
    });
    deps.demoCovers.put(book.title, book.author, lookup);
  }
  const meta = await lookup;
  return coverOrPlaceholder(meta?.coverUrl, book.cover);
}

export function storedBookView(book: StoredBook, rating = 0): BookView {
  const built = buildCoverUrl({ coverRef: book.coverRef, isbn: book.isbn, editionId: book.editionId });
  return {
    title: book.title,
    author: book.author,
    genre: book.genre || "Other",
    year: book.year,
    cover: coverOrPlaceholder(built, book.coverUrl),
    rating,
  };
}

export async function listCatalogBooks(deps: CatalogDeps = defaultDeps): Promise<BookView[]> {
  const demo: BookView[] = [];
  for (const book of getDemoBooks()) {
    demo.push({
      title: book.title,
      author: book.author,
      genre: book.genre || "Other",
      year: "",
      cover: await demoCover(book, deps),
      rating: book.rating,
    });
  }

  const [rows, ratings] = await Promise.all([listBooks(), getAverageRatings()]);
  const stored = rows.map((row) => storedBookView(row, ratings.get(row.title) ?? 0));

  return [...demo, ...stored];
}

export async function browseBooks(
  filters: { genre?: string; q?: string } = {},
  deps: CatalogDeps = defaultDeps
): Promise<BookView[]> {
  const genre = (filters.genre ?? "").trim().toLowerCase();
  const q = filters.q ?? "";

  const books = await listCatalogBooks(deps);
  return books.filter(
    (book) => (!genre || book.genre.toLowerCase() === genre) && matchesTitleOrAuthor(book, q)
  );
}

export async function searchSuggestions(q: string, deps: CatalogDeps = defaultDeps): Promise<BookView[]> {
  if (!q.trim()) return [];
  const books = await listCatalogBooks(deps);
  return books.filter((book) => matchesTitleOrAuthor(book, q)).slice(0, SUGGESTION_LIMIT);
}

export async function topRatedBooks(q = "", deps: CatalogDeps = defaultDeps): Promise<BookView[]> {
  const books = await listCatalogBooks(deps);
  return books
    .filter((book) => matchesTitleOrAuthor(book, q))
    .sort((a, b) => b.rating - a.rating);
}

export async function findBookByTitle(title: string, deps: CatalogDeps = defaultDeps): Promise<BookView | null> {
  const needle = title.trim().toLowerCase();
  const books = await listCatalogBooks(deps);
  return books.find((book) => book.title.toLowerCase() === needle) ?? null;
}

/**
 * Ensure a catalog row exists for a book view; no metadata lookup
 */
export async function getOrCreateBookRow(book: BookView): Promise<StoredBook | null> {
  const title = book.title.trim();
  const author = book.author.trim();
  if (!title || !author) return null;

  const existing = await findBookByTitleAuthor(title, author);
  if (existing) return existing;

  const created = await insertBook({
    title,
    author,
    genre: book.genre || "Other",
    year: book.year,
    coverUrl: coverOrPlaceholder(book.cover),
    coverRef: "",
    isbn: "",
    editionId: "",
  });
  return created ?? findBookByTitleAuthor(title, author);
}

export interface NewBookInput {
  title: string;
  author: string;
  genre?: string;
  year?: string;
  cover?: string;
}

export type AddBookResult =
  | { status: "created"; book: StoredBook }
  | { status: "exists"; book: StoredBook };

export async function addBook(input: NewBookInput, resolve: Resolver = resolveBestMatch): Promise<AddBookResult> {
  const title = input.title.trim();
  const author = input.author.trim();
  const genre = (input.genre ?? "").trim() || "Other";
  const year = (input.year ?? "").trim();
  const cover = (input.cover ?? "").trim();

  const existing = await findBookByTitleAuthor(title, author);
  if (existing) return { status: "exists", book: existing };

  const meta: ResolvedMetadata | null = await resolve(title, author);

  const created = await insertBook({
    title,
    author,
    genre,
    year: year || meta?.year || "",
    coverUrl: coverOrPlaceholder(meta?.coverUrl, cover),
    coverRef: meta?.coverRef ?? "",
    isbn: meta?.isbn ?? "",
    editionId: meta?.editionId ?? "",
  });

  if (!created) {
    // Lost a race with a concurrent insert of the same book
    const raced = await findBookByTitleAuthor(title, author);
    if (raced) return { status: "exists", book: raced };
    throw new Error(`Book "${title}" by ${author} could not be stored`);
  }

  log.info("Book added", { id: created.id, title, author, coverRef: created.coverRef });
  return { status: "created", book: created };
}

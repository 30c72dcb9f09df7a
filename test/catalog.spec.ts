import { beforeEach, describe, expect, it, vi } from "vitest";
import { getDemoBooks } from "@/lib/config/catalog";
import { type StoredBook, findBookByTitleAuthor, insertBook, listBooks } from "@/lib/db/catalog";
import { getAverageRatings } from "@/lib/db/sql";
import {
  type CatalogDeps,
  type DemoLookup,
  addBook,
  browseBooks,
  findBookByTitle,
  listCatalogBooks,
  searchSuggestions,
  storedBookView,
  topRatedBooks,
} from "@/lib/features/catalog";
import { MatchCache } from "@/lib/features/cache";
import type { Resolver } from "@/lib/ingest/match";
import { PLACEHOLDER_COVER } from "@/lib/util/covers";

vi.mock("@/lib/db/catalog", () => ({
  findBookByTitleAuthor: vi.fn(),
  insertBook: vi.fn(),
  listBooks: vi.fn(),
}));

vi.mock("@/lib/db/sql", () => ({
  getAverageRatings: vi.fn(),
}));

function storedBook(id: number, title: string, author: string, overrides: Partial<StoredBook> = {}): StoredBook {
  return {
    id,
    title,
    author,
    genre: "Fantasy",
    year: "",
    coverUrl: "",
    coverRef: "",
    isbn: "",
    editionId: "",
    ...overrides,
  };
}

function deps(resolve: Resolver = async () => null): CatalogDeps {
  return { resolve, demoCovers: new MatchCache<DemoLookup>() };
}

beforeEach(() => {
  vi.mocked(listBooks).mockResolvedValue([
    storedBook(1, "Fourth Wing", "Rebecca Yarros", { coverRef: "55" }),
    storedBook(2, "The Silent Patient", "Alex Michaelides", { genre: "Mystery" }),
  ]);
  vi.mocked(getAverageRatings).mockResolvedValue(new Map([["The Silent Patient", 4.9]]));
  vi.mocked(findBookByTitleAuthor).mockReset();
  vi.mocked(insertBook).mockReset();
});

describe("storedBookView", () => {
  it("builds the cover from identifiers before the stored url", () => {
    const book = storedBook(1, "A", "B", { coverRef: "9", coverUrl: "https://example.test/a.jpg" });
    expect(storedBookView(book).cover).toBe("https://covers.openlibrary.org/b/id/9-L.jpg");
    expect(storedBookView({ ...book, coverRef: "" }).cover).toBe("https://example.test/a.jpg");
    expect(storedBookView({ ...book, coverRef: "", coverUrl: "" }).cover).toBe(PLACEHOLDER_COVER);
  });

  it("defaults a blank genre", () => {
    expect(storedBookView(storedBook(1, "A", "B", { genre: "" }), 3)).toMatchObject({ genre: "Other", rating: 3 });
  });
});

describe("listCatalogBooks", () => {
  it("lists demo books first, then catalog rows with their ratings", async () => {
    const books = await listCatalogBooks(deps());
    const demoCount = getDemoBooks().length;

    expect(books).toHaveLength(demoCount + 2);
    expect(books[0].title).toBe("The Great Gatsby");
    expect(books[demoCount]).toMatchObject({
      title: "Fourth Wing",
      cover: "https://covers.openlibrary.org/b/id/55-L.jpg",
      rating: 0,
    });
    expect(books[demoCount + 1]).toMatchObject({ title: "The Silent Patient", rating: 4.9 });
  });

  it("resolves each demo cover once per cache", async () => {
    const resolve = vi.fn<Resolver>(async () => ({
      coverUrl: "https://covers.openlibrary.org/b/id/1-L.jpg",
      coverRef: "1",
      isbn: "",
      editionId: "",
      year: "",
    }));
    const shared = deps(resolve);

    await listCatalogBooks(shared);
    const books = await listCatalogBooks(shared);

    expect(resolve).toHaveBeenCalledTimes(getDemoBooks().length);
    expect(books[0].cover).toBe("https://covers.openlibrary.org/b/id/1-L.jpg");
  });

  it("shares in-flight demo lookups between concurrent listings", async () => {
    const resolve = vi.fn<Resolver>(async () => null);
    const shared = deps(resolve);

    const [first, second] = await Promise.all([listCatalogBooks(shared), listCatalogBooks(shared)]);

    expect(resolve).toHaveBeenCalledTimes(getDemoBooks().length);
    expect(first.map((book) => book.cover)).toEqual(second.map((book) => book.cover));
  });

  it("retries a demo lookup that failed", async () => {
    const resolve = vi
      .fn<Resolver>(async () => null)
      .mockRejectedValueOnce(new Error("lookup failed"));
    const shared = deps(resolve);

    await expect(listCatalogBooks(shared)).rejects.toThrow("lookup failed");
    const books = await listCatalogBooks(shared);

    expect(books[0].cover).toBe(getDemoBooks()[0].cover);
    expect(resolve).toHaveBeenCalledTimes(getDemoBooks().length + 1);
  });

  it("keeps the configured demo cover when nothing resolves", async () => {
    const books = await listCatalogBooks(deps());
    expect(books[0].cover).toBe(getDemoBooks()[0].cover);
  });
});

describe("catalog queries", () => {
  it("filters by genre ignoring case", async () => {
    const books = await browseBooks({ genre: "mystery" }, deps());
    expect(books.map((book) => book.title)).toEqual(["The Silent Patient"]);
  });

  it("filters by title or author text", async () => {
    const books = await browseBooks({ q: "yarros" }, deps());
    expect(books.map((book) => book.title)).toEqual(["Fourth Wing"]);
  });

  it("returns no suggestions for a blank query", async () => {
    expect(await searchSuggestions("  ", deps())).toEqual([]);
  });

  it("caps suggestions at eight", async () => {
    const books = await searchSuggestions("e", deps());
    expect(books).toHaveLength(8);
  });

  it("orders top rated books by rating", async () => {
    const books = await topRatedBooks("", deps());
    expect(books[0].title).toBe("The Silent Patient");
  });

  it("finds a book by title ignoring case", async () => {
    expect((await findBookByTitle("fourth wing", deps()))?.author).toBe("Rebecca Yarros");
    expect(await findBookByTitle("Unknown", deps())).toBeNull();
  });
});

describe("addBook", () => {
  it("reports an existing book without a lookup", async () => {
    const existing = storedBook(7, "Emma", "Jane Austen");
    vi.mocked(findBookByTitleAuthor).mockResolvedValue(existing);
    const resolve = vi.fn<Resolver>(async () => null);

    expect(await addBook({ title: " Emma ", author: "Jane Austen" }, resolve)).toEqual({
      status: "exists",
      book: existing,
    });
    expect(resolve).not.toHaveBeenCalled();
    expect(insertBook).not.toHaveBeenCalled();
  });

  it("stores resolved metadata for a new book", async () => {
    vi.mocked(findBookByTitleAuthor).mockResolvedValue(null);
    vi.mocked(insertBook).mockImplementation(async (entry) => ({ id: 8, ...entry }));
    const resolve = vi.fn<Resolver>(async () => ({
      coverUrl: "https://covers.openlibrary.org/b/id/5-L.jpg",
      coverRef: "5",
      isbn: "978",
      editionId: "OL5M",
      year: "1815",
    }));

    const result = await addBook({ title: "Emma", author: "Jane Austen" }, resolve);

    expect(result.status).toBe("created");
    expect(insertBook).toHaveBeenCalledWith({
      title: "Emma",
      author: "Jane Austen",
      genre: "Other",
      year: "1815",
      coverUrl: "https://covers.openlibrary.org/b/id/5-L.jpg",
      coverRef: "5",
      isbn: "978",
      editionId: "OL5M",
    });
  });

  it("falls back to the given cover, then the placeholder", async () => {
    vi.mocked(findBookByTitleAuthor).mockResolvedValue(null);
    vi.mocked(insertBook).mockImplementation(async (entry) => ({ id: 9, ...entry }));

    const given = await addBook(
      { title: "Emma", author: "Jane Austen", cover: "https://example.test/emma.jpg", year: "1815" },
      async () => null
    );
    const none = await addBook({ title: "Persuasion", author: "Jane Austen" }, async () => null);

    expect(given.book.coverUrl).toBe("https://example.test/emma.jpg");
    expect(given.book.year).toBe("1815");
    expect(none.book.coverUrl).toBe(PLACEHOLDER_COVER);
  });
});

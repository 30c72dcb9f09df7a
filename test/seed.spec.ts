import { afterEach, describe, expect, it, vi } from "vitest";
import type { CuratedShelf } from "@/lib/config/catalog";
import type { Resolver } from "@/lib/ingest/match";
import { ensureSeeded } from "@/lib/ingest/seed";
import { PLACEHOLDER_COVER } from "@/lib/util/covers";
import { MemoryCatalogStore, catalogEntry } from "./helpers/memoryCatalogStore";
import { calledUrls, stubSearch } from "./helpers/openLibrary";

function shelf(name: string, items: Array<[string, string, string]>): CuratedShelf {
  return { name, items: items.map(([title, author, genre]) => ({ title, author, genre })) };
}

const noMatch = () => vi.fn<Resolver>(async () => null);

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("ensureSeeded", () => {
  it("does nothing when the catalog already meets the minimum", async () => {
    const store = new MemoryCatalogStore([catalogEntry("A", "X"), catalogEntry("B", "Y")]);
    const resolve = noMatch();

    const report = await ensureSeeded(store, [shelf("Classics", [["Dracula", "Bram Stoker", "Classics"]])], 2, resolve);

    expect(report).toEqual({ skipped: true, inserted: 0, existing: 2 });
    expect(resolve).not.toHaveBeenCalled();
    expect(store.commits).toBe(0);
  });

  it("seeds one book end to end with a resolved cover", async () => {
    const fetchMock = stubSearch([
      { title: "1984", author_name: ["George Orwell"], cover_i: 123, first_publish_year: 1949 },
    ]);
    const store = new MemoryCatalogStore();

    const report = await ensureSeeded(store, [shelf("Classics", [["1984", "George Orwell", "Classics"]])], 1);

    expect(report).toEqual({ skipped: false, inserted: 1, existing: 0 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(calledUrls(fetchMock)[0].searchParams.get("q")).toBe("1984 George Orwell");
    expect(store.committed).toEqual([
      {
        title: "1984",
        author: "George Orwell",
        genre: "Classics",
        year: "1949",
        coverUrl: "https://covers.openlibrary.org/b/id/123-L.jpg",
        coverRef: "123",
        isbn: "",
        editionId: "",
      },
    ]);
  });

  it("uses the placeholder cover when nothing could be resolved", async () => {
    stubSearch([{ title: "1984", author_name: ["George Orwell"] }]);
    const store = new MemoryCatalogStore();

    await ensureSeeded(store, [shelf("Classics", [["1984", "George Orwell", "Classics"]])], 1);

    expect(store.committed).toHaveLength(1);
    expect(store.committed[0].coverUrl).toBe(PLACEHOLDER_COVER);
    expect(store.committed[0].genre).toBe("Classics");
  });

  it("skips books already in the catalog without looking them up", async () => {
    const store = new MemoryCatalogStore([catalogEntry("1984", "George Orwell")]);
    const resolve = noMatch();

    const report = await ensureSeeded(
      store,
      [shelf("Classics", [["1984", "George Orwell", "Classics"], ["Dracula", "Bram Stoker", "Classics"]])],
      10,
      resolve
    );

    expect(report).toEqual({ skipped: false, inserted: 1, existing: 1 });
    expect(resolve).toHaveBeenCalledTimes(1);
    expect(resolve).toHaveBeenCalledWith("Dracula", "Bram Stoker");
  });

  it("compares titles and authors case-sensitively", async () => {
    const store = new MemoryCatalogStore([catalogEntry("dracula", "bram stoker")]);
    const resolve = noMatch();

    await ensureSeeded(store, [shelf("Classics", [["Dracula", "Bram Stoker", "Classics"]])], 10, resolve);

    expect(resolve).toHaveBeenCalledTimes(1);
    expect(store.committed.map((e) => e.title)).toEqual(["dracula", "Dracula"]);
  });

  it("is idempotent across repeated runs", async () => {
    const store = new MemoryCatalogStore();
    const resolve = noMatch();
    const shelves = [
      shelf("Classics", [["Dracula", "Bram Stoker", "Classics"], ["Emma", "Jane Austen", "Classics"]]),
      shelf("Trending", [["Iron Flame", "Rebecca Yarros", "Fantasy"]]),
    ];

    await ensureSeeded(store, shelves, 100, resolve);
    const second = await ensureSeeded(store, shelves, 100, resolve);

    expect(second).toEqual({ skipped: false, inserted: 0, existing: 3 });
    expect(resolve).toHaveBeenCalledTimes(3);
    expect(store.committed.map((e) => `${e.title}|${e.author}`)).toEqual([
      "Dracula|Bram Stoker",
      "Emma|Jane Austen",
      "Iron Flame|Rebecca Yarros",
    ]);
  });

  it("keeps going past the minimum once triggered", async () => {
    const store = new MemoryCatalogStore();

    const report = await ensureSeeded(
      store,
      [shelf("Mixed", [["A", "X", "Other"], ["B", "Y", "Other"], ["C", "Z", "Other"]])],
      1,
      noMatch()
    );

    expect(report.inserted).toBe(3);
    expect(store.committed).toHaveLength(3);
  });

  it("queues a book listed on two shelves only once", async () => {
    const store = new MemoryCatalogStore();
    const resolve = noMatch();

    await ensureSeeded(
      store,
      [
        shelf("Classics", [["Jane Eyre", "Charlotte Brontë", "Classics"]]),
        shelf("Romance", [["Jane Eyre", "Charlotte Brontë", "Romance"]]),
      ],
      10,
      resolve
    );

    expect(resolve).toHaveBeenCalledTimes(1);
    expect(store.committed).toHaveLength(1);
    expect(store.committed[0].genre).toBe("Classics");
  });

  it("trims input, defaults blank genres and skips incomplete items", async () => {
    const store = new MemoryCatalogStore();
    const resolve = noMatch();

    await ensureSeeded(
      store,
      [shelf("Loose", [[" Dracula ", "Bram Stoker ", "  "], ["Untitled", "   ", "Horror"]])],
      10,
      resolve
    );

    expect(resolve).toHaveBeenCalledTimes(1);
    expect(resolve).toHaveBeenCalledWith("Dracula", "Bram Stoker");
    expect(store.committed).toEqual([
      catalogEntry("Dracula", "Bram Stoker", { genre: "Other", coverUrl: PLACEHOLDER_COVER }),
    ]);
  });

  it("persists nothing when a lookup throws mid-pass", async () => {
    const store = new MemoryCatalogStore();
    const resolve = vi.fn<Resolver>(async (title) => {
      if (title === "B") throw new Error("database went away");
      return null;
    });

    await expect(
      ensureSeeded(store, [shelf("Mixed", [["A", "X", "Other"], ["B", "Y", "Other"]])], 5, resolve)
    ).rejects.toThrow("database went away");

    expect(store.committed).toEqual([]);
    expect(store.pendingCount).toBe(0);
    expect(store.commits).toBe(0);
  });
});

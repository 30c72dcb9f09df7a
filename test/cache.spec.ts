import { describe, expect, it } from "vitest";
import { MatchCache } from "@/lib/features/cache";

describe("MatchCache", () => {
  it("keys entries by title and author together", () => {
    const cache = new MatchCache<string>();
    cache.put("Emma", "Jane Austen", "a");
    cache.put("Emma", "Someone Else", "b");

    expect(cache.get("Emma", "Jane Austen")).toBe("a");
    expect(cache.get("Emma", "Someone Else")).toBe("b");
    expect(cache.has("Emma", "")).toBe(false);
    expect(cache.size).toBe(2);
  });

  it("does not confuse pairs that join to the same text", () => {
    const cache = new MatchCache<number>();
    cache.put("a b", "c", 1);
    expect(cache.has("a", "b c")).toBe(false);
  });

  it("evicts the least recently used entry", () => {
    const cache = new MatchCache<number>(2);
    cache.put("A", "x", 1);
    cache.put("B", "x", 2);
    cache.get("A", "x");
    cache.put("C", "x", 3);

    expect(cache.has("A", "x")).toBe(true);
    expect(cache.has("B", "x")).toBe(false);
    expect(cache.has("C", "x")).toBe(true);
    expect(cache.size).toBe(2);
  });

  it("overwrites without growing", () => {
    const cache = new MatchCache<number>(2);
    cache.put("A", "x", 1);
    cache.put("A", "x", 2);
    expect(cache.get("A", "x")).toBe(2);
    expect(cache.size).toBe(1);
  });

  it("deletes a single entry", () => {
    const cache = new MatchCache<number>();
    cache.put("A", "x", 1);
    cache.put("B", "x", 2);

    expect(cache.delete("A", "x")).toBe(true);
    expect(cache.delete("A", "x")).toBe(false);
    expect(cache.has("B", "x")).toBe(true);
    expect(cache.size).toBe(1);
  });

  it("empties on clear", () => {
    const cache = new MatchCache<number>();
    cache.put("A", "x", 1);
    cache.clear();
    expect(cache.size).toBe(0);
  });

  it("rejects a non-positive size", () => {
    expect(() => new MatchCache(0)).toThrow(RangeError);
  });
});

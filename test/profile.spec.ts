import { describe, expect, it, vi } from "vitest";
import { reviewerName } from "@/lib/features/reviews";
import { normalizeProfileChanges } from "@/lib/features/userProfile";

vi.mock("@/lib/db/sql", () => ({
  getReader: vi.fn(),
  getReviewsByUser: vi.fn(),
  getReviewsForTitle: vi.fn(),
  getRatingSummary: vi.fn(),
  insertReview: vi.fn(),
  upsertReader: vi.fn(),
}));

describe("normalizeProfileChanges", () => {
  it("keeps stored values for blank fields and prefixes handles", () => {
    expect(normalizeProfileChanges({ name: "  ", handle: "reader", bio: ` ${"x".repeat(250)}` })).toEqual({
      name: null,
      handle: "@reader",
      bio: "x".repeat(200),
    });
  });

  it("trims a provided name", () => {
    expect(normalizeProfileChanges({ name: " Ada " })).toEqual({ name: "Ada", handle: null, bio: "" });
  });
});

describe("reviewerName", () => {
  it("prefers the handle, then the name, then the user id", () => {
    expect(reviewerName({ readerHandle: "@ada", readerName: "Ada", userId: "u1" })).toBe("@ada");
    expect(reviewerName({ readerHandle: "", readerName: "Ada", userId: "u1" })).toBe("Ada");
    expect(reviewerName({ readerHandle: "", readerName: "", userId: "u1" })).toBe("u1");
  });
});

import { type ReviewRecord, getReviewsForTitle, getRatingSummary, insertReview } from "@/lib/db/sql";
import { timeAgo } from "@/lib/util/text";
import type { BookView } from "./catalog";

export const DETAIL_REVIEW_LIMIT = 25;

export interface ReviewView {
  id: number;
  user: string;
  rating: number;
  text: string;
  age: string;
}

export function reviewerName(review: Pick<ReviewRecord, "readerHandle" | "readerName" | "userId">): string {
  const name = (review.readerHandle || review.readerName || review.userId || "").trim();
  return name || "reader";
}

export function toReviewView(review: ReviewRecord, now: Date = new Date()): ReviewView {
  return {
    id: review.id,
    user: reviewerName(review),
    rating: review.rating,
    text: review.text.trim(),
    age: timeAgo(review.createdAt, now),
  };
}

export async function getBookReviews(
  bookTitle: string,
  limit?: number
): Promise<{ reviews: ReviewView[]; average: number; count: number }> {
  const [records, summary] = await Promise.all([
    getReviewsForTitle(bookTitle, limit),
    getRatingSummary(bookTitle),
  ]);
  const now = new Date();
  return {
    reviews: records.map((record) => toReviewView(record, now)),
    average: summary.average,
    count: summary.count,
  };
}

/**
 * Store a review against a catalog book, keeping its display author and cover
 */
export async function addReview(
  userId: string,
  book: BookView,
  input: { rating: number; text: string }
): Promise<number> {
  return insertReview({
    userId,
    bookTitle: book.title,
    bookAuthor: book.author,
    bookCover: book.cover,
    rating: input.rating,
    text: input.text.trim(),
  });
}

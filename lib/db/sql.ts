/**
 * Reviews, favourites, viewing history and reader profiles
 */

import type { QueryResultRow } from "pg";
import { type BookRow, type StoredBook, toStoredBook } from "./catalog";
import { query, transaction } from "./pool";

export interface ReviewRecord {
  id: number;
  userId: string;
  bookTitle: string;
  bookAuthor: string;
  bookCover: string;
  rating: number;
  text: string;
  createdAt: Date;
  readerName: string | null;
  readerHandle: string | null;
}

export interface NewReview {
  userId: string;
  bookTitle: string;
  bookAuthor: string;
  bookCover: string;
  rating: number;
  text: string;
}

export interface Reader {
  userId: string;
  name: string;
  handle: string;
  bio: string;
}

export interface ViewedBook extends StoredBook {
  viewedAt: Date;
}

interface ReviewRow extends QueryResultRow {
  id: number;
  user_id: string;
  book_title: string;
  book_author: string;
  book_cover: string;
  rating: number;
  text: string;
  created_at: Date;
  reader_name: string | null;
  reader_handle: string | null;
}

interface ReaderRow extends QueryResultRow {
  user_id: string;
  name: string;
  handle: string;
  bio: string;
}

const REVIEW_SELECT = `
  SELECT r.id, r.user_id, r.book_title, r.book_author, r.book_cover, r.rating, r.text, r.created_at,
         rd.name AS reader_name, rd.handle AS reader_handle
  FROM "Review" r
  LEFT JOIN "Reader" rd ON rd.user_id = r.user_id
`;

function toReview(row: ReviewRow): ReviewRecord {
  return {
    id: row.id,
    userId: row.user_id,
    bookTitle: row.book_title,
    bookAuthor: row.book_author,
    bookCover: row.book_cover,
    rating: row.rating,
    text: row.text,
    createdAt: row.created_at,
    readerName: row.reader_name,
    readerHandle: row.reader_handle,
  };
}

// ============================================================================
// Reviews
// ============================================================================

/**
 * Average review rating per book title
 */
export async function getAverageRatings(): Promise<Map<string, number>> {
  const { rows } = await query<{ book_title: string; avg_rating: string }>(
    `SELECT book_title, AVG(rating) AS avg_rating FROM "Review" GROUP BY book_title`
  );
  return new Map(rows.map((r) => [r.book_title, parseFloat(r.avg_rating)]));
}

export async function getRatingSummary(bookTitle: string): Promise<{ average: number; count: number }> {
  const { rows } = await query<{ avg_rating: string | null; count: string }>(
    `SELECT AVG(rating) AS avg_rating, COUNT(*) AS count FROM "Review" WHERE book_title = $1`,
    [bookTitle]
  );
  return {
    average: rows[0]?.avg_rating ? parseFloat(rows[0].avg_rating) : 0,
    count: parseInt(rows[0]?.count ?? "0", 10),
  };
}

/**
 * Reviews of a book, newest first
 */
export async function getReviewsForTitle(bookTitle: string, limit?: number): Promise<ReviewRecord[]> {
  const params: unknown[] = [bookTitle];
  let limitClause = "";
  if (limit !== undefined) {
    params.push(limit);
    limitClause = `LIMIT $2`;
  }

  const { rows } = await query<ReviewRow>(
    `${REVIEW_SELECT} WHERE r.book_title = $1 ORDER BY r.created_at DESC, r.id DESC ${limitClause}`,
    params
  );
  return rows.map(toReview);
}

export async function getReviewsByUser(userId: string, limit?: number): Promise<ReviewRecord[]> {
  const params: unknown[] = [userId];
  let limitClause = "";
  if (limit !== undefined) {
    params.push(limit);
    limitClause = `LIMIT $2`;
  }

  const { rows } = await query<ReviewRow>(
    `${REVIEW_SELECT} WHERE r.user_id = $1 ORDER BY r.created_at DESC, r.id DESC ${limitClause}`,
    params
  );
  return rows.map(toReview);
}

export async function insertReview(review: NewReview): Promise<number> {
  const { rows } = await query<{ id: number }>(
    `
    INSERT INTO "Review" (user_id, book_title, book_author, book_cover, rating, text)
    VALUES ($1, $2, $3, $4, $5, $6)
    RETURNING id
    `,
    [review.userId, review.bookTitle, review.bookAuthor, review.bookCover, review.rating, review.text]
  );
  return rows[0].id;
}

// ============================================================================
// Favourites
// ============================================================================

export async function bookExists(bookId: number): Promise<boolean> {
  const { rows } = await query<{ id: number }>(`SELECT id FROM "Book" WHERE id = $1`, [bookId]);
  return rows.length > 0;
}

/**
 * Add or remove a favourite; resolves to whether the book is now a favourite
 */
export async function toggleFavourite(userId: string, bookId: number): Promise<boolean> {
  return transaction(async (client) => {
    const removed = await client.query(
      `DELETE FROM "Favourite" WHERE user_id = $1 AND book_id = $2`,
      [userId, bookId]
    );
    if ((removed.rowCount ?? 0) > 0) return false;

    await client.query(
      `INSERT INTO "Favourite" (user_id, book_id) VALUES ($1, $2) ON CONFLICT (user_id, book_id) DO NOTHING`,
      [userId, bookId]
    );
    return true;
  });
}

/**
 * Favourite books, most recently favourited first
 */
export async function getFavouriteBooks(userId: string): Promise<StoredBook[]> {
  const { rows } = await query<BookRow>(
    `
    SELECT b.id, b.title, b.author, b.genre, b.year, b.cover_url, b.cover_ref, b.isbn, b.edition_id, b.created_at
    FROM "Favourite" f
    JOIN "Book" b ON b.id = f.book_id
    WHERE f.user_id = $1
    ORDER BY f.created_at DESC, f.id DESC
    `,
    [userId]
  );
  return rows.map(toStoredBook);
}

// ============================================================================
// History
// ============================================================================

export async function recordView(userId: string, bookId: number): Promise<void> {
  await query(
    `
    INSERT INTO "History" (user_id, book_id, viewed_at)
    VALUES ($1, $2, NOW())
    ON CONFLICT (user_id, book_id) DO UPDATE SET viewed_at = NOW()
    `,
    [userId, bookId]
  );
}

export async function getViewHistory(userId: string, limit = 100): Promise<ViewedBook[]> {
  const { rows } = await query<BookRow & { viewed_at: Date }>(
    `
    SELECT b.id, b.title, b.author, b.genre, b.year, b.cover_url, b.cover_ref, b.isbn, b.edition_id, b.created_at,
           h.viewed_at
    FROM "History" h
    JOIN "Book" b ON b.id = h.book_id
    WHERE h.user_id = $1
    ORDER BY h.viewed_at DESC
    LIMIT $2
    `,
    [userId, limit]
  );
  return rows.map((row) => ({ ...toStoredBook(row), viewedAt: row.viewed_at }));
}

// ============================================================================
// Readers
// ============================================================================

export async function getReader(userId: string): Promise<Reader | null> {
  const { rows } = await query<ReaderRow>(
    `SELECT user_id, name, handle, bio FROM "Reader" WHERE user_id = $1`,
    [userId]
  );
  const row = rows[0];
  return row ? { userId: row.user_id, name: row.name, handle: row.handle, bio: row.bio } : null;
}

/**
 * Create or update a reader. Null name or handle keeps the stored value.
 */
export async function upsertReader(
  userId: string,
  changes: { name: string | null; handle: string | null; bio: string }
): Promise<Reader> {
  const { rows } = await query<ReaderRow>(
    `
    INSERT INTO "Reader" (user_id, name, handle, bio, updated_at)
    VALUES ($1, COALESCE($2, ''), COALESCE($3, ''), $4, NOW())
    ON CONFLICT (user_id) DO UPDATE SET
      name = COALESCE($2, "Reader".name),
      handle = COALESCE($3, "Reader".handle),
      bio = EXCLUDED.bio,
      updated_at = NOW()
    RETURNING user_id, name, handle, bio
    `,
    [userId, changes.name, changes.handle, changes.bio]
  );
  const row = rows[0];
  return { userId: row.user_id, name: row.name, handle: row.handle, bio: row.bio };
}

// ============================================================================
// Follows
// ============================================================================

export interface Person {
  name: string;
  handle: string;
}

export async function findReaderByHandle(handle: string): Promise<Reader | null> {
  const { rows } = await query<ReaderRow>(
    `SELECT user_id, name, handle, bio FROM "Reader" WHERE handle = $1 ORDER BY user_id LIMIT 1`,
    [handle]
  );
  const row = rows[0];
  return row ? { userId: row.user_id, name: row.name, handle: row.handle, bio: row.bio } : null;
}

/**
 * People the reader follows, in the order they were followed
 */
export async function getFollowing(userId: string): Promise<Person[]> {
  const { rows } = await query<{ name: string; handle: string }>(
    `
    SELECT followee_name AS name, followee_handle AS handle
    FROM "Follow"
    WHERE follower_id = $1
    ORDER BY created_at, id
    `,
    [userId]
  );
  return rows.map((row) => ({ name: row.name, handle: row.handle }));
}

/**
 * Readers following this reader's handle; empty until the reader has a handle
 */
export async function getFollowers(userId: string): Promise<Person[]> {
  const { rows } = await query<{ name: string; handle: string }>(
    `
    SELECT COALESCE(NULLIF(r.name, ''), f.follower_id) AS name, COALESCE(r.handle, '') AS handle
    FROM "Follow" f
    JOIN "Reader" me ON me.user_id = $1 AND me.handle <> '' AND f.followee_handle = me.handle
    LEFT JOIN "Reader" r ON r.user_id = f.follower_id
    ORDER BY f.created_at, f.id
    `,
    [userId]
  );
  return rows.map((row) => ({ name: row.name, handle: row.handle }));
}

/**
 * Follow a handle, or unfollow it if already followed; resolves to whether it is now followed
 */
export async function toggleFollow(userId: string, followee: Person): Promise<boolean> {
  return transaction(async (client) => {
    const removed = await client.query(
      `DELETE FROM "Follow" WHERE follower_id = $1 AND followee_handle = $2`,
      [userId, followee.handle]
    );
    if ((removed.rowCount ?? 0) > 0) return false;

    await client.query(
      `
      INSERT INTO "Follow" (follower_id, followee_handle, followee_name)
      VALUES ($1, $2, $3)
      ON CONFLICT (follower_id, followee_handle) DO NOTHING
      `,
      [userId, followee.handle, followee.name]
    );
    return true;
  });
}

/**
 * Remove the follower with this handle; false when no such follower exists
 */
export async function removeFollower(userId: string, followerHandle: string): Promise<boolean> {
  const result = await query(
    `
    DELETE FROM "Follow" f
    USING "Reader" me, "Reader" r
    WHERE me.user_id = $1
      AND me.handle <> ''
      AND f.followee_handle = me.handle
      AND r.user_id = f.follower_id
      AND r.handle = $2
    `,
    [userId, followerHandle]
  );
  return (result.rowCount ?? 0) > 0;
}

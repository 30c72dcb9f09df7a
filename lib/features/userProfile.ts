/**
 * Reader profiles: name, handle, bio and recent reviews
 */

import { type Reader, type ReviewRecord, getReader, getReviewsByUser, upsertReader } from "@/lib/db/sql";
import { normalizeHandle } from "@/lib/util/text";
import { type ReviewView, toReviewView } from "./reviews";

const RECENT_REVIEW_LIMIT = 6;
const MAX_BIO_LENGTH = 200;

export type ReaderReviewView = ReviewView & { bookTitle: string; bookCover: string };

export interface ProfileView {
  userId: string;
  name: string;
  handle: string;
  bio: string;
  recentReviews: ReaderReviewView[];
}

export interface ProfileChanges {
  name?: string;
  handle?: string;
  bio?: string;
}

function toReaderReviewViews(reviews: ReviewRecord[]): ReaderReviewView[] {
  const now = new Date();
  return reviews.map((review) => ({
    ...toReviewView(review, now),
    bookTitle: review.bookTitle,
    bookCover: review.bookCover,
  }));
}

export async function getProfile(userId: string): Promise<ProfileView> {
  const [reader, reviews] = await Promise.all([
    getReader(userId),
    getReviewsByUser(userId, RECENT_REVIEW_LIMIT),
  ]);

  return {
    userId,
    name: reader?.name ?? "",
    handle: reader?.handle ?? "",
    bio: reader?.bio ?? "",
    recentReviews: toReaderReviewViews(reviews),
  };
}

/**
 * Every review the reader has written, newest first
 */
export async function getReaderReviews(userId: string): Promise<ReaderReviewView[]> {
  return toReaderReviewViews(await getReviewsByUser(userId));
}

/**
 * Normalise profile edits: blank name or handle keeps the stored value,
 * handles gain a leading "@", bios are capped.
 */
export function normalizeProfileChanges(changes: ProfileChanges): {
  name: string | null;
  handle: string | null;
  bio: string;
} {
  const name = (changes.name ?? "").trim();
  const handle = normalizeHandle(changes.handle ?? "");
  return {
    name: name || null,
    handle: handle || null,
    bio: (changes.bio ?? "").trim().slice(0, MAX_BIO_LENGTH),
  };
}

export async function updateProfile(userId: string, changes: ProfileChanges): Promise<Reader> {
  return upsertReader(userId, normalizeProfileChanges(changes));
}

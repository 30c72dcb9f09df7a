/**
 * Favourites Management API
 * Toggle and list the acting reader's favourite books
 */

import { NextRequest, NextResponse } from "next/server";
import { z } from "zod";
import { getEnv } from "@/lib/config/env";
import { bookExists, getFavouriteBooks, toggleFavourite } from "@/lib/db/sql";
import { storedBookView } from "@/lib/features/catalog";
import { matchesTitleOrAuthor } from "@/lib/util/text";
import { logger } from "@/lib/util/logger";

export const dynamic = "force-dynamic";

const toggleSchema = z.object({
  bookId: z.coerce.number().int().positive(),
  userId: z.string().trim().min(1).optional(),
});

/**
 * GET - Favourite books, most recent first
 */
export async function GET(request: NextRequest) {
  const searchParams = request.nextUrl.searchParams;
  const userId = searchParams.get("user_id") ?? getEnv().DEFAULT_USER_ID;
  const q = searchParams.get("q")?.trim() ?? "";

  try {
    const rows = await getFavouriteBooks(userId);
    const books = rows
      .filter((row) => matchesTitleOrAuthor(row, q))
      .map((row) => ({ id: row.id, ...storedBookView(row) }));

    return NextResponse.json({ books, bookIds: rows.map((row) => row.id), q });
  } catch (error) {
    logger.error("Failed to list favourites", { error: String(error), userId });
    return NextResponse.json({ error: "Failed to list favourites" }, { status: 500 });
  }
}

/**
 * POST - Add the book to favourites, or remove it if already there
 */
export async function POST(request: NextRequest) {
  const body: unknown = await request.json().catch(() => null);
  const parsed = toggleSchema.safeParse(body);

  if (!parsed.success) {
    return NextResponse.json({ error: "bookId is required" }, { status: 400 });
  }

  const { bookId } = parsed.data;
  const userId = parsed.data.userId ?? getEnv().DEFAULT_USER_ID;

  try {
    if (!(await bookExists(bookId))) {
      return NextResponse.json({ error: "Book not found" }, { status: 404 });
    }

    const favourited = await toggleFavourite(userId, bookId);
    logger.info(favourited ? "Added favourite" : "Removed favourite", { userId, bookId });

    return NextResponse.json({ favourited });
  } catch (error) {
    logger.error("Failed to toggle favourite", { error: String(error), userId, bookId });
    return NextResponse.json({ error: "Failed to toggle favourite" }, { status: 500 });
  }
}

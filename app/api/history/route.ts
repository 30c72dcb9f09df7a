/**
 * Viewing history of the acting reader
 */

import { NextRequest, NextResponse } from "next/server";
import { z } from "zod";
import { getEnv } from "@/lib/config/env";
import { bookExists, getViewHistory, recordView } from "@/lib/db/sql";
import { storedBookView } from "@/lib/features/catalog";
import { matchesTitleOrAuthor } from "@/lib/util/text";
import { logger } from "@/lib/util/logger";

export const dynamic = "force-dynamic";

const viewSchema = z.object({
  bookId: z.coerce.number().int().positive(),
  userId: z.string().trim().min(1).optional(),
});

export async function GET(request: NextRequest) {
  const searchParams = request.nextUrl.searchParams;
  const userId = searchParams.get("user_id") ?? getEnv().DEFAULT_USER_ID;
  const q = searchParams.get("q")?.trim() ?? "";

  try {
    const rows = await getViewHistory(userId);
    const books = rows
      .filter((row) => matchesTitleOrAuthor(row, q))
      .map((row) => ({ id: row.id, ...storedBookView(row), viewedAt: row.viewedAt.toISOString() }));

    return NextResponse.json({ books, q });
  } catch (error) {
    logger.error("Failed to load history", { error: String(error), userId });
    return NextResponse.json({ error: "Failed to load history" }, { status: 500 });
  }
}

export async function POST(request: NextRequest) {
  const body: unknown = await request.json().catch(() => null);
  const parsed = viewSchema.safeParse(body);

  if (!parsed.success) {
    return NextResponse.json({ error: "bookId is required" }, { status: 400 });
  }

  const { bookId } = parsed.data;
  const userId = parsed.data.userId ?? getEnv().DEFAULT_USER_ID;

  try {
    if (!(await bookExists(bookId))) {
      return NextResponse.json({ error: "Book not found" }, { status: 404 });
    }

    await recordView(userId, bookId);
    return NextResponse.json({ success: true });
  } catch (error) {
    logger.error("Failed to record view", { error: String(error), userId, bookId });
    return NextResponse.json({ error: "Failed to record view" }, { status: 500 });
  }
}

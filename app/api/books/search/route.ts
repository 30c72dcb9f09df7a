/**
 * Live search suggestions over the catalog (title or author)
 */

import { NextRequest, NextResponse } from "next/server";
import { searchSuggestions } from "@/lib/features/catalog";
import { logger } from "@/lib/util/logger";

export const dynamic = "force-dynamic";

export async function GET(request: NextRequest) {
  const q = request.nextUrl.searchParams.get("q")?.trim() ?? "";
  if (!q) {
    return NextResponse.json([]);
  }

  try {
    const books = await searchSuggestions(q);
    return NextResponse.json(
      books.map(({ title, author, cover, rating, genre }) => ({ title, author, cover, rating, genre }))
    );
  } catch (error) {
    logger.error("Suggestion search failed", { error: String(error), q });
    return NextResponse.json({ error: "Search failed" }, { status: 500 });
  }
}

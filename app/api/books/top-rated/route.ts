import { NextRequest, NextResponse } from "next/server";
import { topRatedBooks } from "@/lib/features/catalog";
import { logger } from "@/lib/util/logger";

export const dynamic = "force-dynamic";

export async function GET(request: NextRequest) {
  const q = request.nextUrl.searchParams.get("q")?.trim() ?? "";

  try {
    const books = await topRatedBooks(q);
    return NextResponse.json({ books, q });
  } catch (error) {
    logger.error("Failed to load top rated books", { error: String(error) });
    return NextResponse.json({ error: "Failed to load books" }, { status: 500 });
  }
}

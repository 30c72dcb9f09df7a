/**
 * Open Library search proxy for the add-book form.
 * Upstream failures answer with an empty list.
 */

import { NextRequest, NextResponse } from "next/server";
import { searchOpenLibrary } from "@/lib/ingest/openlibrary";
import { logger } from "@/lib/util/logger";

export const dynamic = "force-dynamic";

const RESULT_LIMIT = 10;
const TIMEOUT_MS = 10000;

export async function GET(request: NextRequest) {
  const q = request.nextUrl.searchParams.get("q")?.trim() ?? "";
  if (!q) {
    return NextResponse.json([]);
  }

  try {
    const hits = await searchOpenLibrary(q, { limit: RESULT_LIMIT, page: 1, timeoutMs: TIMEOUT_MS });
    return NextResponse.json(hits);
  } catch (error) {
    logger.warn("Open Library search failed", { error: String(error), q });
    return NextResponse.json([]);
  }
}

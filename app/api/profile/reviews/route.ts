/**
 * Every review written by a reader, newest first
 */

import { NextRequest, NextResponse } from "next/server";
import { getEnv } from "@/lib/config/env";
import { getReaderReviews } from "@/lib/features/userProfile";
import { logger } from "@/lib/util/logger";

export const dynamic = "force-dynamic";

export async function GET(request: NextRequest) {
  const userId = request.nextUrl.searchParams.get("user_id") ?? getEnv().DEFAULT_USER_ID;

  try {
    const reviews = await getReaderReviews(userId);
    return NextResponse.json({ reviews, count: reviews.length });
  } catch (error) {
    logger.error("Failed to load reader reviews", { error: String(error), userId });
    return NextResponse.json({ error: "Failed to load reviews" }, { status: 500 });
  }
}

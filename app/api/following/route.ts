/**
 * People the acting reader follows
 * GET lists them with an optional q filter; POST follows or unfollows a handle
 */

import { NextRequest, NextResponse } from "next/server";
import { z } from "zod";
import { getEnv } from "@/lib/config/env";
import { listFollowing, toggleFollowing } from "@/lib/features/social";
import { logger } from "@/lib/util/logger";

export const dynamic = "force-dynamic";

const toggleSchema = z.object({
  handle: z.string().trim().min(1, "handle is required").max(119),
  userId: z.string().trim().min(1).optional(),
});

export async function GET(request: NextRequest) {
  const searchParams = request.nextUrl.searchParams;
  const userId = searchParams.get("user_id") ?? getEnv().DEFAULT_USER_ID;
  const q = searchParams.get("q")?.trim() ?? "";

  try {
    const people = await listFollowing(userId, q);
    return NextResponse.json({ people, q });
  } catch (error) {
    logger.error("Failed to list following", { error: String(error), userId });
    return NextResponse.json({ error: "Failed to list following" }, { status: 500 });
  }
}

export async function POST(request: NextRequest) {
  const body: unknown = await request.json().catch(() => null);
  const parsed = toggleSchema.safeParse(body);

  if (!parsed.success) {
    return NextResponse.json(
      { error: "missing handle", details: parsed.error.flatten().fieldErrors },
      { status: 400 }
    );
  }

  const { handle } = parsed.data;
  const userId = parsed.data.userId ?? getEnv().DEFAULT_USER_ID;

  try {
    const state = await toggleFollowing(userId, handle);
    logger.info(state === "followed" ? "Followed reader" : "Unfollowed reader", { userId, handle });
    return NextResponse.json({ state });
  } catch (error) {
    logger.error("Failed to toggle follow", { error: String(error), userId, handle });
    return NextResponse.json({ error: "Failed to toggle follow" }, { status: 500 });
  }
}

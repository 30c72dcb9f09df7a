/**
 * Readers following the acting reader
 * GET lists them with an optional q filter; DELETE removes one by handle
 */

import { NextRequest, NextResponse } from "next/server";
import { z } from "zod";
import { getEnv } from "@/lib/config/env";
import { listFollowers, removeFollowerByHandle } from "@/lib/features/social";
import { logger } from "@/lib/util/logger";

export const dynamic = "force-dynamic";

const removeSchema = z.object({
  handle: z.string().trim().min(1, "handle is required").max(119),
  userId: z.string().trim().min(1).optional(),
});

export async function GET(request: NextRequest) {
  const searchParams = request.nextUrl.searchParams;
  const userId = searchParams.get("user_id") ?? getEnv().DEFAULT_USER_ID;
  const q = searchParams.get("q")?.trim() ?? "";

  try {
    const people = await listFollowers(userId, q);
    return NextResponse.json({ people, q });
  } catch (error) {
    logger.error("Failed to list followers", { error: String(error), userId });
    return NextResponse.json({ error: "Failed to list followers" }, { status: 500 });
  }
}

export async function DELETE(request: NextRequest) {
  const body: unknown = await request.json().catch(() => null);
  const parsed = removeSchema.safeParse(body);

  if (!parsed.success) {
    return NextResponse.json(
      { error: "missing handle", details: parsed.error.flatten().fieldErrors },
      { status: 400 }
    );
  }

  const { handle } = parsed.data;
  const userId = parsed.data.userId ?? getEnv().DEFAULT_USER_ID;

  try {
    if (!(await removeFollowerByHandle(userId, handle))) {
      return NextResponse.json({ error: "not found" }, { status: 404 });
    }

    logger.info("Removed follower", { userId, handle });
    return NextResponse.json({ removed: true });
  } catch (error) {
    logger.error("Failed to remove follower", { error: String(error), userId, handle });
    return NextResponse.json({ error: "Failed to remove follower" }, { status: 500 });
  }
}

/**
 * Reader Profile API
 * Returns the reader's profile with recent reviews; PUT edits name, handle and bio
 */

import { NextRequest, NextResponse } from "next/server";
import { z } from "zod";
import { getEnv } from "@/lib/config/env";
import { getProfile, updateProfile } from "@/lib/features/userProfile";
import { logger } from "@/lib/util/logger";

export const dynamic = "force-dynamic";

const profileSchema = z.object({
  userId: z.string().trim().min(1).optional(),
  name: z.string().max(120).optional(),
  handle: z.string().max(119).optional(),
  bio: z.string().optional(),
});

export async function GET(request: NextRequest) {
  const userId = request.nextUrl.searchParams.get("user_id") ?? getEnv().DEFAULT_USER_ID;

  try {
    return NextResponse.json(await getProfile(userId));
  } catch (error) {
    logger.error("Failed to load profile", { error: String(error), userId });
    return NextResponse.json({ error: "Failed to load profile" }, { status: 500 });
  }
}

export async function PUT(request: NextRequest) {
  const body: unknown = await request.json().catch(() => null);
  const parsed = profileSchema.safeParse(body);

  if (!parsed.success) {
    return NextResponse.json(
      { error: "Invalid profile", details: parsed.error.flatten().fieldErrors },
      { status: 400 }
    );
  }

  const userId = parsed.data.userId ?? getEnv().DEFAULT_USER_ID;

  try {
    const reader = await updateProfile(userId, parsed.data);
    logger.info("Profile updated", { userId });
    return NextResponse.json(reader);
  } catch (error) {
    logger.error("Failed to update profile", { error: String(error), userId });
    return NextResponse.json({ error: "Failed to update profile" }, { status: 500 });
  }
}

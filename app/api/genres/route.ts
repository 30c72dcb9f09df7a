import { NextResponse } from "next/server";
import { getGenres } from "@/lib/config/catalog";

export async function GET() {
  return NextResponse.json({ genres: getGenres() });
}

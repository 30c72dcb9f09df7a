/**
 * Catalog API
 * GET browses the catalog; POST adds a book, resolving its metadata on Open Library
 */

import { NextRequest, NextResponse } from "next/server";
import { z } from "zod";
import { addBook, browseBooks, storedBookView } from "@/lib/features/catalog";
import { logger } from "@/lib/util/logger";

export const dynamic = "force-dynamic";

const newBookSchema = z.object({
  title: z.string().trim().min(1, "title is required").max(255),
  author: z.string().trim().min(1, "author is required").max(255),
  genre: z.string().trim().max(120).optional(),
  year: z.string().trim().max(20).optional(),
  cover: z.string().trim().max(500).optional(),
});

export async function GET(request: NextRequest) {
  const searchParams = request.nextUrl.searchParams;
  const genre = searchParams.get("genre")?.trim() ?? "";
  const q = searchParams.get("q")?.trim() ?? "";

  try {
    const books = await browseBooks({ genre, q });
    return NextResponse.json({ books, genre, q });
  } catch (error) {
    logger.error("Failed to browse catalog", { error: String(error), genre, q });
    return NextResponse.json({ error: "Failed to load books" }, { status: 500 });
  }
}

export async function POST(request: NextRequest) {
  const body: unknown = await request.json().catch(() => null);
  const parsed = newBookSchema.safeParse(body);

  if (!parsed.success) {
    return NextResponse.json(
      { error: "Title and author are required", details: parsed.error.flatten().fieldErrors },
      { status: 400 }
    );
  }

  try {
    const result = await addBook(parsed.data);

    if (result.status === "exists") {
      return NextResponse.json(
        { error: "That book already exists", bookId: result.book.id },
        { status: 409 }
      );
    }

    return NextResponse.json(
      { bookId: result.book.id, book: storedBookView(result.book) },
      { status: 201 }
    );
  } catch (error) {
    logger.error("Failed to add book", { error: String(error), title: parsed.data.title });
    return NextResponse.json({ error: "Failed to add book" }, { status: 500 });
  }
}

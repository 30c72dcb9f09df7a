/**
 * Cover image URL utilities
 */

import { getEnv } from "@/lib/config/env";

export type CoverSize = "S" | "M" | "L";

export const PLACEHOLDER_COVER = "https://placehold.co/400x600/EEE/AAA?text=No+Cover";

export interface CoverIdentifiers {
  coverRef?: string | null;
  isbn?: string | null;
  editionId?: string | null;
}

function coversBase(): string {
  return getEnv().OPENLIBRARY_COVERS_URL.replace(/\/+$/, "");
}

/**
 * Get Open Library cover URL by cover ID
 */
export function getOpenLibraryCoverUrl(coverRef: string, size: CoverSize = "L"): string {
  return `${coversBase()}/b/id/${coverRef}-${size}.jpg`;
}

/**
 * Get Open Library cover URL by ISBN
 */
export function getOpenLibraryCoverByIsbn(isbn: string, size: CoverSize = "L"): string {
  return `${coversBase()}/b/isbn/${isbn}-${size}.jpg`;
}

/**
 * Get Open Library cover URL by OLID (edition key)
 */
export function getOpenLibraryCoverByOlid(editionId: string, size: CoverSize = "L"): string {
  return `${coversBase()}/b/olid/${editionId}-${size}.jpg`;
}

/**
 * Build the most reliable cover URL available.
 * Cover ID beats ISBN, which beats edition ID; empty string when none is set.
 */
export function buildCoverUrl(ids: CoverIdentifiers, size: CoverSize = "L"): string {
  const coverRef = (ids.coverRef ?? "").trim();
  const isbn = (ids.isbn ?? "").trim();
  const editionId = (ids.editionId ?? "").trim();

  if (coverRef) return getOpenLibraryCoverUrl(coverRef, size);
  if (isbn) return getOpenLibraryCoverByIsbn(isbn, size);
  if (editionId) return getOpenLibraryCoverByOlid(editionId, size);
  return "";
}

/**
 * First non-empty cover, falling back to the placeholder image
 */
export function coverOrPlaceholder(...candidates: Array<string | null | undefined>): string {
  for (const candidate of candidates) {
    const trimmed = (candidate ?? "").trim();
    if (trimmed) return trimmed;
  }
  return PLACEHOLDER_COVER;
}

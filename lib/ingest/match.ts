/**
 * Best-match resolution of a (title, author) pair against Open Library search
 * results. Used for seeding, for user-added books and for demo-book covers.
 */

import { buildCoverUrl } from "@/lib/util/covers";
import { createLogger, errorMessage } from "@/lib/util/logger";
import { type CandidateRecord, searchDocs } from "./openlibrary";

const log = createLogger({ module: "match" });

const SEARCH_LIMIT = 20;

export interface BookQuery {
  title: string;
  author?: string;
}

export interface ResolvedMetadata {
  coverUrl: string;
  coverRef: string;
  isbn: string;
  editionId: string;
  year: string;
}

export type Resolver = (title: string, author?: string) => Promise<ResolvedMetadata | null>;

interface NormalizedQuery {
  title: string;
  author: string;
}

function normalizeQuery(query: BookQuery): NormalizedQuery {
  return {
    title: query.title.trim().toLowerCase(),
    author: (query.author ?? "").trim().toLowerCase(),
  };
}

/**
 * Free-text search term: the title, followed by the author when there is one
 */
export function buildSearchTerm(title: string, author = ""): string {
  const t = title.trim();
  const a = author.trim();
  return a ? `${t} ${a}` : t;
}

/**
 * Title and first-author agreement, shared by cover and description matching
 */
export function titleAuthorScore(query: BookQuery, candidate: CandidateRecord): number {
  const q = normalizeQuery(query);
  let score = 0;

  const title = candidate.title.toLowerCase();
  if (title === q.title) {
    score += 50;
  } else if (q.title && title.includes(q.title)) {
    score += 25;
  }

  const firstAuthor = (candidate.authors[0] ?? "").toLowerCase();
  if (q.author && firstAuthor) {
    if (firstAuthor === q.author) {
      score += 50;
    } else if (firstAuthor.includes(q.author) || q.author.includes(firstAuthor)) {
      score += 25;
    }
  }

  return score;
}

/**
 * Additive score of a search document against the query
 */
export function scoreCandidate(query: BookQuery, candidate: CandidateRecord): number {
  let score = titleAuthorScore(query, candidate);
  if (candidate.hasCover) score += 10;
  if (candidate.isbns.length > 0) score += 3;
  return score;
}

/**
 * Highest-scoring candidate; the earliest one wins a tie
 */
export function pickBest<T>(candidates: readonly T[], score: (candidate: T) => number): T | null {
  let best: T | null = null;
  let bestScore = Number.NEGATIVE_INFINITY;

  for (const candidate of candidates) {
    const s = score(candidate);
    if (s > bestScore) {
      best = candidate;
      bestScore = s;
    }
  }

  return best;
}

export function extractMetadata(candidate: CandidateRecord): ResolvedMetadata {
  const coverRef = candidate.coverRef;
  const isbn = candidate.isbns[0] ?? "";
  const editionId = candidate.editionIds[0] ?? "";

  return {
    coverUrl: buildCoverUrl({ coverRef, isbn, editionId }),
    coverRef,
    isbn,
    editionId,
    year: candidate.firstPublishYear === null ? "" : String(candidate.firstPublishYear),
  };
}

/**
 * Find the most plausible Open Library record for a book.
 * Returns null for a blank title, an empty result set or any transport failure.
 */
export const resolveBestMatch: Resolver = async (title, author = "") => {
  const query: BookQuery = { title: title.trim(), author: author.trim() };
  if (!query.title) return null;

  const term = buildSearchTerm(query.title, query.author);

  let candidates: CandidateRecord[];
  try {
    candidates = await searchDocs(term, { limit: SEARCH_LIMIT, page: 1 });
  } catch (error) {
    log.warn("Open Library lookup failed", { term, error: errorMessage(error) });
    return null;
  }

  const best = pickBest(candidates, (candidate) => scoreCandidate(query, candidate));
  if (!best) return null;

  const metadata = extractMetadata(best);
  log.debug("Resolved book metadata", { term, coverRef: metadata.coverRef, isbn: metadata.isbn });
  return metadata;
};

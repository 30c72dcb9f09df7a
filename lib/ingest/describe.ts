/**
 * Best-effort book descriptions from Open Library
 * Search -> most plausible work -> work record -> description
 */

import { truncateAtWord } from "@/lib/util/text";
import { createLogger, errorMessage } from "@/lib/util/logger";
import { type CandidateRecord, type OLWork, fetchWork, isWorkKey, searchDocs } from "./openlibrary";
import { type BookQuery, buildSearchTerm, pickBest, titleAuthorScore } from "./match";

const log = createLogger({ module: "describe" });

const SEARCH_LIMIT = 5;
const TIMEOUT_MS = 10000;
const MAX_DESCRIPTION_LENGTH = 600;

function scoreWorkCandidate(query: BookQuery, candidate: CandidateRecord): number {
  return titleAuthorScore(query, candidate) + (candidate.key ? 5 : 0);
}

/**
 * First work_key, else the document key; only well-formed work paths count
 */
export function workKeyFor(candidate: CandidateRecord): string {
  const fromList = candidate.workKeys[0] ?? "";
  if (isWorkKey(fromList)) return fromList;
  return isWorkKey(candidate.key) ? candidate.key : "";
}

/**
 * Description text of a work, trimmed and cut for display
 */
export function formatWorkDescription(work: OLWork): string {
  const raw = typeof work.description === "string" ? work.description : work.description?.value;
  if (typeof raw !== "string") return "";
  return truncateAtWord(raw.trim(), MAX_DESCRIPTION_LENGTH);
}

export async function describeBook(title: string, author = ""): Promise<string> {
  const query: BookQuery = { title: title.trim(), author: author.trim() };
  if (!query.title) return "";

  const term = buildSearchTerm(query.title, query.author);

  try {
    const candidates = await searchDocs(term, { limit: SEARCH_LIMIT, page: 1, timeoutMs: TIMEOUT_MS });
    const best = pickBest(candidates, (candidate) => scoreWorkCandidate(query, candidate));
    if (!best) return "";

    const workKey = workKeyFor(best);
    if (!workKey) return "";

    const work = await fetchWork(workKey, TIMEOUT_MS);
    return formatWorkDescription(work);
  } catch (error) {
    log.warn("Description lookup failed", { term, error: errorMessage(error) });
    return "";
  }
}

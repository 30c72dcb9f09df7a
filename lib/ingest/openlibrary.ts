/**
 * Open Library API client
 * Search and work lookups with a shared rate limiter, a per-request timeout
 * and tolerant parsing of search documents.
 */

import Bottleneck from "bottleneck";
import { z } from "zod";
import { getEnv } from "@/lib/config/env";
import { buildCoverUrl } from "@/lib/util/covers";
import { createLogger, errorMessage } from "@/lib/util/logger";

const log = createLogger({ module: "openlibrary" });

// One request in flight at a time, 10 requests per second at most
const limiter = new Bottleneck({
  minTime: 100,
  maxConcurrent: 1,
});

// ============================================================================
// Types
// ============================================================================

/**
 * One search document, normalised. List fields that were missing or not
 * lists come through as empty arrays; scalar fields as empty strings.
 */
export interface CandidateRecord {
  title: string;
  authors: string[];
  coverRef: string;
  /** cover_i was present and non-empty as sent, before trimming */
  hasCover: boolean;
  isbns: string[];
  editionIds: string[];
  firstPublishYear: number | null;
  key: string;
  workKeys: string[];
}

export interface SearchOptions {
  limit?: number;
  page?: number;
  timeoutMs?: number;
}

export interface OpenLibrarySearchHit {
  title: string;
  author: string;
  year: string;
  coverUrl: string;
  coverRef: string;
  isbn: string;
  editionId: string;
}

export interface OLWork {
  key?: string;
  title?: string;
  description?: string | { value?: string };
}

export class OpenLibraryError extends Error {
  readonly status: number | null;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "OpenLibraryError";
    this.status = options.status ?? null;
  }
}

// ============================================================================
// Parsing
// ============================================================================

const looseList = z.array(z.unknown()).optional().catch(undefined);

const searchDocSchema = z.object({
  title: z.string().optional().catch(undefined),
  author_name: looseList,
  cover_i: z.union([z.number(), z.string()]).optional().catch(undefined),
  isbn: looseList,
  edition_key: looseList,
  first_publish_year: z.number().int().optional().catch(undefined),
  key: z.string().optional().catch(undefined),
  work_key: looseList,
});

const searchResponseSchema = z.object({
  docs: z.array(z.unknown()).nullish().catch(undefined),
});

const workSchema = z.object({
  key: z.string().optional().catch(undefined),
  title: z.string().optional().catch(undefined),
  description: z
    .union([z.string(), z.object({ value: z.string().optional().catch(undefined) })])
    .optional()
    .catch(undefined),
});

/**
 * Render a scalar as trimmed text; null, zero and non-scalars become ""
 */
function toText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && value !== 0 && Number.isFinite(value)) return String(value);
  return "";
}

function isPresent(value: unknown): boolean {
  if (typeof value === "string") return value.length > 0;
  if (typeof value === "number") return value !== 0 && !Number.isNaN(value);
  return false;
}

function toTextList(values: unknown[] | undefined): string[] {
  return (values ?? []).map(toText);
}

/**
 * Normalise a raw search document; null when it is not an object
 */
export function parseCandidate(raw: unknown): CandidateRecord | null {
  const parsed = searchDocSchema.safeParse(raw);
  if (!parsed.success) return null;

  const doc = parsed.data;
  return {
    title: (doc.title ?? "").trim(),
    authors: toTextList(doc.author_name),
    coverRef: toText(doc.cover_i),
    hasCover: isPresent(doc.cover_i),
    isbns: toTextList(doc.isbn),
    editionIds: toTextList(doc.edition_key),
    firstPublishYear: doc.first_publish_year ?? null,
    key: (doc.key ?? "").trim(),
    workKeys: toTextList(doc.work_key),
  };
}

// ============================================================================
// Requests
// ============================================================================

function apiUrl(path: string, params: Record<string, string> = {}): URL {
  const url = new URL(path, getEnv().OPENLIBRARY_BASE_URL);
  for (const [name, value] of Object.entries(params)) {
    url.searchParams.set(name, value);
  }
  return url;
}

/**
 * GET a JSON document from Open Library.
 * Throws OpenLibraryError on timeout, network failure, non-2xx or a non-JSON body.
 */
async function fetchJson(url: URL, timeoutMs: number): Promise<unknown> {
  const env = getEnv();

  let response: Response;
  try {
    response = await limiter.schedule(() =>
      fetch(url, {
        headers: { "User-Agent": env.OPENLIBRARY_USER_AGENT, Accept: "application/json" },
        signal: AbortSignal.timeout(timeoutMs),
      })
    );
  } catch (error) {
    throw new OpenLibraryError(`Request to ${url.pathname} failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (!response.ok) {
    throw new OpenLibraryError(`Open Library responded ${response.status} for ${url.pathname}`, {
      status: response.status,
    });
  }

  try {
    return await response.json();
  } catch (error) {
    throw new OpenLibraryError(`Malformed JSON from ${url.pathname}`, {
      status: response.status,
      cause: error,
    });
  }
}

/**
 * Run a search and return its normalised documents in response order
 */
export async function searchDocs(term: string, options: SearchOptions = {}): Promise<CandidateRecord[]> {
  const { limit = 20, page = 1, timeoutMs = getEnv().OPENLIBRARY_TIMEOUT_MS } = options;

  const url = apiUrl("/search.json", { q: term, limit: String(limit), page: String(page) });
  const body = await fetchJson(url, timeoutMs);

  const parsed = searchResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new OpenLibraryError("Search response is not a JSON object");
  }

  const candidates: CandidateRecord[] = [];
  for (const raw of parsed.data.docs ?? []) {
    const candidate = parseCandidate(raw);
    if (candidate) candidates.push(candidate);
  }

  log.debug("Search completed", { term, results: candidates.length });
  return candidates;
}

const WORK_KEY_PATTERN = /^\/works\/OL\w+W$/;

/**
 * True for a work path such as "/works/OL45883W"
 */
export function isWorkKey(value: string): boolean {
  return WORK_KEY_PATTERN.test(value);
}

/**
 * Fetch a work record, e.g. fetchWork("/works/OL45883W")
 */
export async function fetchWork(workKey: string, timeoutMs = getEnv().OPENLIBRARY_TIMEOUT_MS): Promise<OLWork> {
  if (!isWorkKey(workKey)) {
    throw new OpenLibraryError(`Not a work key: ${workKey}`);
  }

  const body = await fetchJson(apiUrl(`${workKey}.json`), timeoutMs);

  const parsed = workSchema.safeParse(body);
  if (!parsed.success) {
    throw new OpenLibraryError(`Work response for ${workKey} is not a JSON object`);
  }
  return parsed.data;
}

/**
 * Free-text search returning display-ready hits.
 * Documents without both a title and an author are dropped.
 */
export async function searchOpenLibrary(term: string, options: SearchOptions = {}): Promise<OpenLibrarySearchHit[]> {
  const candidates = await searchDocs(term, { limit: 50, ...options });

  const hits: OpenLibrarySearchHit[] = [];
  for (const candidate of candidates) {
    const author = candidate.authors[0] ?? "";
    if (!candidate.title || !author) continue;

    const isbn = candidate.isbns[0] ?? "";
    const editionId = candidate.editionIds[0] ?? "";
    hits.push({
      title: candidate.title,
      author,
      year: candidate.firstPublishYear === null ? "" : String(candidate.firstPublishYear),
      coverUrl: buildCoverUrl({ coverRef: candidate.coverRef, isbn, editionId }),
      coverRef: candidate.coverRef,
      isbn,
      editionId,
    });
  }
  return hits;
}

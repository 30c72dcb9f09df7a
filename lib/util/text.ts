/**
 * Text processing utilities
 */

/**
 * Cut text to maxLength on a word boundary and append an ellipsis
 */
export function truncateAtWord(text: string, maxLength: number, suffix = "…"): string {
  if (text.length <= maxLength) return text;

  const cut = text.slice(0, maxLength);
  const lastSpace = cut.lastIndexOf(" ");
  const head = lastSpace === -1 ? cut : cut.slice(0, lastSpace);
  return head.trimEnd() + suffix;
}

/**
 * True when q is empty or appears in the title or author
 */
export function matchesTitleOrAuthor(book: { title: string; author: string }, q: string): boolean {
  const needle = q.trim().toLowerCase();
  if (!needle) return true;
  return book.title.toLowerCase().includes(needle) || book.author.toLowerCase().includes(needle);
}

/**
 * Ensure a profile handle starts with "@"
 */
export function normalizeHandle(handle: string): string {
  const trimmed = handle.trim();
  if (!trimmed) return "";
  return trimmed.startsWith("@") ? trimmed : `@${trimmed}`;
}

/**
 * Friendly relative age such as "just now", "3h ago" or "2w ago"
 */
export function timeAgo(date: Date | null | undefined, now: Date = new Date()): string {
  if (!date) return "";

  const seconds = Math.floor((now.getTime() - date.getTime()) / 1000);
  if (seconds < 60) return "just now";

  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ago`;

  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours}h ago`;

  const days = Math.floor(hours / 24);
  if (days < 7) return `${days}d ago`;

  const weeks = Math.floor(days / 7);
  if (weeks < 5) return `${weeks}w ago`;

  const months = Math.floor(days / 30);
  if (months < 12) return `${months}mo ago`;

  return `${Math.floor(days / 365)}y ago`;
}

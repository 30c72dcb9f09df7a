/**
 * Following and followers, addressed by profile handle
 */

import {
  type Person,
  findReaderByHandle,
  getFollowers,
  getFollowing,
  removeFollower,
  toggleFollow,
} from "@/lib/db/sql";
import { normalizeHandle } from "@/lib/util/text";

export type FollowState = "followed" | "unfollowed";

/**
 * People whose name or handle contains q, ignoring case; everyone for an empty q
 */
export function filterPeople(people: Person[], q: string): Person[] {
  const needle = q.trim().toLowerCase();
  if (!needle) return people;
  return people.filter(
    (person) => person.name.toLowerCase().includes(needle) || person.handle.toLowerCase().includes(needle)
  );
}

/**
 * Display name for a handle with no profile, e.g. "@l_garcia55" -> "L Garcia55"
 */
export function nameFromHandle(handle: string): string {
  const words = handle
    .replace(/^@+/, "")
    .replace(/_/g, " ")
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, before: string, letter: string) => before + letter.toUpperCase());
  return words || "User";
}

export async function listFollowing(userId: string, q = ""): Promise<Person[]> {
  return filterPeople(await getFollowing(userId), q);
}

export async function listFollowers(userId: string, q = ""): Promise<Person[]> {
  return filterPeople(await getFollowers(userId), q);
}

export async function toggleFollowing(userId: string, rawHandle: string): Promise<FollowState> {
  const handle = normalizeHandle(rawHandle);
  const reader = await findReaderByHandle(handle);
  const name = reader?.name || nameFromHandle(handle);

  const following = await toggleFollow(userId, { name, handle });
  return following ? "followed" : "unfollowed";
}

export async function removeFollowerByHandle(userId: string, rawHandle: string): Promise<boolean> {
  return removeFollower(userId, normalizeHandle(rawHandle));
}

import type { Redis } from "ioredis";

/**
 * Cardinality of a set immediately before and after a mutation
 */
export interface SetChange {
  before: number;
  after: number;
}

/**
 * Set that tracks which owners have a non-empty set, e.g. online users
 */
export interface SetIndex {
  key: string;
  member: string;
}

/**
 * SCARD, SADD, SCARD on KEYS[1]; adds ARGV[2] to the index set KEYS[2] when
 * the add made the set non-empty.
 */
export const ADD_TO_SET_SCRIPT = `
local before = redis.call("SCARD", KEYS[1])
redis.call("SADD", KEYS[1], ARGV[1])
local after = redis.call("SCARD", KEYS[1])
if KEYS[2] and before == 0 and after > 0 then
  redis.call("SADD", KEYS[2], ARGV[2])
end
return {before, after}
`;

/**
 * SCARD, SREM, SCARD on KEYS[1]; removes ARGV[2] from the index set KEYS[2]
 * when the removal emptied the set.
 */
export const REMOVE_FROM_SET_SCRIPT = `
local before = redis.call("SCARD", KEYS[1])
redis.call("SREM", KEYS[1], ARGV[1])
local after = redis.call("SCARD", KEYS[1])
if KEYS[2] and before > 0 and after == 0 then
  redis.call("SREM", KEYS[2], ARGV[2])
end
return {before, after}
`;

/**
 * Read the `{before, after}` reply of a set script
 */
function readSetChange(key: string, reply: unknown): SetChange {
  if (!Array.isArray(reply)) {
    throw new Error(`Unexpected set script reply for ${key}`);
  }

  const [before, after] = reply;
  if (typeof before !== "number" || typeof after !== "number") {
    throw new Error(`Unexpected SCARD reply for ${key}`);
  }

  return { before, after };
}

async function runSetScript(
  redis: Redis,
  script: string,
  key: string,
  member: string,
  index?: SetIndex
): Promise<SetChange> {
  const reply = index
    ? await redis.eval(script, 2, key, index.key, member, index.member)
    : await redis.eval(script, 1, key, member);
  return readSetChange(key, reply);
}

/**
 * Atomically add a member to a set and report the set size around the add.
 * The whole operation runs as one script, so no other client can interleave.
 * With an index, `index.member` joins `index.key` in the same step when the
 * set was empty before.
 *
 * @example
 * ```typescript
 * const { before, after } = await addToSet(redis, "connections:42", "s1", {
 *   key: "online-users",
 *   member: "42",
 * });
 * if (before === 0 && after > 0) {
 *   // first member, "42" is now in online-users
 * }
 * ```
 */
export async function addToSet(
  redis: Redis,
  key: string,
  member: string,
  index?: SetIndex
): Promise<SetChange> {
  return runSetScript(redis, ADD_TO_SET_SCRIPT, key, member, index);
}

/**
 * Atomically remove a member from a set and report the set size around the
 * removal. With an index, `index.member` leaves `index.key` in the same step
 * when the removal emptied the set.
 */
export async function removeFromSet(
  redis: Redis,
  key: string,
  member: string,
  index?: SetIndex
): Promise<SetChange> {
  return runSetScript(redis, REMOVE_FROM_SET_SCRIPT, key, member, index);
}

/**
 * Add a member to a set
 *
 * @returns true if the member was not present before
 */
export async function addMember(
  redis: Redis,
  key: string,
  member: string
): Promise<boolean> {
  return (await redis.sadd(key, member)) === 1;
}

/**
 * Remove a member from a set
 *
 * @returns true if the member was present
 */
export async function removeMember(
  redis: Redis,
  key: string,
  member: string
): Promise<boolean> {
  return (await redis.srem(key, member)) === 1;
}

/**
 * Number of members in a set (0 for a missing key)
 */
export async function cardinality(redis: Redis, key: string): Promise<number> {
  return redis.scard(key);
}

/**
 * All members of a set, in no particular order
 */
export async function members(redis: Redis, key: string): Promise<string[]> {
  return redis.smembers(key);
}

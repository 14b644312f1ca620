/**
 * User name resolution for requesters, assignees and comment authors.
 *
 * Resolution never fails a fetch: an unresolvable user becomes a placeholder
 * name and the failure is logged.
 */

import type { TtlCache } from '../cache/ttl-cache';
import { userKey } from '../cache/keys';
import { ResolutionFailureError } from '../errors';
import type { Logger } from '../logger';
import { userResolutionFailuresTotal } from '../metrics';
import type { ZendeskClient } from './client';
import type { ZendeskUserList, ZendeskUserResponse } from './types';

export const UNKNOWN_USER = 'Unknown';
export const UNASSIGNED = 'Unassigned';

/** show_many accepts at most 100 ids per call. */
export const SHOW_MANY_CHUNK_SIZE = 100;

/**
 * Batch lookup via users/show_many. A failed chunk is logged and skipped, so
 * its ids are simply absent from the returned map.
 */
export async function fetchUserNames(
  client: ZendeskClient,
  ids: Iterable<number>,
  log: Logger,
): Promise<Map<number, string>> {
  const unique = [...new Set(ids)];
  const names = new Map<number, string>();

  for (let i = 0; i < unique.length; i += SHOW_MANY_CHUNK_SIZE) {
    const chunk = unique.slice(i, i + SHOW_MANY_CHUNK_SIZE);
    try {
      const { users } = await client.request<ZendeskUserList>(
        `/api/v2/users/show_many.json?ids=${chunk.join(',')}`,
      );
      for (const user of users ?? []) {
        names.set(user.id, user.name);
      }
    } catch (err) {
      userResolutionFailuresTotal.inc(chunk.length);
      log.warn({ err, ids: chunk }, 'User batch lookup failed');
    }
  }

  return names;
}

/** Single user lookup; throws ResolutionFailureError when the name cannot be read. */
export async function lookupUserName(client: ZendeskClient, userId: number): Promise<string> {
  let response: ZendeskUserResponse;
  try {
    response = await client.request<ZendeskUserResponse>(`/api/v2/users/${userId}.json`);
  } catch (err) {
    throw new ResolutionFailureError(userId, err);
  }
  const name = response.user?.name;
  if (typeof name !== 'string' || name.trim() === '') {
    throw new ResolutionFailureError(userId);
  }
  return name;
}

export type AuthorResolver = (authorId: number) => Promise<string>;

/**
 * Resolver scoped to one fetch: each distinct author is looked up at most once,
 * concurrent callers share the in-flight lookup. Successful names are also
 * written to the shared user cache; failures are not cached.
 */
export function createAuthorResolver(opts: {
  client: ZendeskClient;
  cache?: TtlCache<string>;
  log: Logger;
}): AuthorResolver {
  const { client, cache, log } = opts;
  const inFlight = new Map<number, Promise<string>>();

  async function resolve(authorId: number): Promise<string> {
    const cached = cache?.get(userKey(authorId));
    if (cached !== undefined) return cached;

    try {
      const name = await lookupUserName(client, authorId);
      cache?.put(userKey(authorId), name);
      return name;
    } catch (err) {
      userResolutionFailuresTotal.inc();
      log.warn({ err, authorId }, 'Author lookup failed, using placeholder');
      return UNKNOWN_USER;
    }
  }

  return (authorId) => {
    let pending = inFlight.get(authorId);
    if (!pending) {
      pending = resolve(authorId);
      inFlight.set(authorId, pending);
    }
    return pending;
  };
}

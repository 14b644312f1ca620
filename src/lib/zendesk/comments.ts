/**
 * Comment Fetcher: all comments of one ticket with resolved author names,
 * served through the comment cache with a hit/miss status.
 *
 * Bodies are cached in full; summaries are truncated by the renderer.
 */

import type { TtlCache } from '../cache/ttl-cache';
import { commentsKey } from '../cache/keys';
import type { DisplayTimezone } from '../config';
import { SourceUnavailableError, TicketNotFoundError } from '../errors';
import { formatInstant } from '../format';
import { createLogger } from '../logger';
import { cacheLookupsTotal } from '../metrics';
import type { ZendeskClient } from './client';
import { paginateNextPage } from './pagination';
import { createAuthorResolver } from './users';
import type { TicketComment, ZendeskComment, ZendeskCommentList } from './types';

const logger = createLogger('comment-fetcher');

export interface CommentFetchDeps {
  client: ZendeskClient;
  cache: TtlCache<CommentBatch>;
  /** Shared user-name cache consulted before each author lookup. */
  users?: TtlCache<string>;
  display: DisplayTimezone;
}

export interface CommentBatch {
  comments: readonly TicketComment[];
  count: number;
}

export interface CommentFetchResult extends CommentBatch {
  cacheStatus: 'hit' | 'miss';
}

/** Wire shape of GET /api/ticket/:id/comments. */
export interface CommentsResponse {
  comments: Array<{
    id: number;
    author_name: string;
    created_at: string;
    created_at_formatted: string;
    body: string;
    html_body: string;
  }>;
  count: number;
  cache_status: 'hit' | 'miss';
}

export async function fetchTicketComments(deps: CommentFetchDeps, ticketId: number): Promise<CommentFetchResult> {
  const { client, cache, users, display } = deps;
  const key = commentsKey(ticketId);

  const cached = cache.get(key);
  if (cached) {
    cacheLookupsTotal.inc({ cache: 'comments', result: 'hit' });
    return { ...cached, cacheStatus: 'hit' };
  }

  let raw: ZendeskComment[];
  try {
    raw = await paginateNextPage<ZendeskCommentList, ZendeskComment>({
      client,
      initialPath: `/api/v2/tickets/${ticketId}/comments.json`,
      getItems: (page) => page.comments,
    });
  } catch (err) {
    if (err instanceof SourceUnavailableError && err.status === 404) {
      throw new TicketNotFoundError(ticketId);
    }
    throw err;
  }

  const resolveAuthor = createAuthorResolver({ client, cache: users, log: logger.child({ ticketId }) });
  const comments = await Promise.all(
    raw.map(async (c): Promise<TicketComment> => ({
      id: c.id,
      ticketId,
      authorId: c.author_id,
      authorName: await resolveAuthor(c.author_id),
      body: c.body ?? '',
      htmlBody: c.html_body ?? '',
      public: c.public ?? true,
      createdAt: c.created_at,
      createdAtFormatted: formatInstant(c.created_at, display),
    })),
  );

  const batch: CommentBatch = Object.freeze({ comments: Object.freeze(comments), count: comments.length });
  cache.put(key, batch);
  cacheLookupsTotal.inc({ cache: 'comments', result: 'miss' });
  return { ...batch, cacheStatus: 'miss' };
}

export function toCommentsResponse(result: CommentFetchResult): CommentsResponse {
  return {
    comments: result.comments.map((c) => ({
      id: c.id,
      author_name: c.authorName,
      created_at: c.createdAt,
      created_at_formatted: c.createdAtFormatted,
      body: c.body,
      html_body: c.htmlBody,
    })),
    count: result.count,
    cache_status: result.cacheStatus,
  };
}

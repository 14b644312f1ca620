/**
 * Ticket Fetcher: the N most recent tickets, normalized, served through the
 * ticket cache.
 */

import type { TtlCache } from '../cache/ttl-cache';
import { RECENT_TICKETS_KEY } from '../cache/keys';
import type { DisplayTimezone } from '../config';
import { SourceUnavailableError } from '../errors';
import { formatInstant } from '../format';
import { createLogger } from '../logger';
import { cacheLookupsTotal } from '../metrics';
import type { ZendeskClient } from './client';
import { fetchUserNames, UNASSIGNED, UNKNOWN_USER } from './users';
import type {
  CacheStatus,
  Ticket,
  TicketPriority,
  TicketStatus,
  ZendeskTicket,
  ZendeskTicketList,
} from './types';

const logger = createLogger('ticket-fetcher');

export const RECENT_TICKET_COUNT = 10;

export interface TicketFetchDeps {
  client: ZendeskClient;
  cache: TtlCache<readonly Ticket[]>;
  display: DisplayTimezone;
}

export interface RecentTickets {
  tickets: readonly Ticket[];
  cacheStatus: CacheStatus;
}

const STATUS_MAP: Record<string, TicketStatus> = {
  new: 'new',
  open: 'open',
  pending: 'pending',
  hold: 'hold',
  'on-hold': 'hold',
  on_hold: 'hold',
  solved: 'solved',
  closed: 'closed',
};

const PRIORITY_MAP: Record<string, TicketPriority> = {
  urgent: 'urgent',
  high: 'high',
  normal: 'normal',
  low: 'low',
};

/** Unknown or missing status is treated as open. */
export function mapStatus(status: string | null | undefined): TicketStatus {
  if (!status) return 'open';
  return STATUS_MAP[status.toLowerCase()] ?? 'open';
}

/** Unknown or missing priority is treated as unset. */
export function mapPriority(priority: string | null | undefined): TicketPriority | null {
  if (!priority) return null;
  return PRIORITY_MAP[priority.toLowerCase()] ?? null;
}

export function normalizeTicket(
  raw: ZendeskTicket,
  names: ReadonlyMap<number, string>,
  display: DisplayTimezone,
): Ticket {
  const requesterId = raw.requester_id ?? null;
  const assigneeId = raw.assignee_id ?? null;

  return {
    id: raw.id,
    subject: raw.subject || 'No subject',
    description: raw.description ?? '',
    status: mapStatus(raw.status),
    priority: mapPriority(raw.priority),
    requesterId,
    assigneeId,
    requesterName: (requesterId !== null && names.get(requesterId)) || UNKNOWN_USER,
    assigneeName: (assigneeId !== null && names.get(assigneeId)) || UNASSIGNED,
    createdAt: raw.created_at,
    updatedAt: raw.updated_at ?? null,
    createdAtFormatted: formatInstant(raw.created_at, display),
    updatedAtFormatted: formatInstant(raw.updated_at, display),
  };
}

export function collectUserIds(tickets: readonly ZendeskTicket[]): Set<number> {
  const ids = new Set<number>();
  for (const t of tickets) {
    if (t.requester_id) ids.add(t.requester_id);
    if (t.assignee_id) ids.add(t.assignee_id);
  }
  return ids;
}

/**
 * Serves from the cache when the entry is fresh. On a miss the source is
 * queried; if that fails and an expired entry is still held, the expired list
 * is returned with cacheStatus "stale" rather than failing.
 */
export async function fetchRecentTickets(
  deps: TicketFetchDeps,
  count: number = RECENT_TICKET_COUNT,
): Promise<RecentTickets> {
  const { client, cache, display } = deps;

  const cached = cache.get(RECENT_TICKETS_KEY);
  if (cached) {
    cacheLookupsTotal.inc({ cache: 'tickets', result: 'hit' });
    return { tickets: cached, cacheStatus: 'hit' };
  }

  try {
    const path = `/api/v2/tickets.json?sort_by=created_at&sort_order=desc&per_page=${count}`;
    const body = await client.request<ZendeskTicketList | null>(path);
    if (typeof body !== 'object' || body === null) {
      throw new SourceUnavailableError('Zendesk returned an empty ticket list response', { url: path });
    }
    const recent = (body.tickets ?? []).slice(0, count);
    const names = await fetchUserNames(client, collectUserIds(recent), logger);
    const tickets = Object.freeze(recent.map((t) => normalizeTicket(t, names, display)));

    cache.put(RECENT_TICKETS_KEY, tickets);
    cacheLookupsTotal.inc({ cache: 'tickets', result: 'miss' });
    logger.debug({ count: tickets.length }, 'Recent tickets refreshed');
    return { tickets, cacheStatus: 'miss' };
  } catch (err) {
    const stale = cache.peek(RECENT_TICKETS_KEY);
    if (err instanceof SourceUnavailableError && stale) {
      cacheLookupsTotal.inc({ cache: 'tickets', result: 'stale' });
      logger.warn({ err, insertedAt: stale.insertedAt }, 'Zendesk unavailable, serving stale tickets');
      return { tickets: stale.value, cacheStatus: 'stale' };
    }
    throw err;
  }
}

/**
 * Ticket statistics for a date range, built from the Zendesk search API.
 *
 * Search rejects very wide created-at ranges, so the range is queried in
 * windows of at most 60 days and the results are merged.
 */

import type { TtlCache } from '../cache/ttl-cache';
import { statsKey } from '../cache/keys';
import type { DisplayTimezone } from '../config';
import { InvalidDateRangeError } from '../errors';
import { createLogger } from '../logger';
import { cacheLookupsTotal } from '../metrics';
import type { ZendeskClient } from './client';
import { paginateNextPage } from './pagination';
import { collectUserIds, normalizeTicket } from './tickets';
import { fetchUserNames } from './users';
import { TICKET_STATUSES } from './types';
import type { Ticket, TicketStatus, ZendeskSearchResponse, ZendeskTicket } from './types';

const logger = createLogger('ticket-stats');

export const SEARCH_WINDOW_DAYS = 60;
const DAY_MS = 86_400_000;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export interface DateRange {
  startDate: string;
  endDate: string;
}

export interface TicketStats {
  range: DateRange;
  total: number;
  counts: Record<TicketStatus, number>;
  /** Share of `total` per status, 0-100; all zero when there are no tickets. */
  percentages: Record<TicketStatus, number>;
  /** Tickets per status, newest first. */
  tickets: Record<TicketStatus, Ticket[]>;
}

export interface StatsFetchDeps {
  client: ZendeskClient;
  cache: TtlCache<TicketStats>;
  display: DisplayTimezone;
}

function toIsoDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

function parseIsoDate(value: string): number | null {
  if (!DATE_PATTERN.test(value)) return null;
  const ms = Date.parse(`${value}T00:00:00Z`);
  if (Number.isNaN(ms) || toIsoDate(ms) !== value) return null;
  return ms;
}

/** First day of the current month through today (UTC). */
export function defaultDateRange(now: Date = new Date()): DateRange {
  const first = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1);
  return { startDate: toIsoDate(first), endDate: toIsoDate(now.getTime()) };
}

export function resolveDateRange(
  startDate: string | undefined,
  endDate: string | undefined,
  now: Date = new Date(),
): DateRange {
  const defaults = defaultDateRange(now);
  const range = { startDate: startDate || defaults.startDate, endDate: endDate || defaults.endDate };

  const start = parseIsoDate(range.startDate);
  const end = parseIsoDate(range.endDate);
  if (start === null || end === null) {
    throw new InvalidDateRangeError(
      `Invalid date format: '${range.startDate}' or '${range.endDate}'. Expected YYYY-MM-DD`,
    );
  }
  if (start > end) {
    throw new InvalidDateRangeError('Start date cannot be after end date');
  }
  return range;
}

/** Consecutive inclusive windows of at most `windowDays` days covering the range. */
export function splitDateRange(range: DateRange, windowDays: number = SEARCH_WINDOW_DAYS): DateRange[] {
  const start = parseIsoDate(range.startDate);
  const end = parseIsoDate(range.endDate);
  if (start === null || end === null || start > end) return [];

  const windows: DateRange[] = [];
  let current = start;
  while (current <= end) {
    const windowEnd = Math.min(current + (windowDays - 1) * DAY_MS, end);
    windows.push({ startDate: toIsoDate(current), endDate: toIsoDate(windowEnd) });
    current = windowEnd + DAY_MS;
  }
  return windows;
}

export function searchPath(window: DateRange): string {
  const query = `type:ticket created>=${window.startDate}T00:00:00Z created<=${window.endDate}T23:59:59Z`;
  return `/api/v2/search.json?query=${encodeURIComponent(query)}`;
}

function emptyByStatus<T>(make: () => T): Record<TicketStatus, T> {
  return {
    new: make(),
    open: make(),
    pending: make(),
    hold: make(),
    solved: make(),
    closed: make(),
  };
}

export function summarizeTickets(range: DateRange, tickets: readonly Ticket[]): TicketStats {
  const counts = emptyByStatus(() => 0);
  const byStatus = emptyByStatus<Ticket[]>(() => []);

  for (const ticket of tickets) {
    counts[ticket.status]++;
    byStatus[ticket.status].push(ticket);
  }
  for (const status of TICKET_STATUSES) {
    byStatus[status].sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt));
  }

  const total = tickets.length;
  const percentages = emptyByStatus(() => 0);
  if (total > 0) {
    for (const status of TICKET_STATUSES) {
      percentages[status] = (counts[status] / total) * 100;
    }
  }

  return { range, total, counts, percentages, tickets: byStatus };
}

export async function fetchTicketStats(
  deps: StatsFetchDeps,
  range: DateRange,
): Promise<{ stats: TicketStats; cacheStatus: 'hit' | 'miss' }> {
  const { client, cache, display } = deps;
  const key = statsKey(range.startDate, range.endDate);

  const cached = cache.get(key);
  if (cached) {
    cacheLookupsTotal.inc({ cache: 'stats', result: 'hit' });
    return { stats: cached, cacheStatus: 'hit' };
  }

  const raw: ZendeskTicket[] = [];
  for (const window of splitDateRange(range)) {
    const results = await paginateNextPage<ZendeskSearchResponse, ZendeskTicket>({
      client,
      initialPath: searchPath(window),
      getItems: (page) => page.results,
    });
    raw.push(...results);
  }

  const names = await fetchUserNames(client, collectUserIds(raw), logger);
  const stats = summarizeTickets(range, raw.map((t) => normalizeTicket(t, names, display)));

  cache.put(key, stats);
  cacheLookupsTotal.inc({ cache: 'stats', result: 'miss' });
  logger.info({ range, total: stats.total }, 'Ticket statistics refreshed');
  return { stats, cacheStatus: 'miss' };
}

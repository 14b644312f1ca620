/**
 * Dashboard Service: owns the client and the per-process caches, and exposes
 * the operations the pages and route handlers call.
 */

import { TtlCache, type CacheStats, type Clock } from './cache/ttl-cache';
import { loadConfig, type AppConfig } from './config';
import { NotConfiguredError } from './errors';
import { createLogger } from './logger';
import { cacheEntries } from './metrics';
import { createZendeskClient, type ZendeskClient } from './zendesk/client';
import { fetchTicketComments, type CommentBatch, type CommentFetchResult } from './zendesk/comments';
import { runDebugProbe, type DebugReport } from './zendesk/probe';
import { fetchTicketStats, type DateRange, type TicketStats } from './zendesk/stats';
import { fetchRecentTickets, RECENT_TICKET_COUNT, type RecentTickets } from './zendesk/tickets';
import type { Ticket } from './zendesk/types';
import { ingestTicketWebhook, type WebhookAck } from './zendesk/webhook';

const logger = createLogger('dashboard-service');

export interface DashboardCaches {
  tickets: TtlCache<readonly Ticket[]>;
  comments: TtlCache<CommentBatch>;
  users: TtlCache<string>;
  stats: TtlCache<TicketStats>;
}

export interface DashboardService {
  readonly config: AppConfig;
  readonly caches: DashboardCaches;
  recentTickets(count?: number): Promise<RecentTickets>;
  ticketComments(ticketId: number): Promise<CommentFetchResult>;
  ticketStats(range: DateRange): Promise<{ stats: TicketStats; cacheStatus: 'hit' | 'miss' }>;
  ingestWebhook(body: unknown): WebhookAck;
  debugReport(): Promise<DebugReport>;
  cacheStats(): Record<keyof DashboardCaches, CacheStats>;
}

export interface DashboardServiceOptions {
  clock?: Clock;
}

export function createDashboardService(config: AppConfig, options: DashboardServiceOptions = {}): DashboardService {
  const { clock } = options;
  const maxEntries = config.cacheMaxEntries;

  const caches: DashboardCaches = {
    tickets: new TtlCache({ ttlMs: config.ttl.ticketsMs, clock }),
    comments: new TtlCache({ ttlMs: config.ttl.commentsMs, maxEntries, clock }),
    users: new TtlCache({ ttlMs: config.ttl.usersMs, maxEntries, clock }),
    stats: new TtlCache({ ttlMs: config.ttl.statsMs, maxEntries, clock }),
  };

  const client: ZendeskClient | null = config.zendesk
    ? createZendeskClient(config.zendesk, { timeoutMs: config.timeoutMs, maxRetries: config.maxRetries })
    : null;

  if (!client) {
    logger.warn({ missing: config.missing }, 'Zendesk credentials incomplete');
  }

  function requireClient(): ZendeskClient {
    if (!client) throw new NotConfiguredError(config.missing);
    return client;
  }

  function cacheStats(): Record<keyof DashboardCaches, CacheStats> {
    return {
      tickets: caches.tickets.stats(),
      comments: caches.comments.stats(),
      users: caches.users.stats(),
      stats: caches.stats.stats(),
    };
  }

  return {
    config,
    caches,

    async recentTickets(count = RECENT_TICKET_COUNT) {
      return fetchRecentTickets({ client: requireClient(), cache: caches.tickets, display: config.display }, count);
    },

    async ticketComments(ticketId) {
      return fetchTicketComments(
        { client: requireClient(), cache: caches.comments, users: caches.users, display: config.display },
        ticketId,
      );
    },

    async ticketStats(range) {
      return fetchTicketStats({ client: requireClient(), cache: caches.stats, display: config.display }, range);
    },

    ingestWebhook(body) {
      return ingestTicketWebhook(body, {
        log: logger,
        invalidateTickets: config.webhookInvalidatesTickets,
        tickets: caches.tickets,
      });
    },

    debugReport() {
      return runDebugProbe(config, client, cacheStats());
    },

    cacheStats,
  };
}

/** Publishes the current cache sizes to the cache_entries gauge. */
export function recordCacheGauges(service: DashboardService): void {
  for (const [name, stats] of Object.entries(service.cacheStats())) {
    cacheEntries.set({ cache: name }, stats.size);
  }
}

// ---- Process singleton ----

declare global {
  // eslint-disable-next-line no-var
  var __zendeskPulseService: DashboardService | undefined;
}

export function getDashboardService(): DashboardService {
  if (!globalThis.__zendeskPulseService) {
    globalThis.__zendeskPulseService = createDashboardService(loadConfig());
  }
  return globalThis.__zendeskPulseService;
}

/** Drops the process singleton so the next call re-reads configuration. */
export function resetDashboardService(): void {
  globalThis.__zendeskPulseService = undefined;
}

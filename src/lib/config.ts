// Runtime settings for the Zendesk connection and the in-process caches.
// Credentials come from Docker secrets (/run/secrets/<NAME>) first, then env.

import { readFileSync } from 'fs';
import { join } from 'path';

export interface ZendeskCredentials {
  /** Bare host, e.g. "acme.zendesk.com". */
  domain: string;
  user: string;
  apiKey: string;
}

export interface DisplayTimezone {
  /** Fixed offset from UTC, in minutes (e.g. -240 for UTC-4). */
  offsetMinutes: number;
  label: string;
}

export interface AppConfig {
  /** Null when any of SUBDOMAIN / ZENDESK_USER / ZENDESK_API_KEY is missing. */
  zendesk: ZendeskCredentials | null;
  missing: string[];
  /** Raw values for the configuration panel, present even when incomplete. */
  domain: string | null;
  user: string | null;
  apiKeyLength: number;
  timeoutMs: number;
  maxRetries: number;
  ttl: {
    ticketsMs: number;
    commentsMs: number;
    usersMs: number;
    statsMs: number;
  };
  cacheMaxEntries: number | undefined;
  display: DisplayTimezone;
  webhookInvalidatesTickets: boolean;
}

type Env = Record<string, string | undefined>;

const SECRETS_DIR = '/run/secrets';

export function readSecret(name: string, env: Env = process.env, secretsDir = SECRETS_DIR): string | undefined {
  try {
    // Windows-edited secret files may carry a BOM
    const value = readFileSync(join(secretsDir, name), 'utf-8').replace(/^\uFEFF/, '').trim();
    if (value) return value;
  } catch {
    // No mounted secret; fall through to the environment
  }
  const fromEnv = env[name]?.trim();
  return fromEnv ? fromEnv : undefined;
}

/** Accepts "acme.zendesk.com" or "https://acme.zendesk.com/" and returns the host. */
export function normalizeBaseDomain(value: string | undefined): string | null {
  if (!value) return null;
  const host = value.trim().replace(/^https?:\/\//i, '').replace(/\/+$/, '');
  return host || null;
}

function intSetting(env: Env, name: string, fallback: number, min = Number.NEGATIVE_INFINITY): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) || parsed < min ? fallback : parsed;
}

function boolSetting(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  return raw === 'true' || raw === '1' || raw === 'yes';
}

export function loadConfig(env: Env = process.env, secretsDir = SECRETS_DIR): AppConfig {
  const domain = normalizeBaseDomain(readSecret('SUBDOMAIN', env, secretsDir));
  const user = readSecret('ZENDESK_USER', env, secretsDir) ?? null;
  const apiKey = readSecret('ZENDESK_API_KEY', env, secretsDir);

  const missing: string[] = [];
  if (!domain) missing.push('SUBDOMAIN');
  if (!user) missing.push('ZENDESK_USER');
  if (!apiKey) missing.push('ZENDESK_API_KEY');

  const maxEntries = intSetting(env, 'CACHE_MAX_ENTRIES', 500);

  return {
    zendesk: domain && user && apiKey ? { domain, user, apiKey } : null,
    missing,
    domain,
    user,
    apiKeyLength: apiKey?.length ?? 0,
    timeoutMs: intSetting(env, 'ZENDESK_TIMEOUT_MS', 10_000, 1),
    maxRetries: intSetting(env, 'ZENDESK_MAX_RETRIES', 2, 0),
    ttl: {
      ticketsMs: intSetting(env, 'TICKETS_CACHE_TTL_SECONDS', 300, 1) * 1000,
      commentsMs: intSetting(env, 'COMMENTS_CACHE_TTL_SECONDS', 1800, 1) * 1000,
      usersMs: intSetting(env, 'USERS_CACHE_TTL_SECONDS', 86_400, 1) * 1000,
      statsMs: intSetting(env, 'STATS_CACHE_TTL_SECONDS', 600, 1) * 1000,
    },
    cacheMaxEntries: maxEntries > 0 ? maxEntries : undefined,
    display: {
      offsetMinutes: intSetting(env, 'DISPLAY_UTC_OFFSET_MINUTES', -240),
      label: env.DISPLAY_TZ_LABEL?.trim() || 'EST',
    },
    webhookInvalidatesTickets: boolSetting(env, 'WEBHOOK_INVALIDATES_TICKETS', false),
  };
}

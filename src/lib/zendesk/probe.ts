import type { AppConfig } from '../config';
import type { CacheStats } from '../cache/ttl-cache';
import { errorMessage } from '../errors';
import { createLogger } from '../logger';
import type { ZendeskClient } from './client';

const logger = createLogger('debug-probe');

export const PROBE_PATH = '/api/v2/tickets.json?per_page=1';
export const PROBE_RESPONSE_LIMIT = 500;

export interface DebugReport {
  zendesk_url: string | null;
  zendesk_user: string | null;
  api_key_configured: boolean;
  api_key_length: number;
  api_test_status?: number;
  api_test_response?: string;
  auth_header?: string;
  api_test_error?: string;
  error?: string;
  cache?: Record<string, CacheStats>;
}

/** Connection report for /debug-api. Never includes the API key itself. */
export async function runDebugProbe(
  config: AppConfig,
  client: ZendeskClient | null,
  cache?: Record<string, CacheStats>,
): Promise<DebugReport> {
  const report: DebugReport = {
    zendesk_url: config.domain,
    zendesk_user: config.user,
    api_key_configured: config.apiKeyLength > 0,
    api_key_length: config.apiKeyLength,
  };

  if (!client) {
    report.error = 'Missing configuration';
  } else {
    try {
      const { status, body } = await client.probe(PROBE_PATH);
      report.api_test_status = status;
      report.api_test_response = body ? body.slice(0, PROBE_RESPONSE_LIMIT) : 'No response';
      report.auth_header = `${client.user}/token:***`;
    } catch (err) {
      logger.warn({ err }, 'Debug probe request failed');
      report.api_test_error = errorMessage(err);
    }
  }

  if (cache) report.cache = cache;
  return report;
}

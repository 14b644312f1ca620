import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { resetDashboardService } from '@/lib/dashboard-service';

describe('GET /api/health', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    resetDashboardService();
  });

  afterEach(() => {
    process.env = originalEnv;
    resetDashboardService();
  });

  it('returns ok with cache checks when Zendesk is configured', async () => {
    process.env.SUBDOMAIN = 'acme.zendesk.com';
    process.env.ZENDESK_USER = 'agent@example.com';
    process.env.ZENDESK_API_KEY = 'test-api-key';
    const { GET } = await import('@/app/api/health/route');

    const res = await GET();
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.service).toBe('zendesk-pulse');
    expect(body.status).toBe('ok');
    expect(body.checks.zendesk).toEqual({ status: 'ok' });
    expect(body.checks['cache:tickets']).toEqual({ status: 'ok', entries: 0, hitRate: 0 });
  });

  it('reports degraded with the missing settings', async () => {
    delete process.env.SUBDOMAIN;
    delete process.env.ZENDESK_USER;
    process.env.ZENDESK_API_KEY = 'test-api-key';
    const { GET } = await import('@/app/api/health/route');

    const body = await (await GET()).json();

    expect(body.status).toBe('degraded');
    expect(body.checks.zendesk).toEqual({
      status: 'not_configured',
      missing: ['SUBDOMAIN', 'ZENDESK_USER'],
    });
  });

  it('includes a valid ISO timestamp', async () => {
    const { GET } = await import('@/app/api/health/route');

    const body = await (await GET()).json();

    expect(new Date(body.timestamp).getTime()).not.toBeNaN();
  });
});

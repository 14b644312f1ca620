import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { NextRequest } from 'next/server';
import { resetDashboardService } from '@/lib/dashboard-service';

function webhookRequest(body: string): NextRequest {
  return new NextRequest('http://localhost:3000/zendesk-webhook', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
}

describe('POST /zendesk-webhook', () => {
  beforeEach(() => {
    resetDashboardService();
  });

  afterEach(() => {
    resetDashboardService();
  });

  it('acknowledges a ticket payload', async () => {
    const { POST } = await import('@/app/zendesk-webhook/route');
    const payload = { ticket: { id: 12345, subject: 'Cannot log in' } };

    const res = await POST(webhookRequest(JSON.stringify(payload)));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      message: 'Webhook received successfully',
      ticket_id: 12345,
      data: payload,
    });
  });

  it('returns 400 for a payload without a ticket', async () => {
    const { POST } = await import('@/app/zendesk-webhook/route');

    const res = await POST(webhookRequest('{}'));

    expect(res.status).toBe(400);
    const body = await res.json();
    expect(body.error).toBe('Invalid webhook payload: expected a ticket with an id');
    expect(body.issues).toHaveLength(1);
  });

  it('returns 400 for a body that is not JSON', async () => {
    const { POST } = await import('@/app/zendesk-webhook/route');

    const res = await POST(webhookRequest('ticket=1'));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid request body: expected valid JSON' });
  });
});

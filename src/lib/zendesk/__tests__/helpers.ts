import { vi } from 'vitest';
import type { DisplayTimezone, ZendeskCredentials } from '../../config';
import type { ZendeskComment, ZendeskTicket } from '../types';

export const credentials: ZendeskCredentials = {
  domain: 'acme.zendesk.com',
  user: 'agent@example.com',
  apiKey: 'test-api-key',
};

export const display: DisplayTimezone = { offsetMinutes: -240, label: 'EST' };

export function jsonResponse(data: unknown, status = 200, headers?: Record<string, string>): Response {
  return new Response(JSON.stringify(data), {
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

type RouteHandler = (url: URL) => Response | Promise<Response>;

function requestUrl(input: string | URL | Request): URL {
  if (typeof input === 'string') return new URL(input);
  if (input instanceof URL) return input;
  return new URL(input.url);
}

/**
 * fetch stand-in that dispatches on the request pathname. Unrouted paths get a
 * 404 so a missing route shows up as a failed lookup rather than a hang.
 */
export function routedFetch(routes: Record<string, RouteHandler>) {
  return vi.fn(async (input: string | URL | Request) => {
    const url = requestUrl(input);
    const handler = routes[url.pathname];
    if (!handler) return jsonResponse({ error: 'RecordNotFound' }, 404);
    return handler(url);
  });
}

/** Pathnames the mock was called with, in call order. */
export function calledPaths(mock: { mock: { calls: Array<[string | URL | Request, ...unknown[]]> } }): string[] {
  return mock.mock.calls.map(([input]) => requestUrl(input).pathname);
}

export function makeTicket(overrides: Partial<ZendeskTicket> = {}): ZendeskTicket {
  return {
    id: 1,
    subject: 'Printer on fire',
    description: 'The office printer is emitting smoke.',
    status: 'open',
    priority: 'high',
    requester_id: 11,
    assignee_id: 12,
    created_at: '2026-01-15T12:00:00Z',
    updated_at: '2026-01-15T13:30:00Z',
    ...overrides,
  };
}

export function makeComment(overrides: Partial<ZendeskComment> = {}): ZendeskComment {
  return {
    id: 100,
    author_id: 21,
    body: 'Have you tried turning it off and on again?',
    html_body: '<p>Have you tried turning it off and on again?</p>',
    public: true,
    created_at: '2026-01-15T14:00:00Z',
    ...overrides,
  };
}

/**
 * Webhook Ingestor: validates Zendesk ticket notifications and acknowledges
 * them. Payloads are not signature-verified.
 */

import { z } from 'zod';
import { RECENT_TICKETS_KEY } from '../cache/keys';
import { MalformedPayloadError } from '../errors';
import type { Logger } from '../logger';
import { webhooksReceivedTotal } from '../metrics';

const ticketIdSchema = z.union([
  z.number().int().positive(),
  z
    .string()
    .trim()
    .regex(/^\d+$/, 'ticket id must be numeric')
    .transform(Number)
    .refine((n) => n > 0, 'ticket id must be positive'),
]);

export const webhookPayloadSchema = z
  .object({
    ticket: z
      .object({
        id: ticketIdSchema,
      })
      .passthrough(),
  })
  .passthrough();

export type WebhookPayload = z.infer<typeof webhookPayloadSchema>;

export interface WebhookAck {
  message: 'Webhook received successfully';
  ticket_id: number;
  data: unknown;
}

export function parseWebhookPayload(body: unknown): WebhookPayload {
  const result = webhookPayloadSchema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new MalformedPayloadError('Invalid webhook payload: expected a ticket with an id', issues);
  }
  return result.data;
}

export interface IngestOptions {
  log: Logger;
  /** Invalidate the recent-tickets entry on each accepted webhook. */
  invalidateTickets?: boolean;
  tickets?: { invalidate(key: string): boolean };
}

export function ingestTicketWebhook(body: unknown, opts: IngestOptions): WebhookAck {
  let payload: WebhookPayload;
  try {
    payload = parseWebhookPayload(body);
  } catch (err) {
    webhooksReceivedTotal.inc({ outcome: 'rejected' });
    opts.log.warn({ err }, 'Rejected malformed webhook');
    throw err;
  }

  const ticketId = payload.ticket.id;
  opts.log.info({ ticketId }, 'ticket webhook received');

  if (opts.invalidateTickets && opts.tickets) {
    const removed = opts.tickets.invalidate(RECENT_TICKETS_KEY);
    opts.log.debug({ ticketId, removed }, 'Recent tickets invalidated by webhook');
  }

  webhooksReceivedTotal.inc({ outcome: 'accepted' });
  return { message: 'Webhook received successfully', ticket_id: ticketId, data: body };
}

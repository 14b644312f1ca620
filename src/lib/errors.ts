/**
 * Error taxonomy for the Zendesk data path.
 *
 * Whole-fetch failures (source unreachable, ticket missing) propagate to the
 * caller; per-item failures (one author lookup) are absorbed where they occur.
 */

export class SourceUnavailableError extends Error {
  /** Upstream HTTP status, absent for network failures and timeouts. */
  readonly status?: number;
  readonly url?: string;

  constructor(message: string, options?: { status?: number; url?: string; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'SourceUnavailableError';
    this.status = options?.status;
    this.url = options?.url;
  }
}

export class TicketNotFoundError extends Error {
  readonly ticketId: number;

  constructor(ticketId: number) {
    super(`Ticket ${ticketId} not found`);
    this.name = 'TicketNotFoundError';
    this.ticketId = ticketId;
  }
}

export class MalformedPayloadError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'MalformedPayloadError';
    this.issues = issues;
  }
}

export class ResolutionFailureError extends Error {
  readonly userId: number;

  constructor(userId: number, cause?: unknown) {
    super(`Could not resolve user ${userId}`, cause !== undefined ? { cause } : undefined);
    this.name = 'ResolutionFailureError';
    this.userId = userId;
  }
}

export class NotConfiguredError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Zendesk not configured: missing ${missing.join(', ')}`);
    this.name = 'NotConfiguredError';
    this.missing = missing;
  }
}

export class InvalidDateRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidDateRangeError';
  }
}

export function errorMessage(err: unknown, fallback = 'Unknown error'): string {
  return err instanceof Error ? err.message : fallback;
}

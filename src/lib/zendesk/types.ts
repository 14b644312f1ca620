// ---- Zendesk API v2 payloads (only the fields this service reads) ----

export interface ZendeskTicket {
  id: number;
  subject?: string | null;
  description?: string | null;
  status?: string | null;
  priority?: string | null;
  requester_id?: number | null;
  assignee_id?: number | null;
  created_at: string;
  updated_at?: string | null;
}

export interface ZendeskComment {
  id: number;
  author_id: number;
  body?: string | null;
  html_body?: string | null;
  public?: boolean;
  created_at: string;
}

export interface ZendeskUser {
  id: number;
  name: string;
  email?: string | null;
}

export interface ZendeskTicketList {
  tickets: ZendeskTicket[];
  next_page?: string | null;
  count?: number;
}

export interface ZendeskCommentList {
  comments: ZendeskComment[];
  next_page?: string | null;
}

export interface ZendeskUserList {
  users: ZendeskUser[];
}

export interface ZendeskUserResponse {
  user: ZendeskUser;
}

export interface ZendeskSearchResponse {
  results: ZendeskTicket[];
  next_page?: string | null;
  count?: number;
}

// ---- Normalized records served to the dashboard ----

export type TicketStatus = 'new' | 'open' | 'pending' | 'hold' | 'solved' | 'closed';
export type TicketPriority = 'urgent' | 'high' | 'normal' | 'low';

export const TICKET_STATUSES: readonly TicketStatus[] = ['new', 'open', 'pending', 'hold', 'solved', 'closed'];

export interface Ticket {
  id: number;
  subject: string;
  description: string;
  status: TicketStatus;
  /** Null when the ticket has no priority set. */
  priority: TicketPriority | null;
  requesterId: number | null;
  assigneeId: number | null;
  requesterName: string;
  assigneeName: string;
  /** ISO instant in UTC, as returned by Zendesk. */
  createdAt: string;
  updatedAt: string | null;
  createdAtFormatted: string;
  updatedAtFormatted: string;
}

export interface TicketComment {
  id: number;
  ticketId: number;
  authorId: number;
  /** Resolved display name; "Unknown" when the lookup failed. */
  authorName: string;
  body: string;
  htmlBody: string;
  public: boolean;
  createdAt: string;
  createdAtFormatted: string;
}

export type CacheStatus = 'hit' | 'miss' | 'stale';

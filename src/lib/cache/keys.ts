export const RECENT_TICKETS_KEY = 'tickets:recent';

export function commentsKey(ticketId: number): string {
  return `comments:${ticketId}`;
}

export function userKey(userId: number): string {
  return `users:${userId}`;
}

export function statsKey(startDate: string, endDate: string): string {
  return `stats:${startDate}:${endDate}`;
}

/**
 * next_page link pagination (Zendesk list and search endpoints).
 * Follows next_page URLs until null, preserving the order pages arrive in.
 */

import type { ZendeskClient } from './client';

export async function paginateNextPage<P extends { next_page?: string | null }, T>(opts: {
  client: ZendeskClient;
  initialPath: string;
  /** Extract the items from one page. */
  getItems: (page: P) => T[] | undefined;
  /** Stop after this many pages even if next_page is still set (default: 50). */
  maxPages?: number;
}): Promise<T[]> {
  const { client, initialPath, getItems, maxPages = 50 } = opts;
  const collected: T[] = [];
  let path: string | null = initialPath;
  let pages = 0;

  while (path && pages < maxPages) {
    const page: P = await client.request<P>(path);
    pages++;
    const items = getItems(page);
    if (!Array.isArray(items) || items.length === 0) break;
    collected.push(...items);
    path = page.next_page ?? null;
  }

  return collected;
}

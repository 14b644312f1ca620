/**
 * Display formatting for ticket timestamps and summaries.
 * Timestamps are shown at a fixed UTC offset (no DST), matching the
 * configured display timezone label.
 */

import type { DisplayTimezone } from './config';

export const SUBJECT_SUMMARY_LENGTH = 80;
export const DESCRIPTION_SUMMARY_LENGTH = 150;
export const COMMENT_SUMMARY_LENGTH = 200;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** "2026-01-15 08:00:00 EST" for "2026-01-15T12:00:00Z" at UTC-4; "N/A" when absent or invalid. */
export function formatInstant(iso: string | null | undefined, tz: DisplayTimezone): string {
  if (!iso) return 'N/A';
  const ms = Date.parse(iso);
  if (Number.isNaN(ms)) return 'N/A';

  const shifted = new Date(ms + tz.offsetMinutes * 60_000);
  const date = `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
  const time = `${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(shifted.getUTCSeconds())}`;
  return `${date} ${time} ${tz.label}`;
}

/** First `max` characters plus "..." when the text is longer; unchanged otherwise. */
export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

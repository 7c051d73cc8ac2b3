/**
 * Timestamp formatting for message output.
 */

// Human-readable timestamps with day of week
const humanReadableDateFormatter = new Intl.DateTimeFormat('en-US', {
  weekday: 'long',
  day: 'numeric',
  month: 'long',
  year: 'numeric',
  hour: '2-digit',
  minute: '2-digit',
  timeZone: 'UTC',
  timeZoneName: 'short',
});

/**
 * Formats a date into a human-readable string with day of week.
 * This helps LLMs correctly identify the day without needing to calculate it.
 * Example: "Friday, January 30, 2026 at 10:45 AM UTC"
 */
export function formatHumanReadableDate(date: Date): string {
  if (isNaN(date.getTime())) return '';
  return humanReadableDateFormatter.format(date);
}

/**
 * Formats a date as "YYYY-MM-DD HH:MM:SS" in UTC.
 */
export function formatTimestamp(date: Date): string {
  if (isNaN(date.getTime())) return '';
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

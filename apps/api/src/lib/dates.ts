export const normalizeTimezone = (raw: unknown): string | null => {
  if (typeof raw !== 'string') return null;
  const tz = raw.trim();
  if (!tz) return null;
  try {
    // Throws RangeError for invalid time zones
    const formatter = new Intl.DateTimeFormat('en-US', { timeZone: tz });
    formatter.format(0);
    return tz;
  } catch {
    return null;
  }
};

/** `YYYY-MM-DD` of `date` as seen in `timezone` (UTC when the zone is unknown). */
export function formatDateInTimezone(date: Date, timezone: string): string {
  const tz = normalizeTimezone(timezone) ?? 'UTC';
  const fmt = new Intl.DateTimeFormat('en-CA', {
    timeZone: tz,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
  const parts = fmt.formatToParts(date);
  const y = parts.find((p) => p.type === 'year')?.value ?? '';
  const m = parts.find((p) => p.type === 'month')?.value ?? '';
  const d = parts.find((p) => p.type === 'day')?.value ?? '';
  if (y && m && d) return `${y}-${m}-${d}`;
  // Fallback: UTC YYYY-MM-DD
  return date.toISOString().slice(0, 10);
}

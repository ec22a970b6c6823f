// Timezone-aware date helpers
// Reports are keyed by the local calendar day of the configured timezone,
// while GitHub returns every timestamp in UTC.

function getParts(date: Date, timeZone: string): Record<string, string> {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23'
  });

  const parts: Record<string, string> = {};
  for (const part of formatter.formatToParts(date)) {
    parts[part.type] = part.value;
  }
  return parts;
}

/**
 * Format a date as YYYY-MM-DD in the given timezone
 */
export function formatLocalDate(date: Date, timeZone: string): string {
  const parts = getParts(date, timeZone);
  return `${parts.year}-${parts.month}-${parts.day}`;
}

/**
 * Format a date as HH:MM:SS (24h) in the given timezone
 */
export function formatLocalTime(date: Date, timeZone: string): string {
  const parts = getParts(date, timeZone);
  return `${parts.hour}:${parts.minute}:${parts.second}`;
}

/**
 * Check whether an IANA timezone name is understood by the runtime
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Check whether two instants fall on the same local calendar day
 */
export function isSameLocalDay(a: Date, b: Date, timeZone: string): boolean {
  return formatLocalDate(a, timeZone) === formatLocalDate(b, timeZone);
}

/**
 * Lower bound for fetching "today's" commits.
 * UTC offsets range from -12h to +14h, so 48h back always covers the
 * start of the local day; callers filter with isSameLocalDay.
 */
export function getLookbackStart(now: Date): Date {
  return new Date(now.getTime() - 48 * 60 * 60 * 1000);
}

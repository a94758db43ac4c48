const RUN_TIMESTAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})-(\d{2})(\d{2})(\d{2})$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date as YYYYMMDD-HHMMSS in UTC
 */
export function formatRunTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * Parse a YYYYMMDD-HHMMSS (UTC) timestamp. Returns null for anything else,
 * including out-of-range fields such as month 13.
 */
export function parseRunTimestamp(value: unknown): Date | null {
  if (typeof value !== 'string') {
    return null;
  }

  const match = RUN_TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [year, month, day, hours, minutes, seconds] = match.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));

  if (formatRunTimestamp(date) !== value) {
    return null;
  }

  return date;
}

/**
 * YYYY/MM/DD in UTC, used for daily directories and S3 key prefixes
 */
export function formatDatePath(date: Date): string {
  return `${date.getUTCFullYear()}/${pad(date.getUTCMonth() + 1)}/${pad(date.getUTCDate())}`;
}

export function formatBackupDate(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} UTC`
  );
}

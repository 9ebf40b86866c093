function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local wall-clock time as `YYYY-MM-DD HH:MM:SS`, the format operators read
 * in alerts and the audit CSV.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Audit bucket key for the local calendar date, e.g. `26_01_15`.
 */
export function formatBucketKey(date: Date): string {
  return `${pad(date.getFullYear() % 100)}_${pad(date.getMonth() + 1)}_${pad(date.getDate())}`;
}

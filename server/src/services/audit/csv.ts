const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

/** One RFC 4180 record, CRLF-terminated */
export function toCsvRow(fields: readonly string[]): string {
  return `${fields.map(escapeCsvField).join(',')}\r\n`;
}

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?\s*(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Unix seconds for an ISO-8601 timestamp (`Z` or `±hh:mm` offsets). A bare
 * date is taken as noon UTC; a time without zone as UTC.
 */
export function parseTimestamp(value: string | undefined | null): number | null {
  if (!value) return null;
  const m = ISO_PATTERN.exec(value.trim());
  if (!m) return null;
  const [, y, mo, d, h, mi, s, zone] = m;
  const base = Date.UTC(
    Number(y),
    Number(mo) - 1,
    Number(d),
    h === undefined ? 12 : Number(h),
    Number(mi ?? 0),
    Number(s ?? 0),
  );
  if (Number.isNaN(base)) return null;
  let offsetMinutes = 0;
  if (zone && zone !== 'Z') {
    const sign = zone.startsWith('-') ? -1 : 1;
    const digits = zone.slice(1).replace(':', '');
    offsetMinutes =
      sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
  }
  return Math.floor(base / 1000) - offsetMinutes * 60;
}

export function formatDate(value: string | undefined): string {
  const ts = parseTimestamp(value);
  if (ts === null) return value ?? '';
  return new Date(ts * 1000).toISOString().slice(0, 16).replace('T', ' ');
}

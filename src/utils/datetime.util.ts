// Accepts ISO 8601 (with or without Z, fraction or offset), SQL-style
// "YYYY-MM-DD HH:MM[:SS[.ffffff]]" and date-only strings. No offset means UTC.
const DATE_TIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?(Z|[+-]\d{2}:?\d{2})?$/;

export function parseDateTime(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Date(value) : undefined;
  }
  if (typeof value !== 'string') {
    return undefined;
  }

  const match = DATE_TIME_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }

  const [, year, month, day, hour = '0', minute = '0', second = '0', fraction = '', zone] = match;
  const millis = fraction ? Math.round(Number(`0.${fraction}`) * 1000) : 0;
  const calendar = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));

  // Date.UTC rolls 2024-02-30 or month 13 over into the next period
  if (
    calendar.getUTCFullYear() !== Number(year) ||
    calendar.getUTCMonth() !== Number(month) - 1 ||
    calendar.getUTCDate() !== Number(day) ||
    Number(hour) > 23 ||
    Number(minute) > 59 ||
    Number(second) > 59
  ) {
    return undefined;
  }

  const utc = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
    millis
  );
  return new Date(utc - offsetMinutes(zone) * 60_000);
}

function offsetMinutes(zone: string | undefined): number {
  if (!zone || zone === 'Z') {
    return 0;
  }
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

export function utcDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

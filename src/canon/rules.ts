export function standardizeColumnName(header: string): string {
  return header
    .replace(/^\uFEFF/, '')
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '_');
}

/** Only a missing or empty field is null; whitespace is kept as text. */
export function normalizeNullableString(value: unknown): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  return value.length === 0 ? null : value;
}

export function parseNumberCell(value: string | null, context: string): number | null {
  if (value === null) {
    return null;
  }
  const parsed = Number(value);
  if (value.trim().length === 0 || !Number.isFinite(parsed)) {
    throw new Error(`Non-numeric value "${value}" in ${context}.`);
  }
  return parsed;
}

const DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parses `YYYY-MM-DD`, `YYYY-MM-DD HH:MM[:SS[.fff]]` and ISO-8601 stamps to epoch milliseconds.
 * Values without an offset are read as UTC.
 */
export function parseDateCell(value: string | null, context: string): number | null {
  if (value === null) {
    return null;
  }
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Unparseable date "${value}" in ${context}.`);
  }

  const [, year, month, day, hour = '00', minute = '00', second = '00', fraction = '', zone] = match;
  const millis = fraction.padEnd(3, '0').slice(0, 3);
  const offset = zone === undefined || zone === 'Z' ? 'Z' : zone.includes(':') ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
  const iso = `${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}${offset}`;
  const parsed = Date.parse(iso);

  const calendarCheck = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    !Number.isFinite(parsed) ||
    calendarCheck.getUTCMonth() !== Number(month) - 1 ||
    calendarCheck.getUTCDate() !== Number(day)
  ) {
    throw new Error(`Unparseable date "${value}" in ${context}.`);
  }
  return parsed;
}

export function formatDateTimeUtc(epochMs: number): string {
  return new Date(epochMs).toISOString().replace('T', ' ').slice(0, 19);
}

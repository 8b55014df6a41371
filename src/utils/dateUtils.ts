/**
 * Date helpers. Calendar dates travel through the pipeline as YYYY-MM-DD
 * strings; the portal wants YYYYMMDD and the digest shows dd/mm/aaaa.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Validate a YYYY-MM-DD calendar date
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return date.getUTCFullYear() === Number(y) && date.getUTCMonth() === Number(m) - 1 && date.getUTCDate() === Number(d);
}

/**
 * Calendar date of an instant in the given time zone
 */
export function formatIsoDate(date: Date, timeZone: string): string {
  // en-CA formats as YYYY-MM-DD
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(date);
}

export function shiftIsoDate(isoDate: string, days: number): string {
  const [y, m, d] = isoDate.split('-').map(Number);
  const date = new Date(Date.UTC(y, m - 1, d));
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}

/** YYYY-MM-DD to the portal's YYYYMMDD */
export function toPortalDate(isoDate: string): string {
  return isoDate.replaceAll('-', '');
}

/** YYYY-MM-DD to dd/mm/aaaa */
export function toDisplayDate(isoDate: string): string {
  const [y, m, d] = isoDate.split('-');
  return `${d}/${m}/${y}`;
}

/**
 * Calendar part of a portal timestamp ("2026-10-18T09:30:00" or "2026-10-18")
 */
export function extractIsoDate(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const candidate = value.trim().slice(0, 10);
  return isIsoDate(candidate) ? candidate : null;
}

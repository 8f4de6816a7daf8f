/**
 * Collapses runs of whitespace and trims
 */
export function normalizeSpace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Strips query string and fragment; the result is the identity of a catalog item
 */
export function canonicalizeUrl(url: string): string {
  const trimmed = url.trim();
  const cut = trimmed.search(/[?#]/);
  return cut === -1 ? trimmed : trimmed.slice(0, cut);
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Checks a YYYY-MM-DD string names a real calendar date
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().startsWith(value);
}

/**
 * Adds calendar days to a YYYY-MM-DD date
 */
export function addDays(isoDate: string, days: number): string {
  const date = new Date(`${isoDate}T00:00:00Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}

/**
 * Builds the lookahead window: the run date plus `lookaheadDays` following dates
 */
export function buildDateWindow(runDate: string, lookaheadDays: number): string[] {
  const dates: string[] = [];
  for (let offset = 0; offset <= lookaheadDays; offset++) {
    dates.push(addDays(runDate, offset));
  }
  return dates;
}

/**
 * Formats an instant as YYYY-MM-DD in the given IANA time zone
 */
export function formatDateInTimeZone(date: Date, timeZone: string): string {
  // en-CA formats dates as YYYY-MM-DD
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(date);
}

/**
 * Orders movies by lowercase title, then URL, comparing code units
 */
export function compareByTitleThenUrl(
  a: { title: string; canonicalUrl: string },
  b: { title: string; canonicalUrl: string }
): number {
  const titleA = a.title.toLowerCase();
  const titleB = b.title.toLowerCase();
  if (titleA !== titleB) return titleA < titleB ? -1 : 1;
  if (a.canonicalUrl !== b.canonicalUrl) return a.canonicalUrl < b.canonicalUrl ? -1 : 1;
  return 0;
}

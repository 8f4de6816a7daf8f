/**
 * One title found on a listing page, before details are fetched.
 */
export interface CatalogEntry {
  title: string;
  canonicalUrl: string;
}

/**
 * A single screening of a movie.
 */
export interface SessionSlot {
  date: string; // YYYY-MM-DD
  time: string; // HH:mm as shown on the site
  hall: string;
  info: string;
  sessionId: string;
  venueName: string;
  purchaseUrl: string;
}

/**
 * A catalog entry with its description and collected sessions.
 * Sessions are ordered by window date, then by the order they were found.
 */
export interface Movie {
  title: string;
  canonicalUrl: string;
  description: string;
  sessions: SessionSlot[];
}

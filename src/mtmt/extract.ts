import { escapeHtml } from '../render/escape.js';
import { cleanJournalTitle } from './journalTitle.js';
import type { Authorship, Book, Journal, RawPublication } from './types.js';

export const UNKNOWN_POSITION = 999;
export const UNKNOWN_TITLE = 'Unknown Title';

// An empty object from the API means the same as a missing one.
export function hasEntries<T extends object>(value: T | null | undefined): value is T {
  return value != null && Object.keys(value).length > 0;
}

function nonEmpty(value: string | null | undefined): string | undefined {
  return value ? value : undefined;
}

export function extractTitle(pub: RawPublication): string {
  return pub.title ?? UNKNOWN_TITLE;
}

export function extractYear(pub: RawPublication): number | undefined {
  return pub.publishedYear ? pub.publishedYear : undefined;
}

export function extractCitationCount(pub: RawPublication): number {
  const count = pub.citingPubCount ?? 0;
  return count > 0 ? Math.floor(count) : 0;
}

export function extractDoi(pub: RawPublication): string {
  for (const ident of pub.identifiers ?? []) {
    if (ident.source?.type?.label === 'DOI') {
      return ident.realUrl ?? '';
    }
  }
  return '';
}

export function formatAuthorName(authorship: Authorship): string {
  const given = authorship.givenName ?? '';
  const family = authorship.familyName ?? '';
  const initial = given ? `${Array.from(given)[0]}.` : '';
  return `${initial} ${family}`.trim();
}

export function countedAuthors(pub: RawPublication): Authorship[] {
  return (pub.authorships ?? [])
    .filter((a) => a.authorTyped === true)
    .sort((a, b) => (a.listPosition ?? UNKNOWN_POSITION) - (b.listPosition ?? UNKNOWN_POSITION));
}

/**
 * Comma-separated "J. Doe" list in author order. The subject author is matched
 * on MTID only and wrapped in <strong>; every name is escaped.
 */
export function extractAuthors(pub: RawPublication, subjectAuthorId: number): string {
  return countedAuthors(pub)
    .map((a) => {
      const name = escapeHtml(formatAuthorName(a));
      return a.author?.mtid === subjectAuthorId ? `<strong>${name}</strong>` : name;
    })
    .join(', ');
}

export function bookOf(pub: RawPublication): Book | undefined {
  return hasEntries(pub.book) ? pub.book : undefined;
}

export function journalOf(pub: RawPublication): Journal | undefined {
  return hasEntries(pub.journal) ? pub.journal : undefined;
}

export function venueTitle(pub: RawPublication): string {
  const seeded = bookOf(pub)?.title ?? '';
  const journal = journalOf(pub);
  if (!journal) return seeded;
  return cleanJournalTitle(journal.title ?? journal.label ?? seeded);
}

export function pageRange(pub: RawPublication): string | undefined {
  const first = nonEmpty(pub.firstPage);
  const last = nonEmpty(pub.lastPage);
  if (!first || !last) return undefined;
  return first === last ? `p. ${first}` : `pp. ${first}–${last}`;
}

/** Unescaped venue line: title, then volume, issue and pages in that order. */
export function extractVenue(pub: RawPublication): string {
  const parts = [venueTitle(pub)];
  const volume = nonEmpty(pub.volume);
  const issue = nonEmpty(pub.issue);
  const pages = pageRange(pub);

  if (volume) parts.push(`vol. ${volume}`);
  if (issue) parts.push(`no. ${issue}`);
  if (pages) parts.push(pages);

  return parts.join(', ');
}

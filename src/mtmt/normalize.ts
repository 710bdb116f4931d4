import { escapeHtml } from '../render/escape.js';
import type { Logger } from '../log.js';
import { classifyPublication } from './classify.js';
import {
  extractAuthors,
  extractCitationCount,
  extractDoi,
  extractTitle,
  extractVenue,
  extractYear,
} from './extract.js';
import { inferPublisher } from './publisher.js';
import { RawPublicationSchema, type NormalizedPublication, type RawPublication } from './types.js';

/**
 * Validates the `content` list of a page. Elements that don't look like a
 * publication are reported and skipped; the rest keep their order.
 */
export function parseRawPublications(content: readonly unknown[], logger?: Logger): RawPublication[] {
  const publications: RawPublication[] = [];
  content.forEach((item, index) => {
    const parsed = RawPublicationSchema.safeParse(item);
    if (parsed.success) {
      publications.push(parsed.data);
    } else {
      const issue = parsed.error.issues[0];
      logger?.warn(`Skipping record #${index}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`);
    }
  });
  return publications;
}

export function normalizePublication(pub: RawPublication, subjectAuthorId: number): NormalizedPublication | null {
  const year = extractYear(pub);
  if (year === undefined) return null;

  const doi = extractDoi(pub);

  return {
    title: escapeHtml(extractTitle(pub)),
    link: doi || null,
    authors: extractAuthors(pub, subjectAuthorId),
    venue: escapeHtml(extractVenue(pub)),
    type: classifyPublication(pub),
    publisher: inferPublisher(pub),
    citations: extractCitationCount(pub),
    year,
  };
}

export function normalizePublications(
  publications: readonly RawPublication[],
  subjectAuthorId: number,
  logger?: Logger
): NormalizedPublication[] {
  const normalized: NormalizedPublication[] = [];
  const undated: string[] = [];
  for (const pub of publications) {
    const item = normalizePublication(pub, subjectAuthorId);
    if (item) {
      normalized.push(item);
    } else {
      undated.push(pub.mtid != null ? String(pub.mtid) : '?');
    }
  }
  if (undated.length > 0) {
    logger?.debug(`Dropped ${undated.length} publications without a year: ${undated.join(', ')}`);
  }
  return normalized;
}

import iconv from 'iconv-lite';
import { fetch } from 'undici';
import { formatError, type Logger } from '../log.js';
import { parseRawPublications } from './normalize.js';
import { PublicationPageSchema, type AuthorQuery, type PublicationPage, type RawPublication } from './types.js';

export const DEFAULT_BASE_URL = 'https://m2.mtmt.hu';
export const DEFAULT_PATH = '/api/publication';

export interface FetchOptions {
  timeoutMs?: number;
  baseUrl?: string;
}

export class MtmtFetchError extends Error {
  code = 'MTMT_FETCH_FAILED';
  constructor(message: string, public readonly url: string) {
    super(message);
    this.name = 'MtmtFetchError';
  }
}

export function buildMtmtUrl(
  params: Record<string, string | number | boolean | undefined>,
  baseUrl: string = DEFAULT_BASE_URL
): string {
  const url = new URL(DEFAULT_PATH, baseUrl);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      url.searchParams.append(key, String(value));
    }
  }
  return url.toString();
}

export function publicationQueryParams(query: AuthorQuery, page: number): Record<string, string | number> {
  return {
    cond: `authors;eq;${query.authorId}`,
    sort: query.sort,
    size: query.pageSize,
    labelLang: query.labelLang,
    format: 'json',
    page,
  };
}

function decodeBody(buffer: ArrayBuffer, contentType: string): string {
  const charsetMatch = contentType.match(/charset=([^;]+)/i);
  const charset = charsetMatch ? charsetMatch[1].trim().toLowerCase() : 'utf-8';

  if (charset !== 'utf-8' && charset !== 'utf8') {
    return iconv.decode(Buffer.from(buffer), charset);
  }
  return new TextDecoder().decode(buffer);
}

/** One page of the author's publication list. Never retried. */
export async function fetchPublicationPage(
  query: AuthorQuery,
  page: number,
  opts: FetchOptions = {}
): Promise<PublicationPage> {
  const { timeoutMs = 30000, baseUrl = DEFAULT_BASE_URL } = opts;
  const url = buildMtmtUrl(publicationQueryParams(query, page), baseUrl);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  let body: string;
  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        Accept: 'application/json',
      },
    });

    if (!response.ok) {
      throw new MtmtFetchError(`HTTP Error: ${response.status} ${response.statusText}`, url);
    }

    body = decodeBody(await response.arrayBuffer(), response.headers.get('Content-Type') || '');
  } catch (error) {
    if (error instanceof MtmtFetchError) throw error;
    if (controller.signal.aborted) {
      throw new MtmtFetchError(`Request timed out after ${timeoutMs}ms`, url);
    }
    throw new MtmtFetchError(`Request failed: ${formatError(error)}`, url);
  } finally {
    clearTimeout(timeoutId);
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new MtmtFetchError(`Invalid JSON: ${formatError(error)}`, url);
  }

  const parsed = PublicationPageSchema.safeParse(json);
  if (!parsed.success) {
    throw new MtmtFetchError(`Unexpected page shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`, url);
  }
  return parsed.data;
}

export interface FetchAllOptions extends FetchOptions {
  logger?: Logger;
}

/**
 * Walks the pages until an empty page or `paging.last`. A failing page ends
 * the walk; whatever was collected before it is returned.
 */
export async function fetchAllPublications(query: AuthorQuery, opts: FetchAllOptions = {}): Promise<RawPublication[]> {
  const { logger, ...fetchOpts } = opts;
  const publications: RawPublication[] = [];

  for (let page = 1; ; page++) {
    logger?.info(`Fetching page ${page}: ${buildMtmtUrl(publicationQueryParams(query, page), fetchOpts.baseUrl)}`);

    let data: PublicationPage;
    try {
      data = await fetchPublicationPage(query, page, fetchOpts);
    } catch (error) {
      logger?.error(`Error fetching page ${page}: ${formatError(error)}`);
      break;
    }

    const content = data.content ?? [];
    if (content.length === 0) break;

    publications.push(...parseRawPublications(content, logger));

    if (data.paging?.last ?? true) break;
  }

  logger?.info(`Fetched ${publications.length} publications total.`);
  return publications;
}

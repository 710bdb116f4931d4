import path from 'path';
import type { PublicationsConfig } from './config.js';
import { updateDocumentFile } from './document/patch.js';
import { createConsoleLogger, type Logger } from './log.js';
import { fetchAllPublications } from './mtmt/fetchJson.js';
import { normalizePublications } from './mtmt/normalize.js';
import { groupByYear } from './render/group.js';
import { renderPublications } from './render/html.js';

export interface UpdateOptions {
  logger?: Logger;
  /** Directory that a relative `documentPath` is resolved against. */
  cwd?: string;
}

export type UpdateResult =
  | { status: 'empty' }
  | {
      status: 'updated' | 'unchanged';
      path: string;
      publications: number;
      years: number;
    };

export async function updatePublications(config: PublicationsConfig, opts: UpdateOptions = {}): Promise<UpdateResult> {
  const { logger = createConsoleLogger(config.debug), cwd = process.cwd() } = opts;

  logger.info('Fetching publications from MTMT...');
  const raw = await fetchAllPublications(
    {
      authorId: config.authorId,
      pageSize: config.pageSize,
      sort: config.sort,
      labelLang: config.labelLang,
    },
    { baseUrl: config.baseUrl, timeoutMs: config.timeoutMs, logger }
  );

  if (raw.length === 0) {
    logger.info('No publications found. Exiting without changes.');
    return { status: 'empty' };
  }

  logger.info(`Processing ${raw.length} publications...`);
  const publications = normalizePublications(raw, config.authorId, logger);

  const groups = groupByYear(publications);
  const fragment = renderPublications(groups, { indent: config.indent });

  const documentPath = path.resolve(cwd, config.documentPath);
  logger.info(`Updating ${documentPath}...`);
  const written = await updateDocumentFile(documentPath, fragment, {
    markers: config.markers,
    closingIndent: config.closingIndent,
  });

  logger.info(written ? `Updated ${documentPath}.` : `${documentPath} is already up to date.`);
  return {
    status: written ? 'updated' : 'unchanged',
    path: documentPath,
    publications: publications.length,
    years: groups.length,
  };
}

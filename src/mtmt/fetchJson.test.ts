import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { MockAgent, setGlobalDispatcher, getGlobalDispatcher, type Dispatcher } from 'undici';
import iconv from 'iconv-lite';
import {
  DEFAULT_BASE_URL,
  MtmtFetchError,
  buildMtmtUrl,
  fetchAllPublications,
  fetchPublicationPage,
  publicationQueryParams,
} from './fetchJson.js';

const query = { authorId: 10000001, pageSize: 50, sort: 'publishedYear,desc', labelLang: 'eng' };

const pagePath = (page: number) => new RegExp(`^/api/publication\\?.*\\bpage=${page}(&|$)`);

const silentLogger = () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() });

describe('fetchJson', () => {
  let mockAgent: MockAgent;
  let originalDispatcher: Dispatcher;

  beforeAll(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    originalDispatcher = getGlobalDispatcher();
    setGlobalDispatcher(mockAgent);
  });

  afterAll(async () => {
    await mockAgent.close();
    setGlobalDispatcher(originalDispatcher);
  });

  function replyPage(page: number, body: unknown, status = 200) {
    mockAgent
      .get(DEFAULT_BASE_URL)
      .intercept({ path: pagePath(page), method: 'GET' })
      .reply(status, JSON.stringify(body), { headers: { 'Content-Type': 'application/json' } });
  }

  describe('buildMtmtUrl', () => {
    it('should build the author query URL', () => {
      const url = buildMtmtUrl(publicationQueryParams(query, 2));
      expect(url).toBe(
        'https://m2.mtmt.hu/api/publication?cond=authors%3Beq%3B10000001&sort=publishedYear%2Cdesc&size=50&labelLang=eng&format=json&page=2'
      );
    });

    it('should skip undefined parameters', () => {
      expect(buildMtmtUrl({ format: 'json', page: undefined }, 'http://custom.api')).toBe(
        'http://custom.api/api/publication?format=json'
      );
    });
  });

  describe('fetchPublicationPage', () => {
    it('should fetch and validate a page', async () => {
      replyPage(1, { content: [{ mtid: 1, title: 'One' }], paging: { last: true } });

      const page = await fetchPublicationPage(query, 1);
      expect(page.content).toEqual([{ mtid: 1, title: 'One' }]);
      expect(page.paging?.last).toBe(true);
    });

    it('should decode a non-UTF-8 charset', async () => {
      const body = iconv.encode(JSON.stringify({ content: [{ title: 'Café' }] }), 'latin1');
      mockAgent
        .get(DEFAULT_BASE_URL)
        .intercept({ path: pagePath(1), method: 'GET' })
        .reply(200, body, { headers: { 'Content-Type': 'application/json; charset=ISO-8859-1' } });

      const page = await fetchPublicationPage(query, 1);
      expect(page.content).toEqual([{ title: 'Café' }]);
    });

    it('should not retry on a server error', async () => {
      replyPage(1, { error: 'boom' }, 500);

      await expect(fetchPublicationPage(query, 1)).rejects.toThrow('HTTP Error: 500');
    });

    it('should time out', async () => {
      mockAgent
        .get(DEFAULT_BASE_URL)
        .intercept({ path: pagePath(1), method: 'GET' })
        .reply(200, '{"content":[]}')
        .delay(200);

      await expect(fetchPublicationPage(query, 1, { timeoutMs: 50 })).rejects.toThrow('Request timed out after 50ms');
    });

    it('should reject a body that is not JSON', async () => {
      mockAgent
        .get(DEFAULT_BASE_URL)
        .intercept({ path: pagePath(1), method: 'GET' })
        .reply(200, '<html>maintenance</html>');

      await expect(fetchPublicationPage(query, 1)).rejects.toBeInstanceOf(MtmtFetchError);
    });

    it('should reject an unexpected page shape', async () => {
      replyPage(1, { content: 'nope' });

      await expect(fetchPublicationPage(query, 1)).rejects.toThrow(/^Unexpected page shape/);
    });
  });

  describe('fetchAllPublications', () => {
    it('should follow pages until the last one', async () => {
      replyPage(1, { content: [{ mtid: 1 }, { mtid: 2 }], paging: { last: false } });
      replyPage(2, { content: [{ mtid: 3 }], paging: { last: true } });

      const logger = silentLogger();
      const publications = await fetchAllPublications(query, { logger });

      expect(publications.map((p) => p.mtid)).toEqual([1, 2, 3]);
      expect(logger.info).toHaveBeenLastCalledWith('Fetched 3 publications total.');
    });

    it('should stop on an empty page', async () => {
      replyPage(1, { content: [{ mtid: 1 }], paging: { last: false } });
      replyPage(2, { content: [], paging: { last: false } });

      const publications = await fetchAllPublications(query);
      expect(publications).toHaveLength(1);
    });

    it('should stop when paging information is missing', async () => {
      replyPage(1, { content: [{ mtid: 1 }] });

      const publications = await fetchAllPublications(query);
      expect(publications).toHaveLength(1);
    });

    it('should keep what was collected when a page fails', async () => {
      replyPage(1, { content: [{ mtid: 1 }], paging: { last: false } });
      replyPage(2, { error: 'down' }, 503);

      const logger = silentLogger();
      const publications = await fetchAllPublications(query, { logger });

      expect(publications.map((p) => p.mtid)).toEqual([1]);
      expect(logger.error).toHaveBeenCalledTimes(1);
      expect(logger.error.mock.calls[0][0]).toMatch(/^Error fetching page 2: HTTP Error: 503/);
    });
  });
});

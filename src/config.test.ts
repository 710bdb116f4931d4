import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { ConfigError, DEFAULT_MARKERS, loadConfig, resolveConfig } from './config.js';

describe('resolveConfig', () => {
  it('should fill in defaults', () => {
    expect(resolveConfig({ authorId: 10000001 })).toEqual({
      authorId: 10000001,
      baseUrl: 'https://m2.mtmt.hu',
      pageSize: 50,
      sort: 'publishedYear,desc',
      labelLang: 'eng',
      timeoutMs: 30000,
      documentPath: 'index.html',
      markers: DEFAULT_MARKERS,
      indent: '            ',
      closingIndent: '        ',
      debug: false,
    });
  });

  it('should keep a partial marker override', () => {
    const config = resolveConfig({ authorId: 1, markers: { start: '<!-- BEGIN -->' } });
    expect(config.markers).toEqual({ start: '<!-- BEGIN -->', end: '<!-- PUBLICATIONS_END -->' });
  });

  it('should require the author id', () => {
    expect(() => resolveConfig({})).toThrow(ConfigError);
    expect(() => resolveConfig({})).toThrow('Invalid config: authorId: Required');
  });

  it('should reject identical markers', () => {
    expect(() => resolveConfig({ authorId: 1, markers: { start: 'X', end: 'X' } })).toThrow(
      'markers: start and end markers must differ'
    );
  });
});

describe('loadConfig', () => {
  let tempBase: string;

  beforeEach(async () => {
    tempBase = await fs.mkdtemp(path.join(os.tmpdir(), 'mtmt-config-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempBase, { recursive: true, force: true });
  });

  it('should read and validate the config file', async () => {
    const file = path.join(tempBase, 'publications.config.json');
    await fs.writeFile(file, JSON.stringify({ authorId: 7, documentPath: 'docs/index.html', debug: true }));

    const config = await loadConfig(file);
    expect(config.authorId).toBe(7);
    expect(config.documentPath).toBe('docs/index.html');
    expect(config.debug).toBe(true);
  });

  it('should report a missing file', async () => {
    const file = path.join(tempBase, 'missing.json');
    await expect(loadConfig(file)).rejects.toThrow(`Config file not found: ${file}`);
  });

  it('should report malformed JSON', async () => {
    const file = path.join(tempBase, 'broken.json');
    await fs.writeFile(file, '{ authorId: ');
    await expect(loadConfig(file)).rejects.toThrow(ConfigError);
  });
});

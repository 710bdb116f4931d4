import fs from 'fs/promises';
import { z } from 'zod';
import { DEFAULT_BASE_URL } from './mtmt/fetchJson.js';

export const CONFIG_FILE = 'publications.config.json';

export const DEFAULT_MARKERS = {
  start: '<!-- PUBLICATIONS_START -->',
  end: '<!-- PUBLICATIONS_END -->',
};

export const MarkersSchema = z
  .object({
    start: z.string().min(1).default(DEFAULT_MARKERS.start),
    end: z.string().min(1).default(DEFAULT_MARKERS.end),
  })
  .refine((markers) => markers.start !== markers.end, {
    message: 'start and end markers must differ',
  });

export const ConfigSchema = z.object({
  authorId: z.number().int().positive().describe('MTID of the author whose publications are listed'),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  pageSize: z.number().int().positive().default(50),
  sort: z.string().default('publishedYear,desc'),
  labelLang: z.string().default('eng'),
  timeoutMs: z.number().int().positive().default(30000),
  documentPath: z.string().min(1).default('index.html'),
  markers: MarkersSchema.default(DEFAULT_MARKERS),
  indent: z.string().default(' '.repeat(12)).describe('Base indentation of the generated block'),
  closingIndent: z.string().default(' '.repeat(8)).describe('Indentation written before the end marker'),
  debug: z.boolean().default(false),
});

export type PublicationsConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  code = 'INVALID_CONFIG';
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function resolveConfig(input: unknown, source = 'config'): PublicationsConfig {
  const parsed = ConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid ${source}: ${details.join('; ')}`);
  }
  return parsed.data;
}

export async function loadConfig(configPath: string): Promise<PublicationsConfig> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new ConfigError(`Config file is not valid JSON: ${configPath}`);
  }
  return resolveConfig(json, configPath);
}

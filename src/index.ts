#!/usr/bin/env node
import path from 'path';
import { CONFIG_FILE, loadConfig } from './config.js';
import { createConsoleLogger } from './log.js';
import { updatePublications } from './pipeline.js';

async function main() {
  const config = await loadConfig(path.resolve(process.cwd(), CONFIG_FILE));
  const logger = createConsoleLogger(config.debug);

  const result = await updatePublications(config, { logger });
  if (result.status !== 'empty') {
    logger.info(`Done! ${result.publications} publications in ${result.years} years.`);
  }
}

main().catch((error) => {
  console.error('Fatal error in main():', error instanceof Error ? error.message : error);
  process.exit(1);
});

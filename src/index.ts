/**
 * LinkedIn Post Engine
 *
 * Entry point for the service that:
 * 1. Cleans raw LinkedIn post dumps
 * 2. Enriches each post with line count, language and tags via Claude
 * 3. Serves the processed corpus (filters, tag counts, stats) over HTTP
 */

import 'dotenv/config';
import { createAppServer } from './server';
import { getConfig } from './config';
import { getPostStore } from './services/post-store';

async function main() {
  console.log('LinkedIn Post Engine starting...');

  const config = getConfig();
  getPostStore();

  if (!config.apiToken) {
    console.warn('[Server] API_TOKEN is not set - the API is open to any caller');
  }

  const server = createAppServer();

  server.listen(config.port, () => {
    console.log(`Engine running on port ${config.port}`);
  });
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exitCode = 1;
});

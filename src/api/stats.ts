/**
 * Stats API
 *
 * GET /api/stats - Corpus summary (language split, length buckets, tags)
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { getPostStore } from '../services/post-store';
import { getCorpusStats } from '../services/corpus';

function sendJson(res: ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

export async function handleStats(req: IncomingMessage, res: ServerResponse): Promise<void> {
  if (req.method !== 'GET') {
    sendJson(res, 405, { success: false, error: 'Method not allowed' });
    return;
  }

  try {
    const posts = await getPostStore().list();
    sendJson(res, 200, { success: true, data: getCorpusStats(posts) });
  } catch (err) {
    console.error('Error getting stats:', err);
    sendJson(res, 500, {
      success: false,
      error: err instanceof Error ? err.message : 'Internal server error',
    });
  }
}

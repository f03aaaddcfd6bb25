/**
 * Tags API
 *
 * GET  /api/tags        - Tag usage counts across stored posts
 * POST /api/tags/unify  - Merge near-duplicate tags and rewrite the store
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { getPostStore } from '../services/post-store';
import { getTagCounts } from '../services/corpus';
import { applyToStore, unifyTags } from '../services/tags';

interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

function sendJson(res: ServerResponse, status: number, data: ApiResponse): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

async function handleList(res: ServerResponse): Promise<void> {
  try {
    const posts = await getPostStore().list();
    sendJson(res, 200, { success: true, data: getTagCounts(posts) });
  } catch (err) {
    console.error('Error listing tags:', err);
    sendJson(res, 500, {
      success: false,
      error: err instanceof Error ? err.message : 'Internal server error',
    });
  }
}

async function handleUnify(res: ServerResponse): Promise<void> {
  try {
    const store = getPostStore();
    const { mapping } = await unifyTags(await store.list());

    // Posts added while the model was answering get the mapping too
    const updated = await applyToStore(store, mapping);

    sendJson(res, 200, { success: true, data: { mapping, updated } });
  } catch (err) {
    console.error('Error unifying tags:', err);
    sendJson(res, 500, {
      success: false,
      error: err instanceof Error ? err.message : 'Internal server error',
    });
  }
}

export async function handleTags(
  req: IncomingMessage,
  res: ServerResponse,
  pathname: string
): Promise<void> {
  if (pathname === '/api/tags' && req.method === 'GET') {
    return handleList(res);
  }

  if (pathname === '/api/tags/unify' && req.method === 'POST') {
    return handleUnify(res);
  }

  sendJson(res, 404, { success: false, error: 'Not found' });
}

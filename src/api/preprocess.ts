/**
 * Preprocess API
 *
 * POST /api/preprocess         - Enrich posts from the request body and store them
 * POST /api/preprocess/file    - Start a background run over RAW_POSTS_PATH
 * GET  /api/preprocess/status  - Status of the background run
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { enrichPosts } from '../processing/preprocess';
import { getPostStore } from '../services/post-store';
import { getRunStatus, runFilePreprocess } from '../services/preprocess-runner';

interface PreprocessRequest {
  posts: unknown[];
}

interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

export class InvalidJsonError extends Error {
  constructor() {
    super('Invalid JSON');
    this.name = 'InvalidJsonError';
  }
}

function parseBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', (chunk) => {
      body += chunk.toString();
    });
    req.on('end', () => {
      try {
        resolve(body ? JSON.parse(body) : {});
      } catch {
        reject(new InvalidJsonError());
      }
    });
    req.on('error', reject);
  });
}

function sendJson(res: ServerResponse, status: number, data: ApiResponse): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

function validateRequest(body: unknown): body is PreprocessRequest {
  if (typeof body !== 'object' || body === null) return false;
  return 'posts' in body && Array.isArray(body.posts);
}

async function handleInline(req: IncomingMessage, res: ServerResponse): Promise<void> {
  try {
    const body = await parseBody(req);

    if (!validateRequest(body)) {
      sendJson(res, 400, {
        success: false,
        error: 'Invalid request. Required: posts (array of { text, ... })',
      });
      return;
    }

    console.log(`[Preprocess] Enriching ${body.posts.length} posts from request`);
    const enriched = await enrichPosts(body.posts);
    const { added, skipped } = await getPostStore().addMany(enriched);

    sendJson(res, 201, {
      success: true,
      data: {
        processed: enriched.length,
        added: added.length,
        skipped,
        posts: added,
      },
    });
  } catch (err) {
    if (err instanceof InvalidJsonError) {
      sendJson(res, 400, { success: false, error: err.message });
      return;
    }
    console.error('Error preprocessing posts:', err);
    sendJson(res, 500, {
      success: false,
      error: err instanceof Error ? err.message : 'Internal server error',
    });
  }
}

function handleFileRun(res: ServerResponse): void {
  if (getRunStatus().isRunning) {
    sendJson(res, 409, { success: false, error: 'Job already running' });
    return;
  }

  // Run in the background - return immediately
  runFilePreprocess()
    .then((result) => {
      console.log('[Preprocess API] File run completed:', result);
    })
    .catch((err) => {
      console.error('[Preprocess API] File run failed:', err);
    });

  sendJson(res, 202, {
    success: true,
    data: { message: 'Job started in background', status: 'running' },
  });
}

export async function handlePreprocess(
  req: IncomingMessage,
  res: ServerResponse,
  pathname: string
): Promise<void> {
  if (pathname === '/api/preprocess' && req.method === 'POST') {
    return handleInline(req, res);
  }

  if (pathname === '/api/preprocess/file' && req.method === 'POST') {
    return handleFileRun(res);
  }

  if (pathname === '/api/preprocess/status' && req.method === 'GET') {
    sendJson(res, 200, { success: true, data: getRunStatus() });
    return;
  }

  sendJson(res, 404, { success: false, error: 'Not found' });
}

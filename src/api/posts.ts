/**
 * Posts API
 *
 * GET /api/posts      - List processed posts (filters: language, length, tag, limit)
 * GET /api/posts/:id  - Get a single post
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { getPostStore } from '../services/post-store';
import { filterPosts } from '../services/corpus';
import type { PostFilter } from '../services/corpus';
import { LENGTH_CATEGORIES, POST_LANGUAGES } from '../types';
import type { LengthCategory, PostLanguage } from '../types';

interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

function sendJson(res: ServerResponse, status: number, data: ApiResponse): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

function extractIdFromPath(pathname: string): string | null {
  const match = pathname.match(/^\/api\/posts\/([^/]+)$/);
  if (!match) return null;

  try {
    return decodeURIComponent(match[1]);
  } catch {
    // A malformed escape can never be a stored id; the lookup answers 404
    return match[1];
  }
}

function getQueryParams(req: IncomingMessage): URLSearchParams {
  const url = new URL(req.url ?? '/', `http://${req.headers.host}`);
  return url.searchParams;
}

function isLanguage(value: string): value is PostLanguage {
  return POST_LANGUAGES.some((language) => language === value);
}

function isLengthCategory(value: string): value is LengthCategory {
  return LENGTH_CATEGORIES.some((category) => category === value);
}

/**
 * Builds a filter from query params, or returns an error message
 */
function parseFilter(params: URLSearchParams): PostFilter | string {
  const filter: PostFilter = {};

  const language = params.get('language');
  if (language) {
    if (!isLanguage(language)) return `Invalid language. Must be one of: ${POST_LANGUAGES.join(', ')}`;
    filter.language = language;
  }

  const length = params.get('length');
  if (length) {
    if (!isLengthCategory(length)) return `Invalid length. Must be one of: ${LENGTH_CATEGORIES.join(', ')}`;
    filter.length = length;
  }

  const tag = params.get('tag');
  if (tag) filter.tag = tag;

  const limit = parseInt(params.get('limit') ?? '0', 10);
  if (limit > 0) filter.limit = limit;

  return filter;
}

async function handleList(req: IncomingMessage, res: ServerResponse): Promise<void> {
  try {
    const filter = parseFilter(getQueryParams(req));
    if (typeof filter === 'string') {
      sendJson(res, 400, { success: false, error: filter });
      return;
    }

    const posts = await getPostStore().list();
    sendJson(res, 200, { success: true, data: filterPosts(posts, filter) });
  } catch (err) {
    console.error('Error listing posts:', err);
    sendJson(res, 500, {
      success: false,
      error: err instanceof Error ? err.message : 'Internal server error',
    });
  }
}

async function handleGet(res: ServerResponse, id: string): Promise<void> {
  try {
    const post = await getPostStore().get(id);

    if (!post) {
      sendJson(res, 404, { success: false, error: 'Post not found' });
      return;
    }

    sendJson(res, 200, { success: true, data: post });
  } catch (err) {
    console.error('Error getting post:', err);
    sendJson(res, 500, {
      success: false,
      error: err instanceof Error ? err.message : 'Internal server error',
    });
  }
}

export async function handlePosts(
  req: IncomingMessage,
  res: ServerResponse,
  pathname: string
): Promise<void> {
  if (req.method !== 'GET') {
    sendJson(res, 405, { success: false, error: 'Method not allowed' });
    return;
  }

  if (pathname === '/api/posts') {
    return handleList(req, res);
  }

  const id = extractIdFromPath(pathname);
  if (id) {
    return handleGet(res, id);
  }

  sendJson(res, 404, { success: false, error: 'Not found' });
}

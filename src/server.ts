/**
 * HTTP server: CORS, auth and routing to the API handlers
 */

import { createServer } from 'http';
import type { IncomingMessage, Server, ServerResponse } from 'http';
import { handlePosts, handlePreprocess, handleStats, handleTags } from './api';
import { validateAuth, sendUnauthorized, isPublicPath } from './middleware/auth';
import { getConfig } from './config';

function setCorsHeaders(req: IncomingMessage, res: ServerResponse): void {
  const origin = req.headers.origin;

  if (origin && getConfig().corsOrigins.includes(origin)) {
    res.setHeader('Access-Control-Allow-Origin', origin);
  }

  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
  res.setHeader('Access-Control-Max-Age', '86400');
}

function getPathname(req: IncomingMessage): string {
  const url = new URL(req.url ?? '/', `http://${req.headers.host}`);
  return url.pathname;
}

export async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
  // Set CORS headers on all responses
  setCorsHeaders(req, res);

  // Handle preflight requests
  if (req.method === 'OPTIONS') {
    res.writeHead(204);
    res.end();
    return;
  }

  const pathname = getPathname(req);

  // Health check (no auth required)
  if (pathname === '/health') {
    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ status: 'ok' }));
    return;
  }

  if (!isPublicPath(pathname)) {
    const auth = validateAuth(req);
    if (!auth.authorized) {
      sendUnauthorized(res, auth.error || 'Unauthorized');
      return;
    }
  }

  // API routes
  if (pathname === '/api/posts' || pathname.startsWith('/api/posts/')) {
    return handlePosts(req, res, pathname);
  }

  if (pathname === '/api/preprocess' || pathname.startsWith('/api/preprocess/')) {
    return handlePreprocess(req, res, pathname);
  }

  if (pathname === '/api/tags' || pathname.startsWith('/api/tags/')) {
    return handleTags(req, res, pathname);
  }

  if (pathname === '/api/stats') {
    return handleStats(req, res);
  }

  if (pathname.startsWith('/api/')) {
    res.writeHead(404, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ success: false, error: 'Not found' }));
    return;
  }

  // Default response
  res.writeHead(200, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify({ service: 'linkedin-post-engine', status: 'running' }));
}

export function createAppServer(): Server {
  return createServer((req, res) => {
    handleRequest(req, res).catch((err) => {
      console.error('[Server] Unhandled error:', err);
      res.writeHead(500, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ success: false, error: 'Internal server error' }));
    });
  });
}

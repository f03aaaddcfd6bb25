/**
 * Bearer token authentication middleware
 *
 * When API_TOKEN is set, API requests must carry it:
 * Authorization: Bearer <token>
 * Without API_TOKEN the API is open (local use).
 */

import { timingSafeEqual } from 'crypto';
import type { IncomingMessage, ServerResponse } from 'http';
import { getConfig } from '../config';

export interface AuthResult {
  authorized: boolean;
  error?: string;
}

function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function validateAuth(req: IncomingMessage): AuthResult {
  const expected = getConfig().apiToken;
  if (!expected) {
    return { authorized: true };
  }

  const authHeader = req.headers.authorization;

  if (!authHeader) {
    return { authorized: false, error: 'Missing Authorization header' };
  }

  // Expected format: "Bearer <token>"
  const parts = authHeader.split(' ');

  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return { authorized: false, error: 'Invalid Authorization format. Expected: Bearer <token>' };
  }

  if (!tokensMatch(parts[1], expected)) {
    console.warn('[Auth] Rejected request with invalid token');
    return { authorized: false, error: 'Invalid token' };
  }

  return { authorized: true };
}

export function sendUnauthorized(res: ServerResponse, message: string): void {
  res.writeHead(401, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify({ success: false, error: message }));
}

/**
 * Paths that don't require authentication
 */
const PUBLIC_PATHS = ['/health', '/'];

export function isPublicPath(pathname: string): boolean {
  return PUBLIC_PATHS.includes(pathname);
}

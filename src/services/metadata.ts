/**
 * Post metadata extraction
 *
 * Asks Claude for the line count, language and up to two tags of a post.
 * Transient failures are retried with exponential backoff; when every
 * attempt fails the metadata is derived from local heuristics instead.
 */

import { completeText } from './claude';
import { extractJsonFromText } from '../processing/json-extract';
import { getConfig } from '../config';
import { POST_LANGUAGES } from '../types';
import type { PostLanguage, PostMetadata } from '../types';

export const MAX_POST_LENGTH = 1000;
export const MAX_TAGS = 2;

export class MetadataParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MetadataParseError';
  }
}

const METADATA_PROMPT = `Extract the following information from this LinkedIn post:
- line_count: number of lines
- language: either "English" or "French"
- tags: array of maximum two relevant tags

CRITICAL: Return ONLY a valid JSON object. No explanations, no markdown, no additional text.

Post: `;

export function truncatePost(text: string): string {
  if (text.length <= MAX_POST_LENGTH) return text;
  return `${text.slice(0, MAX_POST_LENGTH)}...`;
}

export function buildMetadataPrompt(text: string): string {
  return `${METADATA_PROMPT}${truncatePost(text)}\n\nJSON:`;
}

export function countLines(text: string): number {
  return text.split('\n').length;
}

function parseLineCount(value: unknown): number {
  const lineCount = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof lineCount !== 'number' || !Number.isInteger(lineCount) || lineCount < 0) {
    throw new MetadataParseError(`Invalid line_count: ${JSON.stringify(value)}`);
  }
  return lineCount;
}

function parseLanguage(value: unknown): PostLanguage {
  if (typeof value === 'string') {
    const match = POST_LANGUAGES.find((language) => language.toLowerCase() === value.trim().toLowerCase());
    if (match) return match;
  }
  throw new MetadataParseError(`Invalid language: ${JSON.stringify(value)}`);
}

function parseTags(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new MetadataParseError('Invalid tags: expected an array');
  }

  const tags: string[] = [];
  for (const tag of value) {
    if (typeof tag !== 'string') {
      throw new MetadataParseError(`Invalid tag: ${JSON.stringify(tag)}`);
    }
    const trimmed = tag.trim();
    if (trimmed && !tags.includes(trimmed)) {
      tags.push(trimmed);
    }
  }

  return tags.slice(0, MAX_TAGS);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseMetadataResponse(reply: string): PostMetadata {
  const jsonText = extractJsonFromText(reply);
  if (!jsonText) {
    throw new MetadataParseError('No valid JSON found in response');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonText);
  } catch (err) {
    throw new MetadataParseError(`Invalid JSON output: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!isRecord(parsed)) {
    throw new MetadataParseError('Invalid JSON output: expected an object');
  }

  return {
    line_count: parseLineCount(parsed.line_count),
    language: parseLanguage(parsed.language),
    tags: parseTags(parsed.tags),
  };
}

export async function extractMetadata(text: string): Promise<PostMetadata> {
  const reply = await completeText(buildMetadataPrompt(text));
  return parseMetadataResponse(reply);
}

// ============================================
// RETRY
// ============================================

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 529]);
const RETRYABLE_MESSAGES = [
  '503',
  'service unavailable',
  'overloaded',
  'invalid json output',
  'expecting value',
  'context too big',
];

function getErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  return typeof err.status === 'number' ? err.status : undefined;
}

export function isRetryableError(err: unknown): boolean {
  if (err instanceof MetadataParseError) return true;

  const status = getErrorStatus(err);
  if (status !== undefined && RETRYABLE_STATUSES.has(status)) return true;

  const message = (err instanceof Error ? err.message : String(err)).toLowerCase();
  return RETRYABLE_MESSAGES.some((fragment) => message.includes(fragment));
}

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  extract?: (text: string) => Promise<PostMetadata>;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function extractMetadataWithRetry(
  text: string,
  options: RetryOptions = {}
): Promise<PostMetadata> {
  const config = getConfig();
  const maxRetries = options.maxRetries ?? config.metadataMaxRetries;
  const baseDelayMs = options.baseDelayMs ?? config.metadataRetryBaseMs;
  const extract = options.extract ?? extractMetadata;
  const wait = options.sleep ?? sleep;

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await extract(text);
    } catch (err) {
      if (!isRetryableError(err)) {
        console.error(`[Metadata] Non-retryable error: ${err instanceof Error ? err.message : String(err)}`);
        break;
      }

      const waitMs = 2 ** attempt * baseDelayMs;
      console.warn(
        `[Metadata] API unavailable (attempt ${attempt + 1}/${maxRetries}). Retrying in ${waitMs / 1000}s...`
      );
      if (attempt < maxRetries - 1) {
        await wait(waitMs);
      }
    }
  }

  console.warn('[Metadata] All API attempts failed, using fallback metadata');
  return getFallbackMetadata(text);
}

// ============================================
// FALLBACK HEURISTICS
// ============================================

const FRENCH_MARKERS = ['le', 'la', 'les', 'de', 'du', 'des', 'et', 'est', 'une', 'un', 'ce', 'cette'];
const FRENCH_MARKER_THRESHOLD = 3;

const TAG_KEYWORDS: ReadonlyArray<[string, string[]]> = [
  ['career', ['career', 'job', 'work', 'employment']],
  ['business', ['business', 'company', 'startup', 'entrepreneur']],
  ['tech', ['technology', 'tech', 'ai', 'digital', 'software']],
  ['leadership', ['leadership', 'management', 'team', 'leader']],
  ['marketing', ['marketing', 'brand', 'social media']],
  ['networking', ['network', 'connection', 'professional']],
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsWord(text: string, word: string): boolean {
  const pattern = escapeRegExp(word).replace(/ /g, '\\s+');
  return new RegExp(`(^|[^\\p{L}\\p{N}])${pattern}(?=$|[^\\p{L}\\p{N}])`, 'iu').test(text);
}

export function detectLanguage(text: string): PostLanguage {
  const markers = FRENCH_MARKERS.filter((word) => containsWord(text, word)).length;
  return markers > FRENCH_MARKER_THRESHOLD ? 'French' : 'English';
}

export function detectTags(text: string): string[] {
  const tags: string[] = [];
  for (const [tag, keywords] of TAG_KEYWORDS) {
    if (keywords.some((keyword) => containsWord(text, keyword))) {
      tags.push(tag);
      if (tags.length >= MAX_TAGS) break;
    }
  }
  return tags;
}

export function getFallbackMetadata(text: string): PostMetadata {
  return {
    line_count: countLines(text),
    language: detectLanguage(text),
    tags: detectTags(text),
  };
}

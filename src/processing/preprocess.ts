/**
 * Post preprocessing pipeline
 *
 * Reads a raw dump of LinkedIn posts, cleans each post's text and enriches
 * it with metadata (line count, language, tags), then writes the result as
 * indented UTF-8 JSON.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { cleanDataRecursively, cleanUnicode } from './unicode';
import { countLines, extractMetadataWithRetry } from '../services/metadata';
import type { RetryOptions } from '../services/metadata';
import { getConfig } from '../config';
import type { EnrichedPost, PostMetadata, RawPost } from '../types';

export interface PreprocessOptions extends RetryOptions {
  onProgress?: (done: number, total: number) => void;
}

function isRawPost(value: unknown): value is RawPost {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function enrichPost(post: RawPost, options: RetryOptions = {}): Promise<EnrichedPost> {
  if (post.text === undefined || post.text === null) {
    throw new Error('Post has no text');
  }

  const text = cleanUnicode(post.text);
  const metadata = await extractMetadataWithRetry(text, options);

  return { ...post, text, ...metadata };
}

function fallbackMetadata(post: RawPost): PostMetadata {
  const text = typeof post.text === 'string' ? post.text : '';
  return {
    line_count: countLines(text),
    language: 'English',
    tags: [],
  };
}

export async function enrichPosts(posts: unknown[], options: PreprocessOptions = {}): Promise<EnrichedPost[]> {
  const enriched: EnrichedPost[] = [];
  const total = posts.length;

  for (let i = 0; i < total; i++) {
    const post = posts[i];

    if (!isRawPost(post)) {
      console.error(`[Preprocess] Skipping post ${i + 1}: expected an object`);
      options.onProgress?.(i + 1, total);
      continue;
    }

    try {
      enriched.push(await enrichPost(post, options));
      console.log(`[Preprocess] Processed post ${i + 1}/${total}`);
    } catch (err) {
      console.error(`[Preprocess] Error processing post ${i + 1}: ${err instanceof Error ? err.message : String(err)}`);
      const text = typeof post.text === 'string' ? cleanUnicode(post.text) : '';
      enriched.push({ ...post, text, ...fallbackMetadata(post) });
    }

    options.onProgress?.(i + 1, total);
  }

  return enriched;
}

export async function readRawPosts(path: string): Promise<unknown[]> {
  const content = await readFile(path, 'utf-8');
  const parsed: unknown = JSON.parse(content);

  if (!Array.isArray(parsed)) {
    throw new Error(`Expected a JSON array of posts in ${path}`);
  }

  return parsed;
}

export async function writeJsonSafely(data: unknown[], path: string): Promise<void> {
  const cleaned = cleanDataRecursively(data);

  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(cleaned, null, 2)}\n`, 'utf-8');

  console.log(`[Preprocess] Successfully wrote ${data.length} posts to ${path}`);
}

export async function processPosts(
  rawFilePath: string,
  processedFilePath: string = getConfig().processedPostsPath,
  options: PreprocessOptions = {}
): Promise<EnrichedPost[]> {
  const posts = await readRawPosts(rawFilePath);
  console.log(`[Preprocess] Loaded ${posts.length} posts from ${rawFilePath}`);

  const enriched = await enrichPosts(posts, options);
  await writeJsonSafely(enriched, processedFilePath);

  return enriched;
}

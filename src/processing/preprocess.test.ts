import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { enrichPost, enrichPosts, processPosts, readRawPosts, writeJsonSafely } from './preprocess';
import type { PostMetadata } from '../types';

const metadata: PostMetadata = { line_count: 2, language: 'English', tags: ['Career'] };

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'post-engine-'));
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('enrichPost', () => {
  it('cleans the text before extraction and keeps other fields', async () => {
    const extract = vi.fn().mockResolvedValue(metadata);

    const result = await enrichPost({ text: 'Hi\uD83D\nthere', engagement: 120 }, { extract });

    expect(extract).toHaveBeenCalledWith('Hi�\nthere');
    expect(result).toEqual({ text: 'Hi�\nthere', engagement: 120, line_count: 2, language: 'English', tags: ['Career'] });
  });

  it('lets extracted metadata override raw fields of the same name', async () => {
    const extract = vi.fn().mockResolvedValue(metadata);
    const result = await enrichPost({ text: 'a\nb', tags: ['old'], line_count: 99 }, { extract });
    expect(result.tags).toEqual(['Career']);
    expect(result.line_count).toBe(2);
  });

  it('throws for a post without text', async () => {
    await expect(enrichPost({ engagement: 3 }, { extract: vi.fn() })).rejects.toThrow('Post has no text');
  });
});

describe('enrichPosts', () => {
  it('falls back per post, skips non-objects and reports progress', async () => {
    const extract = vi.fn().mockResolvedValue(metadata);
    const onProgress = vi.fn();

    const result = await enrichPosts([{ text: 'one\ntwo' }, 'not a post', { engagement: 5 }], { extract, onProgress });

    expect(result).toEqual([
      { text: 'one\ntwo', line_count: 2, language: 'English', tags: ['Career'] },
      { engagement: 5, text: '', line_count: 1, language: 'English', tags: [] },
    ]);
    expect(onProgress.mock.calls).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
  });
});

describe('readRawPosts', () => {
  it('rejects a file whose top level is not an array', async () => {
    const path = join(dir, 'raw.json');
    await writeFile(path, '{"text": "solo"}', 'utf-8');
    await expect(readRawPosts(path)).rejects.toThrow(`Expected a JSON array of posts in ${path}`);
  });
});

describe('writeJsonSafely', () => {
  it('creates parent directories and writes indented, cleaned JSON', async () => {
    const path = join(dir, 'nested', 'out.json');

    await writeJsonSafely([{ text: 'café \uDE80' }], path);

    expect(await readFile(path, 'utf-8')).toBe('[\n  {\n    "text": "café �"\n  }\n]\n');
  });
});

describe('processPosts', () => {
  it('reads, enriches and writes the processed file', async () => {
    const rawPath = join(dir, 'RawData.json');
    const outPath = join(dir, 'Preprocessed_posts.json');
    await writeFile(rawPath, JSON.stringify([{ text: 'Hello\nworld', engagement: 42 }]), 'utf-8');

    const extract = vi.fn().mockResolvedValue(metadata);
    const result = await processPosts(rawPath, outPath, { extract });

    const expected = [{ text: 'Hello\nworld', engagement: 42, line_count: 2, language: 'English', tags: ['Career'] }];
    expect(result).toEqual(expected);
    expect(JSON.parse(await readFile(outPath, 'utf-8'))).toEqual(expected);
  });
});

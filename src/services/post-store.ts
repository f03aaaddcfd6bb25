/**
 * Post store
 *
 * Processed posts live either in the processed JSON file (the default) or in
 * the Supabase `posts` table. Post ids are derived from the text, so adding
 * the same post twice is a no-op.
 */

import { createHash } from 'crypto';
import { readFile } from 'fs/promises';
import { getDb } from './db';
import { writeJsonSafely } from '../processing/preprocess';
import { getConfig } from '../config';
import type { EnrichedPost, PostRow, PostRowInsert, StoredPost } from '../types';

export interface AddResult {
  added: StoredPost[];
  skipped: number;
}

export type PostTransform = (posts: StoredPost[]) => StoredPost[];

export interface PostStore {
  list(): Promise<StoredPost[]>;
  get(id: string): Promise<StoredPost | null>;
  addMany(posts: EnrichedPost[]): Promise<AddResult>;
  /**
   * Re-reads the store, applies `transform` and saves the posts it changed.
   * Returns how many posts changed. Posts are matched by id.
   */
  updateMany(transform: PostTransform): Promise<number>;
}

/**
 * Runs tasks one after another so read-modify-write cycles never overlap
 */
export class TaskQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // A failed task rejects its own caller only; the next task still runs
    this.tail = result.catch(() => undefined);
    return result;
  }
}

export function hashPostText(text: string): string {
  return createHash('sha256').update(text).digest('hex').slice(0, 16);
}

export function toStoredPost(post: EnrichedPost, now: Date = new Date()): StoredPost {
  return { ...post, id: hashPostText(post.text), created_at: now.toISOString() };
}

function dedupe(posts: EnrichedPost[], existingIds: Set<string>): AddResult {
  const added: StoredPost[] = [];
  let skipped = 0;

  for (const post of posts) {
    const stored = toStoredPost(post);
    if (existingIds.has(stored.id)) {
      skipped++;
      continue;
    }
    existingIds.add(stored.id);
    added.push(stored);
  }

  return { added, skipped };
}

function findChanged(before: StoredPost[], after: StoredPost[]): StoredPost[] {
  const previous = new Map<string, string>(before.map((post) => [post.id, JSON.stringify(post)]));
  return after.filter((post) => previous.get(post.id) !== JSON.stringify(post));
}

// ============================================
// JSON FILE STORE
// ============================================

function isEnrichedPost(value: unknown): value is EnrichedPost {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return (
    'text' in value &&
    typeof value.text === 'string' &&
    'line_count' in value &&
    typeof value.line_count === 'number' &&
    'language' in value &&
    (value.language === 'English' || value.language === 'French') &&
    'tags' in value &&
    Array.isArray(value.tags) &&
    value.tags.every((tag) => typeof tag === 'string')
  );
}

function isStoredPost(value: unknown): value is StoredPost {
  return (
    isEnrichedPost(value) &&
    typeof value.id === 'string' &&
    typeof value.created_at === 'string'
  );
}

export class JsonFilePostStore implements PostStore {
  private readonly queue = new TaskQueue();

  constructor(private readonly path: string) {}

  async list(): Promise<StoredPost[]> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return [];
      }
      throw err;
    }

    const parsed: unknown = JSON.parse(content);
    if (!Array.isArray(parsed)) {
      throw new Error(`Expected a JSON array of posts in ${this.path}`);
    }

    // Entries written by the CLI carry no id yet
    return parsed.map((entry, i) => {
      if (isStoredPost(entry)) return entry;
      if (isEnrichedPost(entry)) return toStoredPost(entry, new Date(0));
      throw new Error(`Invalid post at index ${i} in ${this.path}`);
    });
  }

  async get(id: string): Promise<StoredPost | null> {
    const posts = await this.list();
    return posts.find((post) => post.id === id) ?? null;
  }

  addMany(posts: EnrichedPost[]): Promise<AddResult> {
    return this.queue.run(async () => {
      const existing = await this.list();
      const result = dedupe(posts, new Set(existing.map((post) => post.id)));

      if (result.added.length > 0) {
        await writeJsonSafely([...existing, ...result.added], this.path);
      }

      return result;
    });
  }

  updateMany(transform: PostTransform): Promise<number> {
    return this.queue.run(async () => {
      const current = await this.list();
      const next = transform(current);
      const changed = findChanged(current, next).length;

      if (changed > 0) {
        await writeJsonSafely(next, this.path);
      }

      return changed;
    });
  }
}

// ============================================
// SUPABASE STORE
// ============================================

const POST_COLUMNS = new Set(['id', 'text', 'line_count', 'language', 'tags', 'created_at']);

export function toRow(post: StoredPost): PostRowInsert {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(post)) {
    if (!POST_COLUMNS.has(key)) extra[key] = value;
  }

  return {
    id: post.id,
    text: post.text,
    line_count: post.line_count,
    language: post.language,
    tags: post.tags,
    extra,
    created_at: post.created_at,
  };
}

export function fromRow(row: PostRow): StoredPost {
  return {
    ...row.extra,
    id: row.id,
    text: row.text,
    line_count: row.line_count,
    language: row.language,
    tags: row.tags ?? [],
    created_at: row.created_at,
  };
}

export class SupabasePostStore implements PostStore {
  private readonly queue = new TaskQueue();

  async list(): Promise<StoredPost[]> {
    const { data, error } = await getDb()
      .from('posts')
      .select('*')
      .order('created_at', { ascending: true });

    if (error) {
      throw new Error(`Failed to list posts: ${error.message}`);
    }

    return ((data ?? []) as PostRow[]).map(fromRow);
  }

  async get(id: string): Promise<StoredPost | null> {
    const { data, error } = await getDb().from('posts').select('*').eq('id', id).maybeSingle();

    if (error) {
      throw new Error(`Failed to load post ${id}: ${error.message}`);
    }

    return data ? fromRow(data as PostRow) : null;
  }

  addMany(posts: EnrichedPost[]): Promise<AddResult> {
    return this.queue.run(async () => {
      const ids = posts.map((post) => hashPostText(post.text));
      const { data: existing, error: existingError } = await getDb().from('posts').select('id').in('id', ids);

      if (existingError) {
        throw new Error(`Failed to check existing posts: ${existingError.message}`);
      }

      const result = dedupe(posts, new Set((existing ?? []).map((row: { id: string }) => row.id)));
      if (result.added.length === 0) {
        return result;
      }

      const { error } = await getDb().from('posts').insert(result.added.map(toRow));
      if (error) {
        throw new Error(`Failed to save posts: ${error.message}`);
      }

      return result;
    });
  }

  updateMany(transform: PostTransform): Promise<number> {
    return this.queue.run(async () => {
      const current = await this.list();
      const changed = findChanged(current, transform(current));

      if (changed.length === 0) return 0;

      const { error } = await getDb().from('posts').upsert(changed.map(toRow), { onConflict: 'id' });
      if (error) {
        throw new Error(`Failed to update posts: ${error.message}`);
      }

      return changed.length;
    });
  }
}

// ============================================
// SINGLETON
// ============================================

let store: PostStore | null = null;

export function getPostStore(): PostStore {
  if (!store) {
    const config = getConfig();
    store = config.postStore === 'supabase' ? new SupabasePostStore() : new JsonFilePostStore(config.processedPostsPath);
    console.log(`[PostStore] Using ${config.postStore} store`);
  }
  return store;
}

export function setPostStore(next: PostStore | null): void {
  store = next;
}

/**
 * Tag unification
 *
 * Per-post extraction produces near-duplicate tags ("Job Search",
 * "Jobseekers", "Job Hunting"). One Claude call maps every distinct tag
 * onto a smaller unified set, which is then applied to the whole corpus.
 */

import { completeText } from './claude';
import { extractJsonFromText } from '../processing/json-extract';
import { MAX_TAGS } from './metadata';
import type { PostStore } from './post-store';
import type { EnrichedPost } from '../types';

export type TagMapping = Record<string, string>;

export interface UnifyResult<T extends EnrichedPost> {
  posts: T[];
  mapping: TagMapping;
}

export interface UnifyOptions {
  complete?: (prompt: string) => Promise<string>;
}

const UNIFY_PROMPT = `I will give you a list of tags. You need to unify tags with the following requirements:
1. Tags are unified and merged to create a shorter list.
   Example 1: "Jobseekers", "Job Hunting" can be all merged into a single tag "Job Search".
   Example 2: "Motivation", "Inspiration", "Drive" can be mapped to "Motivation".
2. Each tag should follow title case convention. example: "Motivation", "Job Search".
3. Output should be a JSON object, no preamble.
4. Output should have mapping of original tag and the unified tag.
   For example: {"Jobseekers": "Job Search", "Job Hunting": "Job Search", "Motivation": "Motivation"}

Here is the list of tags:
`;

export function normalizeTag(tag: string): string {
  return tag.trim().replace(/\s+/g, ' ');
}

export function collectTags(posts: EnrichedPost[]): string[] {
  const tags = new Set<string>();
  for (const post of posts) {
    for (const tag of post.tags) {
      const normalized = normalizeTag(tag);
      if (normalized) tags.add(normalized);
    }
  }
  return Array.from(tags).sort();
}

export function buildUnifyPrompt(tags: string[]): string {
  return `${UNIFY_PROMPT}${tags.join(', ')}`;
}

export function parseTagMapping(reply: string): TagMapping {
  const jsonText = extractJsonFromText(reply);
  if (!jsonText) {
    throw new Error('No tag mapping found in response');
  }

  const parsed: unknown = JSON.parse(jsonText);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Tag mapping must be a JSON object');
  }

  const mapping: TagMapping = {};
  for (const [original, unified] of Object.entries(parsed)) {
    if (typeof unified !== 'string') {
      throw new Error(`Tag mapping for "${original}" is not a string`);
    }
    mapping[normalizeTag(original)] = normalizeTag(unified);
  }

  return mapping;
}

export function applyTagMapping<T extends EnrichedPost>(posts: T[], mapping: TagMapping): T[] {
  return posts.map((post) => {
    const tags: string[] = [];
    for (const tag of post.tags) {
      const normalized = normalizeTag(tag);
      const unified = normalizeTag(mapping[normalized] ?? normalized);
      if (unified && !tags.includes(unified)) {
        tags.push(unified);
      }
    }
    return { ...post, tags: tags.slice(0, MAX_TAGS) };
  });
}

export async function unifyTags<T extends EnrichedPost>(posts: T[], options: UnifyOptions = {}): Promise<UnifyResult<T>> {
  const tags = collectTags(posts);
  if (tags.length === 0) {
    return { posts, mapping: {} };
  }

  const complete = options.complete ?? ((prompt: string) => completeText(prompt, { maxTokens: 2000 }));

  console.log(`[Tags] Unifying ${tags.length} distinct tags...`);
  const mapping = parseTagMapping(await complete(buildUnifyPrompt(tags)));

  const unifiedCount = new Set(Object.values(mapping)).size;
  console.log(`[Tags] Mapped ${Object.keys(mapping).length} tags onto ${unifiedCount} unified tags`);

  return { posts: applyTagMapping(posts, mapping), mapping };
}

/**
 * Applies a mapping to whatever the store holds now, not to the snapshot the
 * mapping was built from. Returns the number of posts whose tags changed.
 */
export async function applyToStore(store: PostStore, mapping: TagMapping): Promise<number> {
  if (Object.keys(mapping).length === 0) return 0;
  return store.updateMany((posts) => applyTagMapping(posts, mapping));
}

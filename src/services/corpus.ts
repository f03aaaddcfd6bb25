/**
 * Queries over the processed post corpus: length buckets, filters, tag
 * counts and summary stats.
 */

import type { EnrichedPost, LengthCategory, PostLanguage } from '../types';

export interface PostFilter {
  language?: PostLanguage;
  length?: LengthCategory;
  tag?: string;
  limit?: number;
}

export interface TagCount {
  tag: string;
  count: number;
}

export interface CorpusStats {
  total: number;
  by_language: Record<string, number>;
  by_length: Record<LengthCategory, number>;
  average_line_count: number;
  unique_tags: number;
}

export function getLengthCategory(lineCount: number): LengthCategory {
  if (lineCount < 5) return 'Short';
  if (lineCount <= 10) return 'Medium';
  return 'Long';
}

export function filterPosts<T extends EnrichedPost>(posts: T[], filter: PostFilter = {}): T[] {
  const tag = filter.tag?.trim().toLowerCase();

  const matches = posts.filter((post) => {
    if (filter.language && post.language !== filter.language) return false;
    if (filter.length && getLengthCategory(post.line_count) !== filter.length) return false;
    if (tag && !post.tags.some((t) => t.toLowerCase() === tag)) return false;
    return true;
  });

  return filter.limit && filter.limit > 0 ? matches.slice(0, filter.limit) : matches;
}

export function getTagCounts(posts: EnrichedPost[]): TagCount[] {
  const counts = new Map<string, number>();
  for (const post of posts) {
    for (const tag of post.tags) {
      counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }
  }

  return Array.from(counts, ([tag, count]) => ({ tag, count })).sort(
    (a, b) => b.count - a.count || a.tag.localeCompare(b.tag)
  );
}

export function getCorpusStats(posts: EnrichedPost[]): CorpusStats {
  const byLanguage: Record<string, number> = {};
  const byLength: Record<LengthCategory, number> = { Short: 0, Medium: 0, Long: 0 };
  let totalLines = 0;

  for (const post of posts) {
    byLanguage[post.language] = (byLanguage[post.language] ?? 0) + 1;
    byLength[getLengthCategory(post.line_count)]++;
    totalLines += post.line_count;
  }

  const average = posts.length > 0 ? Math.round((totalLines / posts.length) * 100) / 100 : 0;

  return {
    total: posts.length,
    by_language: byLanguage,
    by_length: byLength,
    average_line_count: average,
    unique_tags: getTagCounts(posts).length,
  };
}

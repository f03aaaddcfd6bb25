/**
 * Post types, plus the row shape of the Supabase `posts` table
 */

// ============================================
// ENUMS
// ============================================

export type PostLanguage = 'English' | 'French';
export type LengthCategory = 'Short' | 'Medium' | 'Long';

export const POST_LANGUAGES: readonly PostLanguage[] = ['English', 'French'];
export const LENGTH_CATEGORIES: readonly LengthCategory[] = ['Short', 'Medium', 'Long'];

// ============================================
// POST TYPES
// ============================================

export interface PostMetadata {
  line_count: number;
  language: PostLanguage;
  tags: string[];
}

/**
 * One entry of a raw dump. Only `text` is required; every other field
 * (engagement, url, ...) is carried through untouched.
 */
export interface RawPost {
  text?: unknown;
  [key: string]: unknown;
}

export interface EnrichedPost extends PostMetadata {
  text: string;
  [key: string]: unknown;
}

export interface StoredPost extends EnrichedPost {
  id: string;
  created_at: string;
}

// ============================================
// TABLE TYPES
// ============================================

export interface PostRow {
  id: string;
  text: string;
  line_count: number;
  language: PostLanguage;
  tags: string[];
  extra: Record<string, unknown>;
  created_at: string;
}

export type PostRowInsert = Omit<PostRow, 'created_at'> & {
  created_at?: string;
};

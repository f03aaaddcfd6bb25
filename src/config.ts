/**
 * Runtime configuration read from environment variables.
 *
 * Entry points load `.env` via `dotenv/config` before anything here is read.
 */

export type PostStoreKind = 'file' | 'supabase';

export interface AppConfig {
  port: number;
  anthropicApiKey: string | null;
  llmModel: string;
  llmMaxTokens: number;
  rawPostsPath: string;
  processedPostsPath: string;
  postStore: PostStoreKind;
  supabaseUrl: string | null;
  supabaseServiceKey: string | null;
  metadataMaxRetries: number;
  metadataRetryBaseMs: number;
  apiToken: string | null;
  corsOrigins: string[];
}

export const DEFAULT_RAW_POSTS_PATH = 'Dataset/RawData.json';
export const DEFAULT_PROCESSED_POSTS_PATH = 'Dataset/Preprocessed_posts.json';
export const DEFAULT_LLM_MODEL = 'claude-sonnet-4-20250514';

let config: AppConfig | null = null;

function readInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function readString(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function readPostStore(value: string | undefined): PostStoreKind {
  const kind = (value ?? 'file').trim().toLowerCase();
  if (kind === 'file' || kind === 'supabase') {
    return kind;
  }
  throw new Error(`Invalid POST_STORE "${value}". Expected "file" or "supabase"`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readInt(env.PORT, 3000),
    anthropicApiKey: readString(env.ANTHROPIC_API_KEY),
    llmModel: readString(env.LLM_MODEL) ?? DEFAULT_LLM_MODEL,
    llmMaxTokens: readInt(env.LLM_MAX_TOKENS, 500),
    rawPostsPath: readString(env.RAW_POSTS_PATH) ?? DEFAULT_RAW_POSTS_PATH,
    processedPostsPath: readString(env.PROCESSED_POSTS_PATH) ?? DEFAULT_PROCESSED_POSTS_PATH,
    postStore: readPostStore(env.POST_STORE),
    supabaseUrl: readString(env.SUPABASE_URL),
    supabaseServiceKey: readString(env.SUPABASE_SERVICE_KEY),
    metadataMaxRetries: readInt(env.METADATA_MAX_RETRIES, 3),
    metadataRetryBaseMs: readInt(env.METADATA_RETRY_BASE_MS, 5000),
    apiToken: readString(env.API_TOKEN),
    corsOrigins: (env.CORS_ORIGINS ?? 'http://localhost:5173,http://localhost:3000')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
  };
}

export function getConfig(): AppConfig {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

// Tests override individual settings without touching process.env
export function setConfig(overrides: Partial<AppConfig> | null): void {
  config = overrides ? { ...loadConfig(), ...overrides } : null;
}

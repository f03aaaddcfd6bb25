/**
 * Background preprocessing of the raw dump into the post store
 *
 * Only one run at a time; a run over a large dump can take minutes once
 * retries back off, so the API starts it and reports status separately.
 */

import { enrichPosts, readRawPosts } from '../processing/preprocess';
import type { PreprocessOptions } from '../processing/preprocess';
import { getPostStore } from './post-store';
import { getConfig } from '../config';

export interface RunResult {
  source: string;
  processed: number;
  added: number;
  skipped: number;
}

let isRunning = false;
let lastRunAt: string | null = null;
let lastRunResult: RunResult | null = null;
let lastRunError: string | null = null;

export async function runFilePreprocess(
  rawFilePath: string = getConfig().rawPostsPath,
  options: PreprocessOptions = {}
): Promise<RunResult> {
  if (isRunning) {
    throw new Error('Job already running');
  }

  isRunning = true;
  console.log(`[Preprocess] Starting file run for ${rawFilePath}`);

  try {
    const raw = await readRawPosts(rawFilePath);
    const enriched = await enrichPosts(raw, options);
    const { added, skipped } = await getPostStore().addMany(enriched);

    const result: RunResult = {
      source: rawFilePath,
      processed: enriched.length,
      added: added.length,
      skipped,
    };

    lastRunResult = result;
    lastRunError = null;
    console.log(`[Preprocess] File run complete: ${result.added} added, ${result.skipped} already stored`);
    return result;
  } catch (err) {
    lastRunError = err instanceof Error ? err.message : String(err);
    throw err;
  } finally {
    lastRunAt = new Date().toISOString();
    isRunning = false;
  }
}

export function getRunStatus(): {
  isRunning: boolean;
  lastRunAt: string | null;
  lastRunResult: RunResult | null;
  lastRunError: string | null;
} {
  return { isRunning, lastRunAt, lastRunResult, lastRunError };
}

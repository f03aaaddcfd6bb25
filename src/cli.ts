#!/usr/bin/env node
/**
 * Command line entry point
 *
 * Usage:
 *   linkedin-post-engine preprocess [raw-file] [processed-file]
 *   linkedin-post-engine unify-tags [processed-file]
 *   linkedin-post-engine stats [processed-file]
 */

import 'dotenv/config';
import { processPosts } from './processing/preprocess';
import { JsonFilePostStore } from './services/post-store';
import { getCorpusStats } from './services/corpus';
import { applyToStore, unifyTags } from './services/tags';
import { getConfig } from './config';
import type { EnrichedPost } from './types';

const USAGE = `Usage:
  linkedin-post-engine preprocess [raw-file] [processed-file]
  linkedin-post-engine unify-tags [processed-file]
  linkedin-post-engine stats [processed-file]`;

export function formatSample(posts: EnrichedPost[], count = 3): string {
  return posts
    .slice(0, count)
    .map((post, i) =>
      [
        `Post ${i + 1}:`,
        `  Text preview: ${post.text.slice(0, 100)}...`,
        `  Language: ${post.language}`,
        `  Line count: ${post.line_count}`,
        `  Tags: ${JSON.stringify(post.tags)}`,
      ].join('\n')
    )
    .join('\n\n');
}

async function runPreprocess(args: string[]): Promise<void> {
  const config = getConfig();
  const rawPath = args[0] ?? config.rawPostsPath;
  const processedPath = args[1] ?? config.processedPostsPath;

  const processed = await processPosts(rawPath, processedPath);

  console.log(`\nProcessing complete! Processed ${processed.length} posts.`);
  if (processed.length > 0) {
    console.log('\nSample processed posts:\n');
    console.log(formatSample(processed));
  }
}

async function runUnifyTags(args: string[]): Promise<void> {
  const store = new JsonFilePostStore(args[0] ?? getConfig().processedPostsPath);
  const { mapping } = await unifyTags(await store.list());
  const updated = await applyToStore(store, mapping);

  console.log(`Updated tags on ${updated} posts.`);
  console.log(JSON.stringify(mapping, null, 2));
}

async function runStats(args: string[]): Promise<void> {
  const store = new JsonFilePostStore(args[0] ?? getConfig().processedPostsPath);
  console.log(JSON.stringify(getCorpusStats(await store.list()), null, 2));
}

export async function runCli(argv: string[]): Promise<number> {
  const [command, ...args] = argv;

  try {
    switch (command) {
      case 'preprocess':
        await runPreprocess(args);
        return 0;
      case 'unify-tags':
        await runUnifyTags(args);
        return 0;
      case 'stats':
        await runStats(args);
        return 0;
      default:
        console.error(USAGE);
        return 1;
    }
  } catch (err) {
    console.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
    if (err instanceof Error && err.stack) {
      console.error(err.stack);
    }
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}

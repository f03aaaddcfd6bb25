/**
 * Claude API client for metadata extraction and tag unification
 */

import Anthropic from '@anthropic-ai/sdk';
import { getConfig } from '../config';

let client: Anthropic | null = null;

export function getClaudeClient(): Anthropic {
  if (!client) {
    const apiKey = getConfig().anthropicApiKey;

    if (!apiKey) {
      throw new Error('Missing ANTHROPIC_API_KEY environment variable');
    }

    client = new Anthropic({ apiKey });
  }

  return client;
}

export interface CompletionOptions {
  model?: string;
  maxTokens?: number;
}

export async function completeText(prompt: string, options: CompletionOptions = {}): Promise<string> {
  const claude = getClaudeClient();
  const config = getConfig();

  const response = await claude.messages.create({
    model: options.model ?? config.llmModel,
    max_tokens: options.maxTokens ?? config.llmMaxTokens,
    messages: [
      {
        role: 'user',
        content: prompt,
      },
    ],
  });

  const textBlock = response.content.find((block) => block.type === 'text');
  if (!textBlock || textBlock.type !== 'text') {
    throw new Error('No text response from Claude');
  }

  return textBlock.text.trim();
}

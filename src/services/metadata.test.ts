import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  buildMetadataPrompt,
  detectLanguage,
  detectTags,
  extractMetadata,
  extractMetadataWithRetry,
  getFallbackMetadata,
  isRetryableError,
  MetadataParseError,
  parseMetadataResponse,
  truncatePost,
} from './metadata';
import { completeText } from './claude';
import type { PostMetadata } from '../types';

vi.mock('./claude', () => ({
  completeText: vi.fn(),
}));

const mockedComplete = vi.mocked(completeText);

beforeEach(() => {
  mockedComplete.mockReset();
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('truncatePost / buildMetadataPrompt', () => {
  it('keeps posts up to 1000 characters', () => {
    const text = 'a'.repeat(1000);
    expect(truncatePost(text)).toBe(text);
  });

  it('cuts longer posts and appends an ellipsis', () => {
    const truncated = truncatePost('b'.repeat(1200));
    expect(truncated).toHaveLength(1003);
    expect(truncated.endsWith('b...')).toBe(true);
  });

  it('embeds the post and ends with the JSON cue', () => {
    const prompt = buildMetadataPrompt('Hello team');
    expect(prompt).toContain('Post: Hello team\n\nJSON:');
    expect(prompt.endsWith('JSON:')).toBe(true);
  });
});

describe('parseMetadataResponse', () => {
  it('parses a clean reply', () => {
    expect(parseMetadataResponse('{"line_count": 4, "language": "English", "tags": ["Career", "AI"]}')).toEqual({
      line_count: 4,
      language: 'English',
      tags: ['Career', 'AI'],
    });
  });

  it('accepts numeric strings, lowercase languages and missing tags', () => {
    expect(parseMetadataResponse('Sure! {"line_count": "7", "language": "french"}')).toEqual({
      line_count: 7,
      language: 'French',
      tags: [],
    });
  });

  it('trims, de-duplicates and caps tags at two', () => {
    const reply = '{"line_count": 1, "language": "English", "tags": [" Growth ", "Growth", "", "Sales", "Hiring"]}';
    expect(parseMetadataResponse(reply).tags).toEqual(['Growth', 'Sales']);
  });

  it('rejects replies without JSON', () => {
    expect(() => parseMetadataResponse('I cannot help with that')).toThrow('No valid JSON found in response');
  });

  it('rejects malformed JSON as invalid output', () => {
    expect(() => parseMetadataResponse("{'line_count': 3}")).toThrow(/^Invalid JSON output: /);
  });

  it('rejects an unsupported language', () => {
    expect(() => parseMetadataResponse('{"line_count": 2, "language": "Spanish", "tags": []}')).toThrow(
      'Invalid language: "Spanish"'
    );
  });

  it('rejects a negative or fractional line count', () => {
    expect(() => parseMetadataResponse('{"line_count": -1, "language": "English"}')).toThrow(MetadataParseError);
    expect(() => parseMetadataResponse('{"line_count": 2.5, "language": "English"}')).toThrow(
      'Invalid line_count: 2.5'
    );
  });
});

describe('extractMetadata', () => {
  it('sends the built prompt and parses the reply', async () => {
    mockedComplete.mockResolvedValue('```json\n{"line_count": 2, "language": "English", "tags": ["Tech"]}\n```');

    const metadata = await extractMetadata('Line one\nLine two');

    expect(mockedComplete).toHaveBeenCalledWith(buildMetadataPrompt('Line one\nLine two'));
    expect(metadata).toEqual({ line_count: 2, language: 'English', tags: ['Tech'] });
  });
});

describe('isRetryableError', () => {
  it('retries parse failures and overloaded statuses', () => {
    expect(isRetryableError(new MetadataParseError('No valid JSON found in response'))).toBe(true);
    expect(isRetryableError(Object.assign(new Error('overloaded'), { status: 529 }))).toBe(true);
    expect(isRetryableError(Object.assign(new Error('rate limited'), { status: 429 }))).toBe(true);
    expect(isRetryableError(new Error('503 Service Unavailable'))).toBe(true);
    expect(isRetryableError(new Error('Context too big for model'))).toBe(true);
  });

  it('does not retry auth or request errors', () => {
    expect(isRetryableError(Object.assign(new Error('invalid x-api-key'), { status: 401 }))).toBe(false);
    expect(isRetryableError(new Error('Missing ANTHROPIC_API_KEY environment variable'))).toBe(false);
  });
});

describe('extractMetadataWithRetry', () => {
  const good: PostMetadata = { line_count: 3, language: 'English', tags: ['Career'] };

  it('returns the first successful extraction without waiting', async () => {
    const extract = vi.fn().mockResolvedValue(good);
    const sleep = vi.fn().mockResolvedValue(undefined);

    await expect(extractMetadataWithRetry('text', { extract, sleep, maxRetries: 3, baseDelayMs: 5000 })).resolves.toEqual(
      good
    );
    expect(extract).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('backs off exponentially between retryable failures', async () => {
    const extract = vi
      .fn()
      .mockRejectedValueOnce(new Error('503 Service Unavailable'))
      .mockRejectedValueOnce(new MetadataParseError('No valid JSON found in response'))
      .mockResolvedValueOnce(good);
    const sleep = vi.fn().mockResolvedValue(undefined);

    const result = await extractMetadataWithRetry('text', { extract, sleep, maxRetries: 3, baseDelayMs: 5000 });

    expect(result).toEqual(good);
    expect(sleep.mock.calls).toEqual([[5000], [10000]]);
  });

  it('does not wait after the last attempt and falls back', async () => {
    const extract = vi.fn().mockRejectedValue(new Error('service unavailable'));
    const sleep = vi.fn().mockResolvedValue(undefined);

    const result = await extractMetadataWithRetry('Our startup is hiring\nJoin the team', {
      extract,
      sleep,
      maxRetries: 3,
      baseDelayMs: 100,
    });

    expect(extract).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
    expect(result).toEqual({ line_count: 2, language: 'English', tags: ['business', 'leadership'] });
  });

  it('stops at the first non-retryable error', async () => {
    const extract = vi.fn().mockRejectedValue(Object.assign(new Error('invalid x-api-key'), { status: 401 }));
    const sleep = vi.fn().mockResolvedValue(undefined);

    const result = await extractMetadataWithRetry('Just a thought', { extract, sleep, maxRetries: 3, baseDelayMs: 100 });

    expect(extract).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(result).toEqual({ line_count: 1, language: 'English', tags: [] });
  });
});

describe('fallback heuristics', () => {
  it('detects French when more than three marker words appear as whole words', () => {
    expect(detectLanguage("Le projet est une réussite et la suite arrive")).toBe('French');
  });

  it('ignores marker letters inside English words', () => {
    // "people", "delivery", "set", "unique" all contain marker fragments
    expect(detectLanguage('People love delivery; set a unique cadence')).toBe('English');
  });

  it('needs strictly more than three markers', () => {
    expect(detectLanguage('le la les')).toBe('English');
    expect(detectLanguage('le la les de')).toBe('French');
  });

  it('matches keyword groups in order and stops at two', () => {
    expect(detectTags('New job at a tech company with a great team')).toEqual(['career', 'business']);
  });

  it('matches multi-word keywords and whole words only', () => {
    expect(detectTags('Our social media plan')).toEqual(['marketing']);
    expect(detectTags('She said it was paid')).toEqual([]);
  });

  it('counts lines on newline boundaries', () => {
    expect(getFallbackMetadata('one\ntwo\n\nfour')).toEqual({ line_count: 4, language: 'English', tags: [] });
    expect(getFallbackMetadata('').line_count).toBe(1);
  });
});

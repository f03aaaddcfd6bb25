import { describe, it, expect } from 'vitest';
import { extractJsonFromText } from './json-extract';

describe('extractJsonFromText', () => {
  it('prefers a fenced json block', () => {
    const reply = 'Here you go:\n```json\n{"line_count": 3, "tags": ["Career"]}\n```\nDone {"x": 1}';
    expect(extractJsonFromText(reply)).toBe('{"line_count": 3, "tags": ["Career"]}');
  });

  it('accepts a fence without a language tag, case-insensitively', () => {
    const reply = '```JSON\n{"a": 1}\n```';
    expect(extractJsonFromText(reply)).toBe('{"a": 1}');
    expect(extractJsonFromText('```\n{"b": 2}\n```')).toBe('{"b": 2}');
  });

  it('picks the longest bare object when several are present', () => {
    const reply = 'first {"a": 1} then {"line_count": 4, "language": "French"}';
    expect(extractJsonFromText(reply)).toBe('{"line_count": 4, "language": "French"}');
  });

  it('keeps the first candidate on equal length', () => {
    expect(extractJsonFromText('{"a": 1} {"b": 2}')).toBe('{"a": 1}');
  });

  it('matches one level of nesting', () => {
    const reply = 'JSON: {"meta": {"n": 1}, "ok": true}';
    expect(extractJsonFromText(reply)).toBe('{"meta": {"n": 1}, "ok": true}');
  });

  it('returns the innermost two levels when nesting goes deeper', () => {
    const reply = 'x {"a": {"b": {"c": 1}}} y';
    expect(extractJsonFromText(reply)).toBe('{"b": {"c": 1}}');
  });

  it('returns null when there is no object', () => {
    expect(extractJsonFromText('no json here')).toBeNull();
    expect(extractJsonFromText('} backwards {')).toBeNull();
  });
});

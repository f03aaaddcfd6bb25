/**
 * Unicode cleanup for scraped post text
 *
 * Scraped dumps sometimes carry lone UTF-16 surrogates (half of an emoji
 * cut in two). Those cannot be encoded as UTF-8, so they are replaced with
 * U+FFFD before the text goes anywhere else.
 */

const REPLACEMENT_CHAR = '\uFFFD';

// A high surrogate without a following low one, or a low surrogate without a preceding high one
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

export function cleanUnicode(value: unknown): string {
  const text = typeof value === 'string' ? value : String(value);
  return text.replace(LONE_SURROGATE, REPLACEMENT_CHAR);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function cleanDataRecursively(value: unknown): unknown {
  if (typeof value === 'string') {
    return cleanUnicode(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => cleanDataRecursively(item));
  }

  if (isPlainObject(value)) {
    const cleaned: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      cleaned[cleanUnicode(key)] = cleanDataRecursively(item);
    }
    return cleaned;
  }

  return value;
}

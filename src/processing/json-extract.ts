/**
 * Pulls a JSON object out of an LLM reply that may wrap it in markdown
 * fences or surround it with explanation.
 */

const FENCED_BLOCK = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/i;

// Objects with at most one level of nesting
const SHALLOW_OBJECT = /\{[^{}]*(?:\{[^{}]*\}[^{}]*)*\}/g;

export function extractJsonFromText(text: string): string | null {
  const fenced = text.match(FENCED_BLOCK);
  if (fenced) {
    return fenced[1].trim();
  }

  const candidates = text.match(SHALLOW_OBJECT);
  if (candidates && candidates.length > 0) {
    let longest = candidates[0];
    for (const candidate of candidates) {
      if (candidate.length > longest.length) {
        longest = candidate;
      }
    }
    return longest.trim();
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end !== -1 && start < end) {
    return text.slice(start, end + 1).trim();
  }

  return null;
}

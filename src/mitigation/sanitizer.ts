/**
 * Sanitization for the REWRITE action: every matched span is replaced
 * with a placeholder, text outside the spans is kept as is.
 */

import { RuleMatch } from '../types';

/** Placeholder left where a matched phrase was removed; matches no default rule */
export const REMOVED_PLACEHOLDER = '[REMOVED]';

/** Half-open span [start, end) of the input */
export interface TextSpan {
  start: number;
  end: number;
}

export interface SanitizationResult {
  text: string;
  removedSpans: TextSpan[];
}

/**
 * Merge overlapping or touching spans, sorted by start
 */
export function mergeSpans(spans: readonly TextSpan[]): TextSpan[] {
  const sorted = [...spans]
    .filter(s => s.end > s.start)
    .sort((a, b) => a.start - b.start || a.end - b.end);

  const merged: TextSpan[] = [];
  for (const span of sorted) {
    const last = merged[merged.length - 1];
    if (last && span.start <= last.end) {
      last.end = Math.max(last.end, span.end);
    } else {
      merged.push({ ...span });
    }
  }
  return merged;
}

/**
 * Replace every matched span in text with the placeholder.
 *
 * Removing a span can bring two fragments of a phrase together and form
 * a new match; such residual matches are not rewritten again.
 */
export function sanitizePrompt(
  text: string,
  matches: readonly RuleMatch[],
  placeholder: string = REMOVED_PLACEHOLDER
): SanitizationResult {
  const removedSpans = mergeSpans(
    matches.map(m => ({ start: m.position, end: m.position + m.matchedText.length }))
  );

  let result = '';
  let cursor = 0;
  for (const span of removedSpans) {
    result += text.slice(cursor, span.start) + placeholder;
    cursor = span.end;
  }
  result += text.slice(cursor);

  return { text: result, removedSpans };
}

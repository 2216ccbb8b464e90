/**
 * Context formatting
 *
 * Renders retrieved passages into the block the model answers from, and
 * collects the links returned to the caller.
 */

import type { SearchResult } from '../retrieval/index.js';
import { NO_RESULTS_CONTEXT } from './types.js';

export const CONTEXT_SEPARATOR = '\n\n---\n\n';

/**
 * One numbered entry per passage, in ranking order.
 *
 * @example
 * formatContext([{ text: 'Kola', label: 'pepsi', docType: 'web', url: '', score: 0.9 }]);
 * // '[Kaynak 1] (Skor: 0.90)\nMarka: pepsi\nİçerik: Kola'
 */
export function formatContext(results: readonly SearchResult[]): string {
  if (results.length === 0) {
    return NO_RESULTS_CONTEXT;
  }

  return results
    .map((result, i) => {
      let entry =
        `[Kaynak ${i + 1}] (Skor: ${result.score.toFixed(2)})\n` +
        `Marka: ${result.label}\n` +
        `İçerik: ${result.text}`;
      if (result.url) {
        entry += `\nURL: ${result.url}`;
      }
      return entry;
    })
    .join(CONTEXT_SEPARATOR);
}

/**
 * Distinct non-empty URLs in first-seen order
 */
export function extractSources(results: readonly SearchResult[]): string[] {
  const seen = new Set<string>();
  for (const result of results) {
    if (result.url) {
      seen.add(result.url);
    }
  }
  return [...seen];
}

/**
 * Split a stored answer back into stream fragments: each word followed by
 * one space.
 */
export function* replayFragments(answer: string): Generator<string, void, unknown> {
  for (const word of answer.split(' ')) {
    yield `${word} `;
  }
}

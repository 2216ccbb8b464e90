/**
 * Label Detector
 *
 * Picks the catalogue label a query is about by fuzzy-matching each word
 * against the known labels. Pure and local; never retried.
 */

import { z } from 'zod';

export const DEFAULT_LABELS = [
  'pepsi',
  'pürsu',
  'doğanay',
  'kızılay',
  'pınar',
  'golf',
  'lipton',
  'fruko',
  'erikli',
  'fritolay',
  'yedigün',
] as const;

/** Label for queries about the company rather than a single brand */
export const DEFAULT_FALLBACK_LABEL = 'sirket_genel';

export const LabelDetectorConfigSchema = z.object({
  labels: z.array(z.string().min(1)).min(1).default([...DEFAULT_LABELS]),
  fallbackLabel: z.string().min(1).default(DEFAULT_FALLBACK_LABEL),
  /** Minimum similarity (0-100) for a word to count as a label mention */
  threshold: z.number().min(0).max(100).default(84),
});

export type LabelDetectorConfig = z.infer<typeof LabelDetectorConfigSchema>;

/**
 * Length of the longest common subsequence of two strings
 */
function lcsLength(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  let previous = new Array<number>(right.length + 1).fill(0);

  for (const charA of left) {
    const current = new Array<number>(right.length + 1).fill(0);
    for (let j = 1; j <= right.length; j++) {
      current[j] =
        charA === right[j - 1]
          ? (previous[j - 1] ?? 0) + 1
          : Math.max(previous[j] ?? 0, current[j - 1] ?? 0);
    }
    previous = current;
  }

  return previous[right.length] ?? 0;
}

/**
 * Indel similarity on a 0-100 scale: 2 * LCS / (len(a) + len(b)) * 100.
 *
 * @example
 * similarity('pepsi', 'pepsi'); // 100
 * similarity('pepsı', 'pepsi'); // 80
 */
export function similarity(a: string, b: string): number {
  const total = Array.from(a).length + Array.from(b).length;
  if (total === 0) return 100;
  return ((2 * lcsLength(a, b)) / total) * 100;
}

export class LabelDetector {
  private readonly config: LabelDetectorConfig;
  private readonly labels: string[];

  constructor(config?: Partial<LabelDetectorConfig>) {
    this.config = LabelDetectorConfigSchema.parse(config ?? {});
    this.labels = this.config.labels.map((label) => label.toLowerCase());
  }

  /**
   * Scans words left to right; the first word that clears the threshold for
   * any label decides, taking its best-scoring label (earlier label on ties).
   */
  detect(query: string): string {
    const words = query.toLowerCase().split(/\s+/).filter((w) => w.length > 0);

    for (const word of words) {
      let best: { label: string; score: number } | undefined;

      for (const label of this.labels) {
        const score = similarity(word, label);
        if (score >= this.config.threshold && (best === undefined || score > best.score)) {
          best = { label, score };
        }
      }

      if (best !== undefined) {
        return best.label;
      }
    }

    return this.config.fallbackLabel;
  }

  get fallbackLabel(): string {
    return this.config.fallbackLabel;
  }
}

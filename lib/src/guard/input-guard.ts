/**
 * Input Guard
 *
 * Size ceilings and a heuristic prompt-injection filter. Runs after
 * admission control and before anything that costs money.
 */

import { z } from 'zod';
import { QueryTooLargeError } from '../errors/index.js';
import { INJECTION_PATTERNS } from './patterns.js';

export const InputGuardConfigSchema = z.object({
  /** Hard character ceiling */
  maxChars: z.number().int().positive().default(1000),
  /** Ceiling on the estimated token count */
  maxTokens: z.number().int().positive().default(350),
  /** Characters per token used by the estimate; 3 suits Turkish text */
  charsPerToken: z.number().positive().default(3),
});

export type InputGuardConfig = z.infer<typeof InputGuardConfigSchema>;

export class InputGuard {
  private readonly config: InputGuardConfig;
  private readonly patterns: readonly RegExp[];

  constructor(
    config?: Partial<InputGuardConfig>,
    patterns: readonly RegExp[] = INJECTION_PATTERNS
  ) {
    this.config = InputGuardConfigSchema.parse(config ?? {});
    this.patterns = patterns;
  }

  /**
   * @throws {QueryTooLargeError} when either ceiling is exceeded
   */
  validateSize(query: string): void {
    if (query.length > this.config.maxChars) {
      throw new QueryTooLargeError('characters', this.config.maxChars, query.length);
    }

    const tokens = this.estimateTokens(query);
    if (tokens > this.config.maxTokens) {
      throw new QueryTooLargeError('tokens', this.config.maxTokens, tokens);
    }
  }

  /**
   * True when any injection pattern matches. Heuristic: false negatives
   * are expected.
   */
  detectInjection(query: string): boolean {
    return this.patterns.some((pattern) => pattern.test(query));
  }

  estimateTokens(text: string): number {
    return Math.ceil(text.length / this.config.charsPerToken);
  }

  getConfig(): Readonly<InputGuardConfig> {
    return this.config;
  }
}

export function createInputGuard(config?: Partial<InputGuardConfig>): InputGuard {
  return new InputGuard(config);
}

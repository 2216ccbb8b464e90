/**
 * Input Guard Module
 */

export { normalizeQuery, queryIdentity, MIN_QUERY_LENGTH } from './normalize.js';
export { INJECTION_PATTERNS } from './patterns.js';
export {
  InputGuard,
  InputGuardConfigSchema,
  type InputGuardConfig,
  createInputGuard,
} from './input-guard.js';

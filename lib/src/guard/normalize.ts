/**
 * Query normalization
 */

// C0 controls and DEL, keeping tab, newline and carriage return for the
// whitespace pass below
const CONTROL_CHARS = /[\x00-\x08\x0b\x0c\x0e-\x1f\x7f]/g;

export const MIN_QUERY_LENGTH = 2;

/**
 * Trim, strip control characters and collapse whitespace runs to one space.
 *
 * @example
 * normalizeQuery('  Pepsi\t\türünleri \n'); // 'Pepsi ürünleri'
 */
export function normalizeQuery(raw: string): string {
  return raw.replace(CONTROL_CHARS, '').replace(/\s+/g, ' ').trim();
}

/**
 * Identity of a query for caching: its normalized, lower-cased form
 */
export function queryIdentity(raw: string): string {
  return normalizeQuery(raw).toLowerCase();
}

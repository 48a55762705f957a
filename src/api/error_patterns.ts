/**
 * Message grammar of the benchmark API's pagination failures.
 *
 * The API never advertises its page-size ceiling; it only reveals it inside
 * the error text of an oversized request, e.g.
 *   "page limit exceeded: 10 > 3"
 * Everything that depends on that wording lives here.
 */

export interface LimitOverflow {
  requested: number;
  allowed: number;
}

const LIMIT_OVERFLOW_PATTERN = /exceeded.*?(\d+).*?>.*?(\d+)/;

const INVALID_PAGINATION_PHRASES = ['invalid pagination', 'invalid params'];

/**
 * Extract the requested/allowed pair from an overflow message.
 * Returns null when the message does not follow the expected grammar.
 */
export function matchLimitOverflow(message: string): LimitOverflow | null {
  const match = message.toLowerCase().match(LIMIT_OVERFLOW_PATTERN);
  if (!match) return null;
  const requested = Number(match[1]);
  const allowed = Number(match[2]);
  if (!Number.isSafeInteger(requested) || !Number.isSafeInteger(allowed)) {
    return null;
  }
  return { requested, allowed };
}

export function isInvalidPagination(message: string): boolean {
  const text = message.toLowerCase();
  return INVALID_PAGINATION_PHRASES.some((phrase) => text.includes(phrase));
}

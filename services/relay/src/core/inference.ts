import type { ContentValue } from '../types';

// Plain decimal only: no hex, no underscores, no Infinity/NaN, no surrounding whitespace
const DECIMAL_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Infer the stored value of one raw parameter.
 *
 * Numeric literals win over strings. Whether a number reads back as an
 * integer or a float follows its value, not its spelling: `"7"`, `"007"` and
 * `"1e5"` come back integral, `"666.666"` does not.
 */
export function inferValue(raw: string): ContentValue {
  if (DECIMAL_LITERAL.test(raw)) {
    const value = Number(raw);
    if (Number.isFinite(value)) return value;
  }
  return raw;
}

/**
 * ENDF-6 11-column floating point fields.
 *
 * Fields may carry blanks anywhere, may be entirely blank (zero), and may
 * write the exponent as a bare sign (`1.234560+2`) or with a `D`/`d` marker
 * instead of `E`/`e`. Conversion is lenient: malformed text never throws.
 */

import { BoundedCharBuffer } from './boundedBuffer.js';

export const ENDF_FIELD_WIDTH = 11;

/** Field width plus the one exponent marker the scan may insert. */
export const NORMALIZED_NUMERAL_CAPACITY = ENDF_FIELD_WIDTH + 1;

const EXPONENT_MARKERS = new Set(['e', 'E', 'd', 'D']);

// Longest convertible prefix, in the shape a C `strtod` accepts for decimals.
const DECIMAL_PREFIX_RE = /^[\t\n\v\f\r ]*[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/**
 * Rewrite the first 11 characters of an ENDF field as a plain decimal numeral.
 *
 * `" 1.234560+2"` becomes `"1.234560e+2"`, `"1.0D+01"` becomes `"1.0e+01"`,
 * and a blank field becomes `""`.
 */
export function normalizeEndfNumeral(field: string): string {
  const out = new BoundedCharBuffer(NORMALIZED_NUMERAL_CAPACITY);
  const n = Math.min(field.length, ENDF_FIELD_WIDTH);
  let foundSignificand = false;
  let foundExponent = false;

  for (let i = 0; i < n; i += 1) {
    const c = field.charAt(i);
    if (c === ' ') continue;

    if (!foundSignificand) {
      if (c === '.' || isDigit(c)) foundSignificand = true;
    } else if (!foundExponent) {
      if (c === '+' || c === '-') {
        // sign with no marker letter: supply one
        out.push('e');
        foundExponent = true;
      } else if (EXPONENT_MARKERS.has(c)) {
        out.push('e');
        foundExponent = true;
        continue;
      }
    }

    out.push(c);
  }

  return out.toString();
}

/**
 * Convert a decimal numeral the way C `atof` does: the longest valid prefix
 * is used and text with no valid prefix is 0.
 */
export function decimalPrefixToNumber(numeral: string): number {
  const m = DECIMAL_PREFIX_RE.exec(numeral);
  if (!m) return 0;
  return Number(m[0]);
}

/** Parse one ENDF-6 float field. Only the first 11 characters are read. */
export function parseEndfFloat(field: string): number {
  return decimalPrefixToNumber(normalizeEndfNumeral(field));
}

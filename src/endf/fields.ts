import { invalidParams, malformedRecord } from '../shared/index.js';
import { ENDF_FIELD_WIDTH } from './parseFloat.js';

export const FIELDS_PER_LINE = 6;
export const DATA_COLUMNS = FIELDS_PER_LINE * ENDF_FIELD_WIDTH;

export interface ControlColumns {
  MAT: number;
  MF: number;
  MT: number;
  NS: number;
}

/** Integer field. A blank field is 0; anything else must be a plain integer. */
export function parseEndfInt(field: string): number {
  const raw = field.trim();
  if (raw.length === 0) return 0;
  if (!/^[+-]?\d+$/.test(raw)) {
    throw malformedRecord(`Invalid ENDF integer field: "${field}"`, { field });
  }
  return Number(raw);
}

/**
 * Mantissa and exponent of `value` at `decimals` places. Rounding the largest
 * doubles can overflow (1.7977e+308), so those are truncated instead.
 */
function exponentialParts(value: number, decimals: number): [string, string] {
  const rounded = value.toExponential(decimals);
  if (Number.isFinite(Number(rounded))) {
    const [mantissa = '', exponent = ''] = rounded.split('e');
    return [mantissa, exponent];
  }
  const [digits = '', exponent = ''] = value.toExponential(16).split('e');
  return [digits.slice(0, (value < 0 ? 3 : 2) + decimals), exponent];
}

/**
 * Render a number as an 11-column ENDF float, e.g. ` 1.234560+2`.
 *
 * Mantissa precision shrinks as the exponent grows so the field always
 * fits: 6 decimals for one exponent digit, 5 for two, 4 for three.
 */
export function formatEndfFloat(value: number): string {
  if (!Number.isFinite(value)) {
    throw invalidParams(`Cannot write non-finite value ${value} to an ENDF field`);
  }
  if (value === 0) return ' 0.000000+0';

  for (const decimals of [6, 5, 4]) {
    const [mantissa, exponent] = exponentialParts(value, decimals);
    const body = `${mantissa}${exponent}`;
    const width = value < 0 ? body.length : body.length + 1;
    if (width <= ENDF_FIELD_WIDTH) return body.padStart(ENDF_FIELD_WIDTH, ' ');
  }
  throw invalidParams(`Value ${value} does not fit an ENDF field`);
}

export function formatEndfInt(value: number): string {
  if (!Number.isInteger(value)) {
    throw invalidParams(`Cannot write non-integer ${value} to an ENDF integer field`);
  }
  const text = String(value);
  if (text.length > ENDF_FIELD_WIDTH) {
    throw invalidParams(`Integer ${value} does not fit an ENDF field`);
  }
  return text.padStart(ENDF_FIELD_WIDTH, ' ');
}

/** The six 11-column data fields of a line; short lines read as blanks. */
export function splitDataFields(line: string): string[] {
  const fields: string[] = [];
  for (let i = 0; i < FIELDS_PER_LINE; i += 1) {
    fields.push(line.slice(i * ENDF_FIELD_WIDTH, (i + 1) * ENDF_FIELD_WIDTH).padEnd(ENDF_FIELD_WIDTH, ' '));
  }
  return fields;
}

/**
 * MAT (67-70), MF (71-72), MT (73-75) and sequence number (76-80).
 * Sequence numbers are optional in practice; unreadable ones are 0.
 */
export function parseControlColumns(line: string): ControlColumns {
  const ns = line.slice(75, 80).trim();
  return {
    MAT: parseEndfInt(line.slice(66, 70)),
    MF: parseEndfInt(line.slice(70, 72)),
    MT: parseEndfInt(line.slice(72, 75)),
    NS: /^\d+$/.test(ns) ? Number(ns) : 0,
  };
}

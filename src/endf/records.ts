/**
 * ENDF-6 record readers.
 *
 * Each reader consumes lines from an `EndfLineReader` and leaves the cursor
 * on the line after the record. Floats go through `parseEndfFloat` (never
 * fails); integer fields go through `parseEndfInt` (throws MALFORMED_RECORD).
 */

import { malformedRecord } from '../shared/index.js';
import { DATA_COLUMNS, FIELDS_PER_LINE, parseEndfInt, splitDataFields } from './fields.js';
import { ENDF_FIELD_WIDTH, parseEndfFloat } from './parseFloat.js';
import { Tabulated1D, type Tabulated2D } from './tabulated.js';

export interface ContRecord {
  C1: number;
  C2: number;
  L1: number;
  L2: number;
  N1: number;
  N2: number;
}

export interface ControlOnlyRecord {
  C1: null;
  C2: null;
  L1: number;
  L2: number;
  N1: number;
  N2: number;
}

export interface HeadRecord {
  ZA: number;
  AWR: number;
  L1: number;
  L2: number;
  N1: number;
  N2: number;
}

export interface ListRecord {
  params: ContRecord;
  values: number[];
}

export interface Tab1Record {
  params: ContRecord;
  table: Tabulated1D;
}

export interface Tab2Record {
  params: ContRecord;
  table: Tabulated2D;
}

/** Items per INTG line, keyed by NDIGIT. */
const INTG_ITEMS_PER_ROW: Record<number, number> = { 2: 18, 3: 12, 4: 11, 5: 9, 6: 8 };

export class EndfLineReader {
  private index = 0;

  constructor(private readonly lines: readonly string[]) {}

  static fromText(text: string): EndfLineReader {
    const lines = text.split(/\r?\n/);
    if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
    return new EndfLineReader(lines);
  }

  get position(): number {
    return this.index;
  }

  get atEnd(): boolean {
    return this.index >= this.lines.length;
  }

  peek(): string | undefined {
    return this.lines[this.index];
  }

  next(): string {
    const line = this.lines[this.index];
    if (line === undefined) {
      throw malformedRecord(`Unexpected end of ENDF data after line ${this.index}`, { line: this.index });
    }
    this.index += 1;
    return line;
  }
}

function fieldAt(line: string, slot: number): string {
  return line.slice(slot * ENDF_FIELD_WIDTH, (slot + 1) * ENDF_FIELD_WIDTH);
}

function requireCount(name: string, value: number): number {
  if (value < 0) throw malformedRecord(`Negative ${name}=${value} in ENDF record`, { [name]: value });
  return value;
}

export function readTextRecord(reader: EndfLineReader): string {
  return reader.next().slice(0, DATA_COLUMNS);
}

export function readContRecord(reader: EndfLineReader): ContRecord;
export function readContRecord(reader: EndfLineReader, options: { skipC: true }): ControlOnlyRecord;
export function readContRecord(reader: EndfLineReader, options?: { skipC?: boolean }): ContRecord | ControlOnlyRecord;
export function readContRecord(reader: EndfLineReader, options: { skipC?: boolean } = {}): ContRecord | ControlOnlyRecord {
  const line = reader.next();
  const ints = {
    L1: parseEndfInt(fieldAt(line, 2)),
    L2: parseEndfInt(fieldAt(line, 3)),
    N1: parseEndfInt(fieldAt(line, 4)),
    N2: parseEndfInt(fieldAt(line, 5)),
  };
  if (options.skipC) return { C1: null, C2: null, ...ints };
  return {
    C1: parseEndfFloat(fieldAt(line, 0)),
    C2: parseEndfFloat(fieldAt(line, 1)),
    ...ints,
  };
}

export function readHeadRecord(reader: EndfLineReader): HeadRecord {
  const { C1, C2, L1, L2, N1, N2 } = readContRecord(reader);
  return { ZA: Math.trunc(C1), AWR: C2, L1, L2, N1, N2 };
}

export function readListRecord(reader: EndfLineReader): ListRecord {
  const params = readContRecord(reader);
  const npl = requireCount('NPL', params.N1);
  const values: number[] = [];
  while (values.length < npl) {
    const fields = splitDataFields(reader.next());
    const take = Math.min(FIELDS_PER_LINE, npl - values.length);
    for (let j = 0; j < take; j += 1) {
      values.push(parseEndfFloat(fields[j] ?? ''));
    }
  }
  return { params, values };
}

/** NR (NBT, INT) pairs, three per line. */
function readInterpolationTable(reader: EndfLineReader, nRegions: number): Tabulated2D {
  const breakpoints: number[] = [];
  const interpolation: number[] = [];
  while (breakpoints.length < nRegions) {
    const fields = splitDataFields(reader.next());
    const take = Math.min(3, nRegions - breakpoints.length);
    for (let j = 0; j < take; j += 1) {
      breakpoints.push(parseEndfInt(fields[2 * j] ?? ''));
      interpolation.push(parseEndfInt(fields[2 * j + 1] ?? ''));
    }
  }
  return { breakpoints, interpolation };
}

export function readTab1Record(reader: EndfLineReader): Tab1Record {
  const params = readContRecord(reader);
  const nRegions = requireCount('NR', params.N1);
  const nPairs = requireCount('NP', params.N2);
  const { breakpoints, interpolation } = readInterpolationTable(reader, nRegions);

  const x: number[] = [];
  const y: number[] = [];
  while (x.length < nPairs) {
    const fields = splitDataFields(reader.next());
    const take = Math.min(3, nPairs - x.length);
    for (let j = 0; j < take; j += 1) {
      x.push(parseEndfFloat(fields[2 * j] ?? ''));
      y.push(parseEndfFloat(fields[2 * j + 1] ?? ''));
    }
  }

  return { params, table: new Tabulated1D(x, y, breakpoints, interpolation) };
}

export function readTab2Record(reader: EndfLineReader): Tab2Record {
  const params = readContRecord(reader);
  const table = readInterpolationTable(reader, requireCount('NR', params.N1));
  return { params, table };
}

/**
 * INTG record: a correlation matrix stored as signed NDIGIT-wide integers.
 * Returns the full symmetric matrix with a unit diagonal.
 */
export function readIntgRecord(reader: EndfLineReader): number[][] {
  const params = readContRecord(reader);
  const ndigit = params.L1;
  const npar = requireCount('NPAR', params.L2);
  const nlines = requireCount('NLINES', params.N1);
  const nrow = INTG_ITEMS_PER_ROW[ndigit];
  if (nrow === undefined) {
    throw malformedRecord(`Unsupported INTG NDIGIT=${ndigit}`, { NDIGIT: ndigit });
  }

  const corr: number[][] = Array.from({ length: npar }, (_, i) =>
    Array.from({ length: npar }, (_, j) => (i === j ? 1 : 0)),
  );
  const factor = 10 ** ndigit;
  const width = ndigit + 1;

  for (let line = 0; line < nlines; line += 1) {
    const text = reader.next();
    const ii = parseEndfInt(text.slice(0, 5)) - 1;
    const jj = parseEndfInt(text.slice(5, 10)) - 1;
    const row = corr[ii];
    if (row === undefined || jj < 0) {
      throw malformedRecord(`INTG row/column out of range: (${ii + 1}, ${jj + 1})`, { NPAR: npar });
    }
    for (let j = 0; j < nrow; j += 1) {
      const col = jj + j;
      if (col >= ii) break;
      const element = parseEndfInt(text.slice(11 + width * j, 11 + width * (j + 1)));
      if (element > 0) row[col] = (element + 0.5) / factor;
      else if (element < 0) row[col] = (element - 0.5) / factor;
    }
  }

  for (let i = 0; i < npar; i += 1) {
    for (let j = 0; j < i; j += 1) {
      const lower = corr[i]?.[j] ?? 0;
      const upperRow = corr[j];
      if (upperRow) upperRow[i] = lower;
    }
  }
  return corr;
}

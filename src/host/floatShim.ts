/**
 * Boundary between host values and the pure field parser.
 *
 * Hosts hand over either text or raw bytes read from a tape; bytes are
 * decoded as Latin-1 so every byte maps to exactly one character and
 * column positions survive. Length is not checked here: the parser reads
 * the first 11 characters itself.
 */

import { z } from 'zod';
import { parseEndfFloat } from '../endf/index.js';
import { invalidParams } from '../shared/index.js';

const HostFieldSchema = z.union([z.string(), z.instanceof(Uint8Array)]);

export type HostField = z.infer<typeof HostFieldSchema>;

export function hostFieldToText(value: unknown): string {
  const parsed = HostFieldSchema.safeParse(value);
  if (!parsed.success) {
    throw invalidParams('ENDF field must be a string or byte array', {
      received: value === null ? 'null' : typeof value,
    });
  }
  const field = parsed.data;
  return typeof field === 'string' ? field : Buffer.from(field).toString('latin1');
}

export function parseEndfFloatFromHost(value: unknown): number {
  return parseEndfFloat(hostFieldToText(value));
}

export function parseEndfFloatsFromHost(values: unknown): number[] {
  if (!Array.isArray(values)) {
    throw invalidParams('ENDF fields must be passed as an array');
  }
  return values.map((value, index) => {
    try {
      return parseEndfFloatFromHost(value);
    } catch (err) {
      throw invalidParams(`ENDF field at index ${index} must be a string or byte array`, {
        index,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  });
}

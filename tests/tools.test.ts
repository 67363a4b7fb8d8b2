import { afterAll, afterEach, beforeAll, describe, expect, it } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { handleToolCall } from '../src/tools/dispatcher.js';
import { buildSampleTape } from './helpers/endfText.js';

type Payload = Record<string, unknown> & { error?: { code: string; message: string; data?: unknown } };

async function call(name: string, args: Record<string, unknown>, mode: 'standard' | 'full' = 'standard') {
  const res = await handleToolCall(name, args, mode);
  const text = res.content[0]?.text ?? '';
  return { isError: res.isError === true, payload: JSON.parse(text) as Payload };
}

const tape = buildSampleTape();

describe('float tools', () => {
  it('endf_parse_float returns the normalized numeral and value', async () => {
    const { isError, payload } = await call('endf_parse_float', { field: ' 1.234560+2' });
    expect(isError).toBe(false);
    expect(payload).toEqual({ field: ' 1.234560+2', normalized: '1.234560e+2', value: 123.456 });
  });

  it('endf_parse_float reads a blank field as 0', async () => {
    const { payload } = await call('endf_parse_float', { field: '           ' });
    expect(payload.value).toBe(0);
  });

  it('endf_parse_float rejects a non-string field', async () => {
    const { isError, payload } = await call('endf_parse_float', { field: 123 });
    expect(isError).toBe(true);
    expect(payload.error?.code).toBe('INVALID_PARAMS');
    expect(payload.error?.message).toBe('Invalid parameters for endf_parse_float');
  });

  it('endf_parse_floats converts a batch and names non-finite values', async () => {
    const { payload } = await call('endf_parse_floats', { fields: ['', '1.0D+01', '1.0+999'] });
    expect(payload.values).toEqual([0, 10, 'Infinity']);
  });

  it('endf_parse_floats rejects an empty batch', async () => {
    const { payload } = await call('endf_parse_floats', { fields: [] });
    expect(payload.error?.code).toBe('INVALID_PARAMS');
  });

  it('endf_format_float renders an 11-column field', async () => {
    const { payload } = await call('endf_format_float', { value: 123.456 });
    expect(payload).toEqual({ field: ' 1.234560+2' });
  });

  it('endf_parse_int is only exposed in full mode', async () => {
    const hidden = await call('endf_parse_int', { field: '42' });
    expect(hidden.payload.error?.message).toBe('Tool not exposed in standard mode: endf_parse_int');

    const shown = await call('endf_parse_int', { field: '         42' }, 'full');
    expect(shown.payload).toEqual({ value: 42 });

    const bad = await call('endf_parse_int', { field: '4.2' }, 'full');
    expect(bad.payload.error?.code).toBe('MALFORMED_RECORD');
  });

  it('returns a result the MCP server accepts as a tool result', async () => {
    const res: CallToolResult = await handleToolCall('endf_format_float', { value: 1 });
    expect(res.content).toEqual([{ type: 'text', text: JSON.stringify({ field: ' 1.000000+0' }, null, 2) }]);
  });

  it('rejects unknown tools', async () => {
    const { payload } = await call('endf_nope', {});
    expect(payload.error).toEqual({ code: 'INVALID_PARAMS', message: 'Unknown tool: endf_nope' });
  });
});

describe('tape tools', () => {
  const envBackup = process.env.ENDF_MAX_FILE_BYTES;
  const tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'endf-mcp-tools-'));
  const tapePath = path.join(tmpRoot, 'h1.endf');

  beforeAll(() => {
    fs.writeFileSync(tapePath, tape, 'latin1');
  });

  afterEach(() => {
    if (envBackup === undefined) delete process.env.ENDF_MAX_FILE_BYTES;
    else process.env.ENDF_MAX_FILE_BYTES = envBackup;
  });

  afterAll(() => {
    fs.rmSync(tmpRoot, { recursive: true, force: true });
  });

  it('endf_list_sections lists materials and section line counts', async () => {
    const { payload } = await call('endf_list_sections', { text: tape });
    expect(payload).toEqual([
      {
        MAT: 125,
        description: 'Incident-neutron data for 1-H-1 ENDF/B',
        sections: [
          { MF: 1, MT: 451, lines: 11 },
          { MF: 3, MT: 1, lines: 4 },
          { MF: 3, MT: 102, lines: 4 },
        ],
      },
      {
        MAT: 128,
        description: 'MAT=128',
        sections: [{ MF: 3, MT: 2, lines: 4 }],
      },
    ]);
  });

  it('requires exactly one of text and path', async () => {
    const both = await call('endf_list_sections', { text: tape, path: tapePath });
    expect(both.payload.error?.code).toBe('INVALID_PARAMS');
    const neither = await call('endf_list_sections', {});
    expect(neither.payload.error?.code).toBe('INVALID_PARAMS');
  });

  it('endf_get_header reads from an absolute path', async () => {
    const { payload } = await call('endf_get_header', { path: tapePath });
    expect(payload.MAT).toBe(125);
    expect(payload.ZA).toBe(1001);
    expect(payload.library).toBe('ENDF/B');
    expect(payload.ZSYMAM).toBe('1-H -  1');
  });

  it('rejects relative paths', async () => {
    const { payload } = await call('endf_get_header', { path: 'h1.endf' });
    expect(payload.error).toEqual({
      code: 'INVALID_PARAMS',
      message: 'path must be absolute',
      data: { path: 'h1.endf' },
    });
  });

  it('enforces ENDF_MAX_FILE_BYTES', async () => {
    process.env.ENDF_MAX_FILE_BYTES = '10';
    const { payload } = await call('endf_get_header', { path: tapePath });
    expect(payload.error?.message).toBe('File exceeds ENDF_MAX_FILE_BYTES=10 bytes');
  });

  it('rejects an invalid ENDF_MAX_FILE_BYTES', async () => {
    process.env.ENDF_MAX_FILE_BYTES = 'lots';
    const { payload } = await call('endf_get_header', { path: tapePath });
    expect(payload.error?.message).toBe('ENDF_MAX_FILE_BYTES must be a positive integer');
  });

  it('endf_get_header reports missing materials with the available ones', async () => {
    const { payload } = await call('endf_get_header', { text: tape, MAT: 999 });
    expect(payload.error).toEqual({
      code: 'NOT_FOUND',
      message: 'No material MAT=999 in input',
      data: { available: [125, 128] },
    });
  });

  it('endf_get_cross_section returns the table', async () => {
    const { payload } = await call('endf_get_cross_section', { text: tape, mt: 102 });
    expect(payload).toEqual({
      MAT: 125,
      MT: 102,
      ZA: 1001,
      AWR: 0.9991673,
      QM: 2224648,
      QI: 2224648,
      LR: 0,
      n_points: 2,
      e_min_eV: 1e-5,
      e_max_eV: 2e7,
      breakpoints: [2],
      interpolation: [5],
      points: [
        { e_eV: 1e-5, sigma_b: 16.72869 },
        { e_eV: 2e7, sigma_b: 2.8784e-5 },
      ],
      truncated: false,
    });
  });

  it('endf_get_cross_section interpolates at an energy', async () => {
    const { payload } = await call('endf_get_cross_section', { text: tape, mt: 102, energy_eV: 100, limit: 1 });
    const evaluation = payload.evaluation as { energy_eV: number; sigma_b: number; interpolation_method: string };
    const expected = 16.72869 * Math.exp((Math.log(100 / 1e-5) / Math.log(2e7 / 1e-5)) * Math.log(2.8784e-5 / 16.72869));
    expect(evaluation.energy_eV).toBe(100);
    expect(evaluation.sigma_b).toBeCloseTo(expected, 10);
    expect(evaluation.interpolation_method).toBe('log-log (INT=5)');
    expect(payload.points).toEqual([{ e_eV: 1e-5, sigma_b: 16.72869 }]);
    expect(payload.truncated).toBe(true);
  });

  it('endf_get_cross_section selects a material by MAT', async () => {
    const { payload } = await call('endf_get_cross_section', { text: tape, MAT: 128, mt: 2, energy_eV: 1e-5 });
    expect(payload.MAT).toBe(128);
    expect(payload.evaluation).toEqual({ energy_eV: 1e-5, sigma_b: 4, interpolation_method: 'clamped (below range)' });
  });

  it('endf_get_cross_section rejects energies outside the table', async () => {
    const { payload } = await call('endf_get_cross_section', { text: tape, mt: 102, energy_eV: 3e7 });
    expect(payload.error?.code).toBe('INVALID_PARAMS');
    expect(payload.error?.message).toBe('energy 30000000 eV is outside tabulated range [0.00001, 20000000] eV');
  });

  it('endf_get_cross_section reports a missing section', async () => {
    const { payload } = await call('endf_get_cross_section', { text: tape, mt: 18 });
    expect(payload.error?.code).toBe('NOT_FOUND');
    expect(payload.error?.message).toBe('MAT=125 has no MF=3 MT=18 section');
  });
});

describe('endf_info', () => {
  it('reports limits and the tool mode', async () => {
    const envBackup = process.env.ENDF_TOOL_MODE;
    delete process.env.ENDF_TOOL_MODE;
    try {
      const { payload } = await call('endf_info', {});
      expect(payload).toMatchObject({
        name: 'endf-mcp',
        tool_mode: 'standard',
        field_width: 11,
        normalized_capacity: 12,
      });
    } finally {
      if (envBackup !== undefined) process.env.ENDF_TOOL_MODE = envBackup;
    }
  });
});

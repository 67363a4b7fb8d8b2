import { z, ZodError } from 'zod';
import { zodToMcpInputSchema } from './mcpSchema.js';
import {
  DEFAULT_MAX_FILE_BYTES,
  SERVER_NAME,
  SERVER_VERSION,
  getMaxFileBytesFromEnv,
  getToolModeFromEnv,
  readEndfFile,
  type ToolExposureMode,
} from '../config.js';
import {
  ENDF_FIELD_WIDTH,
  NORMALIZED_NUMERAL_CAPACITY,
  formatEndfFloat,
  normalizeEndfNumeral,
  parseEndfInt,
  readMaterials,
  type EndfMaterial,
} from '../endf/index.js';
import { hostFieldToText, parseEndfFloatFromHost, parseEndfFloatsFromHost } from '../host/floatShim.js';
import { invalidParams, notFound } from '../shared/index.js';
import {
  ENDF_FORMAT_FLOAT,
  ENDF_GET_CROSS_SECTION,
  ENDF_GET_HEADER,
  ENDF_INFO,
  ENDF_LIST_SECTIONS,
  ENDF_PARSE_FLOAT,
  ENDF_PARSE_FLOATS,
  ENDF_PARSE_INT,
  MAX_BATCH_FIELDS,
} from '../constants.js';

export type { ToolExposureMode } from '../config.js';
export type ToolExposure = 'standard' | 'full';

export interface ToolHandlerContext {}

export interface ToolSpec<TSchema extends z.ZodType = z.ZodType> {
  name: string;
  description: string;
  exposure: ToolExposure;
  zodSchema: TSchema;
  handler: (params: z.output<TSchema>, ctx: ToolHandlerContext) => Promise<unknown>;
}

/** A tool with its argument type erased; `invoke` validates before calling the handler. */
export interface RegisteredTool {
  name: string;
  description: string;
  exposure: ToolExposure;
  zodSchema: z.ZodType;
  invoke: (args: unknown, ctx: ToolHandlerContext) => Promise<unknown>;
}

export function parseToolArgs<TSchema extends z.ZodType>(
  toolName: string,
  schema: TSchema,
  args: unknown,
): z.output<TSchema> {
  try {
    return schema.parse(args);
  } catch (err) {
    if (err instanceof ZodError) {
      throw invalidParams(`Invalid parameters for ${toolName}`, {
        issues: err.issues,
      });
    }
    throw err;
  }
}

function defineTool<TSchema extends z.ZodType>(spec: ToolSpec<TSchema>): RegisteredTool {
  return {
    name: spec.name,
    description: spec.description,
    exposure: spec.exposure,
    zodSchema: spec.zodSchema,
    invoke: (args, ctx) => spec.handler(parseToolArgs(spec.name, spec.zodSchema, args), ctx),
  };
}

export function isToolExposed(spec: RegisteredTool, mode: ToolExposureMode): boolean {
  return mode === 'full' ? true : spec.exposure === 'standard';
}

// ── Helpers ───────────────────────────────────────────────────────────────

/** JSON has no Infinity/NaN; report them by name. */
function jsonNumber(value: number): number | string {
  return Number.isFinite(value) ? value : String(value);
}

async function loadSourceText(source: { text?: string; path?: string }): Promise<string> {
  if (source.text !== undefined) return source.text;
  if (source.path !== undefined) return readEndfFile(source.path);
  throw invalidParams('One of text or path must be provided');
}

async function loadMaterial(source: { text?: string; path?: string; MAT?: number }): Promise<EndfMaterial> {
  const materials = readMaterials(await loadSourceText(source));
  const [first] = materials;
  if (!first) throw notFound('No ENDF-6 material found in input');
  if (source.MAT === undefined) return first;
  const match = materials.find(m => m.MAT === source.MAT);
  if (!match) {
    throw notFound(`No material MAT=${source.MAT} in input`, { available: materials.map(m => m.MAT) });
  }
  return match;
}

// ── Tool Schemas ──────────────────────────────────────────────────────────

const sourceFields = {
  text: z.string().min(1).optional().describe('ENDF-6 formatted text (80-column lines)'),
  path: z.string().min(1).optional().describe('Absolute path to an ENDF-6 file'),
};

const exactlyOneSource = (v: { text?: string; path?: string }): boolean =>
  (v.text === undefined) !== (v.path === undefined);
const exactlyOneSourceMessage = { message: 'Exactly one of text or path must be provided' };

const EndfInfoSchema = z.object({});

const EndfParseFloatSchema = z.object({
  field: z.string().describe('ENDF float field; only the first 11 characters are read'),
});

const EndfParseFloatsSchema = z.object({
  fields: z.array(z.string()).min(1).max(MAX_BATCH_FIELDS).describe('ENDF float fields'),
});

const EndfFormatFloatSchema = z.object({
  value: z.number().finite().describe('Value to render as an 11-column ENDF field'),
});

const EndfParseIntSchema = z.object({
  field: z.string().describe('ENDF integer field (blank reads as 0)'),
});

const EndfListSectionsSchema = z.object(sourceFields).refine(exactlyOneSource, exactlyOneSourceMessage);

const EndfGetHeaderSchema = z.object({
  ...sourceFields,
  MAT: z.number().int().optional().describe('Material number (default: first material)'),
}).refine(exactlyOneSource, exactlyOneSourceMessage);

const EndfGetCrossSectionSchema = z.object({
  ...sourceFields,
  MAT: z.number().int().optional().describe('Material number (default: first material)'),
  mt: z.number().int().min(1).max(999).describe('Reaction number (MT) of the MF=3 section'),
  energy_eV: z.number().finite().optional().describe('Evaluate the cross section at this energy (eV)'),
  limit: z.number().int().min(0).max(100000).optional().default(1000)
    .describe('Maximum tabulated points to return'),
}).refine(exactlyOneSource, exactlyOneSourceMessage);

// ── Tool Specs ────────────────────────────────────────────────────────────

export const TOOL_SPECS: RegisteredTool[] = [
  defineTool({
    name: ENDF_INFO,
    description: 'Return server metadata: version, tool mode, field width, file size limit.',
    exposure: 'standard',
    zodSchema: EndfInfoSchema,
    handler: async () => ({
      name: SERVER_NAME,
      version: SERVER_VERSION,
      tool_mode: getToolModeFromEnv(),
      field_width: ENDF_FIELD_WIDTH,
      normalized_capacity: NORMALIZED_NUMERAL_CAPACITY,
      max_file_bytes: getMaxFileBytesFromEnv(),
      default_max_file_bytes: DEFAULT_MAX_FILE_BYTES,
    }),
  }),
  defineTool({
    name: ENDF_PARSE_FLOAT,
    description: 'Convert one ENDF-6 float field (e.g. " 1.234560+2", "1.0D+01", blank) to a number. Never fails on malformed text; unreadable numerals give 0.',
    exposure: 'standard',
    zodSchema: EndfParseFloatSchema,
    handler: async (params) => {
      const field = hostFieldToText(params.field);
      return {
        field,
        normalized: normalizeEndfNumeral(field),
        value: jsonNumber(parseEndfFloatFromHost(field)),
      };
    },
  }),
  defineTool({
    name: ENDF_PARSE_FLOATS,
    description: `Convert up to ${MAX_BATCH_FIELDS} ENDF-6 float fields in one call.`,
    exposure: 'standard',
    zodSchema: EndfParseFloatsSchema,
    handler: async (params) => ({
      values: parseEndfFloatsFromHost(params.fields).map(jsonNumber),
    }),
  }),
  defineTool({
    name: ENDF_FORMAT_FLOAT,
    description: 'Render a number as an 11-column ENDF-6 float field (sign-only exponent, e.g. " 1.234560+2").',
    exposure: 'standard',
    zodSchema: EndfFormatFloatSchema,
    handler: async (params) => ({ field: formatEndfFloat(params.value) }),
  }),
  defineTool({
    name: ENDF_PARSE_INT,
    description: 'Convert an ENDF-6 integer field to a number (blank is 0).',
    exposure: 'full',
    zodSchema: EndfParseIntSchema,
    handler: async (params) => ({ value: parseEndfInt(params.field) }),
  }),
  defineTool({
    name: ENDF_LIST_SECTIONS,
    description: 'List the materials of an ENDF-6 tape and the (MF, MT) sections each contains, with line counts.',
    exposure: 'standard',
    zodSchema: EndfListSectionsSchema,
    handler: async (params) => {
      const materials = readMaterials(await loadSourceText(params));
      if (materials.length === 0) throw notFound('No ENDF-6 material found in input');
      return materials.map(material => ({
        MAT: material.MAT,
        description: material.describe(),
        sections: material.sections.map(([MF, MT]) => ({
          MF,
          MT,
          lines: material.section(MF, MT).length,
        })),
      }));
    },
  }),
  defineTool({
    name: ENDF_GET_HEADER,
    description: 'Decode the MF=1/MT=451 descriptive header of an ENDF-6 material: ZA, AWR, library, sub-library, evaluation dates, text description, section directory.',
    exposure: 'standard',
    zodSchema: EndfGetHeaderSchema,
    handler: async (params) => {
      const material = await loadMaterial(params);
      return { MAT: material.MAT, ...material.header() };
    },
  }),
  defineTool({
    name: ENDF_GET_CROSS_SECTION,
    description: 'Read an MF=3 cross section (TAB1) from an ENDF-6 material. With energy_eV, also interpolates the cross section at that energy using the section\'s ENDF interpolation laws.',
    exposure: 'standard',
    zodSchema: EndfGetCrossSectionSchema,
    handler: async (params) => {
      const material = await loadMaterial(params);
      const xs = material.crossSection(params.mt);
      const table = xs.sigma;
      const eMin = table.x[0];
      const eMax = table.x[table.x.length - 1];
      if (eMin === undefined || eMax === undefined) {
        throw notFound(`MF=3 MT=${params.mt} has no tabulated points`);
      }

      let evaluation: { energy_eV: number; sigma_b: number | string; interpolation_method: string } | undefined;
      if (params.energy_eV !== undefined) {
        if (params.energy_eV < eMin || params.energy_eV > eMax) {
          throw invalidParams(`energy ${params.energy_eV} eV is outside tabulated range [${eMin}, ${eMax}] eV`);
        }
        const result = table.evaluateWithMethod(params.energy_eV);
        evaluation = {
          energy_eV: params.energy_eV,
          sigma_b: jsonNumber(result.value),
          interpolation_method: result.interpolation_method,
        };
      }

      const shown = Math.min(params.limit, table.nPairs);
      const points: Array<{ e_eV: number; sigma_b: number }> = [];
      for (let i = 0; i < shown; i += 1) {
        points.push({ e_eV: table.x[i] ?? 0, sigma_b: table.y[i] ?? 0 });
      }

      return {
        MAT: material.MAT,
        MT: params.mt,
        ZA: xs.ZA,
        AWR: xs.AWR,
        QM: xs.QM,
        QI: xs.QI,
        LR: xs.LR,
        n_points: table.nPairs,
        e_min_eV: eMin,
        e_max_eV: eMax,
        breakpoints: table.breakpoints,
        interpolation: table.interpolation,
        points,
        truncated: shown < table.nPairs,
        ...(evaluation ? { evaluation } : {}),
      };
    },
  }),
];

// ── Exports ───────────────────────────────────────────────────────────────

export function getToolSpec(name: string): RegisteredTool | undefined {
  return TOOL_SPECS.find(s => s.name === name);
}

export function getToolSpecs(mode: ToolExposureMode = 'standard'): RegisteredTool[] {
  return mode === 'full' ? TOOL_SPECS : TOOL_SPECS.filter(s => s.exposure === 'standard');
}

export function getTools(mode: ToolExposureMode = 'standard'): Array<{
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}> {
  return getToolSpecs(mode).map(s => ({
    name: s.name,
    description: s.description,
    inputSchema: zodToMcpInputSchema(s.zodSchema),
  }));
}

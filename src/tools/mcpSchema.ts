import { z, toJSONSchema } from 'zod';

/**
 * JSON Schema for an MCP tool's `inputSchema`. MCP requires a top-level
 * object; schemas that produce no `type` (e.g. refined objects) get one.
 */
export function zodToMcpInputSchema(schema: z.ZodType): Record<string, unknown> {
  const jsonSchema: Record<string, unknown> = { ...toJSONSchema(schema, {
    target: 'draft-07',
    io: 'input',
    reused: 'inline',
    unrepresentable: 'any',
  }) };

  delete jsonSchema.$schema;
  delete jsonSchema.$defs;

  const type = jsonSchema.type;
  if (type === undefined) {
    jsonSchema.type = 'object';
    return jsonSchema;
  }
  if (type !== 'object') {
    throw new Error(`Invalid MCP inputSchema: expected top-level type "object", got ${JSON.stringify(type)}`);
  }
  return jsonSchema;
}

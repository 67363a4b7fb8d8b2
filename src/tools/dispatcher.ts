import { McpError, invalidParams } from '../shared/index.js';
import type { ToolExposureMode, ToolHandlerContext } from './registry.js';
import { getToolSpec, isToolExposed } from './registry.js';

export type ToolCallResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

function formatToolError(err: unknown): ToolCallResult & { isError: true } {
  const payload = (() => {
    if (err instanceof McpError) {
      const data = err.data;
      const hasData = data !== undefined
        && !(typeof data === 'object' && data !== null && Object.keys(data).length === 0);
      return {
        error: {
          code: err.code,
          message: err.message,
          ...(hasData ? { data } : {}),
        },
      };
    }

    const message = err instanceof Error ? err.message : String(err);
    console.error('[endf-mcp] Unexpected tool error:', message);
    return {
      error: {
        code: 'INTERNAL_ERROR',
        message,
      },
    };
  })();

  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    isError: true,
  };
}

export async function handleToolCall(
  name: string,
  args: Record<string, unknown>,
  mode: ToolExposureMode = 'standard',
  ctx: ToolHandlerContext = {},
): Promise<ToolCallResult> {
  try {
    const spec = getToolSpec(name);
    if (!spec) {
      throw invalidParams(`Unknown tool: ${name}`);
    }
    if (!isToolExposed(spec, mode)) {
      throw invalidParams(`Tool not exposed in ${mode} mode: ${name}`);
    }

    const result = await spec.invoke(args, ctx);
    return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
  } catch (err) {
    return formatToolError(err);
  }
}

export { TOOL_SPECS, getToolSpec, getToolSpecs, getTools, isToolExposed } from './registry.js';
export type { RegisteredTool, ToolExposure, ToolExposureMode, ToolHandlerContext, ToolSpec } from './registry.js';
export { handleToolCall } from './dispatcher.js';
export type { ToolCallResult } from './dispatcher.js';

export { McpError, invalidParams, notFound, malformedRecord, ioError } from './errors.js';
export type { ErrorCode } from './errors.js';

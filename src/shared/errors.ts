export type ErrorCode =
  | 'INVALID_PARAMS'
  | 'NOT_FOUND'
  | 'MALFORMED_RECORD'
  | 'IO_ERROR'
  | 'INTERNAL_ERROR';

export class McpError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public data?: unknown
  ) {
    super(message);
    this.name = 'McpError';
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
    };
  }
}

export function invalidParams(message: string, data?: unknown): McpError {
  return new McpError('INVALID_PARAMS', message, data);
}

export function notFound(message: string, data?: unknown): McpError {
  return new McpError('NOT_FOUND', message, data);
}

/** Record structure that cannot be read (bad integer field, short section). */
export function malformedRecord(message: string, data?: unknown): McpError {
  return new McpError('MALFORMED_RECORD', message, data);
}

export function ioError(message: string, data?: unknown): McpError {
  return new McpError('IO_ERROR', message, data);
}

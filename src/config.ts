import * as fs from 'fs';
import * as path from 'path';
import { invalidParams, ioError } from './shared/index.js';

export const SERVER_NAME = 'endf-mcp';
export const SERVER_VERSION = '0.1.0';

export const TOOL_MODE_ENV = 'ENDF_TOOL_MODE';
export const MAX_FILE_BYTES_ENV = 'ENDF_MAX_FILE_BYTES';
export const DEFAULT_MAX_FILE_BYTES = 64 * 1024 * 1024;

export type ToolExposureMode = 'standard' | 'full';

export function getToolModeFromEnv(): ToolExposureMode {
  return process.env[TOOL_MODE_ENV] === 'full' ? 'full' : 'standard';
}

export function getMaxFileBytesFromEnv(): number {
  const raw = process.env[MAX_FILE_BYTES_ENV];
  if (!raw || raw.trim().length === 0) return DEFAULT_MAX_FILE_BYTES;

  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(value) || value <= 0) {
    throw invalidParams(`${MAX_FILE_BYTES_ENV} must be a positive integer`, {
      env: MAX_FILE_BYTES_ENV,
      value: trimmed,
    });
  }
  return value;
}

function validateFilePath(filePath: string): string {
  if (!path.isAbsolute(filePath)) {
    throw invalidParams('path must be absolute', { path: path.basename(filePath) });
  }

  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw invalidParams('path does not exist', { path: path.basename(resolved) });
  }

  const stat = fs.statSync(resolved);
  if (!stat.isFile()) {
    throw invalidParams('path must point to a file', { path: path.basename(resolved) });
  }

  const limit = getMaxFileBytesFromEnv();
  if (stat.size > limit) {
    throw invalidParams(`File exceeds ${MAX_FILE_BYTES_ENV}=${limit} bytes`, {
      path: path.basename(resolved),
      size_bytes: stat.size,
    });
  }

  return resolved;
}

/** Read an ENDF-6 text file named by an absolute path, within the size limit. */
export async function readEndfFile(filePath: string): Promise<string> {
  const resolved = validateFilePath(filePath);
  try {
    return await fs.promises.readFile(resolved, 'latin1');
  } catch (err) {
    throw ioError(`Failed to read ${path.basename(resolved)}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

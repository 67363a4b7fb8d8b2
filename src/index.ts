#!/usr/bin/env node

import './utils/stdioHygiene.js';

import { fileURLToPath } from 'url';
import { realpathSync } from 'fs';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { getTools, handleToolCall } from './tools/index.js';
import { SERVER_NAME, SERVER_VERSION, getToolModeFromEnv } from './config.js';
import { handleJsonRpcText } from './server/jsonRpc.js';
import { runCli } from './cli.js';

const TOOL_MODE = getToolModeFromEnv();

const server = new Server(
  {
    name: SERVER_NAME,
    version: SERVER_VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: getTools(TOOL_MODE) };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  return handleToolCall(request.params.name, request.params.arguments ?? {}, TOOL_MODE);
});

/**
 * Wait briefly for piped input. Resolves with the first chunk, an empty
 * buffer if nothing arrived in time, or null if stdin closed empty.
 */
function readFirstChunk(timeoutMs: number): Promise<Buffer | null> {
  return new Promise((resolve) => {
    const finish = (value: Buffer | null): void => {
      clearTimeout(timer);
      process.stdin.off('data', onData);
      process.stdin.off('end', onEnd);
      resolve(value);
    };
    const onData = (chunk: string | Buffer): void => {
      process.stdin.pause();
      finish(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    };
    const onEnd = (): void => finish(null);
    const timer = setTimeout(() => finish(Buffer.alloc(0)), timeoutMs);

    process.stdin.on('data', onData);
    process.stdin.on('end', onEnd);
    process.stdin.resume();
  });
}

async function maybeServeOneShotRequest(): Promise<boolean> {
  if (process.stdin.isTTY) return false;

  const firstChunk = await readFirstChunk(30);
  if (firstChunk === null || firstChunk.length === 0) return false;

  const firstText = firstChunk.toString('utf-8');
  if (!firstText.trimStart().startsWith('{')) {
    process.stdin.unshift(firstChunk);
    return false;
  }

  let payload = firstText;
  for await (const chunk of process.stdin) {
    payload += typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf-8');
  }

  const response = await handleJsonRpcText(payload, TOOL_MODE);
  process.stdout.write(`${JSON.stringify(response)}\n`);
  return true;
}

async function main(): Promise<void> {
  if (await runCli(process.argv.slice(2))) {
    return;
  }

  if (await maybeServeOneShotRequest()) {
    console.error('[endf-mcp] Served one-shot JSON-RPC request');
    return;
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[endf-mcp] Server started (tool mode: ${TOOL_MODE})`);
}

const isExecutedAsScript = (() => {
  try {
    const entryPath = process.argv[1] ? realpathSync(process.argv[1]) : '';
    return entryPath === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
})();

if (isExecutedAsScript) {
  main().catch(err => {
    console.error('[endf-mcp] Fatal:', err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}

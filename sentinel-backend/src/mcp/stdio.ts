#!/usr/bin/env node
/**
 * Standalone MCP server over stdio.
 *
 * stdout carries the protocol, so console.log is routed to stderr before
 * anything else logs.
 */

import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createMonitorRuntime } from '../monitor/index.js';
import { createToolServer } from './server.js';

console.log = (...args: unknown[]) => console.error(...args);

const runtime = createMonitorRuntime();
const { server, listTools } = createToolServer(runtime);

const transport = new StdioServerTransport();
await server.connect(transport);
console.log(`[MCP] stdio server ready: ${listTools().length} tools`);

function shutdown(signal: string): void {
  console.log(`[${signal}] Shutting down MCP server...`);
  runtime.engine.stop();
  server.close().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error('[MCP] Close failed:', err instanceof Error ? err.message : err);
      process.exit(1);
    },
  );
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

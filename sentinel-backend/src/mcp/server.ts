/**
 * MCP tool server for fleet insight and remediation control.
 *
 * Provides executeTool() as the single in-process entry point for every tool.
 * The pipeline: look up -> sanitize -> checkSafety -> validate -> handler -> log.
 *
 * Tools are registered once on a ToolRegistry, which records the handler for
 * in-process use and registers the same handler on the MCP SDK server for
 * stdio clients.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { checkSafety, getToolTier } from '../safety/tiers.js';
import { sanitizeArgs } from '../safety/sanitize.js';
import type { MonitorRuntime } from '../monitor/index.js';
import { registerFleetTools } from './tools/fleet.js';
import { registerRemediationTools } from './tools/remediation.js';
import { ToolRegistry, type ToolInfo, type ToolResult, type ToolSource } from './registry.js';

export { errorResult, jsonResult, ToolRegistry } from './registry.js';
export type { ToolDispatcher, ToolInfo, ToolResult, ToolSource } from './registry.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Format milliseconds as human-readable duration */
function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(ms / 60000)}m ${Math.floor((ms % 60000) / 1000)}s`;
}

// ---------------------------------------------------------------------------
// Tool server
// ---------------------------------------------------------------------------

export interface ToolServer {
  server: McpServer;
  executeTool(name: string, args: Record<string, unknown>, source?: ToolSource): Promise<ToolResult>;
  listTools(): ToolInfo[];
}

export function createToolServer(runtime: MonitorRuntime): ToolServer {
  const server = new McpServer({
    name: 'cloud-ops-sentinel',
    version: '1.0.0',
  }, {
    capabilities: {
      tools: {},
    },
  });

  const registry = new ToolRegistry(server);
  registerFleetTools(registry, runtime);
  registerRemediationTools(registry, runtime);

  /**
   * Execute a tool by name with safety checks, logging, and error handling.
   *
   * Pipeline:
   *  1. Look up handler (fail if unknown tool)
   *  2. Sanitize string arguments
   *  3. Run checkSafety() -- block if not allowed
   *  4. Execute handler (validates arguments)
   *  5. Log execution
   */
  async function executeTool(
    name: string,
    args: Record<string, unknown>,
    source: ToolSource = 'api',
  ): Promise<ToolResult> {
    const startTime = Date.now();

    // Step 1: Look up handler
    const handler = registry.get(name);
    if (!handler) {
      const tier = getToolTier(name);
      return {
        content: [{
          type: 'text',
          text: `Unknown tool "${name}". Available tools: ${registry.names().join(', ')}`,
        }],
        isError: true,
        blocked: true,
        reason: `Tool "${name}" not found`,
        tier,
      };
    }

    // Step 2: Sanitize string arguments
    const sanitizedArgs = sanitizeArgs(args);

    // Step 3: Safety check
    const safety = checkSafety(name, sanitizedArgs.confirmed === true);
    if (!safety.allowed) {
      console.warn(`[MCP] BLOCKED: ${name} (${safety.tier}) from ${source} -- ${safety.reason}`);
      return {
        content: [{
          type: 'text',
          text: JSON.stringify({ blocked: true, tool: name, tier: safety.tier, reason: safety.reason }, null, 2),
        }],
        isError: true,
        blocked: true,
        reason: safety.reason,
        tier: safety.tier,
      };
    }

    // Step 4: Execute handler
    const result = await handler(sanitizedArgs);

    // Step 5: Log execution
    const durationMs = Date.now() - startTime;
    console.log(`[MCP] ${result.isError ? 'FAILED' : 'OK'}: ${name} (${safety.tier}) from ${source} [${formatDuration(durationMs)}]`);
    if (durationMs > 10_000) {
      console.warn(`[MCP] Slow tool execution: ${name} took ${formatDuration(durationMs)}`);
    }

    return { ...result, tier: safety.tier };
  }

  // MCP clients (stdio) get the same sanitize -> safety -> log pipeline
  registry.setDispatcher((name, args) => executeTool(name, args, 'mcp'));

  return {
    server,
    executeTool,
    listTools: () => registry.list(),
  };
}

/**
 * Tool registry shared by the MCP SDK server and the in-process executeTool()
 * pipeline. Each tool is registered once; its zod shape validates arguments
 * on both paths, and SDK calls are handed to the dispatcher so they pass the
 * same safety checks as in-process calls.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z, type ZodRawShape, type ZodTypeAny } from 'zod';
import { getToolTier, type ActionTier } from '../safety/tiers.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ToolSource = 'api' | 'chat' | 'mcp' | 'monitor';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
  blocked?: boolean;
  reason?: string;
  tier?: ActionTier;
};

export interface ToolInfo {
  name: string;
  description: string;
  tier: ActionTier;
}

/** Internal tool handler function signature */
export type ToolHandler = (args: Record<string, unknown>) => Promise<ToolResult>;

/** Entry point that MCP SDK calls go through (lookup, safety, logging). */
export type ToolDispatcher = (name: string, args: Record<string, unknown>) => Promise<ToolResult>;

/** JSON result in MCP text content */
export function jsonResult(data: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

export function errorResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }], isError: true };
}

// ---------------------------------------------------------------------------
// Tool registry
// ---------------------------------------------------------------------------

export class ToolRegistry {
  private readonly handlers = new Map<string, { description: string; handler: ToolHandler }>();
  private dispatcher: ToolDispatcher | null = null;

  constructor(readonly server: McpServer) {}

  /**
   * Route SDK tool calls through the given dispatcher. Until one is set,
   * SDK calls are refused so no tool can run without the safety pipeline.
   */
  setDispatcher(dispatcher: ToolDispatcher): void {
    this.dispatcher = dispatcher;
  }

  private dispatch(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    if (!this.dispatcher) {
      return Promise.resolve(errorResult(`Tool "${name}" is not available: no dispatcher configured`));
    }
    return this.dispatcher(name, args);
  }

  /**
   * Register a tool. Arguments are validated against the zod shape before the
   * handler runs; handler exceptions become error results.
   */
  register<Shape extends ZodRawShape>(
    name: string,
    description: string,
    shape: Shape,
    handler: (args: z.objectOutputType<Shape, ZodTypeAny, 'strip'>) => Promise<ToolResult>,
  ): void {
    const schema = z.object(shape);

    const run: ToolHandler = async (args) => {
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
          .join('; ');
        return errorResult(`Invalid arguments for "${name}": ${issues}`);
      }
      try {
        return await handler(parsed.data);
      } catch (err) {
        return errorResult(`Unhandled error in tool "${name}": ${errorMessage(err)}`);
      }
    };

    this.handlers.set(name, { description, handler: run });

    const sdkShape: ZodRawShape = shape;
    this.server.tool(name, description, sdkShape, async (args) => this.dispatch(name, args));
  }

  get(name: string): ToolHandler | undefined {
    return this.handlers.get(name)?.handler;
  }

  names(): string[] {
    return Array.from(this.handlers.keys());
  }

  list(): ToolInfo[] {
    return Array.from(this.handlers.entries(), ([name, { description }]) => ({
      name,
      description,
      tier: getToolTier(name),
    }));
  }
}

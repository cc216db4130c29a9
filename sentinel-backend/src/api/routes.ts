import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { parseIntent } from '../ai/intent.js';
import type { ToolResult, ToolServer } from '../mcp/server.js';
import type { MonitorRuntime } from '../monitor/index.js';
import { createFleetRouter } from './fleet.js';
import { createHealthRouter } from './health.js';
import { createRemediationRouter } from './remediation.js';
import { issuesOf } from './validate.js';

const executeBodySchema = z.object({
  tool: z.string().min(1),
  args: z.record(z.unknown()).optional(),
  confirmed: z.boolean().optional(),
});

const chatBodySchema = z.object({
  message: z.string().max(2000),
});

function firstText(result: ToolResult): string {
  return result.content[0]?.text ?? '';
}

/**
 * Build the API router. Dependencies are injected so tests can mount it on
 * a bare express app with their own runtime.
 */
export function buildRouter(runtime: MonitorRuntime, tools: ToolServer): Router {
  const router = Router();

  router.use('/api/health', createHealthRouter(runtime));
  router.use('/api/remediation', createRemediationRouter(runtime));
  router.use('/api/fleet', createFleetRouter(runtime));

  // ---------------------------------------------------------------------------
  // Tools API -- execute MCP tools with safety enforcement
  // ---------------------------------------------------------------------------

  // GET /api/tools -- list all registered tools with their safety tiers
  router.get('/api/tools', (_req: Request, res: Response) => {
    res.json({ tools: tools.listTools() });
  });

  // POST /api/tools/execute
  router.post('/api/tools/execute', async (req: Request, res: Response) => {
    const parsed = executeBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ success: false, error: issuesOf(parsed.error) });
      return;
    }

    const { tool, args, confirmed } = parsed.data;
    const toolArgs: Record<string, unknown> = { ...args };
    if (confirmed) {
      toolArgs.confirmed = true;
    }

    const result = await tools.executeTool(tool, toolArgs, 'api');

    // Blocked by safety tier (or unknown tool)
    if (result.blocked) {
      const statusCode = result.reason?.includes('not found') ? 404 : 403;
      res.status(statusCode).json({
        success: false,
        error: result.reason ?? 'Tool execution blocked',
        tier: result.tier,
        blocked: true,
      });
      return;
    }

    if (result.isError) {
      res.status(500).json({
        success: false,
        error: firstText(result) || 'Tool execution failed',
        tier: result.tier,
      });
      return;
    }

    res.json({
      success: true,
      result: result.content,
      tier: result.tier,
    });
  });

  // ---------------------------------------------------------------------------
  // Chat API -- keyword intent -> single tool call
  // ---------------------------------------------------------------------------

  // POST /api/chat { message }
  router.post('/api/chat', async (req: Request, res: Response) => {
    const parsed = chatBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: issuesOf(parsed.error) });
      return;
    }

    const message = parsed.data.message.trim();
    const timestamp = new Date().toISOString();
    if (!message) {
      res.json({ message: 'Please enter a question or command.', toolsCalled: [], clarificationNeeded: false, timestamp });
      return;
    }

    const serviceIds = runtime.fleet.listServices().map((s) => s.serviceId);
    const intent = parseIntent(message, serviceIds);
    if (!intent.tool) {
      res.json({ message: intent.clarification, toolsCalled: [], clarificationNeeded: true, timestamp });
      return;
    }

    const result = await tools.executeTool(intent.tool, intent.args, 'chat');
    const text = firstText(result);
    res.json({
      message: result.isError ? `I encountered an issue: ${result.reason ?? text}` : text,
      toolsCalled: [intent.tool],
      args: intent.args,
      tier: result.tier,
      isError: result.isError ?? false,
      clarificationNeeded: false,
      timestamp,
    });
  });

  return router;
}

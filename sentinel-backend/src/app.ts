import express, { type Express } from 'express';
import cors from 'cors';
import { config } from './config.js';
import { buildRouter } from './api/routes.js';
import type { ToolServer } from './mcp/server.js';
import type { MonitorRuntime } from './monitor/index.js';

/**
 * Express app with CORS, JSON body parsing and every API route mounted.
 * Kept separate from index.ts so tests can drive it without listening.
 */
export function createApp(runtime: MonitorRuntime, tools: ToolServer): Express {
  const app = express();

  app.use(cors({
    origin: config.corsOrigins,
    credentials: true,
  }));

  app.use(express.json());

  app.use(buildRouter(runtime, tools));

  return app;
}

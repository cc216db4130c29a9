import crypto from 'node:crypto';
import { createServer } from 'node:http';
import { config } from './config.js';
import { createApp } from './app.js';
import { setupSocketIO } from './realtime/socket.js';
import { runMigrations } from './db/migrate.js';
import { auditSink } from './db/audit.js';
import { createToolServer } from './mcp/server.js';
import { startEmitter, stopEmitter } from './realtime/emitter.js';
import { createMonitorRuntime, startMonitor, stopMonitor } from './monitor/index.js';
import { startAuditCleanup, stopAuditCleanup } from './services/audit-cleanup.js';

// Run database migrations before anything writes to the audit trail
let auditReady = false;
if (config.auditEnabled) {
  try {
    await runMigrations();
    auditReady = true;
  } catch (err) {
    console.error('Failed to run database migrations:', err);
    console.warn('Starting server without audit trail -- events stay in memory only');
  }
}

// Monitor runtime: simulated fleet, compute backend, event log, remediation engine
const runtime = createMonitorRuntime({ sinks: auditReady ? [auditSink] : [] });

// Initialize MCP tool server
const tools = createToolServer(runtime);
const toolList = tools.listTools();
console.log(`MCP server initialized: ${toolList.length} tools registered`);
for (const t of toolList) {
  console.log(`  [${t.tier.toUpperCase().padEnd(6)}] ${t.name}`);
}

// Create Express app and HTTP server
const app = createApp(runtime, tools);
const server = createServer(app);

// Set up Socket.IO on the HTTP server
const { io, eventsNs, fleetNs } = setupSocketIO(server);

// Hourly retention sweep for the audit trail
if (auditReady) {
  startAuditCleanup();
}

// Periodic fleet snapshots on /fleet
startEmitter(fleetNs, runtime);

// Remediation events on /events; starts the loop when AUTO_REMEDIATION=true
startMonitor(runtime, eventsNs);

// Start listening -- IMPORTANT: listen on `server`, not `app` (Socket.IO requirement)
server.listen(config.port, () => {
  console.log(`Cloud Ops Sentinel backend running on port ${config.port}`);
  console.log(`  Environment: ${config.nodeEnv}`);
  console.log(`  Compute backend: ${config.computeBackend}`);
  console.log(`  Health check: http://localhost:${config.port}/api/health`);

  eventsNs.emit('event', {
    id: crypto.randomUUID(),
    type: 'status',
    severity: 'info',
    title: 'Sentinel Online',
    message: `Monitoring ${runtime.fleet.listServices().length} services`,
    source: 'system',
    timestamp: new Date().toISOString(),
  });
});

// Graceful shutdown
function shutdown(signal: string) {
  console.log(`\n[${signal}] Shutting down gracefully...`);
  stopAuditCleanup();
  stopMonitor(runtime);
  stopEmitter();
  void io.close();
  server.close(() => {
    console.log('Server closed.');
    process.exit(0);
  });
  // Force exit after 10 seconds
  setTimeout(() => {
    console.error('Forced shutdown after timeout.');
    process.exit(1);
  }, 10000);
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

import { Server as SocketServer, type Namespace } from 'socket.io';
import type { Server as HttpServer } from 'node:http';
import { config } from '../config.js';

function logConnections(ns: Namespace): void {
  ns.on('connection', (socket) => {
    console.log(`[Socket.IO] ${ns.name} client connected: ${socket.id}`);
    socket.on('disconnect', (reason) => {
      console.log(`[Socket.IO] ${ns.name} client disconnected: ${socket.id} (${reason})`);
    });
  });
}

/**
 * Set up Socket.IO with the /events (remediation feed) and /fleet
 * (periodic snapshots) namespaces.
 */
export function setupSocketIO(server: HttpServer) {
  const io = new SocketServer(server, {
    cors: {
      origin: config.corsOrigins,
      methods: ['GET', 'POST'],
    },
    pingInterval: 25000,
    pingTimeout: 10000,
  });

  const eventsNs = io.of('/events');
  const fleetNs = io.of('/fleet');

  logConnections(eventsNs);
  logConnections(fleetNs);

  console.log('[Socket.IO] WebSocket server initialized with /events and /fleet namespaces');

  return { io, eventsNs, fleetNs };
}

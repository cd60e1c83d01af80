/**
 * Health check HTTP endpoint.
 *
 * Exposes a tiny HTTP server on localhost that returns JSON with the
 * process uptime, the store dialect in use and the amount of deferred
 * work the engine is holding (armed status resets, pending settle runs).
 */

import { createServer, type Server } from 'http';
import { logger } from './logger.js';
import type { StoreDialect } from '../store/record-store.js';

export interface HealthSource {
  dialect: StoreDialect;
  pendingResets(): number;
  pendingEvaluations(): number;
}

export interface HealthPayload {
  status: 'ok' | 'stopping';
  uptimeSeconds: number;
  store: { dialect: StoreDialect };
  pendingResets: number;
  pendingEvaluations: number;
  memory: { rss: number; heapUsed: number };
}

const startedAt = Date.now();
let server: Server | null = null;
let stopping = false;

const HEALTH_RATE_WINDOW_MS = 60_000;
const HEALTH_RATE_LIMIT = 120;

const healthRateWindow = new Map<string, { windowStart: number; count: number }>();

export function isHealthRequestRateLimited(ip: string, now: number): boolean {
  const existing = healthRateWindow.get(ip);
  if (!existing || now - existing.windowStart >= HEALTH_RATE_WINDOW_MS) {
    healthRateWindow.set(ip, { windowStart: now, count: 1 });
    return false;
  }

  existing.count += 1;
  return existing.count > HEALTH_RATE_LIMIT;
}

export function buildHealthPayload(source: HealthSource, now: number = Date.now()): HealthPayload {
  const mem = process.memoryUsage();
  return {
    status: stopping ? 'stopping' : 'ok',
    uptimeSeconds: Math.floor((now - startedAt) / 1000),
    store: { dialect: source.dialect },
    pendingResets: source.pendingResets(),
    pendingEvaluations: source.pendingEvaluations(),
    memory: {
      rss: Math.round(mem.rss / 1024 / 1024),
      heapUsed: Math.round(mem.heapUsed / 1024 / 1024),
    },
  };
}

/**
 * Start the local HTTP health endpoint (`/health`) with lightweight abuse protection.
 */
export function startHealthServer(source: HealthSource, port: number = 3001, host: string = '127.0.0.1'): Server {
  stopping = false;
  server = createServer((req, res) => {
    if (req.url === '/health' && req.method === 'GET') {
      const now = Date.now();
      const ip = req.socket.remoteAddress ?? 'unknown';

      if (isHealthRequestRateLimited(ip, now)) {
        res.writeHead(429, { 'content-type': 'application/json' });
        res.end(JSON.stringify({ error: 'rate_limited', message: 'Too many health requests' }));
        return;
      }

      res.writeHead(200, { 'content-type': 'application/json' });
      res.end(JSON.stringify(buildHealthPayload(source, now)));
    } else {
      res.writeHead(404);
      res.end();
    }
  });

  server.listen(port, host, () => {
    logger.info({ port, url: `http://${host}:${port}/health` }, 'Health check server started');
  });

  server.on('error', (err) => {
    logger.error({ err, port }, 'Health check server error');
  });

  return server;
}

/** Mark the process as stopping, then close the endpoint. */
export function stopHealthServer(): void {
  stopping = true;
  if (server) {
    server.close();
    server = null;
  }
  healthRateWindow.clear();
}

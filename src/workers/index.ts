/**
 * Worker Entry Point
 *
 * Starts the analytics worker and a small health server, and shuts both
 * down gracefully on SIGTERM/SIGINT.
 */

import http from 'http';
import { closePool } from '@/lib/db';
import { toError } from '@/lib/error-logging';
import { closeQueues, getAllQueueStats, initializeQueues } from '@/lib/jobs/queue';
import { logger } from '@/lib/logger';
import { getMetricsSnapshot } from '@/lib/monitoring/metrics';
import {
  isAnalyticsWorkerRunning,
  startAnalyticsWorker,
  stopAnalyticsWorker,
} from './analytics-worker';

// ============================================================================
// Configuration
// ============================================================================

const HEALTH_CHECK_PORT = parseInt(process.env.WORKER_HEALTH_PORT || '3001', 10);

// ============================================================================
// State
// ============================================================================

let isShuttingDown = false;
let healthServer: http.Server | null = null;

// ============================================================================
// Health Check Server
// ============================================================================

async function healthReport(): Promise<{ healthy: boolean; body: Record<string, unknown> }> {
  const healthy = isAnalyticsWorkerRunning();
  return {
    healthy,
    body: {
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      workers: { analytics: healthy },
      queues: await getAllQueueStats(),
      counters: getMetricsSnapshot().counters,
    },
  };
}

function startHealthServer(): void {
  healthServer = http.createServer((req, res) => {
    if (req.url === '/health') {
      healthReport()
        .then(({ healthy, body }) => {
          res.writeHead(healthy ? 200 : 503, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify(body, null, 2));
        })
        .catch((error: unknown) => {
          res.writeHead(500, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ status: 'error', error: toError(error).message }));
        });
    } else if (req.url === '/ready') {
      const ready = isAnalyticsWorkerRunning() && !isShuttingDown;
      res.writeHead(ready ? 200 : 503, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ ready }));
    } else {
      res.writeHead(404, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Not found' }));
    }
  });

  healthServer.listen(HEALTH_CHECK_PORT, () => {
    logger.info(`Health check server listening on port ${HEALTH_CHECK_PORT}`);
  });
}

function stopHealthServer(): Promise<void> {
  return new Promise((resolve) => {
    if (healthServer) {
      healthServer.close(() => {
        logger.info('Health check server stopped');
        resolve();
      });
      healthServer = null;
    } else {
      resolve();
    }
  });
}

// ============================================================================
// Graceful Shutdown
// ============================================================================

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn('Shutdown already in progress, ignoring signal', { signal });
    return;
  }

  isShuttingDown = true;
  logger.info(`Received ${signal}, starting graceful shutdown...`);

  await stopHealthServer();

  // In-progress jobs finish before the worker closes
  await stopAnalyticsWorker();
  await closeQueues();
  await closePool();

  logger.info('Graceful shutdown complete');
  process.exit(0);
}

function onSignal(signal: string): void {
  gracefulShutdown(signal).catch((error: unknown) => {
    logger.error('Graceful shutdown failed', toError(error));
    process.exit(1);
  });
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  logger.info('Starting analytics workers...');

  initializeQueues();
  startAnalyticsWorker();
  startHealthServer();

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', { error: toError(reason) });
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception', error);
  });

  logger.info('Analytics workers started successfully');
}

main().catch((error: unknown) => {
  logger.error('Failed to start workers', toError(error));
  process.exit(1);
});

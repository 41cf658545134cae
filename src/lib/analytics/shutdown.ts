import { toError } from '@/lib/error-logging';
import { logger } from '@/lib/logger';
import { shutdownTelemetry } from './runtime';

let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn('Shutdown already in progress, ignoring signal', { signal });
    return;
  }

  isShuttingDown = true;
  logger.info(`Received ${signal}, flushing telemetry before exit`);

  await shutdownTelemetry();

  logger.info('Telemetry flushed');
  process.exit(0);
}

function onSignal(signal: string): void {
  gracefulShutdown(signal).catch((error: unknown) => {
    logger.error('Telemetry shutdown failed', toError(error));
    process.exit(1);
  });
}

/**
 * Drain the dispatcher on SIGTERM/SIGINT. Next only leaves these signals to
 * the application when NEXT_MANUAL_SIG_HANDLE is set.
 */
export function installShutdownHooks(): void {
  process.once('SIGTERM', () => onSignal('SIGTERM'));
  process.once('SIGINT', () => onSignal('SIGINT'));
}

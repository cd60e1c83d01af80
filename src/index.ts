import { logger } from './middleware/logger.js';
import { config } from './utils/config.js';
import { startHealthServer, stopHealthServer } from './middleware/health.js';
import { startSafetyEngine, type SafetyEngine } from './engine.js';

let engine: SafetyEngine | null = null;

async function main(): Promise<void> {
  logger.info('🛟 Safety circle engine starting...');

  logger.info({
    storeDialect: config.HEALTH_ONLY ? 'memory' : config.STORE_DIALECT,
    healthOnlyMode: config.HEALTH_ONLY,
    healthPort: config.HEALTH_PORT,
    healthBindHost: config.HEALTH_BIND_HOST,
    settleDelayMs: config.SETTLE_DELAY_MS,
    statusResetMinutes: config.STATUS_RESET_MINUTES,
    adminCancelHours: config.ADMIN_CANCEL_HOURS,
    logLevel: config.LOG_LEVEL,
  }, 'Configuration loaded');

  if (config.HEALTH_ONLY) {
    logger.warn('HEALTH_ONLY=true enabled, using an in-memory store for smoke test mode');
  }

  engine = await startSafetyEngine(config.HEALTH_ONLY ? { ...config, STORE_DIALECT: 'memory' } : config);

  startHealthServer(engine.health, config.HEALTH_PORT, config.HEALTH_BIND_HOST);
  logger.info('🛟 Safety circle engine is online');
}

main().catch((err) => {
  logger.fatal({ err }, 'Fatal error, engine shutting down');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ err: reason }, 'Unhandled promise rejection, engine shutting down');
  process.exit(1);
});

process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception, engine shutting down');
  process.exit(1);
});

// Graceful shutdown
async function shutdown(signal: 'SIGINT' | 'SIGTERM'): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal, shutting down');
  stopHealthServer();

  try {
    await engine?.shutdown();
  } catch (err) {
    logger.error({ err, signal }, 'Failed to stop engine cleanly during shutdown');
  }

  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

import express from 'express';
import { registerRoutes } from './app/routes.js';
import { createMonitorServices } from './app/services.js';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';

process.on('unhandledRejection', err => {
  logger.error('unhandled_rejection', { err: String(err) });
});

process.on('uncaughtException', err => {
  logger.error('uncaught_exception', { err: String(err) });
});

const services = createMonitorServices(config);

const app = express();
registerRoutes(app, services);

const host = '0.0.0.0';
app.listen(config.port, host, () => {
  logger.info('server_listening', { port: config.port, address: `${host}:${config.port}` });
});

if (!config.playerName) {
  logger.warn('monitor_not_configured', { reason: 'MONITOR_PLAYER_NAME not set; feed replay cannot match the player' });
}

if (config.autostart) {
  services.monitor.start();
} else {
  logger.info('monitor_autostart_disabled', { nextStep: 'POST /monitor/start with the operator token' });
}

async function shutdown(signal: string): Promise<void> {
  logger.info('shutdown_signal_received', { signal });
  try {
    await services.monitor.stop();
  } catch (err) {
    logger.error('monitor_stop_failed', { err: String(err) });
  }
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

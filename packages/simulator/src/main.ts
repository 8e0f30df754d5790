import { logger, setLogLevel } from '@sensor-link/client';
import { loadSimulatorConfig } from './config.js';
import { createSimulatorServer } from './createSimulatorServer.js';

const config = loadSimulatorConfig();
setLogLevel(config.logLevel);

// biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
const PORT = Number(process.env['PORT']) || config.port;

logger.info('Starting sensor simulator...');

const server = await createSimulatorServer({
  port: PORT,
  host: config.host,
  sensors: config.sensors,
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down...`);
  server.stop().then(
    () => process.exit(0),
    (error: unknown) => {
      logger.error('Shutdown failed', { error: String(error) });
      process.exit(1);
    }
  );
}

// Graceful shutdown
process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

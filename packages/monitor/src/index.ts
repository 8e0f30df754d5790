import { logger, setLogLevel } from '@sensor-link/client';
import { loadMonitorConfig } from './config.js';
import { attachLiveFeed, createServer } from './server.js';

const config = loadMonitorConfig();
setLogLevel(config.logLevel);

// biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
const PORT = Number(process.env['PORT']) || config.http.port;

logger.info('Starting sensor monitor...', {
  link: `${config.link.host}:${config.link.port}`,
  handshakePolicy: config.link.handshakePolicy,
});

const { app, monitor, liveFeed } = createServer(config);

const httpServer = app.listen(PORT, '0.0.0.0', () => {
  logger.info(`Sensor monitor running on port ${PORT}`);
});

const wss = attachLiveFeed(httpServer, liveFeed);

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down...`);
  monitor.dispose();
  liveFeed.closeAll();
  wss.close();
  httpServer.close();
  process.exit(0);
}

// Graceful shutdown
process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

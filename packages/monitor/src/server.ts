import type { Server } from 'node:http';
import {
  logger,
  SensorMonitor,
  type TransportFactory,
  tcpTransportFactory,
} from '@sensor-link/client';
import express, { type Express } from 'express';
import { type WebSocket, WebSocketServer } from 'ws';
import type { MonitorConfig } from './config.js';
import { createSensorRouter } from './routes/sensors.js';
import { LiveFeed, toLiveFeedEvent } from './services/LiveFeed.js';
import type { StatusResponse } from './types.js';

/**
 * Path the live feed WebSocket is served on.
 */
export const LIVE_FEED_PATH = '/api/live';

export interface MonitorService {
  readonly app: Express;
  readonly monitor: SensorMonitor;
  readonly liveFeed: LiveFeed;
}

export function createServer(
  config: MonitorConfig,
  transportFactory: TransportFactory = tcpTransportFactory()
): MonitorService {
  const app = express();
  const liveFeed = new LiveFeed();
  const monitor = new SensorMonitor(
    { onOutcome: (pin, outcome) => liveFeed.broadcast(toLiveFeedEvent(pin, outcome)) },
    {
      host: config.link.host,
      port: config.link.port,
      handshakePolicy: config.link.handshakePolicy,
      handshakeTimeoutMs: config.link.handshakeTimeoutMs,
      historyCapacity: config.history.capacity,
    },
    transportFactory
  );

  // Middleware
  app.use(express.json());

  // API routes
  app.use('/api/sensors', createSensorRouter(monitor));

  app.get('/api/status', (_req, res) => {
    const response: StatusResponse = {
      anyConnected: monitor.isAnyConnected(),
      sensors: monitor.listSensors().length,
    };
    res.json(response);
  });

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  return { app, monitor, liveFeed };
}

/**
 * Serve the live feed on an HTTP server the app is already listening on.
 */
export function attachLiveFeed(httpServer: Server, liveFeed: LiveFeed): WebSocketServer {
  const wss = new WebSocketServer({ server: httpServer, path: LIVE_FEED_PATH });

  wss.on('connection', (ws: WebSocket) => {
    logger.info('Live feed subscriber connected');
    liveFeed.add(ws);

    ws.on('close', () => {
      liveFeed.remove(ws);
    });

    ws.on('error', (error: Error) => {
      logger.error('Live feed WebSocket error', { error: error.message });
    });
  });

  return wss;
}

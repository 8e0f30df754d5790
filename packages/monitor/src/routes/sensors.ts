import type { SensorMonitor, SensorSnapshot } from '@sensor-link/client';
import { type Request, type Response, Router } from 'express';
import { z } from 'zod';
import type {
  ConnectSensorRequest,
  ConnectSensorResponse,
  SensorDetail,
  SensorSummary,
} from '../types.js';

const ConnectSensorRequestSchema = z.object({
  pin: z.string({ required_error: 'pin is required', invalid_type_error: 'pin must be a string' }),
}) satisfies z.ZodType<ConnectSensorRequest>;

function toSummary(sensor: SensorSnapshot): SensorSummary {
  return {
    pin: sensor.pin,
    phase: sensor.phase,
    authorized: sensor.authorized,
    lastValue: sensor.lastValue,
  };
}

export function createSensorRouter(monitor: SensorMonitor): Router {
  const router = Router();

  /**
   * GET /api/sensors - List authorized and pending sensors
   */
  router.get('/', (_req: Request, res: Response) => {
    res.json({ sensors: monitor.listSensors().map(toSummary) });
  });

  /**
   * POST /api/sensors - Start connecting to a sensor
   */
  router.post('/', (req: Request, res: Response) => {
    const body = ConnectSensorRequestSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: body.error.issues[0]?.message ?? 'Invalid request' });
      return;
    }

    const result = monitor.requestConnection(body.data.pin);
    switch (result.status) {
      case 'invalid_pin':
        res.status(400).json({ error: result.message });
        return;

      case 'already_exists':
        res.status(409).json({ error: `Sensor already connected: ${body.data.pin.trim()}` });
        return;

      case 'failed':
        res.status(502).json({ error: `Could not connect to sensor: ${body.data.pin.trim()}` });
        return;

      case 'started': {
        const response: ConnectSensorResponse = {
          pin: result.connection.pin,
          status: 'connecting',
        };
        res.status(202).json(response);
        return;
      }
    }
  });

  /**
   * GET /api/sensors/:pin - Get one sensor with its history
   */
  router.get('/:pin', (req: Request, res: Response) => {
    const { pin } = req.params;
    const sensor = monitor.getSensor(pin ?? '');

    if (!sensor) {
      res.status(404).json({ error: 'Sensor not found' });
      return;
    }

    const response: SensorDetail = { ...toSummary(sensor), history: sensor.history };
    res.json(response);
  });

  /**
   * DELETE /api/sensors/:pin - Disconnect a sensor
   */
  router.delete('/:pin', (req: Request, res: Response) => {
    const { pin } = req.params;

    if (!monitor.disconnect(pin ?? '')) {
      res.status(404).json({ error: 'Sensor not found' });
      return;
    }

    res.json({ message: 'Sensor disconnected' });
  });

  return router;
}

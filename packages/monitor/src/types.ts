import type { ConnectionPhase } from '@sensor-link/client';

/**
 * Request body for POST /api/sensors
 */
export interface ConnectSensorRequest {
  pin: string;
}

/**
 * Response for POST /api/sensors
 */
export interface ConnectSensorResponse {
  pin: string;
  status: 'connecting';
}

/**
 * One entry of GET /api/sensors
 */
export interface SensorSummary {
  pin: string;
  phase: ConnectionPhase;
  authorized: boolean;
  lastValue: number | null;
}

/**
 * Response for GET /api/sensors/:pin
 */
export interface SensorDetail extends SensorSummary {
  history: number[];
}

/**
 * Response for GET /api/status
 */
export interface StatusResponse {
  anyConnected: boolean;
  sensors: number;
}

/**
 * @fileoverview Sensor link client.
 *
 * This package provides the client side of the sensor link:
 * - TCP transport adapter
 * - Per-sensor connection state machine
 * - Bounded value history
 * - Session registry of authorized sensors
 * - SensorMonitor, the owner-facing facade
 */

export {
  type ConnectionPhase,
  DEFAULT_CONNECTION_CONFIG,
  type HandshakePolicy,
  type LinkOutcome,
  SensorConnection,
  type SensorConnectionConfig,
  type SensorConnectionEvents,
} from './SensorConnection.js';
export { DEFAULT_HISTORY_CAPACITY, SensorHistory } from './SensorHistory.js';
export {
  type ConnectAndWaitResult,
  type ConnectionRequestResult,
  DEFAULT_MONITOR_CONFIG,
  SensorMonitor,
  type SensorMonitorConfig,
  type SensorMonitorEvents,
  type SensorSnapshot,
} from './SensorMonitor.js';
export { type RegistryAddResult, SessionRegistry } from './SessionRegistry.js';
export {
  DEFAULT_TCP_OPTIONS,
  TcpTransport,
  type TcpTransportOptions,
  type Transport,
  type TransportEvents,
  type TransportFactory,
  tcpTransportFactory,
} from './transport.js';
export {
  createLogger,
  getLogLevel,
  type Logger,
  type LogLevel,
  logger,
  setLogLevel,
} from './utils/logger.js';

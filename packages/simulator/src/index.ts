/**
 * @fileoverview Sensor link simulator.
 *
 * Plays the simulation side of the protocol so the link can be exercised
 * without the real simulation process.
 */

export {
  type GeneratorConfig,
  loadSimulatorConfig,
  parseSimulatorConfig,
  type SimulatedSensorConfig,
  type SimulatorConfig,
} from './config.js';
export {
  createSimulatorServer,
  type SimulatorServer,
  type SimulatorServerConfig,
} from './createSimulatorServer.js';
export { createGenerator, type ValueGenerator } from './generators.js';
export {
  type Peer,
  SimulatorRuntime,
  type SimulatorRuntimeOptions,
  type SimulatorSession,
  type SimulatorSessionPhase,
} from './SimulatorRuntime.js';

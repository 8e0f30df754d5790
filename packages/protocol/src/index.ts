/**
 * @fileoverview Sensor link protocol.
 *
 * Binary message codec and size-prefixed framing shared by the link client
 * and the simulator. No I/O happens in this package.
 */

export { decodeMessage, encodeMessage } from './codec.js';
export {
  FRAME_HEADER_SIZE,
  MAX_FIELD_LENGTH,
  MAX_MESSAGE_SIZE,
  MESSAGE_HEADER_SIZE,
  MESSAGE_TYPE_TAGS,
  PROTOCOL_VERSION,
  VALUE_SIZE,
} from './constants.js';
export {
  describeError,
  EncodingError,
  ProtocolError,
  type ProtocolErrorCode,
  StateError,
  type StateErrorCode,
  TransportError,
  type TransportErrorCode,
} from './errors.js';
export { encodeFrame, FrameDecoder } from './frame.js';
export {
  type ConnectMessage,
  connectMessage,
  type ErrorStateMessage,
  errorState,
  isAccepted,
  type Message,
  type MessageType,
  PinSchema,
  type PinRequestMessage,
  type PinResponseMessage,
  pinRequest,
  pinResponse,
  type SensorDataMessage,
  sensorData,
  utf8Length,
} from './messages.js';

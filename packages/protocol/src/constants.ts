/**
 * @fileoverview Wire-level constants for the sensor link protocol.
 *
 * All multi-byte fields (the frame size prefix and the float payload) are
 * little-endian on the wire, independent of host byte order.
 */

/**
 * Protocol version byte. A mismatch is a hard incompatibility.
 */
export const PROTOCOL_VERSION = 1;

/**
 * Upper bound for an encoded message and therefore for a frame payload.
 */
export const MAX_MESSAGE_SIZE = 1024;

/**
 * Maximum byte length of a pin or an error string (one length byte).
 */
export const MAX_FIELD_LENGTH = 255;

/**
 * Size of the uint32 frame size prefix.
 */
export const FRAME_HEADER_SIZE = 4;

/**
 * Fixed header: version, type tag, pin length.
 */
export const MESSAGE_HEADER_SIZE = 3;

/**
 * Size of the float32 value field.
 */
export const VALUE_SIZE = 4;

/**
 * Wire ordinals of each message type.
 */
export const MESSAGE_TYPE_TAGS = {
  connect: 0,
  pin_request: 1,
  pin_response: 2,
  sensor_data: 3,
  error_state: 4,
} as const;

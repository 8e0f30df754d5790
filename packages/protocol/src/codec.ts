/**
 * @fileoverview Binary message codec.
 *
 * Layout (all offsets in bytes, multi-byte fields little-endian):
 *
 *   version:uint8 type:uint8 pinLen:uint8 pin:byte[pinLen] value:float32
 *   [errLen:uint8 error:byte[errLen]]   -- error_state only
 *
 * Pure functions, no state and no I/O.
 */

import {
  MAX_FIELD_LENGTH,
  MAX_MESSAGE_SIZE,
  MESSAGE_HEADER_SIZE,
  MESSAGE_TYPE_TAGS,
  PROTOCOL_VERSION,
  VALUE_SIZE,
} from './constants.js';
import { EncodingError, ProtocolError } from './errors.js';
import type { Message, MessageType } from './messages.js';

const EMPTY = Buffer.alloc(0);

function typeFromTag(tag: number): MessageType | undefined {
  switch (tag) {
    case MESSAGE_TYPE_TAGS.connect:
      return 'connect';
    case MESSAGE_TYPE_TAGS.pin_request:
      return 'pin_request';
    case MESSAGE_TYPE_TAGS.pin_response:
      return 'pin_response';
    case MESSAGE_TYPE_TAGS.sensor_data:
      return 'sensor_data';
    case MESSAGE_TYPE_TAGS.error_state:
      return 'error_state';
    default:
      return undefined;
  }
}

function fieldBytes(name: string, text: string): Buffer {
  const bytes = Buffer.from(text, 'utf8');
  if (bytes.length > MAX_FIELD_LENGTH) {
    throw new EncodingError(
      `${name} is ${bytes.length} bytes, maximum is ${MAX_FIELD_LENGTH}`
    );
  }
  return bytes;
}

function payloadValue(message: Message): number {
  switch (message.type) {
    case 'pin_response':
    case 'sensor_data':
      return message.value;
    default:
      return 0;
  }
}

// ============ Encoding ============

/**
 * Encode a message into its wire payload (without the frame size prefix).
 * @throws {EncodingError} if the pin or error exceeds 255 bytes, or the
 *   message exceeds MAX_MESSAGE_SIZE
 */
export function encodeMessage(message: Message): Buffer {
  const pin = message.type === 'pin_request' ? fieldBytes('pin', message.pin) : EMPTY;
  const error = message.type === 'error_state' ? fieldBytes('error', message.error) : null;

  const size =
    MESSAGE_HEADER_SIZE + pin.length + VALUE_SIZE + (error ? 1 + error.length : 0);
  if (size > MAX_MESSAGE_SIZE) {
    throw new EncodingError(`message is ${size} bytes, maximum is ${MAX_MESSAGE_SIZE}`);
  }

  const buf = Buffer.alloc(size);
  let offset = buf.writeUInt8(PROTOCOL_VERSION, 0);
  offset = buf.writeUInt8(MESSAGE_TYPE_TAGS[message.type], offset);
  offset = buf.writeUInt8(pin.length, offset);
  offset += pin.copy(buf, offset);
  offset = buf.writeFloatLE(payloadValue(message), offset);

  if (error) {
    offset = buf.writeUInt8(error.length, offset);
    error.copy(buf, offset);
  }

  return buf;
}

// ============ Decoding ============

/**
 * Decode one message payload. Bytes past the message's footprint are ignored.
 * @throws {ProtocolError} `truncated`, `version_mismatch` or `unknown_message_type`
 */
export function decodeMessage(data: Uint8Array): Message {
  const buf = Buffer.from(data.buffer, data.byteOffset, data.byteLength);

  if (buf.length < MESSAGE_HEADER_SIZE) {
    throw new ProtocolError('truncated', `message too short: ${buf.length} bytes`);
  }

  const version = buf.readUInt8(0);
  if (version !== PROTOCOL_VERSION) {
    throw new ProtocolError(
      'version_mismatch',
      `protocol version mismatch: expected ${PROTOCOL_VERSION}, got ${version}`
    );
  }

  const tag = buf.readUInt8(1);
  const type = typeFromTag(tag);
  if (type === undefined) {
    throw new ProtocolError('unknown_message_type', `unknown message type: ${tag}`);
  }

  const pinLength = buf.readUInt8(2);
  let offset = MESSAGE_HEADER_SIZE;
  if (offset + pinLength > buf.length) {
    throw new ProtocolError('truncated', 'message truncated at pin');
  }
  const pin = buf.toString('utf8', offset, offset + pinLength);
  offset += pinLength;

  if (offset + VALUE_SIZE > buf.length) {
    throw new ProtocolError('truncated', 'message truncated at value');
  }
  const value = buf.readFloatLE(offset);
  offset += VALUE_SIZE;

  switch (type) {
    case 'connect':
      return { type };
    case 'pin_request':
      return { type, pin };
    case 'pin_response':
      return { type, value };
    case 'sensor_data':
      return { type, value };
    case 'error_state': {
      if (offset + 1 > buf.length) {
        throw new ProtocolError('truncated', 'message truncated at error length');
      }
      const errorLength = buf.readUInt8(offset);
      offset += 1;
      if (offset + errorLength > buf.length) {
        throw new ProtocolError('truncated', 'message truncated at error');
      }
      return { type, error: buf.toString('utf8', offset, offset + errorLength) };
    }
  }
}

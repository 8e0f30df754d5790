/**
 * @fileoverview Sensor link message definitions.
 *
 * Messages are a discriminated union on `type`. Every variant shares the
 * common wire header; only the fields that mean something for a variant are
 * exposed on its type.
 */

import { z } from 'zod';
import { MAX_FIELD_LENGTH } from './constants.js';

// ============ Message Types ============

/**
 * Initial request sent right after the transport connects.
 */
export interface ConnectMessage {
  readonly type: 'connect';
}

/**
 * Request access to the sensor identified by `pin`.
 */
export interface PinRequestMessage {
  readonly type: 'pin_request';
  readonly pin: string;
}

/**
 * Answer to a connect or pin request. `value > 0` means accepted.
 */
export interface PinResponseMessage {
  readonly type: 'pin_response';
  readonly value: number;
}

/**
 * A single sensor reading.
 */
export interface SensorDataMessage {
  readonly type: 'sensor_data';
  readonly value: number;
}

/**
 * The remote end reports an error and will not continue.
 */
export interface ErrorStateMessage {
  readonly type: 'error_state';
  readonly error: string;
}

export type Message =
  | ConnectMessage
  | PinRequestMessage
  | PinResponseMessage
  | SensorDataMessage
  | ErrorStateMessage;

export type MessageType = Message['type'];

// ============ Constructors ============

export function connectMessage(): ConnectMessage {
  return { type: 'connect' };
}

export function pinRequest(pin: string): PinRequestMessage {
  return { type: 'pin_request', pin };
}

export function pinResponse(value: number): PinResponseMessage {
  return { type: 'pin_response', value };
}

export function sensorData(value: number): SensorDataMessage {
  return { type: 'sensor_data', value };
}

export function errorState(error: string): ErrorStateMessage {
  return { type: 'error_state', error };
}

/**
 * Whether a pin response grants access.
 */
export function isAccepted(message: PinResponseMessage): boolean {
  return message.value > 0;
}

// ============ Validation ============

/**
 * Byte length of a string as it goes on the wire.
 */
export function utf8Length(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

/**
 * Schema for a pin supplied by an operator: non-empty, fits one length byte.
 */
export const PinSchema = z
  .string()
  .trim()
  .min(1, 'pin must not be empty')
  .refine((pin) => utf8Length(pin) <= MAX_FIELD_LENGTH, {
    message: `pin must be at most ${MAX_FIELD_LENGTH} bytes`,
  });

/**
 * @fileoverview Error taxonomy for the sensor link.
 *
 * Every error carries a `code` so callers can branch without string matching.
 */

export type ProtocolErrorCode =
  | 'truncated'
  | 'version_mismatch'
  | 'oversized_frame'
  | 'unknown_message_type'
  | 'encoding_error';

/**
 * A frame or message could not be decoded, or a message could not be encoded.
 * Always local to a single frame / connection.
 */
export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string) {
    super(message);
    this.name = 'ProtocolError';
    this.code = code;
  }
}

/**
 * A message field or the whole message is too large to encode.
 * Thrown before any bytes are produced.
 */
export class EncodingError extends ProtocolError {
  constructor(message: string) {
    super('encoding_error', message);
    this.name = 'EncodingError';
  }
}

export type TransportErrorCode = 'connect_failed' | 'write_failed' | 'closed';

/**
 * The underlying byte stream failed.
 */
export class TransportError extends Error {
  readonly code: TransportErrorCode;

  constructor(code: TransportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.code = code;
  }
}

export type StateErrorCode = 'not_ready' | 'not_idle';

/**
 * An operation was called in a lifecycle phase that does not allow it.
 * This is a usage error and is thrown to the caller.
 */
export class StateError extends Error {
  readonly code: StateErrorCode;

  constructor(code: StateErrorCode, message: string) {
    super(message);
    this.name = 'StateError';
    this.code = code;
  }
}

/**
 * Extract a printable message from anything that was thrown.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

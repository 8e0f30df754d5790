/**
 * @fileoverview Frame transport: size-prefixed framing over a byte stream.
 *
 * Frame := size:uint32le payload:byte[size]
 *
 * A stream transport may split a frame across chunks or deliver several
 * frames in one chunk. FrameDecoder accumulates bytes and only hands whole
 * frames to the codec.
 */

import { decodeMessage, encodeMessage } from './codec.js';
import { FRAME_HEADER_SIZE, MAX_MESSAGE_SIZE } from './constants.js';
import { ProtocolError } from './errors.js';
import type { Message } from './messages.js';

/**
 * Encode a message and prepend its 4-byte size.
 * @throws {EncodingError} if the message cannot be encoded
 */
export function encodeFrame(message: Message): Buffer {
  const payload = encodeMessage(message);
  const header = Buffer.alloc(FRAME_HEADER_SIZE);
  header.writeUInt32LE(payload.length, 0);
  return Buffer.concat([header, payload]);
}

/**
 * Reassembles frames from an arbitrarily chunked byte stream.
 *
 * One decoder belongs to exactly one transport; frames come out in the
 * order their bytes went in.
 *
 * @example
 * ```typescript
 * const decoder = new FrameDecoder();
 * socket.on('data', (chunk) => {
 *   for (const message of decoder.push(chunk)) {
 *     handle(message);
 *   }
 * });
 * ```
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private deferredError: unknown = undefined;

  constructor(private readonly maxFrameSize: number = MAX_MESSAGE_SIZE) {}

  /**
   * Append a chunk and decode every frame that is now complete.
   * Bytes of an incomplete trailing frame stay buffered for the next push.
   *
   * When a frame fails after others in the same push decoded fine, those
   * messages are returned and the failure is thrown by the following push.
   * @throws {ProtocolError} `oversized_frame` when a declared size exceeds the
   *   maximum, or any codec error for a complete frame
   */
  push(chunk: Uint8Array): Message[] {
    this.append(chunk);

    if (this.deferredError !== undefined) {
      const error = this.deferredError;
      this.deferredError = undefined;
      throw error;
    }

    const messages: Message[] = [];
    try {
      for (let message = this.next(); message; message = this.next()) {
        messages.push(message);
      }
    } catch (err) {
      if (messages.length === 0) throw err;
      this.deferredError = err;
    }
    return messages;
  }

  /**
   * Add received bytes without decoding anything yet.
   */
  append(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    this.buffer =
      this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
  }

  /**
   * Remove and decode the next complete frame, or return undefined when the
   * buffer does not hold one yet. Lets a consumer stop between frames.
   * @throws {ProtocolError} as for push
   */
  next(): Message | undefined {
    if (this.buffer.length < FRAME_HEADER_SIZE) {
      return undefined;
    }

    const size = this.buffer.readUInt32LE(0);
    if (size > this.maxFrameSize) {
      throw new ProtocolError(
        'oversized_frame',
        `frame of ${size} bytes exceeds maximum of ${this.maxFrameSize}`
      );
    }

    const frameEnd = FRAME_HEADER_SIZE + size;
    if (this.buffer.length < frameEnd) {
      return undefined;
    }

    const payload = this.buffer.subarray(FRAME_HEADER_SIZE, frameEnd);
    this.buffer = this.buffer.subarray(frameEnd);
    return decodeMessage(payload);
  }

  /**
   * Number of bytes waiting for the rest of their frame.
   */
  get bufferedBytes(): number {
    return this.buffer.length;
  }

  /**
   * Drop any partially received frame.
   */
  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.deferredError = undefined;
  }
}

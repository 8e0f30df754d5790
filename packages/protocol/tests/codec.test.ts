import { describe, expect, it } from 'vitest';
import {
  connectMessage,
  decodeMessage,
  EncodingError,
  encodeMessage,
  errorState,
  type Message,
  PinSchema,
  ProtocolError,
  pinRequest,
  pinResponse,
  sensorData,
} from '../src/index.js';

function expectProtocolError(fn: () => unknown, code: ProtocolError['code']): void {
  try {
    fn();
  } catch (err) {
    if (!(err instanceof ProtocolError)) throw err;
    expect(err.code).toBe(code);
    return;
  }
  throw new Error(`expected ProtocolError(${code})`);
}

const SAMPLE_MESSAGES: Message[] = [
  connectMessage(),
  pinRequest('4711'),
  pinRequest(''),
  pinResponse(1),
  pinResponse(-1),
  sensorData(Math.fround(42.42)),
  sensorData(0),
  errorState('sensor offline'),
  errorState(''),
];

describe('codec', () => {
  describe('encodeMessage', () => {
    it('should encode connect as header plus zero value', () => {
      expect([...encodeMessage(connectMessage())]).toEqual([1, 0, 0, 0, 0, 0, 0]);
    });

    it('should encode the pin with its length byte', () => {
      expect([...encodeMessage(pinRequest('ab'))]).toEqual([1, 1, 2, 0x61, 0x62, 0, 0, 0, 0]);
    });

    it('should write the float value little-endian', () => {
      // 1.5f == 0x3fc00000
      expect([...encodeMessage(sensorData(1.5))]).toEqual([1, 3, 0, 0x00, 0x00, 0xc0, 0x3f]);
    });

    it('should append the error tail only for error_state', () => {
      expect([...encodeMessage(errorState('bad'))]).toEqual([
        1, 4, 0, 0, 0, 0, 0, 3, 0x62, 0x61, 0x64,
      ]);
      expect(encodeMessage(pinResponse(1))).toHaveLength(7);
    });

    it('should reject a 300-byte pin before producing bytes', () => {
      expect(() => encodeMessage(pinRequest('x'.repeat(300)))).toThrow(EncodingError);
    });

    it('should reject an error longer than 255 bytes', () => {
      expect(() => encodeMessage(errorState('e'.repeat(256)))).toThrow(EncodingError);
    });

    it('should count multi-byte characters in the length limit', () => {
      // 'ä' is two bytes in UTF-8
      expect(() => encodeMessage(pinRequest('ä'.repeat(128)))).toThrow(EncodingError);
      expect(encodeMessage(pinRequest('ä'.repeat(127)))).toHaveLength(3 + 254 + 4);
    });

    it('should accept fields of exactly 255 bytes', () => {
      const encoded = encodeMessage(errorState('e'.repeat(255)));
      expect(encoded).toHaveLength(3 + 4 + 1 + 255);
    });
  });

  describe('decodeMessage', () => {
    it('should round-trip every message variant', () => {
      for (const message of SAMPLE_MESSAGES) {
        expect(decodeMessage(encodeMessage(message))).toEqual(message);
      }
    });

    it('should round-trip special float values', () => {
      expect(decodeMessage(encodeMessage(sensorData(Number.POSITIVE_INFINITY)))).toEqual(
        sensorData(Number.POSITIVE_INFINITY)
      );
      const nan = decodeMessage(encodeMessage(sensorData(Number.NaN)));
      expect(nan.type).toBe('sensor_data');
      expect(nan.type === 'sensor_data' && Number.isNaN(nan.value)).toBe(true);
    });

    it('should fail with truncated on every strict prefix', () => {
      for (const message of SAMPLE_MESSAGES) {
        const encoded = encodeMessage(message);
        for (let length = 0; length < encoded.length; length++) {
          expectProtocolError(() => decodeMessage(encoded.subarray(0, length)), 'truncated');
        }
      }
    });

    it('should fail with version_mismatch for any other version byte', () => {
      const encoded = encodeMessage(sensorData(3));
      for (const version of [0, 2, 7, 255]) {
        const tampered = Buffer.from(encoded);
        tampered[0] = version;
        expectProtocolError(() => decodeMessage(tampered), 'version_mismatch');
      }
    });

    it('should fail with unknown_message_type for tags past error_state', () => {
      const encoded = Buffer.from(encodeMessage(connectMessage()));
      encoded[1] = 9;
      expectProtocolError(() => decodeMessage(encoded), 'unknown_message_type');
    });

    it('should ignore trailing bytes', () => {
      const encoded = Buffer.concat([encodeMessage(pinResponse(2)), Buffer.from([0xde, 0xad])]);
      expect(decodeMessage(encoded)).toEqual(pinResponse(2));
    });

    it('should decode from a view into a larger buffer', () => {
      const backing = Buffer.concat([Buffer.from([9, 9]), encodeMessage(pinRequest('7'))]);
      expect(decodeMessage(backing.subarray(2))).toEqual(pinRequest('7'));
    });
  });

  describe('PinSchema', () => {
    it('should trim and accept a normal pin', () => {
      expect(PinSchema.parse('  1234 ')).toBe('1234');
    });

    it('should reject empty and oversized pins', () => {
      expect(PinSchema.safeParse('   ').success).toBe(false);
      expect(PinSchema.safeParse('p'.repeat(256)).success).toBe(false);
    });
  });
});

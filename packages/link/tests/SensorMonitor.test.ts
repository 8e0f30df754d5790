import { errorState, pinResponse, sensorData } from '@sensor-link/protocol';
import { createMockTransportFactory, type MockTransport } from '@sensor-link/testing';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SensorMonitor, type SensorMonitorEvents } from '../src/SensorMonitor.js';

describe('SensorMonitor', () => {
  let factory: ReturnType<typeof createMockTransportFactory>;
  let events: Required<SensorMonitorEvents>;
  let monitor: SensorMonitor;

  beforeEach(() => {
    factory = createMockTransportFactory();
    events = {
      onAuthorized: vi.fn(),
      onRejected: vi.fn(),
      onSample: vi.fn(),
      onError: vi.fn(),
      onConnectionLost: vi.fn(),
      onOutcome: vi.fn(),
    };
    monitor = new SensorMonitor(events, { host: 'sim.local', port: 9100 }, factory.create);
  });

  /** Acknowledge the handshake; the monitor answers with a pin request. */
  function acknowledge(transport: MockTransport): void {
    transport.simulateConnected();
    transport.simulateMessages(pinResponse(1));
  }

  function authorize(pin: string): MockTransport {
    monitor.requestConnection(pin);
    const transport = factory.last();
    acknowledge(transport);
    transport.simulateMessages(pinResponse(1));
    return transport;
  }

  describe('requestConnection', () => {
    it.each(['', '   '])('should reject the empty pin %j', (pin) => {
      expect(monitor.requestConnection(pin)).toEqual({
        status: 'invalid_pin',
        message: 'pin must not be empty',
      });
      expect(factory.transports).toHaveLength(0);
    });

    it('should reject a pin that does not fit the wire format', () => {
      const result = monitor.requestConnection('p'.repeat(256));
      expect(result).toEqual({ status: 'invalid_pin', message: 'pin must be at most 255 bytes' });
    });

    it('should start a connection to the configured endpoint', () => {
      const result = monitor.requestConnection('4711');
      const transport = factory.last();

      expect(result.status).toBe('started');
      expect(transport.connectCalls).toBe(1);
      expect(transport.host).toBe('sim.local');
      expect(transport.port).toBe(9100);
      expect(monitor.getSensor('4711')).toEqual({
        pin: '4711',
        phase: 'connecting',
        authorized: false,
        lastValue: null,
        history: [],
      });
    });

    it('should refuse a pin that is already pending', () => {
      monitor.requestConnection('4711');
      expect(monitor.requestConnection('4711')).toEqual({ status: 'already_exists' });
      expect(factory.transports).toHaveLength(1);
    });

    it('should refuse a pin that is already authorized', () => {
      authorize('4711');
      expect(monitor.requestConnection(' 4711 ')).toEqual({ status: 'already_exists' });
    });

    it('should report failed when the transport cannot even start connecting', () => {
      const failing = createMockTransportFactory((transport) => {
        transport.failConnect = true;
      });
      const failingMonitor = new SensorMonitor(events, {}, failing.create);

      expect(failingMonitor.requestConnection('4711')).toEqual({ status: 'failed' });
      expect(events.onError).toHaveBeenCalledWith(
        '4711',
        'connect failed: mock transport refused to connect'
      );
      expect(failingMonitor.listSensors()).toEqual([]);
    });

    it('should send the pin request after the handshake', () => {
      monitor.requestConnection('4711');
      const transport = factory.last();
      acknowledge(transport);

      expect(transport.getSentMessages()).toEqual([
        { type: 'connect' },
        { type: 'pin_request', pin: '4711' },
      ]);
    });
  });

  describe('outcomes', () => {
    it('should register the sensor once the pin is accepted', () => {
      authorize('4711');

      expect(events.onAuthorized).toHaveBeenCalledWith('4711');
      expect(events.onOutcome).toHaveBeenCalledWith('4711', { type: 'authorized' });
      expect(monitor.isAnyConnected()).toBe(true);
      expect(monitor.getSensor('4711')?.authorized).toBe(true);
      expect(monitor.getSensor('4711')?.phase).toBe('streaming');
    });

    it('should forward samples and keep history', () => {
      const transport = authorize('4711');
      transport.simulateMessages(sensorData(2.5), sensorData(3.5));

      expect(events.onSample).toHaveBeenNthCalledWith(1, '4711', 2.5);
      expect(events.onSample).toHaveBeenNthCalledWith(2, '4711', 3.5);
      expect(monitor.getSensor('4711')).toMatchObject({ lastValue: 3.5, history: [2.5, 3.5] });
    });

    it('should drop a rejected attempt and allow a new one', () => {
      monitor.requestConnection('4711');
      const transport = factory.last();
      acknowledge(transport);
      transport.simulateMessages(pinResponse(-1));

      expect(events.onRejected).toHaveBeenCalledWith('4711');
      expect(monitor.listSensors()).toEqual([]);
      expect(monitor.isAnyConnected()).toBe(false);
      expect(monitor.requestConnection('4711').status).toBe('started');
      expect(factory.transports).toHaveLength(2);
    });

    it('should drop the sensor on a remote error', () => {
      const transport = authorize('4711');
      transport.simulateMessages(errorState('boom'));

      expect(events.onError).toHaveBeenCalledWith('4711', 'boom');
      expect(monitor.getSensor('4711')).toBeUndefined();
    });

    it('should drop a pending attempt whose connect fails', () => {
      monitor.requestConnection('4711');
      factory.last().simulateConnectFailure('connection refused');

      expect(events.onError).toHaveBeenCalledWith('4711', 'connection refused');
      expect(monitor.listSensors()).toEqual([]);
    });

    it('should prune the registry when the connection is lost', () => {
      const transport = authorize('4711');
      transport.simulateClosed();

      expect(events.onConnectionLost).toHaveBeenCalledWith('4711');
      expect(monitor.isAnyConnected()).toBe(false);
      expect(monitor.listSensors()).toEqual([]);
    });
  });

  describe('disconnect and dispose', () => {
    it('should close an authorized sensor', () => {
      const transport = authorize('4711');

      expect(monitor.disconnect('4711')).toBe(true);
      expect(transport.closeCalls).toBe(1);
      expect(monitor.getSensor('4711')).toBeUndefined();
      expect(events.onConnectionLost).not.toHaveBeenCalled();
    });

    it('should look up and disconnect by the pin as it was requested', () => {
      const transport = authorize(' 4711 ');

      expect(monitor.getSensor(' 4711 ')?.pin).toBe('4711');
      expect(monitor.getSensor('4711')?.authorized).toBe(true);
      expect(monitor.disconnect(' 4711 ')).toBe(true);
      expect(transport.closeCalls).toBe(1);
      expect(monitor.getSensor('4711')).toBeUndefined();
    });

    it('should not find a pin that could never have been stored', () => {
      expect(monitor.getSensor('   ')).toBeUndefined();
      expect(monitor.disconnect('   ')).toBe(false);
    });

    it('should return false for an unknown pin', () => {
      expect(monitor.disconnect('nope')).toBe(false);
    });

    it('should list authorized sensors before pending ones', () => {
      monitor.requestConnection('pending');
      authorize('live');

      expect(monitor.listSensors().map((s) => s.pin)).toEqual(['live', 'pending']);
    });

    it('should close every connection on dispose', () => {
      monitor.requestConnection('pending');
      authorize('live');
      monitor.dispose();

      expect(factory.transports.map((t) => t.closeCalls)).toEqual([1, 1]);
      expect(monitor.listSensors()).toEqual([]);
    });
  });

  describe('requestConnectionAndWait', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should resolve once the handshake completes', async () => {
      const result = monitor.requestConnectionAndWait('4711', 1000);
      acknowledge(factory.last());

      await expect(result).resolves.toMatchObject({ status: 'handshake_complete' });
    });

    it('should close the attempt on timeout so the pin can be retried', async () => {
      const result = monitor.requestConnectionAndWait('4711', 100);
      const transport = factory.last();
      vi.advanceTimersByTime(100);

      await expect(result).resolves.toEqual({ status: 'timeout' });
      expect(transport.closeCalls).toBe(1);
      expect(monitor.getSensor('4711')).toBeUndefined();
      expect(monitor.requestConnection('4711').status).toBe('started');
    });

    it('should report failed when the connection closes first', async () => {
      const result = monitor.requestConnectionAndWait('4711', 1000);
      factory.last().simulateConnectFailure();

      await expect(result).resolves.toEqual({ status: 'failed' });
    });

    it('should pass through invalid and duplicate pins', async () => {
      await expect(monitor.requestConnectionAndWait('')).resolves.toEqual({
        status: 'invalid_pin',
        message: 'pin must not be empty',
      });

      monitor.requestConnection('4711');
      await expect(monitor.requestConnectionAndWait('4711')).resolves.toEqual({
        status: 'already_exists',
      });
    });
  });
});

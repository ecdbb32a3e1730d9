import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import {
  SensorInvalidAddressError,
  SensorNotConnectedError,
  SensorReadError,
  SensorTimeoutError,
  SensorWriteError,
  SensorWriteUnconfirmedError,
} from '../src/errors.js';
import { rootLogger } from '../src/logger.js';
import { SensorDevice } from '../src/sensor-device.js';
import { SensorDataEvent, SensorDeviceOptions } from '../src/types/sensor-types.js';
import {
  hex,
  IMU_READ_REQUEST,
  IMU_RESPONSE,
  IMU_RESPONSE_51,
  MockTransport,
  REGISTER_RESPONSE,
  SAVE_REQUEST,
  UNLOCK_REQUEST,
} from './fixtures.js';

const READ_51 = hex('51 03 00 34 00 0C 08 51');
const READ_REGISTERS_10 = hex('50 03 00 0A 00 02 E9 88');
const WRITE_REQUEST = hex('50 06 00 1A 00 05 65 8F');

const FAST_TIMINGS = {
  writeSettleMs: 0,
  pollIntervalMs: 1,
  loopReadIntervalMs: 1,
  responseTimeoutMs: 50,
} as const;

function sameBytes(a: number[], b: number[]): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

/** Answers each known request with a canned response */
function respondWith(pairs: Array<[number[], number[]]>): (request: number[]) => number[] | null {
  return request => pairs.find(([expected]) => sameBytes(expected, request))?.[1] ?? null;
}

describe('SensorDevice', () => {
  let transport: MockTransport;
  let device: SensorDevice;

  function createDevice(options: Partial<SensorDeviceOptions> = {}): SensorDevice {
    transport = new MockTransport();
    device = new SensorDevice(transport, { addresses: [0x50], ...FAST_TIMINGS, ...options });
    return device;
  }

  beforeAll(() => {
    rootLogger.disable();
  });

  afterAll(() => {
    rootLogger.enable();
  });

  afterEach(async () => {
    if (device.isOpen) await device.close();
  });

  it('opens and closes the transport', async () => {
    createDevice();
    await device.open();
    expect(device.isOpen).toBe(true);
    expect(transport.isOpen).toBe(true);

    await device.close();
    expect(device.isOpen).toBe(false);
    expect(transport.closeCalls).toBe(1);
  });

  it('reads the IMU block and stores the values', async () => {
    createDevice();
    transport.responder = respondWith([[IMU_READ_REQUEST, IMU_RESPONSE]]);
    const events: SensorDataEvent[] = [];
    device.setDataHandler(event => events.push(event));
    await device.open();

    const result = await device.readRegisters(0x50, 0x34, 12);

    expect(transport.written).toEqual([IMU_READ_REQUEST]);
    expect(result.policy).toBe('imu');
    expect(device.get(0x50, 'AccX')).toBe(8);
    expect(device.get(0x50, 'AngZ')).toBe(45);
    expect(events).toHaveLength(1);
    expect(events[0].address).toBe(0x50);
    expect(events[0].policy).toBe('imu');
    expect(events[0].registers.AsX).toBe(1999.939);
    expect(events[0].checksum).toBe(0xe9fa);
  });

  it('decodes a generic read from the requested register', async () => {
    createDevice();
    transport.responder = respondWith([[READ_REGISTERS_10, REGISTER_RESPONSE]]);
    await device.open();

    const result = await device.readRegisters(0x50, 10, 2);

    expect(result.policy).toBe('register');
    expect(result.context).toEqual({ startRegister: 12 });
    expect(device.snapshot(0x50)).toEqual({ '10': 0.5, '11': -0.5 });

    device.remove(0x50, 10);
    expect(device.snapshot(0x50)).toEqual({ '11': -0.5 });
  });

  it('drops register responses that arrive without a read', async () => {
    createDevice();
    const events: SensorDataEvent[] = [];
    device.setDataHandler(event => events.push(event));
    await device.open();

    transport.inject(REGISTER_RESPONSE);
    transport.inject(IMU_RESPONSE);

    await vi.waitFor(() => expect(device.stats.framesEmitted).toBe(2));
    expect(events.map(event => event.policy)).toEqual(['imu']);
    expect(device.snapshot(0x50)).not.toHaveProperty('10');
  });

  it('times out when the device does not answer', async () => {
    createDevice();
    await device.open();

    const read = device.readRegisters(0x50, 0x34, 12);

    await expect(read).rejects.toThrow(SensorTimeoutError);
    await expect(read).rejects.toThrow('No response from device 0x50 within 50ms');
  });

  it('rejects unknown addresses', async () => {
    createDevice();
    await device.open();

    await expect(device.readRegisters(0x52, 0x34, 12)).rejects.toThrow(SensorInvalidAddressError);
    await expect(device.writeRegister(0x52, 0x1a, 5)).rejects.toThrow(SensorInvalidAddressError);
    expect(transport.written).toEqual([]);
  });

  it('refuses commands while closed', async () => {
    createDevice();

    await expect(device.readRegisters(0x50, 0x34, 12)).rejects.toThrow(SensorNotConnectedError);
    expect(() => device.startLoopRead()).toThrow(SensorNotConnectedError);
  });

  it('sends unlock, write and save in order', async () => {
    createDevice();
    await device.open();

    await device.writeRegister(0x50, 0x1a, 5);

    expect(transport.written).toEqual([UNLOCK_REQUEST, WRITE_REQUEST, SAVE_REQUEST]);
  });

  it('waits the settle interval between the write frames', async () => {
    vi.useFakeTimers();
    try {
      createDevice({ writeSettleMs: 100 });
      await device.open();

      const write = device.writeRegister(0x50, 0x1a, 5);
      await vi.advanceTimersByTimeAsync(0);
      expect(transport.written).toEqual([UNLOCK_REQUEST]);

      await vi.advanceTimersByTimeAsync(99);
      expect(transport.written).toEqual([UNLOCK_REQUEST]);

      await vi.advanceTimersByTimeAsync(1);
      expect(transport.written).toEqual([UNLOCK_REQUEST, WRITE_REQUEST]);

      await vi.advanceTimersByTimeAsync(99);
      expect(transport.written).toHaveLength(2);

      await vi.advanceTimersByTimeAsync(1);
      await write;
      expect(transport.written).toEqual([UNLOCK_REQUEST, WRITE_REQUEST, SAVE_REQUEST]);

      const closing = device.close();
      await vi.advanceTimersByTimeAsync(1);
      await closing;
    } finally {
      vi.useRealTimers();
    }
  });

  it('holds other commands until the write sequence is saved', async () => {
    createDevice({ writeSettleMs: 20 });
    transport.responder = respondWith([[IMU_READ_REQUEST, IMU_RESPONSE]]);
    await device.open();

    const write = device.writeRegister(0x50, 0x1a, 5);
    await vi.waitFor(() => expect(transport.written).toHaveLength(1));
    const read = device.readRegisters(0x50, 0x34, 12);

    await Promise.all([write, read]);
    expect(transport.written).toEqual([UNLOCK_REQUEST, WRITE_REQUEST, SAVE_REQUEST, IMU_READ_REQUEST]);
  });

  it('checks writes with the configured verifier', async () => {
    const verifyWrite = vi.fn(async () => false);
    createDevice({ verifyWrite });
    await device.open();

    await expect(device.writeRegister(0x50, 0x1a, 5)).rejects.toThrow(SensorWriteUnconfirmedError);
    expect(verifyWrite).toHaveBeenCalledWith({ address: 0x50, register: 0x1a, value: 5 });
  });

  it('accepts writes the verifier confirms', async () => {
    createDevice({ verifyWrite: async () => true });
    await device.open();

    await expect(device.writeRegister(0x50, 0x1a, 5)).resolves.toBeUndefined();
  });

  it('keeps running when the data handler throws', async () => {
    createDevice();
    transport.responder = respondWith([[IMU_READ_REQUEST, IMU_RESPONSE]]);
    device.setDataHandler(() => {
      throw new Error('sink failed');
    });
    await device.open();

    await expect(device.readRegisters(0x50, 0x34, 12)).resolves.toMatchObject({ policy: 'imu' });
    await expect(device.readRegisters(0x50, 0x34, 12)).resolves.toMatchObject({ policy: 'imu' });
  });

  it('stops on a read failure and reports it', async () => {
    createDevice();
    const onError = vi.fn();
    device.setErrorHandler(onError);
    await device.open();

    const failure = new SensorReadError('Port closed');
    transport.failRead = failure;

    await vi.waitFor(() => expect(onError).toHaveBeenCalledWith(failure));
    expect(device.isOpen).toBe(false);
    await expect(device.readRegisters(0x50, 0x34, 12)).rejects.toThrow(SensorNotConnectedError);
  });

  it('fails the pending read when the write fails', async () => {
    createDevice();
    const onError = vi.fn();
    device.setErrorHandler(onError);
    await device.open();
    transport.failWrite = new SensorWriteError('Port closed');

    await expect(device.readRegisters(0x50, 0x34, 12)).rejects.toThrow(SensorWriteError);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(device.isOpen).toBe(false);
  });

  it('fails pending reads on close', async () => {
    createDevice({ responseTimeoutMs: 5000 });
    await device.open();

    const read = device.readRegisters(0x50, 0x34, 12);
    const outcome = expect(read).rejects.toThrow(SensorNotConnectedError);
    await vi.waitFor(() => expect(transport.written).toHaveLength(1));
    await device.close();

    await outcome;
  });

  it('loop-reads every address', async () => {
    createDevice({ addresses: [0x50, 0x51] });
    transport.responder = respondWith([
      [IMU_READ_REQUEST, IMU_RESPONSE],
      [READ_51, IMU_RESPONSE_51],
    ]);
    const seen = new Set<number>();
    device.setDataHandler(event => seen.add(event.address));
    await device.open();

    device.startLoopRead();
    expect(device.isLooping).toBe(true);
    await vi.waitFor(() => expect([...seen].sort()).toEqual([0x50, 0x51]));
    await device.stopLoopRead();

    expect(device.isLooping).toBe(false);
    expect(transport.written[0]).toEqual(IMU_READ_REQUEST);
    expect(transport.written[1]).toEqual(READ_51);
    expect(device.get(0x51, 'AccY')).toBe(-16);
  });

  it('keeps loop-reading past a silent device', async () => {
    createDevice({ addresses: [0x50, 0x51] });
    transport.responder = respondWith([[READ_51, IMU_RESPONSE_51]]);
    const handler = vi.fn();
    device.setDataHandler(handler);
    await device.open();

    device.startLoopRead();
    await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(2), { timeout: 2000 });
    await device.stopLoopRead();

    expect(device.get(0x50, 'AccX')).toBeUndefined();
    expect(device.get(0x51, 'AccX')).toBe(8);
  });
});

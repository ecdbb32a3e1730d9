// src/config.ts
import { parseArgs } from 'node:util';
import { FRAME_CONSTANTS, IMU_BLOCK, TIMING_DEFAULTS } from './constants/constants.js';
import { SensorConfigError } from './errors.js';
import { isIntegerInRange } from './utils/utils.js';
import {
  CliOptions,
  DeviceAddress,
  ResolvedSensorDeviceOptions,
  SensorDeviceOptions,
} from './types/sensor-types.js';

const DEFAULT_DEVICE_OPTIONS = {
  name: 'Sensor',
  writeSettleMs: TIMING_DEFAULTS.WRITE_SETTLE_MS,
  pollIntervalMs: TIMING_DEFAULTS.POLL_INTERVAL_MS,
  loopReadIntervalMs: TIMING_DEFAULTS.LOOP_READ_INTERVAL_MS,
  responseTimeoutMs: TIMING_DEFAULTS.RESPONSE_TIMEOUT_MS,
  loopReadRegister: IMU_BLOCK.START_REGISTER,
  loopReadCount: IMU_BLOCK.REGISTER_COUNT,
} as const;

const TIMING_KEYS = [
  'writeSettleMs',
  'pollIntervalMs',
  'loopReadIntervalMs',
  'responseTimeoutMs',
] as const;

/**
 * Merges defaults into device options and validates the result.
 * @throws SensorConfigError If an address or timing is invalid
 */
export function resolveSensorDeviceOptions(
  options: SensorDeviceOptions
): ResolvedSensorDeviceOptions {
  const resolved: ResolvedSensorDeviceOptions = { ...DEFAULT_DEVICE_OPTIONS, ...options };

  if (resolved.addresses.length === 0) {
    throw new SensorConfigError('At least one device address is required');
  }
  for (const address of resolved.addresses) {
    if (!isIntegerInRange(address, 0, FRAME_CONSTANTS.MAX_ADDRESS)) {
      throw new SensorConfigError(`Device address must be 0-255, got ${address}`);
    }
  }
  if (new Set(resolved.addresses).size !== resolved.addresses.length) {
    throw new SensorConfigError('Device addresses must be unique');
  }
  for (const key of TIMING_KEYS) {
    if (!isIntegerInRange(resolved[key], 0, Number.MAX_SAFE_INTEGER)) {
      throw new SensorConfigError(`${key} must be a non-negative integer, got ${resolved[key]}`);
    }
  }
  if (!isIntegerInRange(resolved.loopReadRegister, 0, FRAME_CONSTANTS.MAX_UINT16)) {
    throw new SensorConfigError(`loopReadRegister must be 0-65535, got ${resolved.loopReadRegister}`);
  }
  if (!isIntegerInRange(resolved.loopReadCount, 1, 125)) {
    throw new SensorConfigError(`loopReadCount must be 1-125, got ${resolved.loopReadCount}`);
  }

  return resolved;
}

export const CLI_USAGE = `Usage: sensor-link [options]

Reads acceleration from Modbus-RTU inertial sensors and reports min/max values.

Options:
  --port <path>        Serial port location (default: /dev/ttyUSB0)
  --baudrate <n>       Baud rate for the serial port (default: 230400)
  --address <id>       Device address, decimal or 0x-prefixed hex; repeatable (default: 0x50)
  --max <n>            Number of messages per min/max report (default: 500)
  --live               Print every decoded sample
  --debug              Log transmitted and received frames
  -h, --help           Show this help`;

function parsePositiveInteger(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new SensorConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseAddress(raw: string): DeviceAddress {
  let value = Number.NaN;
  if (/^0x[0-9a-f]{1,2}$/i.test(raw)) value = parseInt(raw.slice(2), 16);
  else if (/^\d{1,3}$/.test(raw)) value = parseInt(raw, 10);
  if (!isIntegerInRange(value, 0, FRAME_CONSTANTS.MAX_ADDRESS)) {
    throw new SensorConfigError(`Device address must be 0-255 or 0x00-0xff, got "${raw}"`);
  }
  return value;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        port: { type: 'string' },
        baudrate: { type: 'string' },
        address: { type: 'string', multiple: true },
        max: { type: 'string' },
        live: { type: 'boolean' },
        debug: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err: unknown) {
    throw new SensorConfigError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Parses command-line arguments (without the node and script entries).
 * @throws SensorConfigError On unknown options or invalid values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const values = readArgs(argv);
  const addresses = (values.address ?? ['0x50']).map(parseAddress);

  return {
    port: values.port ?? '/dev/ttyUSB0',
    baudRate: parsePositiveInteger('Baud rate', values.baudrate ?? '230400'),
    addresses: [...new Set(addresses)],
    max: parsePositiveInteger('Max messages', values.max ?? '500'),
    live: values.live ?? false,
    debug: values.debug ?? false,
    help: values.help ?? false,
  };
}

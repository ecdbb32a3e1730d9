// src/types/sensor-types.ts

import { IMU_FIELDS } from '../constants/constants.js';

// !=============================================================================
// ! Frames and registers
// !=============================================================================

/** 8-bit device address (Modbus ID) */
export type DeviceAddress = number;

/** A complete, checksum-validated read response */
export interface Frame {
  readonly address: DeviceAddress;
  readonly functionCode: number;
  readonly payload: Uint8Array;
  /** Trailing two bytes, high byte first */
  readonly checksum: number;
}

export type ImuField = (typeof IMU_FIELDS)[number];

/** IMU field name, or the numeric address of a register decoded generically */
export type RegisterKey = ImuField | number;

export type RegisterValues = ReadonlyMap<RegisterKey, number>;

/**
 * Register targeted by the last read request to a device. Passed into the
 * decoder and returned advanced, never mutated in place.
 */
export interface PendingReadContext {
  readonly startRegister: number;
}

export type DecodePolicy = 'imu' | 'register' | 'dropped';

export interface DecodeResult {
  readonly policy: DecodePolicy;
  readonly values: RegisterValues;
  /** Context after decoding; `undefined` when the frame was dropped */
  readonly context: PendingReadContext | undefined;
}

export interface FrameAssemblerStats {
  framesEmitted: number;
  checksumErrors: number;
  discardedBytes: number;
}

// !=============================================================================
// ! Transport
// !=============================================================================

/** Byte-oriented link to the sensors */
export interface Transport {
  readonly isOpen: boolean;
  open(): Promise<void>;
  /** Bytes received since the previous call; empty when nothing arrived */
  readAvailable(): Promise<Uint8Array>;
  write(data: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

/** Options for the Node.js SerialPort transport */
export interface NodeSerialTransportOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 2;
  parity?: 'none' | 'even' | 'mark' | 'odd' | 'space';
  maxBufferSize?: number;
}

// !=============================================================================
// ! Sensor device
// !=============================================================================

export interface SensorDataEvent {
  address: DeviceAddress;
  policy: Exclude<DecodePolicy, 'dropped'>;
  /** Values decoded from this frame only */
  values: RegisterValues;
  /** Every value currently stored for the device */
  registers: Readonly<Record<string, number>>;
  /** Checksum of the frame, high byte first */
  checksum: number;
}

export type SensorDataHandler = (event: SensorDataEvent) => void;

export type SensorErrorHandler = (error: Error) => void;

export interface WriteRequest {
  address: DeviceAddress;
  register: number;
  value: number;
}

/** Read-back check run after unlock/write/save; `false` marks the write unconfirmed */
export type WriteVerifier = (request: WriteRequest) => Promise<boolean>;

export interface SensorDeviceOptions {
  name?: string;
  addresses: readonly DeviceAddress[];
  writeSettleMs?: number;
  pollIntervalMs?: number;
  loopReadIntervalMs?: number;
  responseTimeoutMs?: number;
  loopReadRegister?: number;
  loopReadCount?: number;
  verifyWrite?: WriteVerifier;
}

export type ResolvedSensorDeviceOptions = Required<Omit<SensorDeviceOptions, 'verifyWrite'>> &
  Pick<SensorDeviceOptions, 'verifyWrite'>;

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Context for log records */
export interface LogContext {
  address?: number;
  funcCode?: number;
  register?: number;
  logger?: string;
  [key: string]: string | number | boolean | undefined;
}

export type LogField = 'timestamp' | 'level' | 'logger' | 'address' | 'funcCode' | 'register';

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

/** Category logger */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel | 'none'): void;
  pause(): void;
  resume(): void;
}

// !=============================================================================
// ! CLI
// !=============================================================================

export interface CliOptions {
  port: string;
  baudRate: number;
  addresses: DeviceAddress[];
  max: number;
  live: boolean;
  debug: boolean;
  help: boolean;
}

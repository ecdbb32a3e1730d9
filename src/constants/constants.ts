// src/constants/constants.ts

/**
 * Function codes understood by the sensor
 */
export const FUNCTION_CODES = {
  READ_HOLDING_REGISTERS: 0x03,
  WRITE_SINGLE_REGISTER: 0x06,
} as const;

/**
 * Write-protection control registers. Fixed by the device firmware.
 */
export const CONTROL_REGISTERS = {
  UNLOCK: 0x69,
  SAVE: 0x00,
} as const;

export const UNLOCK_KEY = 0xb588;
export const SAVE_VALUE = 0x0000;

export const FRAME_CONSTANTS = {
  /** address + function code + byte count + CRC(2) */
  RESPONSE_OVERHEAD: 5,
  RESPONSE_HEADER_SIZE: 3,
  CRC_SIZE: 2,
  REQUEST_SIZE: 8,
  MAX_ADDRESS: 0xff,
  MAX_UINT16: 0xffff,
} as const;

/** Register block starting at AccX: acceleration, angular rate, magnetic field, angle */
export const IMU_BLOCK = {
  START_REGISTER: 0x34,
  REGISTER_COUNT: 12,
  PAYLOAD_LENGTH: 24,
} as const;

export const IMU_FIELDS = [
  'AccX',
  'AccY',
  'AccZ',
  'AsX',
  'AsY',
  'AsZ',
  'HX',
  'HY',
  'HZ',
  'AngX',
  'AngY',
  'AngZ',
] as const;

/** Raw signed 16-bit value → physical unit */
export const SCALE = {
  /** ±16 g full scale */
  ACCELERATION: (raw: number): number => (raw / 32768) * 16,
  /** ±2000 deg/s full scale */
  ANGULAR_RATE: (raw: number): number => (raw / 32768) * 2000,
  MAGNETIC_FIELD: (raw: number): number => (raw * 13) / 1000,
  /** ±180 deg full scale */
  ANGLE: (raw: number): number => (raw / 32768) * 180,
  REGISTER: (raw: number): number => raw / 32768,
} as const;

export const TIMING_DEFAULTS = {
  WRITE_SETTLE_MS: 100,
  POLL_INTERVAL_MS: 10,
  LOOP_READ_INTERVAL_MS: 200,
  RESPONSE_TIMEOUT_MS: 1000,
} as const;

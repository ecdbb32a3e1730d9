// src/command-encoder.ts

import {
  CONTROL_REGISTERS,
  FRAME_CONSTANTS,
  FUNCTION_CODES,
  SAVE_VALUE,
  UNLOCK_KEY,
} from './constants/constants.js';
import { checksum } from './utils/crc.js';
import { isIntegerInRange } from './utils/utils.js';

function validateDeviceAddress(address: number): void {
  if (!isIntegerInRange(address, 0, FRAME_CONSTANTS.MAX_ADDRESS)) {
    throw new RangeError(`Device address must be 0-${FRAME_CONSTANTS.MAX_ADDRESS}, got ${address}`);
  }
}

function validateUint16(name: string, value: number): void {
  if (!isIntegerInRange(value, 0, FRAME_CONSTANTS.MAX_UINT16)) {
    throw new RangeError(`${name} must be 0-${FRAME_CONSTANTS.MAX_UINT16}, got ${value}`);
  }
}

/**
 * Builds an 8-byte request: address, function code, register, 16-bit operand, checksum.
 */
function buildRequest(
  address: number,
  functionCode: number,
  register: number,
  operand: number
): Uint8Array {
  validateDeviceAddress(address);
  validateUint16('Register address', register);
  validateUint16(functionCode === FUNCTION_CODES.READ_HOLDING_REGISTERS ? 'Register count' : 'Value', operand);

  const buffer = new Uint8Array(FRAME_CONSTANTS.REQUEST_SIZE);
  const view = new DataView(buffer.buffer);

  view.setUint8(0, address);
  view.setUint8(1, functionCode);
  view.setUint16(2, register, false);
  view.setUint16(4, operand, false);
  view.setUint16(6, checksum(buffer, FRAME_CONSTANTS.REQUEST_SIZE - FRAME_CONSTANTS.CRC_SIZE), false);

  return buffer;
}

/**
 * Read request (function 0x03).
 * @throws RangeError If an argument is out of range
 */
export function buildReadRequest(address: number, register: number, count: number): Uint8Array {
  return buildRequest(address, FUNCTION_CODES.READ_HOLDING_REGISTERS, register, count);
}

/**
 * Single-register write request (function 0x06).
 * @throws RangeError If an argument is out of range
 */
export function buildWriteRequest(address: number, register: number, value: number): Uint8Array {
  return buildRequest(address, FUNCTION_CODES.WRITE_SINGLE_REGISTER, register, value);
}

/** Write-enable command; registers stay write-protected until it is sent. */
export function buildUnlockRequest(address: number): Uint8Array {
  return buildWriteRequest(address, CONTROL_REGISTERS.UNLOCK, UNLOCK_KEY);
}

/** Persists written registers. */
export function buildSaveRequest(address: number): Uint8Array {
  return buildWriteRequest(address, CONTROL_REGISTERS.SAVE, SAVE_VALUE);
}

/**
 * Frames for a persistent write, in send order: unlock, write, save. The
 * caller waits the settle interval between consecutive frames.
 */
export function buildWriteSequence(
  address: number,
  register: number,
  value: number
): [unlock: Uint8Array, write: Uint8Array, save: Uint8Array] {
  const write = buildWriteRequest(address, register, value);
  return [buildUnlockRequest(address), write, buildSaveRequest(address)];
}

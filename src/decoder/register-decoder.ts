// src/decoder/register-decoder.ts

import { IMU_BLOCK, IMU_FIELDS, SCALE } from '../constants/constants.js';
import { bytesToUint16BE, roundTo } from '../utils/utils.js';
import {
  DecodeResult,
  Frame,
  ImuField,
  PendingReadContext,
  RegisterKey,
} from '../types/sensor-types.js';

const DECIMALS = 3;
const UINT16_SIZE = 2;

/** Scale applied to each IMU field, in payload order */
const IMU_SCALES: Record<ImuField, (raw: number) => number> = {
  AccX: SCALE.ACCELERATION,
  AccY: SCALE.ACCELERATION,
  AccZ: SCALE.ACCELERATION,
  AsX: SCALE.ANGULAR_RATE,
  AsY: SCALE.ANGULAR_RATE,
  AsZ: SCALE.ANGULAR_RATE,
  HX: SCALE.MAGNETIC_FIELD,
  HY: SCALE.MAGNETIC_FIELD,
  HZ: SCALE.MAGNETIC_FIELD,
  AngX: SCALE.ANGLE,
  AngY: SCALE.ANGLE,
  AngZ: SCALE.ANGLE,
};

/**
 * Two's-complement sign extension of a 16-bit value.
 */
export function toSignedInt16(value: number): number {
  const unsigned = value & 0xffff;
  return unsigned >= 0x8000 ? unsigned - 0x10000 : unsigned;
}

/**
 * Reads a signed big-endian 16-bit field.
 */
export function readInt16BE(bytes: ArrayLike<number>, offset: number): number {
  return toSignedInt16(bytesToUint16BE(bytes, offset));
}

function decodeImu(payload: Uint8Array): Map<RegisterKey, number> {
  const values = new Map<RegisterKey, number>();
  IMU_FIELDS.forEach((field, i) => {
    const raw = readInt16BE(payload, i * UINT16_SIZE);
    values.set(field, roundTo(IMU_SCALES[field](raw), DECIMALS));
  });
  return values;
}

function decodeRegisters(
  payload: Uint8Array,
  context: PendingReadContext
): { values: Map<RegisterKey, number>; context: PendingReadContext } {
  const values = new Map<RegisterKey, number>();
  const count = Math.floor(payload.length / UINT16_SIZE);
  for (let i = 0; i < count; i++) {
    const raw = readInt16BE(payload, i * UINT16_SIZE);
    values.set(context.startRegister + i, roundTo(SCALE.REGISTER(raw), DECIMALS));
  }
  return { values, context: { startRegister: context.startRegister + count } };
}

/**
 * Decodes a validated frame.
 *
 * A 24-byte payload is always the IMU block (acceleration, angular rate,
 * magnetic field, angle) and leaves the context untouched. Any other length
 * is a generic register read and needs the context of the request that
 * produced it; without one the frame is dropped.
 *
 * @param frame - validated read response
 * @param context - register targeted by the outstanding read, if any
 */
export function decodeFrame(frame: Frame, context?: PendingReadContext): DecodeResult {
  if (frame.payload.length === IMU_BLOCK.PAYLOAD_LENGTH) {
    return { policy: 'imu', values: decodeImu(frame.payload), context };
  }
  if (context === undefined) {
    return { policy: 'dropped', values: new Map(), context: undefined };
  }
  const decoded = decodeRegisters(frame.payload, context);
  return { policy: 'register', values: decoded.values, context: decoded.context };
}

// src/index.ts

export { SensorDevice } from './sensor-device.js';
export { default as NodeSerialTransport } from './transport/node-serialport.js';
export { FrameAssembler } from './framers/frame-assembler.js';
export type { FrameAssemblerOptions } from './framers/frame-assembler.js';
export { decodeFrame, readInt16BE, toSignedInt16 } from './decoder/register-decoder.js';
export {
  buildReadRequest,
  buildWriteRequest,
  buildUnlockRequest,
  buildSaveRequest,
  buildWriteSequence,
} from './command-encoder.js';
export { DeviceRegisterStore } from './device-register-store.js';
export { MinMaxTracker } from './stats/min-max-tracker.js';
export type { AxisExtremes, MinMaxSummary } from './stats/min-max-tracker.js';
export { checksum, appendChecksum, hasValidChecksum, crcTables } from './utils/crc.js';
export { resolveSensorDeviceOptions, parseCliArgs, CLI_USAGE } from './config.js';
export { rootLogger } from './logger.js';
export * from './constants/constants.js';
export * from './errors.js';
export type * from './types/sensor-types.js';

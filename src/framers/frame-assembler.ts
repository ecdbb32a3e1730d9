// src/framers/frame-assembler.ts
import { FRAME_CONSTANTS, FUNCTION_CODES } from '../constants/constants.js';
import { rootLogger } from '../logger.js';
import { checksum } from '../utils/crc.js';
import { toHex } from '../utils/utils.js';
import {
  DeviceAddress,
  Frame,
  FrameAssemblerStats,
  LoggerInstance,
} from '../types/sensor-types.js';

export interface FrameAssemblerOptions {
  logger?: LoggerInstance;
}

/**
 * Reassembles read responses from an unbounded byte stream.
 *
 * Frames are delimited only by the byte count at offset 2, so the assembler
 * keeps a buffer that always starts at a candidate frame start. Any anomaly
 * (unknown address, function code other than 0x03, checksum mismatch) drops
 * the first buffered byte and re-examines the rest; nothing is thrown.
 */
export class FrameAssembler {
  private readonly addresses: ReadonlySet<DeviceAddress>;
  private readonly logger: LoggerInstance;
  private buffer: number[] = [];
  private readonly _stats: FrameAssemblerStats = {
    framesEmitted: 0,
    checksumErrors: 0,
    discardedBytes: 0,
  };

  constructor(addresses: Iterable<DeviceAddress>, options: FrameAssemblerOptions = {}) {
    this.addresses = new Set(addresses);
    this.logger = options.logger ?? rootLogger.createLogger('FrameAssembler');
  }

  /**
   * Appends one byte and returns the frame it completes, if any.
   */
  public feed(byte: number): Frame | null {
    this.buffer.push(byte & 0xff);
    return this._resolve();
  }

  /**
   * Feeds a chunk byte by byte. Equivalent to calling `feed` for each byte.
   */
  public push(chunk: ArrayLike<number>): Frame[] {
    const frames: Frame[] = [];
    for (let i = 0; i < chunk.length; i++) {
      const frame = this.feed(chunk[i]);
      if (frame) frames.push(frame);
    }
    return frames;
  }

  public reset(): void {
    this.buffer = [];
  }

  public get bufferedLength(): number {
    return this.buffer.length;
  }

  public get stats(): Readonly<FrameAssemblerStats> {
    return { ...this._stats };
  }

  private _resolve(): Frame | null {
    const buf = this.buffer;
    while (buf.length > 0) {
      if (!this.addresses.has(buf[0])) {
        this._dropFirst();
        continue;
      }
      if (buf.length < FRAME_CONSTANTS.RESPONSE_HEADER_SIZE) return null;
      if (buf[1] !== FUNCTION_CODES.READ_HOLDING_REGISTERS) {
        this._dropFirst();
        continue;
      }

      const expected = buf[2] + FRAME_CONSTANTS.RESPONSE_OVERHEAD;
      if (buf.length < expected) return null;

      const calculated = checksum(buf, expected - FRAME_CONSTANTS.CRC_SIZE);
      const received = (buf[expected - 2] << 8) | buf[expected - 1];
      if (calculated !== received) {
        this._stats.checksumErrors++;
        this.logger.debug(
          `Checksum mismatch: received ${received.toString(16).padStart(4, '0')}, calculated ${calculated.toString(16).padStart(4, '0')}`,
          { address: buf[0] }
        );
        this._dropFirst();
        continue;
      }

      const frame: Frame = {
        address: buf[0],
        functionCode: buf[1],
        payload: Uint8Array.from(buf.slice(FRAME_CONSTANTS.RESPONSE_HEADER_SIZE, expected - 2)),
        checksum: received,
      };
      // Bytes past the frame exist only after a resync; keep them for the next feed
      this.buffer = buf.slice(expected);
      this._stats.framesEmitted++;
      this.logger.trace(`RX frame: ${toHex(buf.slice(0, expected))}`, {
        address: frame.address,
        funcCode: frame.functionCode,
      });
      return frame;
    }
    return null;
  }

  private _dropFirst(): void {
    this.buffer.shift();
    this._stats.discardedBytes++;
  }
}

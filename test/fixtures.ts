import { Transport } from '../src/types/sensor-types.js';

export function hex(dump: string): number[] {
  return dump
    .trim()
    .split(/\s+/)
    .map(byte => parseInt(byte, 16));
}

/** Response from 0x50 to a 12-register read at 0x34 */
export const IMU_RESPONSE = hex(
  '50 03 18 40 00 80 00 00 00 7F FF 08 00 FC 00 03 E8 FF 38 00 00 C0 00 40 00 20 00 E9 FA'
);

/** Response from 0x51 with the same payload as IMU_RESPONSE */
export const IMU_RESPONSE_51 = hex(
  '51 03 18 40 00 80 00 00 00 7F FF 08 00 FC 00 03 E8 FF 38 00 00 C0 00 40 00 20 00 17 78'
);

/** Two-register response from 0x50: 0x4000, 0xC000 */
export const REGISTER_RESPONSE = hex('50 03 04 40 00 C0 00 FF 36');

export const REGISTER_RESPONSE_51 = hex('51 03 04 40 00 C0 00 EF F6');

export const IMU_READ_REQUEST = hex('50 03 00 34 00 0C 09 80');

export const UNLOCK_REQUEST = hex('50 06 00 69 B5 88 22 A1');

export const SAVE_REQUEST = hex('50 06 00 00 00 00 84 4B');

/**
 * In-process stand-in for a serial line. Written frames are recorded; a
 * responder may queue bytes that the next `readAvailable` hands out.
 */
export class MockTransport implements Transport {
  public readonly written: number[][] = [];
  public responder: ((request: number[]) => number[] | null) | null = null;
  public failRead: Error | null = null;
  public failWrite: Error | null = null;
  public openCalls = 0;
  public closeCalls = 0;

  private pending: number[] = [];
  private _isOpen = false;

  get isOpen(): boolean {
    return this._isOpen;
  }

  async open(): Promise<void> {
    this.openCalls++;
    this._isOpen = true;
  }

  /** Queues bytes as if they arrived on the line */
  inject(bytes: number[]): void {
    this.pending.push(...bytes);
  }

  async readAvailable(): Promise<Uint8Array> {
    if (this.failRead) throw this.failRead;
    const data = Uint8Array.from(this.pending);
    this.pending = [];
    return data;
  }

  async write(data: Uint8Array): Promise<void> {
    if (this.failWrite) throw this.failWrite;
    const request = Array.from(data);
    this.written.push(request);
    const response = this.responder?.(request);
    if (response) this.inject(response);
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this._isOpen = false;
  }
}

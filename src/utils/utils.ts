// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Reads a big-endian 16-bit unsigned integer.
 * @param buf - Source bytes.
 * @param offset - Index of the high byte.
 */
export function bytesToUint16BE(buf: ArrayLike<number>, offset: number = 0): number {
  return ((buf[offset] << 8) | buf[offset + 1]) & 0xffff;
}

/**
 * Converts a byte sequence to a space-separated upper-case hex dump, e.g. `50 03 00 34`.
 */
export function toHex(bytes: ArrayLike<number>): string {
  const parts: string[] = [];
  for (let i = 0; i < bytes.length; i++) {
    const b = bytes[i] & 0xff;
    parts.push((HEX_TABLE[b >> 4] + HEX_TABLE[b & 0xf]).toUpperCase());
  }
  return parts.join(' ');
}

/**
 * Rounds to a fixed number of decimals, ties to the even neighbour.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;
  let rounded = floor;
  if (fraction > 0.5 || (fraction === 0.5 && floor % 2 !== 0)) rounded = floor + 1;
  // 0 rather than -0 for small negatives
  return rounded / factor + 0;
}

/**
 * Formats a wall-clock time as HH:MM:SS.mmm (local time).
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number, width: number = 2): string => String(n).padStart(width, '0');
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Checks that a value is an integer within [min, max].
 */
export function isIntegerInRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

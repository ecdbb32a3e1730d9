// src/utils/crc.ts

/**
 * CRC-16/MODBUS split into two byte tables (polynomial 0xA001, reflected).
 * CRC_HI[i] and CRC_LO[i] are the low and high byte of the 16-bit table entry
 * for i; the running "high" accumulator therefore ends up holding the byte
 * that is transmitted first.
 */
const CRC_HI: Uint8Array = new Uint8Array(256);
const CRC_LO: Uint8Array = new Uint8Array(256);
(function initCrcTables(): void {
  for (let i: number = 0; i < 256; i++) {
    let crc: number = i;
    for (let j: number = 0; j < 8; j++) {
      crc = crc & 0x0001 ? (crc >> 1) ^ 0xa001 : crc >> 1;
    }
    CRC_HI[i] = crc & 0xff;
    CRC_LO[i] = (crc >> 8) & 0xff;
  }
})();

/**
 * Calculates the frame checksum over the first `length` bytes.
 * @param data - input bytes
 * @param length - number of bytes to cover (default: all)
 * @returns 16-bit checksum; high byte is sent first on the wire
 * @throws RangeError If length exceeds the input
 */
function checksum(data: ArrayLike<number>, length: number = data.length): number {
  if (!Number.isInteger(length) || length < 0 || length > data.length) {
    throw new RangeError(`Checksum length must be 0-${data.length}, got ${length}`);
  }
  let hi: number = 0xff;
  let lo: number = 0xff;
  for (let i: number = 0; i < length; i++) {
    const index: number = (hi ^ data[i]) & 0xff;
    hi = (lo ^ CRC_HI[index]) & 0xff;
    lo = CRC_LO[index];
  }
  return (hi << 8) | lo;
}

/**
 * Copies of both lookup tables. The tables themselves stay private to this module.
 */
function crcTables(): { hi: Uint8Array; lo: Uint8Array } {
  return { hi: Uint8Array.from(CRC_HI), lo: Uint8Array.from(CRC_LO) };
}

/**
 * Returns a copy of `data` with its checksum appended (high byte first).
 */
function appendChecksum(data: Uint8Array): Uint8Array {
  const crc: number = checksum(data);
  const out: Uint8Array = new Uint8Array(data.length + 2);
  out.set(data, 0);
  out[data.length] = crc >> 8;
  out[data.length + 1] = crc & 0xff;
  return out;
}

/**
 * Checks the trailing two bytes of a complete frame against the checksum of the rest.
 */
function hasValidChecksum(frame: ArrayLike<number>, length: number = frame.length): boolean {
  if (length < 2 || length > frame.length) return false;
  const crc: number = checksum(frame, length - 2);
  return crc >> 8 === frame[length - 2] && (crc & 0xff) === frame[length - 1];
}

export { checksum, appendChecksum, hasValidChecksum, crcTables };

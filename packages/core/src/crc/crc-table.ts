/**
 * CRC32 lookup table for the reflected polynomial 0xEDB88320.
 */

const CRC32_POLYNOMIAL = 0xedb88320;

/** Running value every CRC32 accumulator starts from. */
export const CRC32_SEED = 0xffffffff;

function buildTable(): Uint32Array {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? CRC32_POLYNOMIAL ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
}

export const CRC32_TABLE: Uint32Array = buildTable();

/** Feed one byte into a running CRC32 value. */
export function crc32Step(crc: number, b: number): number {
  return (CRC32_TABLE[(crc ^ b) & 0xff] ^ (crc >>> 8)) >>> 0;
}

/** Final inversion applied to the stored string hashes. */
export function crc32Finish(crc: number): number {
  return ~crc >>> 0;
}

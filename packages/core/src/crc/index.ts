export { CRC32_TABLE, CRC32_SEED, crc32Step, crc32Finish } from './crc-table.js';
export {
  MetaData,
  scanMetadata,
  scanSize,
  scanCiCrc32,
  scanCrc32,
  scanCiCrc32AsciiLower,
  scanCrc32AsciiLower,
  scanAll,
  computeCrc32,
  computeCiCrc32,
  computeIsAscii,
  computeIsAsciiLower,
} from './scanner.js';
export type { ScanResult } from './scanner.js';

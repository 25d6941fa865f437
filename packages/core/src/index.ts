/**
 * @modpath/core: case-insensitive byte strings with cached metadata.
 */

export * from './memory/index.js';
export * from './crc/index.js';
export * from './string/index.js';
export { ByteStringError, ByteIndexOutOfRangeError } from './errors.js';

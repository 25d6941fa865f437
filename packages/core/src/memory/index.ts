export {
  ASCII_LIMIT,
  asciiToLower,
  asciiToUpper,
  asciiIsLower,
  isAsciiWhitespace,
  asciiToLowerInPlace,
  asciiToLowerCopy,
  memCopy,
  memCompare,
  memCompareCaseInsensitive,
  memFill,
  replaceBytes,
} from './memory-utility.js';
export {
  StringMemory,
  DEFAULT_STRING_MEMORY_CONFIG,
  configureStringMemory,
  getStringMemoryConfig,
  allocateString,
  freeString,
  trackOwnedBuffer,
  untrackOwnedBuffer,
} from './string-memory.js';
export type { StringMemoryConfig } from './string-memory.js';
export { TypedEventBus, stringMemoryEvents } from './memory-events.js';
export type { StringMemoryEventMap } from './memory-events.js';

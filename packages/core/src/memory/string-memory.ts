/**
 * Allocation of owned string buffers and the advisory counters around them.
 *
 * JavaScript reclaims the bytes themselves; "free" here means the owner gave the
 * buffer up, which is what the counters and the event channel report.
 */

import { stringMemoryEvents } from './memory-events.js';

export interface StringMemoryConfig {
  /** Count allocations and frees. Default: true. */
  trackAllocations: boolean;
  /** Warn when an owned buffer is garbage collected without dispose(). Default: false. */
  warnOnLeak: boolean;
}

export const DEFAULT_STRING_MEMORY_CONFIG: Readonly<StringMemoryConfig> = {
  trackAllocations: true,
  warnOnLeak: false,
};

let config: StringMemoryConfig = { ...DEFAULT_STRING_MEMORY_CONFIG };

export function configureStringMemory(overrides: Partial<StringMemoryConfig>): StringMemoryConfig {
  config = { ...config, ...overrides };
  return { ...config };
}

export function getStringMemoryConfig(): Readonly<StringMemoryConfig> {
  return config;
}

interface Counters {
  allocatedBytes: number;
  freedBytes: number;
  allocatedStrings: number;
  freedStrings: number;
}

const counters: Counters = {
  allocatedBytes: 0,
  freedBytes: 0,
  allocatedStrings: 0,
  freedStrings: 0,
};

/** Read-only view of the allocation counters. */
export const StringMemory = {
  get allocatedBytes(): number {
    return counters.allocatedBytes;
  },
  get freedBytes(): number {
    return counters.freedBytes;
  },
  get currentBytes(): number {
    return counters.allocatedBytes - counters.freedBytes;
  },
  get allocatedStrings(): number {
    return counters.allocatedStrings;
  },
  get freedStrings(): number {
    return counters.freedStrings;
  },
  get currentStrings(): number {
    return counters.allocatedStrings - counters.freedStrings;
  },
  resetCounters(): void {
    counters.allocatedBytes = 0;
    counters.freedBytes = 0;
    counters.allocatedStrings = 0;
    counters.freedStrings = 0;
  },
};

function recordFree(size: number, finalized: boolean): void {
  if (config.trackAllocations) {
    counters.freedBytes += size;
    counters.freedStrings++;
  }
  stringMemoryEvents.emit('free', { size, finalized });
}

/** Allocate a zeroed buffer for an owned string. */
export function allocateString(size: number): Uint8Array {
  const bytes = new Uint8Array(size);
  if (config.trackAllocations) {
    counters.allocatedBytes += size;
    counters.allocatedStrings++;
  }
  stringMemoryEvents.emit('allocate', { size });
  return bytes;
}

/** Give up an owned buffer. Must be called exactly once per allocateString(). */
export function freeString(bytes: Uint8Array): void {
  recordFree(bytes.length, false);
}

const leakSweeper = new FinalizationRegistry<number>((size) => {
  if (config.warnOnLeak) {
    console.warn(
      `StringMemory: owned string buffer of ${size} bytes was collected without dispose().`,
    );
  }
  recordFree(size, true);
});

/** Account for the owner's buffer if the owner is collected undisposed. */
export function trackOwnedBuffer(owner: object, size: number): void {
  leakSweeper.register(owner, size, owner);
}

export function untrackOwnedBuffer(owner: object): void {
  leakSweeper.unregister(owner);
}

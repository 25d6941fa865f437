/**
 * Game path limits and separators.
 */

/** Longest path, in bytes, a GamePath accepts. */
export const MAX_GAME_PATH_LENGTH = 2 << 10;

/** Folder separator of the asset index. */
export const PATH_SEPARATOR = 0x2f; // '/'

export const EXTENSION_SEPARATOR = 0x2e; // '.'

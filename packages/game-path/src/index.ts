/**
 * @modpath/game-path: length-checked game paths and asset-index path hashes.
 */

export { MAX_GAME_PATH_LENGTH, PATH_SEPARATOR, EXTENSION_SEPARATOR } from './config.js';
export { GamePathError } from './errors.js';
export {
  hash32,
  computeDomainHash,
  computeLowerCaseDomainHash,
  computeDomainHashFromText,
} from './path-hash.js';
export { GamePath } from './game-path.js';
export type { GamePathResult } from './game-path.js';

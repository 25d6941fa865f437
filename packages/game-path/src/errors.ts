/**
 * Typed error classes for game paths.
 */

/** A value could not be read as a game path. */
export class GamePathError extends Error {
  constructor(
    public readonly value: string,
    public readonly reason: string,
  ) {
    super(`Could not convert "${value}" to a game path: ${reason}`);
    this.name = 'GamePathError';
  }
}

/**
 * Cached facts that are either established or not yet evaluated.
 */

export type TriState = 'unknown' | 'yes' | 'no';

export function fromBoolean(value: boolean): TriState {
  return value ? 'yes' : 'no';
}

/**
 * Merge the facts of two pieces that end up in one string.
 *
 * A known `no` on either side decides the result; `yes` needs both sides to
 * know it. Anything else stays unknown.
 */
export function combine(a: TriState, b: TriState): TriState {
  if (a === 'no' || b === 'no') return 'no';
  if (a === 'yes' && b === 'yes') return 'yes';
  return 'unknown';
}

/** Keep a fact only if it is already known to hold. */
export function keepIfTrue(state: TriState): TriState {
  return state === 'yes' ? 'yes' : 'unknown';
}

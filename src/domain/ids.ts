// ============================================================================
// ID Generation
// ============================================================================

/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

const ID_RANGE_START = 2 ** 30;
const ID_RANGE_SIZE = 2 ** 30;

/**
 * Draw a model or deck ID uniformly from [2^30, 2^31).
 */
export function randomId(random: RandomSource = Math.random): number {
  return ID_RANGE_START + Math.floor(random() * ID_RANGE_SIZE);
}

/**
 * Draw `count` IDs that differ from each other and from everything in `taken`.
 */
export function distinctRandomIds(
  count: number,
  taken: Iterable<number>,
  random: RandomSource = Math.random
): number[] {
  const used = new Set(taken);
  const ids: number[] = [];
  while (ids.length < count) {
    const id = randomId(random);
    if (!used.has(id)) {
      used.add(id);
      ids.push(id);
    }
  }
  return ids;
}

/**
 * Note and card IDs for one build.
 * Starts at the current epoch milliseconds and counts up by one.
 */
export class IdSequence {
  private _next: number;

  constructor(start: number = Date.now()) {
    this._next = start;
  }

  next(): number {
    return this._next++;
  }
}

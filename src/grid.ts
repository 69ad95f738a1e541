import type { GridCoord } from './types.js';

/** Side of the smallest square grid that holds `count` items. */
export function sideLength(count: number): number {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`Item count must be a non-negative integer, got ${count}`);
  }
  const side = Math.ceil(Math.sqrt(count));
  // Guard against sqrt rounding just below an exact square root
  return side * side < count ? side + 1 : side;
}

/** Row-major position of item `index` on a `size x size` grid. */
export function indexToCoord(index: number, size: number): GridCoord {
  if (!Number.isInteger(index) || index < 0 || index >= size * size) {
    throw new RangeError(`Index ${index} outside ${size}x${size} grid`);
  }
  return { row: Math.floor(index / size), col: index % size };
}

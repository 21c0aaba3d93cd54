/** Moves a wrapping list cursor; returns null when there is nothing to select. */
export function stepSelectorIndex(index: number, delta: number, count: number): number | null {
  if (count <= 0) {
    return null;
  }
  return (((index + delta) % count) + count) % count;
}

/**
 * Helpers for arrays with set semantics, kept sorted and duplicate-free so
 * that persisted snapshots serialize identically regardless of insertion
 * order.
 */

export function withItem(items: ReadonlyArray<string>, item: string): string[] {
  if (items.includes(item)) return [...items];
  return [...items, item].sort();
}

export function withoutItem(items: ReadonlyArray<string>, item: string): string[] {
  return items.filter((i) => i !== item);
}

export function normalizeSet(items: Iterable<string>): string[] {
  return [...new Set(items)].sort();
}

/** Code-unit ordering, the same order Array.prototype.sort() uses for strings. */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

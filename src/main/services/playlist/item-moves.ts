import { InvalidReorderError } from "../../../shared/errors.js";
import type { ItemMovedResult } from "../../../shared/types.js";

export function validIndexes(indexes: Iterable<number>, size: number): number[] {
  const unique = new Set<number>();
  for (const index of indexes) {
    if (Number.isInteger(index) && index >= 0 && index < size) {
      unique.add(index);
    }
  }
  return [...unique];
}

function swap<T>(items: T[], a: number, b: number): void {
  [items[a], items[b]] = [items[b], items[a]];
}

/**
 * Moves each selected item one slot towards the top, in place. An item at
 * index 0, or directly below a selected item that could not move, stays put.
 */
export function moveItemsUp<T>(items: T[], indexes: Iterable<number>): ItemMovedResult[] {
  const ordered = validIndexes(indexes, items.length).sort((a, b) => a - b);
  const results: ItemMovedResult[] = [];
  let boundary = 0;

  for (const index of ordered) {
    if (index === boundary) {
      results.push({ oldIndex: index, newIndex: index });
      boundary = index + 1;
      continue;
    }

    swap(items, index, index - 1);
    results.push({ oldIndex: index, newIndex: index - 1 });
  }

  return results;
}

export function moveItemsDown<T>(items: T[], indexes: Iterable<number>): ItemMovedResult[] {
  const ordered = validIndexes(indexes, items.length).sort((a, b) => b - a);
  const results: ItemMovedResult[] = [];
  let boundary = items.length - 1;

  for (const index of ordered) {
    if (index === boundary) {
      results.push({ oldIndex: index, newIndex: index });
      boundary = index - 1;
      continue;
    }

    swap(items, index, index + 1);
    results.push({ oldIndex: index, newIndex: index + 1 });
  }

  return results;
}

export interface Placement<T> {
  item: T;
  newIndex: number;
}

export interface PlacementLabels<T> {
  noun: string;
  container: string;
  describe(item: T): string;
}

/**
 * Checks every placement against `items` and returns them keyed by target
 * index. Throws before anything is changed.
 */
export function collectPlacements<T>(
  items: readonly T[],
  placements: Iterable<Placement<T>>,
  labels: PlacementLabels<T>
): Map<number, T> {
  const size = items.length;
  const placed = new Map<number, T>();
  const moving = new Set<T>();

  for (const { item, newIndex } of placements) {
    if (!Number.isInteger(newIndex) || newIndex < 0 || newIndex >= size) {
      throw new InvalidReorderError(`Target index ${newIndex} is outside the ${labels.container} (size ${size}).`);
    }
    if (!items.includes(item)) {
      throw new InvalidReorderError(`${labels.describe(item)} is not in the ${labels.container}.`);
    }
    if (moving.has(item)) {
      throw new InvalidReorderError(`${labels.describe(item)} appears more than once.`);
    }
    if (placed.has(newIndex)) {
      throw new InvalidReorderError(`More than one ${labels.noun} targets index ${newIndex}.`);
    }
    moving.add(item);
    placed.set(newIndex, item);
  }

  return placed;
}

/** Placed items land on their indexes; the rest fill the free slots in their current order. */
export function placeItems<T>(items: readonly T[], placed: ReadonlyMap<number, T>): T[] {
  const moving = new Set(placed.values());
  const remaining = items.filter((item) => !moving.has(item));
  const reordered: T[] = [];

  for (let index = 0; index < items.length; index += 1) {
    const fromPlaced = placed.get(index);
    if (fromPlaced !== undefined) {
      reordered.push(fromPlaced);
      continue;
    }
    const next = remaining.shift();
    if (next !== undefined) {
      reordered.push(next);
    }
  }

  return reordered;
}

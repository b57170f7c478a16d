import { OutOfRangeError } from "../errors.js";
import { parseDimensionList } from "../validation.js";

/** Canonical form of a dimension list that collapses to a single point. */
export const ONE_POINT_DIMENSIONS: readonly number[] = Object.freeze([1]);

/**
 * Canonical dimension sequence: drops every `1`, sorts the rest in descending
 * order and substitutes `[1]` when nothing remains. A `0` entry raises
 * `InvalidArgumentError`. Canonical input comes back unchanged.
 */
export function canonicalizeDimensions(raw: readonly number[]): readonly number[] {
  const kept = parseDimensionList(raw).filter((size) => size !== 1);
  if (kept.length === 0) {
    return ONE_POINT_DIMENSIONS;
  }
  kept.sort((a, b) => b - a);
  return Object.freeze(kept);
}

/** Whether {@link dimensions} is the one-point sentinel `[1]`. */
export function isOnePoint(dimensions: readonly number[]): boolean {
  return dimensions.length === 1 && dimensions[0] === 1;
}

/** Read-only, bounds-checked view over a canonical dimension sequence. */
export class DimensionsView implements Iterable<number> {
  constructor(private readonly dimensions: readonly number[]) {}

  get length(): number {
    return this.dimensions.length;
  }

  /** Size at {@link index}; raises {@link OutOfRangeError} outside `0..length-1`. */
  at(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.dimensions.length) {
      throw new OutOfRangeError(index, this.dimensions.length);
    }
    return this.dimensions[index];
  }

  toArray(): number[] {
    return [...this.dimensions];
  }

  [Symbol.iterator](): Iterator<number> {
    return this.dimensions[Symbol.iterator]();
  }
}

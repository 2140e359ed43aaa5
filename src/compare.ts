/**
 * Comparison functions for multihashes.
 *
 * Multihashes are sorted by:
 * 1. code (algorithm identifier)
 * 2. digest (bytes, lexicographic)
 */

import { compare as compareBytes, equals as equalBytes } from "uint8arrays";
import type { Multihash } from "./interface.js";

export { compareBytes };

export interface Comparitor<T> {
  (a: T, b: T): number;
}

export const composeComparators = <T>(
  ...comparitors: Comparitor<T>[]
): Comparitor<T> => {
  return (a: T, b: T): number => {
    for (const comparitor of comparitors) {
      const comparison = comparitor(a, b);
      if (comparison !== 0) return comparison;
    }

    return 0;
  };
};

export const compareCodes = (a: Multihash, b: Multihash): number =>
  Math.sign(a.code - b.code);

export const compareDigests = (a: Multihash, b: Multihash): number =>
  compareBytes(a.digest, b.digest);

/**
 * Compare two multihashes. code > digest
 *
 * @param a
 * @param b
 * @returns
 */
export const compareMultihashes = composeComparators(
  compareCodes,
  compareDigests,
);

/**
 * Equality on (code, digest). Base or other metadata never takes part.
 */
export const equals = (a: Multihash, b: Multihash): boolean =>
  a === b || (a.code === b.code && equalBytes(a.digest, b.digest));

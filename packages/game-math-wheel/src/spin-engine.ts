import { notFoundError, validationError } from "@prize-wheel/core-errors";
import type { IRandomOracle } from "@prize-wheel/core-rng";
import { removeByPosition, removeByValue } from "./entry-pool";
import type { SpinSelection } from "./types";

/**
 * Default draw: one oracle index into the pool, winner removed by value. A
 * lone entry is handed out without reading the oracle.
 */
export function selectRandom(entries: readonly string[], oracle: IRandomOracle): SpinSelection {
  assertNotEmpty(entries);

  if (entries.length === 1) {
    return { winner: entries[0], position: 0, remaining: [], consumedRandomness: false };
  }

  const position = drawIndex(oracle, entries.length);
  const winner = entries[position];
  return { winner, position, remaining: removeByValue(entries, winner), consumedRandomness: true };
}

/**
 * Ordered draw: the oracle index goes through a caller-supplied permutation to
 * a pool position, and only that position is removed.
 */
export function selectWithOrder(
  entries: readonly string[],
  permutation: readonly number[],
  oracle: IRandomOracle,
): SpinSelection {
  assertNotEmpty(entries);
  assertPermutation(permutation, entries.length);

  if (entries.length === 1) {
    const position = permutation[0];
    return { winner: entries[position], position, remaining: removeByPosition(entries, position), consumedRandomness: false };
  }

  const drawn = drawIndex(oracle, entries.length);
  const position = permutation[drawn];
  return {
    winner: entries[position],
    position,
    remaining: removeByPosition(entries, position),
    consumedRandomness: true,
  };
}

function assertNotEmpty(entries: readonly string[]): void {
  if (entries.length === 0) {
    throw notFoundError("NO_ENTRIES", "no entries remain to draw from");
  }
}

function assertPermutation(permutation: readonly number[], count: number): void {
  if (!Array.isArray(permutation) || permutation.length !== count) {
    throw validationError("INVALID_PERMUTATION", "permutation length must equal the number of remaining entries", {
      length: Array.isArray(permutation) ? permutation.length : null,
      expected: count,
    });
  }
  permutation.forEach((value, idx) => {
    if (!Number.isInteger(value) || value < 0 || value >= count) {
      throw validationError("INVALID_PERMUTATION", `permutation[${idx}] must be an index below ${count}`, {
        index: idx,
        value,
      });
    }
  });
}

function drawIndex(oracle: IRandomOracle, bound: number): number {
  const value = oracle.randomBelow(bound);
  if (!Number.isInteger(value) || value < 0 || value >= bound) {
    throw new Error(`Wheel: oracle must produce an integer in [0, ${bound}), got ${value}`);
  }
  return value;
}

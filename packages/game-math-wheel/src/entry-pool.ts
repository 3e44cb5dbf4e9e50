import { notFoundError, validationError } from "@prize-wheel/core-errors";
import type { WheelLimits } from "@prize-wheel/core-types";

export function countDistinct(entries: readonly string[]): number {
  return new Set(entries).size;
}

/**
 * Validates a full entry list against the configured bounds and the number of
 * prizes it has to cover. Returns a copy safe to store.
 */
export function validateEntries(entries: readonly string[], prizeCount: number, limits: WheelLimits): string[] {
  if (!Array.isArray(entries)) {
    throw validationError("INVALID_ENTRY", "entries must be an array of identifiers");
  }
  if (entries.length < limits.minEntries || entries.length > limits.maxEntries) {
    throw validationError(
      "ENTRY_COUNT_OUT_OF_RANGE",
      `entries must contain between ${limits.minEntries} and ${limits.maxEntries} identifiers`,
      { count: entries.length, min: limits.minEntries, max: limits.maxEntries },
    );
  }
  entries.forEach((entry, idx) => {
    if (typeof entry !== "string" || entry.trim() === "") {
      throw validationError("INVALID_ENTRY", `entries[${idx}] must be a non-empty identifier`, { index: idx });
    }
  });

  const distinct = countDistinct(entries);
  if (distinct < prizeCount) {
    throw validationError("NOT_ENOUGH_UNIQUE_ENTRIES", "distinct entries must cover every prize", {
      distinct,
      prizeCount,
    });
  }
  return [...entries];
}

/** Drops every occurrence of `address`, so the identifier cannot win again. */
export function removeByValue(entries: readonly string[], address: string): string[] {
  return entries.filter((entry) => entry !== address);
}

/** Drops exactly the entry at `position`; duplicates elsewhere stay eligible. */
export function removeByPosition(entries: readonly string[], position: number): string[] {
  if (!Number.isInteger(position) || position < 0 || position >= entries.length) {
    throw notFoundError("NO_ENTRIES", "no entry at the requested position", { position, count: entries.length });
  }
  return [...entries.slice(0, position), ...entries.slice(position + 1)];
}

/**
 * When a single distinct identifier is left, hands it out without consuming
 * randomness. Returns null otherwise.
 */
export function autoPopIfSingleton(entries: readonly string[]): { winner: string; remaining: string[] } | null {
  if (entries.length === 0 || countDistinct(entries) !== 1) {
    return null;
  }
  const winner = entries[0];
  return { winner, remaining: removeByValue(entries, winner) };
}

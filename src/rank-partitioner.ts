// Perplexity Sectioner - Rank Partitioner
//
// Sorts aligned records by perplexity, trims both extremes and splits the
// rest into equal-probability bins by sorted rank.
//
// Interval convention: with L records, trim fraction c and N bins, bin i
// covers ranks r with
//
//     L(1-2c)(i-1)/N + Lc  <  r  <=  L(1-2c)i/N + Lc
//
// open at the low end, closed at the high end, so a rank sitting exactly on
// a boundary belongs to the lower-indexed bin. Bounds stay real-valued; no
// rounding is applied, so integer bin sizes may differ by one.

import { validateTrimFraction } from "./config.js";
import { ValidationError } from "./errors.js";
import type { AlignedRecord, BinAssignment, PartitionResult } from "./types.js";

export const DEFAULT_TRIM_FRACTION = 0.05;

export interface BinBounds {
  /** Exclusive lower rank bound */
  lower: number;
  /** Inclusive upper rank bound */
  upper: number;
}

/**
 * Rank bounds of bin `bin` (1-based) for `total` records.
 */
export function binBounds(total: number, bin: number, binCount: number, trimFraction: number): BinBounds {
  const span = total * (1 - 2 * trimFraction);
  const offset = total * trimFraction;
  return {
    lower: (span * (bin - 1)) / binCount + offset,
    upper: (span * bin) / binCount + offset,
  };
}

/** Whether a 1-based sorted rank falls inside the trim window `[Lc, L(1-c)]`. */
export function isWithinTrimWindow(rank: number, total: number, trimFraction: number): boolean {
  return rank >= total * trimFraction && rank <= total * (1 - trimFraction);
}

/**
 * Bin index for a 1-based sorted rank, or null when the rank is trimmed.
 */
export function assignBin(
  rank: number,
  total: number,
  binCount: number,
  trimFraction: number = DEFAULT_TRIM_FRACTION,
): number | null {
  if (!isWithinTrimWindow(rank, total, trimFraction)) {
    return null;
  }
  for (let bin = 1; bin <= binCount; bin++) {
    const { lower, upper } = binBounds(total, bin, binCount, trimFraction);
    if (rank > lower && rank <= upper) {
      return bin;
    }
  }
  return null;
}

/**
 * Stable ascending sort by perplexity; equal perplexities keep input order.
 */
export function sortByPerplexity(records: readonly AlignedRecord[]): AlignedRecord[] {
  return [...records].sort((a, b) => a.perplexity - b.perplexity);
}

/**
 * Assigns every aligned record to one bin or to the trimmed set.
 *
 * @throws ValidationError if `binCount` is not a positive integer or the
 *   trim fraction is outside [0, 0.5).
 */
export function partition(
  alignedRecords: readonly AlignedRecord[],
  binCount: number,
  trimFraction: number = DEFAULT_TRIM_FRACTION,
): PartitionResult {
  if (!Number.isInteger(binCount) || binCount < 1) {
    throw new ValidationError(`Bin count must be a positive integer, got ${binCount}`);
  }
  validateTrimFraction(trimFraction);

  const total = alignedRecords.length;
  const sorted = sortByPerplexity(alignedRecords);
  const bins: AlignedRecord[][] = Array.from({ length: binCount }, () => []);
  const excludedLow: AlignedRecord[] = [];
  const excludedHigh: AlignedRecord[] = [];
  const lowCut = total * trimFraction;

  const assignments: BinAssignment[] = sorted.map((record, index) => {
    const rank = index + 1;
    const bin = assignBin(rank, total, binCount, trimFraction);
    if (bin === null) {
      (rank <= lowCut ? excludedLow : excludedHigh).push(record);
    } else {
      bins[bin - 1].push(record);
    }
    return { record, rank, bin };
  });

  return { binCount, trimFraction, total, assignments, bins, excludedLow, excludedHigh };
}

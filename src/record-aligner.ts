// Perplexity Sectioner - Record Aligner
// Restricts the perplexity records to the utterances that were decoded.

import { AlignmentError, MissingUtterancesError } from "./errors.js";
import type { AlignedRecord, PerplexityRecord, UtteranceId } from "./types.js";

/**
 * Returns the hypothesis ids with no perplexity record, deduplicated,
 * in order of first appearance.
 */
export function findMissingIds(
  perplexityRecords: readonly PerplexityRecord[],
  hypothesisIds: readonly UtteranceId[],
): UtteranceId[] {
  const known = new Set(perplexityRecords.map((r) => r.id));
  const missing = new Set<UtteranceId>();
  for (const id of hypothesisIds) {
    if (!known.has(id)) missing.add(id);
  }
  return [...missing];
}

/**
 * Keeps the perplexity records whose id occurs among `hypothesisIds`, in
 * perplexity-file order, numbering them 1..n as they are emitted.
 *
 * @throws MissingUtterancesError if any hypothesis id has no perplexity record.
 */
export function align(
  perplexityRecords: readonly PerplexityRecord[],
  hypothesisIds: readonly UtteranceId[],
): AlignedRecord[] {
  const missing = findMissingIds(perplexityRecords, hypothesisIds);
  if (missing.length > 0) {
    throw new MissingUtterancesError(missing);
  }

  const wanted = new Set(hypothesisIds);
  const aligned: AlignedRecord[] = [];
  for (const record of perplexityRecords) {
    if (wanted.has(record.id)) {
      aligned.push({ ...record, position: aligned.length + 1 });
    }
  }
  return aligned;
}

/**
 * Returns the ids that occur more than once, each listed once, in order of
 * first repetition.
 */
export function findDuplicateIds(ids: readonly UtteranceId[]): UtteranceId[] {
  const seen = new Set<UtteranceId>();
  const duplicates = new Set<UtteranceId>();
  for (const id of ids) {
    if (seen.has(id)) duplicates.add(id);
    seen.add(id);
  }
  return [...duplicates];
}

/**
 * Rejects repeated ids in one of the two record streams.
 *
 * @throws AlignmentError naming every repeated id.
 */
export function assertUniqueIds(ids: readonly UtteranceId[], source: string): void {
  const duplicates = findDuplicateIds(ids);
  if (duplicates.length > 0) {
    throw new AlignmentError(`Duplicate utterance id(s) in the ${source}: ${duplicates.join(", ")}`);
  }
}

/**
 * Checks that alignment produced exactly one record per hypothesis line.
 * Duplicate ids on either side break this.
 */
export function assertOneToOne(aligned: readonly AlignedRecord[], hypothesisCount: number): void {
  if (aligned.length !== hypothesisCount) {
    throw new AlignmentError(
      `Aligned ${aligned.length} perplexity record(s) against ${hypothesisCount} hypothesis line(s); ` +
        "each utterance must appear exactly once in both files",
    );
  }
}

/**
 * Checks that the filtered perplexity order matches the hypothesis file
 * order index for index. Needed only when pairing records by position.
 */
export function assertSameOrder(
  aligned: readonly AlignedRecord[],
  hypothesisIds: readonly UtteranceId[],
): void {
  const length = Math.min(aligned.length, hypothesisIds.length);
  for (let i = 0; i < length; i++) {
    if (aligned[i].id !== hypothesisIds[i]) {
      throw new AlignmentError(
        `Utterance order differs at position ${i + 1}: perplexity file has '${aligned[i].id}', ` +
          `hypothesis file has '${hypothesisIds[i]}'`,
      );
    }
  }
  assertOneToOne(aligned, hypothesisIds.length);
}

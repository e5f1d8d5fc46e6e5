// Perplexity Sectioner - Error taxonomy
// Every failure a sectioning run can report maps to exit code 1 at the CLI.

import type { UtteranceId } from "./types.js";

export class SectioningError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad arguments, configuration, paths or input lines. Raised before any output is written. */
export class ValidationError extends SectioningError {}

/** The perplexity and hypothesis record sets do not line up. */
export class AlignmentError extends SectioningError {}

/**
 * Hypothesis ids that have no perplexity record.
 * `offendingLines` holds the matching hypothesis lines when the caller has them.
 */
export class MissingUtterancesError extends AlignmentError {
  readonly missingIds: UtteranceId[];
  readonly offendingLines: string[];

  constructor(missingIds: UtteranceId[], offendingLines: string[] = []) {
    super(`Perplexity records are missing for ${missingIds.length} utterance(s): ${missingIds.join(", ")}`);
    this.missingIds = missingIds;
    this.offendingLines = offendingLines;
  }
}

/** An output path could not be created or written. */
export class IOError extends SectioningError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot write '${path}': ${detail}`, { cause });
    this.path = path;
  }
}

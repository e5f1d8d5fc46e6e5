// Perplexity Sectioner - Shared TypeScript interfaces and types
// Records flowing through align → partition → materialize, plus run options.

// ─── Corpus Records ─────────────────────────────────────────────────────────────

/** Source audio file name without its extension. Unique within a corpus partition. */
export type UtteranceId = string;

/**
 * One line of a perplexity file: `perplexity\ttext\t(id)`.
 * File order is upstream enumeration order, not sorted by any field.
 */
export interface PerplexityRecord {
  perplexity: number;
  text: string;
  id: UtteranceId;
}

/**
 * One line of a hypothesis trn file: `<text> (<id>)`.
 */
export interface HypothesisRecord {
  text: string;
  id: UtteranceId;
  /** Verbatim source line, used when the hypothesis is re-emitted */
  line: string;
}

/**
 * A perplexity record that survived alignment against the hypothesis ids.
 * `position` is its 1-based index in the filtered, unsorted perplexity stream.
 */
export interface AlignedRecord extends PerplexityRecord {
  position: number;
}

// ─── Partitioning ───────────────────────────────────────────────────────────────

export interface BinAssignment {
  record: AlignedRecord;
  /** 1-based rank after the stable perplexity sort */
  rank: number;
  /** 1-based bin index, or null when the record was trimmed */
  bin: number | null;
}

export interface PartitionResult {
  binCount: number;
  trimFraction: number;
  /** Number of aligned records (L) */
  total: number;
  /** One entry per aligned record, in sorted-rank order */
  assignments: BinAssignment[];
  /** bins[i - 1] holds the records of bin i, in sorted-rank order */
  bins: AlignedRecord[][];
  /** Trimmed records at or below the low cut */
  excludedLow: AlignedRecord[];
  /** Trimmed records above the low cut (the high extreme) */
  excludedHigh: AlignedRecord[];
}

// ─── Materialization ────────────────────────────────────────────────────────────

/**
 * How bin records are paired with hypothesis lines.
 * - "id": by utterance id
 * - "position": record position N takes hypothesis line N (orders must agree)
 */
export type MatchStrategy = "id" | "position";

export type TokenizerMode = "plain" | "phonetic";

export interface MaterializedBin {
  bin: number;
  dir: string;
  refPath: string;
  hypPath: string;
  /** Number of utterances written to each of ref.trn and hyp.trn */
  count: number;
}

// ─── Sectioning Run ─────────────────────────────────────────────────────────────

export interface SectionRequest {
  perplexityPath: string;
  hypothesisPath: string;
  binCount: number;
  outDir: string;
}

export interface SectionResult {
  /** True when the completion marker was already present and nothing was written */
  skipped: boolean;
  bins: MaterializedBin[];
  total: number;
  excludedLow: number;
  excludedHigh: number;
}

// Perplexity Sectioner - Public API
// Splits a speech corpus into perplexity-ranked difficulty bins.

export const APP_NAME = "Perplexity Sectioner";
export const APP_VERSION = "0.1.0";

export type {
  AlignedRecord,
  BinAssignment,
  HypothesisRecord,
  MatchStrategy,
  MaterializedBin,
  PartitionResult,
  PerplexityRecord,
  SectionRequest,
  SectionResult,
  TokenizerMode,
  UtteranceId,
} from "./types.js";

export {
  AlignmentError,
  IOError,
  MissingUtterancesError,
  SectioningError,
  ValidationError,
} from "./errors.js";

export { createConsoleLogger, silentLogger } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";

export { DEFAULT_CONFIG, loadConfig } from "./config.js";
export type { SectionerConfig } from "./config.js";

export {
  PHONETIC_CLUSTER_PATTERNS,
  PHONETIC_TOKENIZER,
  PLAIN_TOKENIZER,
  retokenizeLine,
  tokenize,
  tokenizePhonetic,
} from "./tokenizer.js";
export type { TokenizerOptions } from "./tokenizer.js";

export {
  formatPerplexityLine,
  formatTrnLine,
  parseHypothesisFile,
  parsePerplexityFile,
} from "./trn-format.js";

export { align, findMissingIds } from "./record-aligner.js";
export { assignBin, binBounds, partition, DEFAULT_TRIM_FRACTION } from "./rank-partitioner.js";
export { BinMaterializer } from "./bin-materializer.js";
export { PerplexitySectioner } from "./sectioner.js";
export { buildCorpusTranscript, prepareTokenizedTranscript } from "./corpus-prep.js";
export { runPrepareCli, runSectionCli } from "./cli.js";

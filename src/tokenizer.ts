// Perplexity Sectioner - Tokenizer
//
// Splits word-level transcript text into atomic units so character-level
// language models and scorers see one symbol per token. Word boundaries
// survive the split as an explicit marker token.

import { ValidationError } from "./errors.js";
import type { TokenizerMode } from "./types.js";

// ─── Options ────────────────────────────────────────────────────────────────────

export interface TokenizerOptions {
  /** Token that stands in for the space between two words. Default: "_" */
  wordBoundary: string;
  /**
   * Regular expression sources tried in order at each position before the
   * single-character fallback. The first pattern that matches wins.
   */
  clusterPatterns: readonly string[];
}

/**
 * IPA clusters emitted as one token in phonetic mode, longest first:
 * the filler marker, long and short affricates, then any long segment.
 */
export const PHONETIC_CLUSTER_PATTERNS: readonly string[] = [
  "\\[fp\\]",
  "d[zʒ]ː",
  "tʃː",
  "d[zʒ]",
  "tʃ",
  "\\Sː",
];

export const PLAIN_TOKENIZER: Readonly<TokenizerOptions> = {
  wordBoundary: "_",
  clusterPatterns: [],
};

export const PHONETIC_TOKENIZER: Readonly<TokenizerOptions> = {
  wordBoundary: "_",
  clusterPatterns: PHONETIC_CLUSTER_PATTERNS,
};

// Compiled matchers, keyed by the joined pattern list
const matcherCache = new Map<string, RegExp>();

function buildMatcher(options: TokenizerOptions): RegExp {
  if (options.wordBoundary.length === 0 || /\s/u.test(options.wordBoundary)) {
    throw new ValidationError(
      `Word boundary marker must be non-empty and contain no whitespace, got '${options.wordBoundary}'`,
    );
  }

  const alternatives = [...options.clusterPatterns.map((p) => `(?:${p})`), "\\S"];
  const source = alternatives.join("|");
  let matcher = matcherCache.get(source);
  if (!matcher) {
    try {
      matcher = new RegExp(source, "gu");
    } catch (err) {
      throw new ValidationError(`Invalid cluster pattern list: ${source}`, { cause: err });
    }
    matcherCache.set(source, matcher);
  }
  return matcher;
}

// ─── Tokenization ───────────────────────────────────────────────────────────────

/**
 * Joins the words of `text` with the boundary marker. Leading and trailing
 * whitespace is dropped and inner runs of whitespace count as one separator.
 */
export function markWordBoundaries(text: string, wordBoundary: string): string {
  return text.split(/\s+/u).filter((word) => word.length > 0).join(wordBoundary);
}

/**
 * Splits `text` into tokens.
 *
 * Algorithm:
 *  1. Collapse whitespace and replace each word gap with the boundary marker.
 *  2. Scan left to right. At each position try the cluster patterns in
 *     order, then fall back to a single code point. Matches never overlap.
 */
export function tokenizeWith(text: string, options: TokenizerOptions): string[] {
  const matcher = buildMatcher(options);
  const marked = markWordBoundaries(text, options.wordBoundary);
  return Array.from(marked.matchAll(matcher), (m) => m[0]);
}

/** Plain mode: one token per non-space character. */
export function tokenize(text: string, options: TokenizerOptions = PLAIN_TOKENIZER): string[] {
  return tokenizeWith(text, { ...options, clusterPatterns: [] });
}

/** Phonetic mode: IPA clusters and the filler marker stay whole. */
export function tokenizePhonetic(
  text: string,
  options: TokenizerOptions = PHONETIC_TOKENIZER,
): string[] {
  return tokenizeWith(text, options);
}

/**
 * Re-tokenizes a trn line. The last whitespace-delimited field is the
 * utterance identifier; it is re-appended as written, unsplit.
 *
 * "cat dog (utt01)" → "c a t _ d o g (utt01)"
 */
export function retokenizeLine(
  line: string,
  mode: TokenizerMode = "plain",
  options?: TokenizerOptions,
): string {
  const fields = line.trim().split(/\s+/u).filter((f) => f.length > 0);
  const identifier = fields.pop();
  if (identifier === undefined) {
    return "";
  }

  const text = fields.join(" ");
  const tokens = mode === "phonetic" ? tokenizePhonetic(text, options) : tokenize(text, options);
  return [...tokens, identifier].join(" ");
}

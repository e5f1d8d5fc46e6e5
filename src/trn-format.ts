// Perplexity Sectioner - TRN and perplexity file formats
//
// Perplexity file:  perplexity<TAB>text<TAB>(id)
// Hypothesis trn:   text (id)
//
// Files are parsed once into typed records; everything downstream works on
// the records and serializes lines only when writing output.

import { ValidationError } from "./errors.js";
import type { HypothesisRecord, PerplexityRecord, UtteranceId } from "./types.js";

/**
 * Strips the conventional parentheses from an identifier field.
 * Fields without them are taken as-is.
 */
export function unwrapIdentifier(field: string): UtteranceId {
  const trimmed = field.trim();
  if (trimmed.length >= 2 && trimmed.startsWith("(") && trimmed.endsWith(")")) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

/** Formats a transcript line: `<text> (<id>)`, or `(<id>)` for empty text. */
export function formatTrnLine(text: string, id: UtteranceId): string {
  return text.length > 0 ? `${text} (${id})` : `(${id})`;
}

/**
 * Splits file content into non-blank lines, each paired with its 1-based
 * line number in the file.
 */
function contentLines(content: string): Array<{ line: string; lineNumber: number }> {
  const result: Array<{ line: string; lineNumber: number }> = [];
  content.split(/\r?\n/).forEach((line, index) => {
    if (line.trim().length > 0) {
      result.push({ line, lineNumber: index + 1 });
    }
  });
  return result;
}

// ─── Perplexity File ────────────────────────────────────────────────────────────

/**
 * Parses one perplexity line.
 *
 * @throws ValidationError when the line does not hold three tab-separated
 *   fields, the perplexity is not a number, or the id is empty.
 */
export function parsePerplexityLine(line: string, lineNumber = 1): PerplexityRecord {
  const fields = line.split("\t");
  if (fields.length !== 3) {
    throw new ValidationError(
      `Perplexity line ${lineNumber}: expected 3 tab-separated fields, found ${fields.length}`,
    );
  }

  const [rawPerplexity, text, rawId] = fields;
  const perplexity = Number(rawPerplexity.trim());
  if (rawPerplexity.trim().length === 0 || Number.isNaN(perplexity)) {
    throw new ValidationError(`Perplexity line ${lineNumber}: '${rawPerplexity}' is not a number`);
  }

  const id = unwrapIdentifier(rawId);
  if (id.length === 0) {
    throw new ValidationError(`Perplexity line ${lineNumber}: missing utterance id`);
  }

  return { perplexity, text: text.trim(), id };
}

/** Parses a whole perplexity file, preserving file order. Blank lines are skipped. */
export function parsePerplexityFile(content: string): PerplexityRecord[] {
  return contentLines(content).map(({ line, lineNumber }) => parsePerplexityLine(line, lineNumber));
}

/**
 * Formats a record the way the external perplexity scorer writes it,
 * with the perplexity rounded to one decimal.
 */
export function formatPerplexityLine(record: PerplexityRecord): string {
  return `${record.perplexity.toFixed(1)}\t${record.text}\t(${record.id})`;
}

// ─── Hypothesis File ────────────────────────────────────────────────────────────

/**
 * Parses one hypothesis line. The last whitespace-delimited field is the id.
 *
 * @throws ValidationError when the line holds no id.
 */
export function parseHypothesisLine(line: string, lineNumber = 1): HypothesisRecord {
  const trimmed = line.trim();
  const split = trimmed.search(/\s\S*$/u);
  const idField = split === -1 ? trimmed : trimmed.slice(split + 1);
  const text = split === -1 ? "" : trimmed.slice(0, split).trim();

  const id = unwrapIdentifier(idField);
  if (id.length === 0) {
    throw new ValidationError(`Hypothesis line ${lineNumber}: missing utterance id`);
  }

  return { text, id, line: trimmed };
}

/** Parses a whole hypothesis trn file, preserving file order. Blank lines are skipped. */
export function parseHypothesisFile(content: string): HypothesisRecord[] {
  return contentLines(content).map(({ line, lineNumber }) => parseHypothesisLine(line, lineNumber));
}

/** Joins lines into file content, each terminated by a newline. */
export function serializeLines(lines: readonly string[]): string {
  return lines.map((line) => `${line}\n`).join("");
}

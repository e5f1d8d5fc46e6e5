// Perplexity Sectioner - Corpus preparation
// Builds the corpus transcript from paired .wav/.txt files and tokenizes it
// into the symbol stream the external perplexity scorer reads.

import { mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { IOError, ValidationError } from "./errors.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { retokenizeLine } from "./tokenizer.js";
import type { TokenizerOptions } from "./tokenizer.js";
import { formatTrnLine, serializeLines } from "./trn-format.js";
import type { TokenizerMode } from "./types.js";

/** Name of the cached corpus transcript inside a data directory. */
export const CORPUS_TRN_FILE_NAME = "trn";

export interface PrepareOptions {
  mode?: TokenizerMode;
  tokenizer?: TokenizerOptions;
  logger?: Logger;
}

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }
}

/**
 * Lists `<text> (<name>)` for every `*.wav` in `dataDir`, sorted by file
 * name, taking the text from the `<name>.txt` beside it with its whitespace
 * collapsed to single spaces.
 *
 * @throws ValidationError if `dataDir` is not a directory or a transcript is missing.
 */
export async function buildCorpusTranscript(dataDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dataDir);
  } catch (err) {
    throw new ValidationError(`'${dataDir}' is not a directory`, { cause: err });
  }

  // Code-unit order, not locale order
  const wavs = entries.filter((name) => extname(name) === ".wav").sort();
  const lines: string[] = [];

  for (const wav of wavs) {
    const name = basename(wav, ".wav");
    const txtPath = join(dataDir, `${name}.txt`);
    const content = await readIfExists(txtPath);
    if (content === null) {
      throw new ValidationError(`Missing transcript '${txtPath}' for '${wav}'`);
    }
    // One trn line per recording: inner line breaks become spaces
    const text = content.split(/\s+/).filter(Boolean).join(" ");
    lines.push(formatTrnLine(text, name));
  }

  return lines;
}

/**
 * Loads `dataDir/trn` if present, otherwise builds it from the wav/txt pairs
 * and caches it there.
 */
export async function loadCorpusTranscript(dataDir: string, logger: Logger = silentLogger): Promise<string[]> {
  const trnPath = join(dataDir, CORPUS_TRN_FILE_NAME);
  const cached = await readIfExists(trnPath);
  if (cached !== null) {
    logger.debug(`Reusing ${trnPath}`);
    return cached.split(/\r?\n/).filter((line) => line.trim().length > 0);
  }

  const lines = await buildCorpusTranscript(dataDir);
  try {
    await writeFile(trnPath, serializeLines(lines), "utf-8");
  } catch (err) {
    throw new IOError(trnPath, err);
  }
  logger.info(`Built ${trnPath} from ${lines.length} recording(s)`);
  return lines;
}

/**
 * Writes the corpus transcript of `dataDir`, re-tokenized, to `outPath`.
 *
 * @returns Number of lines written.
 */
export async function prepareTokenizedTranscript(
  dataDir: string,
  outPath: string,
  options: PrepareOptions = {},
): Promise<number> {
  const { mode = "phonetic", tokenizer, logger = silentLogger } = options;

  try {
    if (!(await stat(dataDir)).isDirectory()) {
      throw new ValidationError(`'${dataDir}' is not a directory`);
    }
  } catch (err) {
    if (err instanceof ValidationError) throw err;
    throw new ValidationError(`'${dataDir}' is not a directory`, { cause: err });
  }

  const lines = await loadCorpusTranscript(dataDir, logger);
  const tokenized = lines.map((line) => retokenizeLine(line, mode, tokenizer));

  try {
    await mkdir(dirname(outPath), { recursive: true });
    await writeFile(outPath, serializeLines(tokenized), "utf-8");
  } catch (err) {
    throw new IOError(outPath, err);
  }
  logger.info(`Wrote ${tokenized.length} ${mode} line(s) to ${outPath}`);
  return tokenized.length;
}

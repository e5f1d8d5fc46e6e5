// Perplexity Sectioner - Sectioning run
//
// Pipeline: validate request → check completion marker → parse inputs →
// align → partition → materialize → write marker.
//
// Every check that can fail on bad input runs before the first write, so an
// invalid request never leaves bin directories behind. A run that fails
// during materialization leaves the bins it already wrote but no marker;
// such a directory counts as incomplete.

import { readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { BinMaterializer } from "./bin-materializer.js";
import { DEFAULT_CONFIG } from "./config.js";
import type { SectionerConfig } from "./config.js";
import { IOError, MissingUtterancesError, ValidationError } from "./errors.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { partition } from "./rank-partitioner.js";
import { align, assertOneToOne, assertSameOrder, assertUniqueIds } from "./record-aligner.js";
import { parseHypothesisFile, parsePerplexityFile } from "./trn-format.js";
import type {
  AlignedRecord,
  HypothesisRecord,
  PerplexityRecord,
  SectionRequest,
  SectionResult,
} from "./types.js";

export interface SectionerDeps {
  config?: Partial<SectionerConfig>;
  logger?: Logger;
}

/** Body of the completion marker file. */
export function formatMarker(perplexityPath: string): string {
  return `split using: ${perplexityPath}\n`;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export class PerplexitySectioner {
  private readonly config: SectionerConfig;
  private readonly logger: Logger;

  constructor(deps: SectionerDeps = {}) {
    this.config = { ...DEFAULT_CONFIG, ...deps.config };
    this.logger = deps.logger ?? silentLogger;
  }

  /** Path of the completion marker for an output directory. */
  markerPath(outDir: string): string {
    return join(outDir, this.config.markerFileName);
  }

  /**
   * Validates the request shape and that every path exists.
   *
   * @throws ValidationError on the first problem found.
   */
  async validateRequest(request: SectionRequest): Promise<void> {
    const { perplexityPath, hypothesisPath, binCount, outDir } = request;

    if (!Number.isInteger(binCount) || binCount < 0) {
      throw new ValidationError(`'${binCount}' is not a non-negative int`);
    }
    if (!(await isFile(perplexityPath))) {
      throw new ValidationError(`'${perplexityPath}' is not a file`);
    }
    if (!(await isFile(hypothesisPath))) {
      throw new ValidationError(`'${hypothesisPath}' is not a file`);
    }
    if (!(await isDirectory(outDir))) {
      throw new ValidationError(`'${outDir}' is not a directory`);
    }
  }

  /** Whether the output directory already holds a completed split. */
  async isComplete(outDir: string): Promise<boolean> {
    return isFile(this.markerPath(outDir));
  }

  /**
   * Runs a full sectioning pass.
   *
   * @throws ValidationError for a bad request or malformed input files.
   * @throws AlignmentError (or MissingUtterancesError) when the two files
   *   do not describe the same utterances.
   * @throws IOError when output cannot be written.
   */
  async section(request: SectionRequest): Promise<SectionResult> {
    await this.validateRequest(request);
    const { perplexityPath, hypothesisPath, binCount, outDir } = request;

    if (await this.isComplete(outDir)) {
      this.logger.info(`${outDir} already split (found ${this.config.markerFileName}), skipping`);
      return { skipped: true, bins: [], total: 0, excludedLow: 0, excludedHigh: 0 };
    }

    const perplexities = parsePerplexityFile(await readFile(perplexityPath, "utf-8"));
    const hypotheses = parseHypothesisFile(await readFile(hypothesisPath, "utf-8"));
    this.logger.debug(
      `Parsed ${perplexities.length} perplexity record(s) and ${hypotheses.length} hypothesis line(s)`,
    );

    const aligned = this.alignRecords(perplexities, hypotheses);

    if (binCount === 0) {
      this.logger.warn("Bin count is 0, nothing to write");
      return { skipped: false, bins: [], total: aligned.length, excludedLow: 0, excludedHigh: 0 };
    }

    const result = partition(aligned, binCount, this.config.trimFraction);
    this.logger.info(
      `Partitioned ${result.total} utterance(s) into ${binCount} bin(s); ` +
        `trimmed ${result.excludedLow.length} low and ${result.excludedHigh.length} high`,
    );

    const materializer = new BinMaterializer(outDir, {
      matchStrategy: this.config.matchStrategy,
      logger: this.logger,
    });
    const bins = await materializer.materialize(result, hypotheses);

    const markerPath = this.markerPath(outDir);
    try {
      await writeFile(markerPath, formatMarker(perplexityPath), "utf-8");
    } catch (err) {
      throw new IOError(markerPath, err);
    }
    this.logger.info(`Split complete: ${bins.map((b) => `${b.bin}=${b.count}`).join(" ")}`);

    return {
      skipped: false,
      bins,
      total: result.total,
      excludedLow: result.excludedLow.length,
      excludedHigh: result.excludedHigh.length,
    };
  }

  private alignRecords(perplexities: PerplexityRecord[], hypotheses: HypothesisRecord[]): AlignedRecord[] {
    const hypothesisIds = hypotheses.map((h) => h.id);

    let aligned: AlignedRecord[];
    try {
      aligned = align(perplexities, hypothesisIds);
    } catch (err) {
      if (err instanceof MissingUtterancesError) {
        const missing = new Set(err.missingIds);
        const lines = hypotheses.filter((h) => missing.has(h.id)).map((h) => h.line);
        throw new MissingUtterancesError(err.missingIds, lines);
      }
      throw err;
    }

    // A repeated id on both sides still balances the counts
    assertUniqueIds(hypothesisIds, "hypothesis file");
    assertUniqueIds(
      aligned.map((r) => r.id),
      "perplexity file",
    );

    if (this.config.matchStrategy === "position") {
      assertSameOrder(aligned, hypothesisIds);
    } else {
      assertOneToOne(aligned, hypotheses.length);
    }
    return aligned;
  }
}

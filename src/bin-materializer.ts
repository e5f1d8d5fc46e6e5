// Perplexity Sectioner - Bin Materializer
// Writes each bin's reference and hypothesis transcripts to disk.
//
// Output directory structure:
//   {outDir}/{bin}/
//     ref.trn   <text> (<id>)                 reference text, corpus order
//     hyp.trn   <t o k e n s> (<id>)          re-tokenized hypothesis, same order
//
// Both files of a bin list the same ids in the same order: records are
// sorted by their aligned position before either file is serialized.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { AlignmentError, IOError } from "./errors.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { retokenizeLine, PLAIN_TOKENIZER } from "./tokenizer.js";
import type { TokenizerOptions } from "./tokenizer.js";
import { formatTrnLine, serializeLines } from "./trn-format.js";
import type {
  AlignedRecord,
  HypothesisRecord,
  MatchStrategy,
  MaterializedBin,
  PartitionResult,
  UtteranceId,
} from "./types.js";

export const REF_FILE_NAME = "ref.trn";
export const HYP_FILE_NAME = "hyp.trn";

export interface BinMaterializerOptions {
  /** How bin records find their hypothesis line. Default: "id" */
  matchStrategy?: MatchStrategy;
  /** Tokenizer applied to hypothesis text. Default: plain mode with "_" boundaries */
  tokenizer?: TokenizerOptions;
  logger?: Logger;
}

/**
 * Pairs aligned records with hypothesis records. Each hypothesis is handed
 * out at most once.
 */
export class HypothesisLookup {
  private readonly byId = new Map<UtteranceId, HypothesisRecord>();
  private readonly byPosition = new Map<number, HypothesisRecord>();
  private readonly consumed = new Set<HypothesisRecord>();
  private readonly strategy: MatchStrategy;

  constructor(hypotheses: readonly HypothesisRecord[], strategy: MatchStrategy = "id") {
    this.strategy = strategy;
    hypotheses.forEach((hyp, index) => {
      // First occurrence of an id wins
      if (!this.byId.has(hyp.id)) this.byId.set(hyp.id, hyp);
      this.byPosition.set(index + 1, hyp);
    });
  }

  /**
   * Takes the hypothesis for `record`, or null if there is none left.
   */
  take(record: AlignedRecord): HypothesisRecord | null {
    const hyp =
      this.strategy === "id" ? this.byId.get(record.id) : this.byPosition.get(record.position);
    if (!hyp || this.consumed.has(hyp)) {
      return null;
    }
    this.consumed.add(hyp);
    return hyp;
  }
}

/**
 * Orders a bin's records by aligned position, i.e. original corpus order.
 */
export function inCorpusOrder(records: readonly AlignedRecord[]): AlignedRecord[] {
  return [...records].sort((a, b) => a.position - b.position);
}

export class BinMaterializer {
  private readonly outDir: string;
  private readonly matchStrategy: MatchStrategy;
  private readonly tokenizer: TokenizerOptions;
  private readonly logger: Logger;

  constructor(outDir: string, options: BinMaterializerOptions = {}) {
    this.outDir = outDir;
    this.matchStrategy = options.matchStrategy ?? "id";
    this.tokenizer = options.tokenizer ?? PLAIN_TOKENIZER;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Builds the ref.trn and hyp.trn lines of one bin.
   *
   * @throws AlignmentError if a record has no hypothesis to pair with.
   */
  renderBin(records: readonly AlignedRecord[], lookup: HypothesisLookup): { ref: string[]; hyp: string[] } {
    const ref: string[] = [];
    const hyp: string[] = [];

    for (const record of inCorpusOrder(records)) {
      const hypothesis = lookup.take(record);
      if (!hypothesis) {
        throw new AlignmentError(
          `No hypothesis line left for utterance '${record.id}' (position ${record.position})`,
        );
      }
      if (hypothesis.id !== record.id) {
        throw new AlignmentError(
          `Hypothesis at position ${record.position} is '${hypothesis.id}', expected '${record.id}'`,
        );
      }
      ref.push(formatTrnLine(record.text, record.id));
      hyp.push(retokenizeLine(hypothesis.line, "plain", this.tokenizer));
    }

    return { ref, hyp };
  }

  /**
   * Writes `{outDir}/{i}/ref.trn` and `{outDir}/{i}/hyp.trn` for every bin.
   * Bins written before a failure stay on disk.
   *
   * @returns One entry per bin, in bin order.
   * @throws IOError if a directory or file cannot be written.
   */
  async materialize(
    partitionResult: PartitionResult,
    hypotheses: readonly HypothesisRecord[],
  ): Promise<MaterializedBin[]> {
    const lookup = new HypothesisLookup(hypotheses, this.matchStrategy);
    const written: MaterializedBin[] = [];

    for (let bin = 1; bin <= partitionResult.binCount; bin++) {
      const records = partitionResult.bins[bin - 1] ?? [];
      const { ref, hyp } = this.renderBin(records, lookup);

      const dir = join(this.outDir, String(bin));
      const refPath = join(dir, REF_FILE_NAME);
      const hypPath = join(dir, HYP_FILE_NAME);

      await this.write(dir, () => mkdir(dir, { recursive: true }));
      await this.write(refPath, () => writeFile(refPath, serializeLines(ref), "utf-8"));
      await this.write(hypPath, () => writeFile(hypPath, serializeLines(hyp), "utf-8"));

      this.logger.debug(`Bin ${bin}: ${records.length} utterance(s) written to ${dir}`);
      written.push({ bin, dir, refPath, hypPath, count: records.length });
    }

    return written;
  }

  private async write(path: string, op: () => Promise<unknown>): Promise<void> {
    try {
      await op();
    } catch (err) {
      throw new IOError(path, err);
    }
  }
}

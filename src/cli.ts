// Perplexity Sectioner - Command-line surface
// Argument parsing and error reporting for the section-data and prepare-trn
// commands. Both return an exit code instead of exiting so they stay testable.

import { loadConfig } from "./config.js";
import type { SectionerConfig } from "./config.js";
import { prepareTokenizedTranscript } from "./corpus-prep.js";
import { MissingUtterancesError, SectioningError, ValidationError } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { PerplexitySectioner } from "./sectioner.js";
import type { SectionRequest, TokenizerMode } from "./types.js";

export const SECTION_USAGE = "Usage: section-data perp_file hypothesis_trn_file num-to-split out-dir";
export const PREPARE_USAGE = "Usage: prepare-trn [--plain] data-dir out-file";

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  /** Overrides the console logger built from LOG_LEVEL. */
  logger?: Logger;
}

/**
 * Parses a bin count. Only plain decimal digits are accepted.
 *
 * @throws ValidationError for anything that is not a non-negative integer.
 */
export function parseBinCount(raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new ValidationError(`'${raw}' is not a non-negative int`);
  }
  const value = Number(raw.trim());
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError(`'${raw}' is too large`);
  }
  return value;
}

/**
 * Turns the four positional arguments into a sectioning request.
 *
 * @throws ValidationError on a wrong argument count or a bad bin count.
 */
export function parseSectionArgs(args: readonly string[]): SectionRequest {
  if (args.length !== 4) {
    throw new ValidationError(SECTION_USAGE);
  }
  const [perplexityPath, hypothesisPath, rawBinCount, outDir] = args;
  return { perplexityPath, hypothesisPath, binCount: parseBinCount(rawBinCount), outDir };
}

function setup(command: string, deps: CliDeps): { config: SectionerConfig; logger: Logger } {
  const config = loadConfig(deps.env ?? process.env);
  return { config, logger: deps.logger ?? createConsoleLogger(command, config.logLevel) };
}

function report(err: unknown, logger: Logger, request?: SectionRequest): number {
  if (err instanceof MissingUtterancesError) {
    const source = request
      ? `'${request.perplexityPath}' is missing utterances corresponding to the following utterances in '${request.hypothesisPath}':`
      : "Missing utterances:";
    logger.error(source);
    const lines = err.offendingLines.length > 0 ? err.offendingLines : err.missingIds;
    for (const line of lines) {
      logger.error(line);
    }
    return err.exitCode;
  }
  if (err instanceof SectioningError) {
    logger.error(err.message);
    return err.exitCode;
  }
  logger.error("Unexpected failure:", err);
  return 1;
}

/**
 * `section-data perp_file hypothesis_trn_file num-to-split out-dir`
 */
export async function runSectionCli(args: readonly string[], deps: CliDeps = {}): Promise<number> {
  let logger = deps.logger ?? createConsoleLogger("section-data");
  let request: SectionRequest | undefined;

  try {
    request = parseSectionArgs(args);
    const ctx = setup("section-data", deps);
    logger = ctx.logger;

    const sectioner = new PerplexitySectioner({ config: ctx.config, logger });
    await sectioner.section(request);
    return 0;
  } catch (err) {
    return report(err, logger, request);
  }
}

/**
 * `prepare-trn [--plain] data-dir out-file`
 */
export async function runPrepareCli(args: readonly string[], deps: CliDeps = {}): Promise<number> {
  let logger = deps.logger ?? createConsoleLogger("prepare-trn");

  try {
    const mode: TokenizerMode = args.includes("--plain") ? "plain" : "phonetic";
    const positional = args.filter((arg) => arg !== "--plain");
    if (positional.length !== 2 || positional.some((arg) => arg.startsWith("--"))) {
      throw new ValidationError(PREPARE_USAGE);
    }
    const [dataDir, outPath] = positional;

    const ctx = setup("prepare-trn", deps);
    logger = ctx.logger;

    await prepareTokenizedTranscript(dataDir, outPath, { mode, logger });
    return 0;
  } catch (err) {
    return report(err, logger);
  }
}

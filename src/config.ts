// Perplexity Sectioner - Configuration
// Values come from the process environment (populated from .env by the CLI launchers).

import { basename } from "node:path";
import { ValidationError } from "./errors.js";
import { LOG_LEVELS } from "./logger.js";
import type { LogLevel } from "./logger.js";
import type { MatchStrategy } from "./types.js";

export interface SectionerConfig {
  /** Fraction of records dropped from each perplexity extreme. Default: 0.05 */
  trimFraction: number;
  /** How bin records are paired with hypothesis lines. Default: "id" */
  matchStrategy: MatchStrategy;
  /** Completion marker file name inside the output directory. Default: ".done_split" */
  markerFileName: string;
  /** Minimum log level. Default: "info" */
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<SectionerConfig> = {
  trimFraction: 0.05,
  matchStrategy: "id",
  markerFileName: ".done_split",
  logLevel: "info",
};

const MATCH_STRATEGIES: readonly MatchStrategy[] = ["id", "position"];

function isMatchStrategy(value: string): value is MatchStrategy {
  return MATCH_STRATEGIES.some((strategy) => strategy === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Checks a trim fraction: the two trimmed tails together must leave something to bin.
 */
export function validateTrimFraction(value: number): number {
  if (!Number.isFinite(value) || value < 0 || value >= 0.5) {
    throw new ValidationError(`Trim fraction must be a number in [0, 0.5), got ${value}`);
  }
  return value;
}

/**
 * Builds the configuration from environment variables, falling back to defaults
 * for anything unset or empty.
 *
 * @throws ValidationError for values that are set but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SectionerConfig {
  const config: SectionerConfig = { ...DEFAULT_CONFIG };

  const trim = env.SECTION_TRIM_FRACTION?.trim();
  if (trim) {
    const parsed = Number(trim);
    if (Number.isNaN(parsed)) {
      throw new ValidationError(`SECTION_TRIM_FRACTION '${trim}' is not a number`);
    }
    config.trimFraction = validateTrimFraction(parsed);
  }

  const strategy = env.SECTION_MATCH_STRATEGY?.trim();
  if (strategy) {
    if (!isMatchStrategy(strategy)) {
      throw new ValidationError(
        `SECTION_MATCH_STRATEGY '${strategy}' must be one of: ${MATCH_STRATEGIES.join(", ")}`,
      );
    }
    config.matchStrategy = strategy;
  }

  const marker = env.SECTION_MARKER_FILE?.trim();
  if (marker) {
    if (basename(marker) !== marker || marker === "." || marker === "..") {
      throw new ValidationError(`SECTION_MARKER_FILE '${marker}' must be a bare file name`);
    }
    config.markerFileName = marker;
  }

  const level = env.LOG_LEVEL?.trim().toLowerCase();
  if (level) {
    if (!isLogLevel(level)) {
      throw new ValidationError(`LOG_LEVEL '${level}' must be one of: ${LOG_LEVELS.join(", ")}`);
    }
    config.logLevel = level;
  }

  return config;
}

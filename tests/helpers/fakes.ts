/**
 * Deterministic in-memory collaborators for splitter tests.
 */

import { fileURLToPath } from "node:url";

import { WordListDictionary } from "../../src/shared/dictionary.js";
import { FrequencyTable } from "../../src/shared/frequencies.js";
import { createLogger, silentLogger, type Logger, type LogLevel } from "../../src/shared/logger.js";
import { getDefaultAffixTables } from "../../src/splitter/affixes.js";
import type { SameCaseContext } from "../../src/splitter/same-case.js";
import { ScoringModel } from "../../src/splitter/scoring.js";

export const FIXTURE_FREQUENCIES = fileURLToPath(
  new URL("../fixtures/frequencies.tsv", import.meta.url)
);
export const FIXTURE_WORDS = fileURLToPath(new URL("../fixtures/words.txt", import.meta.url));

/**
 * Same table and word list as the fixture files, for tests that build
 * splitters in memory.
 */
export const REFERENCE_FREQUENCIES: Record<string, number> = {
  auto: 5000,
  commit: 8000,
  gps: 300,
  module: 4000,
  get: 20000,
  max: 6000,
  usage: 2500,
  data: 15000,
  argv: 2000,
  arg: 3000,
  ns: 200,
  template: 3000,
  match: 4000,
  ref: 500,
  set: 6000,
  meter: 900,
  visitor: 700,
};

export const REFERENCE_WORDS = [
  "commit",
  "data",
  "get",
  "match",
  "max",
  "meter",
  "module",
  "set",
  "template",
  "usage",
  "visitor",
];

export function buildScoring(
  frequencies: Record<string, number>,
  words: readonly string[] = []
): ScoringModel {
  return new ScoringModel(FrequencyTable.fromEntries(frequencies), new WordListDictionary(words));
}

export function buildContext(
  frequencies: Record<string, number>,
  words: readonly string[] = [],
  logger: Logger = silentLogger
): SameCaseContext {
  return {
    scoring: buildScoring(frequencies, words),
    affixes: getDefaultAffixTables(),
    logger,
  };
}

export function recordingLogger(level: LogLevel = "debug"): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = createLogger({ level, sink: (_level, line) => lines.push(line) });
  return { logger, lines };
}

/**
 * Builds splitters from resolved configuration and keeps a process-wide
 * splitter per (config file, cwd, log level) for `splitIdentifier`.
 */

import { loadSplitterConfig, type SplitterConfig } from "../shared/config.js";
import { loadWordList, WordListDictionary } from "../shared/dictionary.js";
import { FrequencyTable, loadFrequencyTable } from "../shared/frequencies.js";
import { createLogger, type Logger, type LogLevel } from "../shared/logger.js";

import { getDefaultAffixTables } from "./affixes.js";
import { SamuraiSplitter } from "./samurai.js";
import { DelimiterSplitter } from "./simple-split.js";

export function createSplitterFromConfig(
  config: SplitterConfig,
  logger: Logger = createLogger({ level: config.logLevel })
): SamuraiSplitter {
  const frequencies = config.frequencies
    ? loadFrequencyTable(config.frequencies)
    : new FrequencyTable();
  if (config.frequencies) {
    logger.debug(() => `loaded ${frequencies.size} frequency entries from ${config.frequencies}`);
  } else {
    logger.warn(
      "No frequency table configured; every token scores 0 and only unambiguous boundaries are split. " +
        "Set `frequencies` in .idsplit/config.yml or IDSPLIT_FREQUENCIES."
    );
  }

  const dictionary =
    config.dictionary.length > 0 ? loadWordList(config.dictionary) : new WordListDictionary();
  logger.debug(() => `dictionary holds ${dictionary.size} words`);

  const { prefixes, suffixes } = config.affixes;
  const baseAffixes = getDefaultAffixTables();
  const affixes =
    prefixes.length > 0 || suffixes.length > 0
      ? baseAffixes.extend({ prefixes, suffixes })
      : baseAffixes;

  return new SamuraiSplitter({
    frequencies,
    dictionary,
    affixes,
    simpleSplitter: new DelimiterSplitter({ keepDigits: config.keepDigits }),
    noiseThreshold: config.noiseThreshold,
    scoreFloor: config.scoreFloor,
    maxIdentifierLength: config.maxIdentifierLength,
    logger,
  });
}

// ============================================================
// Shared splitter cache
// ============================================================

export interface SplitIdentifierOptions {
  /** Diagnostic verbosity; defaults to the configured level */
  logLevel?: LogLevel;
  configPath?: string;
  cwd?: string;
}

const cachedSplitters = new Map<string, SamuraiSplitter>();

export function getSharedSplitter(options: SplitIdentifierOptions = {}): SamuraiSplitter {
  const cwd = options.cwd ?? process.cwd();
  const key = JSON.stringify([options.configPath ?? null, cwd, options.logLevel ?? null]);
  const cached = cachedSplitters.get(key);
  if (cached) {
    return cached;
  }
  const config = loadSplitterConfig({
    cwd,
    ...(options.configPath !== undefined && { configPath: options.configPath }),
    ...(options.logLevel !== undefined && { overrides: { logLevel: options.logLevel } }),
  });
  const splitter = createSplitterFromConfig(config);
  cachedSplitters.set(key, splitter);
  return splitter;
}

/**
 * Splits one identifier with the process-wide splitter for `options`.
 */
export function splitIdentifier(identifier: string, options: SplitIdentifierOptions = {}): string[] {
  return getSharedSplitter(options).split(identifier);
}

/**
 * Test hook: drop all cached splitters.
 */
export function clearSplitterCache(): void {
  cachedSplitters.clear();
}

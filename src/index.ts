export {
  SamuraiSplitter,
  samuraiSplit,
  IdentifierTooLongError,
  DEFAULT_MAX_LENGTH,
  type SamuraiSplitterOptions,
} from "./splitter/samurai.js";
export {
  createSplitterFromConfig,
  getSharedSplitter,
  splitIdentifier,
  clearSplitterCache,
  type SplitIdentifierOptions,
} from "./splitter/loader.js";
export { sameCaseSplit, DEFAULT_SCORE_FLOOR, type SameCaseContext } from "./splitter/same-case.js";
export { splitOnCaseTransition, type CaseTransitionContext } from "./splitter/case-transition.js";
export { ScoringModel, DEFAULT_NOISE_THRESHOLD, type ScoringOptions } from "./splitter/scoring.js";
export {
  AffixTables,
  loadAffixTables,
  getDefaultAffixTables,
  clearAffixCache,
  type AffixLists,
} from "./splitter/affixes.js";
export { DelimiterSplitter, type DelimiterSplitterOptions } from "./splitter/simple-split.js";
export type { DictionaryOracle, FrequencyModel, SimpleSplitter } from "./splitter/types.js";
export { FrequencyTable, loadFrequencyTable, parseFrequencyText } from "./shared/frequencies.js";
export { WordListDictionary, loadWordList } from "./shared/dictionary.js";
export {
  loadSplitterConfig,
  defaultConfig,
  type SplitterConfig,
  type ConfigOverrides,
  type LoadConfigOptions,
} from "./shared/config.js";
export {
  createLogger,
  silentLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogSink,
} from "./shared/logger.js";

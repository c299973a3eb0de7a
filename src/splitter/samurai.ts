/**
 * Samurai-style identifier splitting
 *
 * identifier → SimpleSplitter (delimiters, digits, lower→upper)
 *            → case-transition resolution per segment
 *            → recursive same-case splitting per piece
 *
 * @see Enslen et al., "Mining source code to automatically split identifiers
 *      for software analysis", MSR 2009
 */

import { silentLogger, type Logger } from "../shared/logger.js";

import { getDefaultAffixTables, type AffixTables } from "./affixes.js";
import { splitOnCaseTransition } from "./case-transition.js";
import { DEFAULT_SCORE_FLOOR, sameCaseSplit, type SameCaseContext } from "./same-case.js";
import { ScoringModel } from "./scoring.js";
import { DelimiterSplitter } from "./simple-split.js";
import type { DictionaryOracle, FrequencyModel, SimpleSplitter } from "./types.js";

export const DEFAULT_MAX_LENGTH = 256;

export class IdentifierTooLongError extends Error {
  constructor(
    public readonly length: number,
    public readonly limit: number
  ) {
    super(
      `Identifier of ${length} characters exceeds the limit of ${limit} → shorten the input or raise maxIdentifierLength`
    );
    this.name = "IdentifierTooLongError";
  }
}

export interface SamuraiSplitterOptions {
  frequencies: FrequencyModel;
  dictionary: DictionaryOracle;
  /** Defaults to DelimiterSplitter */
  simpleSplitter?: SimpleSplitter;
  /** Defaults to the bundled prefix/suffix lists */
  affixes?: AffixTables;
  noiseThreshold?: number;
  /** Threshold floor used by sameCaseSplit when no score is given */
  scoreFloor?: number;
  maxIdentifierLength?: number;
  logger?: Logger;
}

export class SamuraiSplitter {
  readonly scoring: ScoringModel;
  private readonly context: SameCaseContext;
  private readonly simpleSplitter: SimpleSplitter;
  private readonly scoreFloor: number;
  private readonly maxIdentifierLength: number;
  private readonly logger: Logger;

  constructor(options: SamuraiSplitterOptions) {
    const scoringOptions =
      options.noiseThreshold !== undefined ? { noiseThreshold: options.noiseThreshold } : {};
    this.scoring = new ScoringModel(options.frequencies, options.dictionary, scoringOptions);
    this.logger = options.logger ?? silentLogger;
    this.context = {
      scoring: this.scoring,
      affixes: options.affixes ?? getDefaultAffixTables(),
      logger: this.logger,
    };
    this.simpleSplitter = options.simpleSplitter ?? new DelimiterSplitter();
    this.scoreFloor = options.scoreFloor ?? DEFAULT_SCORE_FLOOR;
    this.maxIdentifierLength = options.maxIdentifierLength ?? DEFAULT_MAX_LENGTH;
  }

  /**
   * Splits an identifier into word tokens, in order.
   *
   * @throws {IdentifierTooLongError} above the configured length limit
   */
  split(identifier: string): string[] {
    if (identifier.length > this.maxIdentifierLength) {
      throw new IdentifierTooLongError(identifier.length, this.maxIdentifierLength);
    }
    if (identifier.length === 0) {
      return [];
    }
    this.logger.debug(() => `splitting ${identifier}`);

    const pieces: string[] = [];
    for (const segment of this.simpleSplitter.split(identifier)) {
      pieces.push(...this.splitOnCaseTransition(segment));
    }
    this.logger.debug(() => `turning over to same-case split: ${JSON.stringify(pieces)}`);

    const results: string[] = [];
    for (const piece of pieces) {
      // each piece is its own threshold floor
      results.push(...this.sameCaseSplit(piece, this.scoring.score(piece)));
    }
    this.logger.debug(() => `final results: ${JSON.stringify(results)}`);
    return results;
  }

  sameCaseSplit(token: string, scoreNs: number = this.scoreFloor): string[] {
    return sameCaseSplit(token, this.context, scoreNs);
  }

  splitOnCaseTransition(segment: string): string[] {
    return splitOnCaseTransition(segment, this.context);
  }
}

/**
 * One-shot split with a freshly built splitter.
 */
export function samuraiSplit(identifier: string, options: SamuraiSplitterOptions): string[] {
  return new SamuraiSplitter(options).split(identifier);
}

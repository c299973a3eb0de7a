import type { DictionaryOracle, FrequencyModel } from "./types.js";

/**
 * Frequencies below this count are treated as noise (score 0).
 */
export const DEFAULT_NOISE_THRESHOLD = 30;

export interface ScoringOptions {
  noiseThreshold?: number;
}

/**
 * Frequency-based "goodness" of a token, plus the rescaling used to compare
 * candidate pieces against a split threshold.
 */
export class ScoringModel {
  private readonly noiseThreshold: number;

  constructor(
    private readonly frequencies: FrequencyModel,
    private readonly dictionary: DictionaryOracle,
    options: ScoringOptions = {}
  ) {
    this.noiseThreshold = options.noiseThreshold ?? DEFAULT_NOISE_THRESHOLD;
  }

  /**
   * Corpus frequency of `token`, or 0 when it falls below the noise threshold.
   */
  score(token: string): number {
    const frequency = this.frequencies.frequency(token);
    return frequency < this.noiseThreshold ? 0 : frequency;
  }

  /**
   * Length- and dictionary-sensitive normalization of a raw score.
   *
   * - single characters (and the empty string) never count: 0
   * - dictionary words of up to 4 characters: value^(1/2)
   * - everything else: value^(1/2.5)
   */
  rescale(token: string, value: number): number {
    if (token.length <= 1) {
      return 0;
    }
    if (token.length <= 4 && this.isWord(token)) {
      return Math.sqrt(value);
    }
    return Math.pow(value, 1 / 2.5);
  }

  isWord(token: string): boolean {
    return this.dictionary.isWord(token);
  }
}

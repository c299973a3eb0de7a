/**
 * Same-case splitting
 *
 * Recursive search for the cut points of a case-uniform token ("autocommit",
 * "NSTEMPLATEMATCHREFSET"). Every cut index is visited; two rules record a
 * candidate:
 *
 * - case 1: neither piece is a bound affix and both pieces clear the
 *   threshold after rescaling. Only the best `score(left) + score(right)`
 *   seen so far among case-1 cuts is kept.
 * - case 2: the left piece clears the threshold but the right one does not.
 *   The right piece is split recursively and, if that produced a split, the
 *   result replaces whatever was recorded before (case-1 results included).
 *
 * The scan never stops early, so the last recorded candidate wins.
 */

import type { Logger } from "../shared/logger.js";

import type { AffixTables } from "./affixes.js";
import type { ScoringModel } from "./scoring.js";

/**
 * Floor for the split threshold when the caller has no score of its own.
 * Keeps near-zero distinct from zero in the `>` comparisons.
 */
export const DEFAULT_SCORE_FLOOR = 0.0000005;

export interface SameCaseContext {
  scoring: ScoringModel;
  affixes: AffixTables;
  logger: Logger;
}

type SplitMemo = Map<string, readonly string[]>;

export function sameCaseSplit(
  token: string,
  context: SameCaseContext,
  scoreNs: number = DEFAULT_SCORE_FLOOR
): string[] {
  // scoreNs is fixed for the whole search, so results depend on the token alone
  const memo: SplitMemo = new Map();
  return [...searchSplit(token, scoreNs, context, memo)];
}

function searchSplit(
  token: string,
  scoreNs: number,
  context: SameCaseContext,
  memo: SplitMemo
): readonly string[] {
  const cached = memo.get(token);
  if (cached) {
    return cached;
  }
  const result = computeSplit(token, scoreNs, context, memo);
  memo.set(token, result);
  return result;
}

function computeSplit(
  token: string,
  scoreNs: number,
  context: SameCaseContext,
  memo: SplitMemo
): readonly string[] {
  const { scoring, affixes, logger } = context;

  if (token.length < 2) {
    logger.debug(() => `"${token}" cannot be split; returning as-is`);
    return [token];
  }
  if (scoring.isWord(token)) {
    logger.debug(() => `"${token}" is a dictionary word; returning as-is`);
    return [token];
  }

  let split: readonly string[] | null = null;
  let maxScore = -1;
  const threshold = Math.max(scoring.score(token), scoreNs);
  logger.debug(() => `threshold score for "${token}" = ${threshold}`);

  // i = 0 leaves an empty left piece and can never qualify; it is scanned anyway
  for (let i = 0; i < token.length; i += 1) {
    const left = token.slice(0, i);
    const right = token.slice(i);
    const scoreL = scoring.score(left);
    const scoreR = scoring.score(right);
    const isAffix = affixes.isPrefix(left) || affixes.isSuffix(right);
    const rescaledL = scoring.rescale(left, scoreL);
    const rescaledR = scoring.rescale(right, scoreR);
    const toSplitL = rescaledL > threshold;
    const toSplitR = rescaledR > threshold;

    logger.debug(
      () =>
        `|${left} : ${right}| l = ${rescaledL} r = ${rescaledR} split_l = ${toSplitL} ` +
        `split_r = ${toSplitR} affix = ${isAffix} threshold = ${threshold} max_score = ${maxScore}`
    );

    if (isAffix || !toSplitL) {
      continue;
    }

    if (toSplitR) {
      const combined = scoreL + scoreR;
      if (combined > maxScore) {
        maxScore = combined;
        split = [left, right];
        logger.debug(() => `case 1 split result: ${JSON.stringify(split)}`);
      } else {
        logger.debug(() => `case 1: ${combined} does not beat ${maxScore}`);
      }
      continue;
    }

    logger.debug(() => `case 2: recursive split of "${right}"`);
    const rest = searchSplit(right, scoreNs, context, memo);
    // "no further split" is detected by the first piece being the whole remainder
    if (rest[0] !== right) {
      split = [left, ...rest];
      logger.debug(() => `case 2 split result: ${JSON.stringify(split)}`);
    } else {
      logger.debug(() => `case 2: "${right}" did not split`);
    }
  }

  const result = split ?? [token];
  logger.debug(() => `<-- returning ${JSON.stringify(result)}`);
  return result;
}

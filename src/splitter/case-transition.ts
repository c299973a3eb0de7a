import type { Logger } from "../shared/logger.js";

import type { ScoringModel } from "./scoring.js";

const TRANSITION_PATTERN = /[A-Z][a-z]/;

export interface CaseTransitionContext {
  scoring: ScoringModel;
  logger: Logger;
}

/**
 * Resolves the first upper → lower case transition of a segment.
 *
 * At a transition at index i the upper-case letter either starts the
 * following word (`ASTVisitor` → `AST` + `Visitor`) or ends the preceding
 * one (`GPSmodule` → `GPS` + `module`). The raw score of the camel-case
 * reading is compared against the rescaled score of the remainder without
 * the capital; a tie goes to the second reading.
 *
 * Only the first transition is examined. Returns one or two pieces.
 */
export function splitOnCaseTransition(segment: string, context: CaseTransitionContext): string[] {
  const { scoring, logger } = context;
  const match = TRANSITION_PATTERN.exec(segment);
  if (!match) {
    logger.debug(() => `no upper-to-lower case transition in "${segment}"`);
    return [segment];
  }

  const i = match.index;
  logger.debug(() => `case transition: ${match[0]} at ${i} in "${segment}"`);

  const camel = i > 0 ? segment.slice(i) : segment;
  const camelScore = scoring.score(camel);
  const alt = segment.slice(i + 1);
  const altScore = scoring.rescale(alt, scoring.score(alt));
  logger.debug(() => `"${camel}" score ${camelScore}, "${alt}" rescaled alt score ${altScore}`);

  let parts: string[];
  if (camelScore > altScore) {
    parts = i > 0 ? [segment.slice(0, i), segment.slice(i)] : [segment];
  } else {
    parts = [segment.slice(0, i + 1), segment.slice(i + 1)];
  }
  logger.debug(() => `split outcome: ${JSON.stringify(parts)}`);
  return parts;
}
